/**
 * Dot-path addressing over raw mappings.
 *
 * Segments are plain keys. Sequences are never addressed by index; they are
 * replaced or concatenated whole by the merge engine.
 */

import { InvalidPathError, StructuralConflictError } from './errors.js';
import { describeKind, emptyMapping, type RawMapping, type RawValue } from './value.js';

export const ABSENT: unique symbol = Symbol('absent');
export type Absent = typeof ABSENT;

export function splitPath(path: string, recipeId: string | null = null): string[] {
    const segments = path.split('.');
    if (segments.some(segment => segment.length === 0)) {
        throw new InvalidPathError(path, recipeId);
    }
    return segments;
}

function withEntry(doc: RawMapping, key: string, value: RawValue): RawMapping {
    const entries = new Map(doc.entries);
    entries.set(key, value);
    return { kind: 'mapping', entries };
}

function withoutEntry(doc: RawMapping, key: string): RawMapping {
    const entries = new Map(doc.entries);
    entries.delete(key);
    return { kind: 'mapping', entries };
}

export function getPath(doc: RawMapping, path: string, recipeId: string | null = null): RawValue | Absent {
    const segments = splitPath(path, recipeId);
    let current: RawValue = doc;

    for (let i = 0; i < segments.length; i++) {
        if (current.kind !== 'mapping') {
            throw new StructuralConflictError(path, segments.slice(0, i).join('.'), describeKind(current), recipeId);
        }
        const next = current.entries.get(segments[i]);
        if (next === undefined) {
            return ABSENT;
        }
        current = next;
    }

    return current;
}

export function setPath(doc: RawMapping, path: string, value: RawValue, recipeId: string | null = null): RawMapping {
    const segments = splitPath(path, recipeId);

    const assign = (node: RawMapping, depth: number): RawMapping => {
        const key = segments[depth];
        if (depth === segments.length - 1) {
            return withEntry(node, key, value);
        }
        const child = node.entries.get(key) ?? emptyMapping();
        if (child.kind !== 'mapping') {
            throw new StructuralConflictError(path, segments.slice(0, depth + 1).join('.'), describeKind(child), recipeId);
        }
        return withEntry(node, key, assign(child, depth + 1));
    };

    return assign(doc, 0);
}

/**
 * Returns `doc` itself when nothing was removed.
 */
export function deletePath(doc: RawMapping, path: string, recipeId: string | null = null): RawMapping {
    const segments = splitPath(path, recipeId);

    const remove = (node: RawMapping, depth: number): RawMapping => {
        const key = segments[depth];
        if (depth === segments.length - 1) {
            return node.entries.has(key) ? withoutEntry(node, key) : node;
        }
        const child = node.entries.get(key);
        if (child === undefined) {
            return node;
        }
        if (child.kind !== 'mapping') {
            throw new StructuralConflictError(path, segments.slice(0, depth + 1).join('.'), describeKind(child), recipeId);
        }
        const updated = remove(child, depth + 1);
        return updated === child ? node : withEntry(node, key, updated);
    };

    return remove(doc, 0);
}
