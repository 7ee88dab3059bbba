/**
 * Deep merge of a child recipe over its parent.
 *
 * Rules:
 * - Key on one side only: taken as is
 * - Both mappings: merged recursively
 * - Both sequences at an accumulating path (transform.steps): parent items, then child items
 * - Any other pair (sequences elsewhere, scalars, mismatched kinds): child wins
 */

import { sequence, type RawMapping, type RawValue } from './value.js';

export const DEFAULT_ACCUMULATING_FIELDS: readonly string[] = ['transform.steps'];

export interface MergeOptions {
    /** Dotted paths whose sequences concatenate instead of being replaced */
    accumulate?: readonly string[];
}

function mergeValues(parent: RawValue, child: RawValue, path: string, accumulate: ReadonlySet<string>): RawValue {
    switch (child.kind) {
        case 'mapping':
            return parent.kind === 'mapping' ? mergeMappings(parent, child, path, accumulate) : child;
        case 'sequence':
            if (parent.kind === 'sequence' && accumulate.has(path)) {
                return sequence([...parent.items, ...child.items]);
            }
            return child;
        case 'scalar':
            return child;
    }
}

function mergeMappings(parent: RawMapping, child: RawMapping, prefix: string, accumulate: ReadonlySet<string>): RawMapping {
    const entries = new Map<string, RawValue>();

    for (const [key, parentValue] of parent.entries) {
        const childValue = child.entries.get(key);
        if (childValue === undefined) {
            entries.set(key, parentValue);
        } else {
            const path = prefix ? `${prefix}.${key}` : key;
            entries.set(key, mergeValues(parentValue, childValue, path, accumulate));
        }
    }

    for (const [key, childValue] of child.entries) {
        if (!parent.entries.has(key)) {
            entries.set(key, childValue);
        }
    }

    return { kind: 'mapping', entries };
}

export function mergeDocuments(parent: RawMapping, child: RawMapping, options: MergeOptions = {}): RawMapping {
    const accumulate = new Set(options.accumulate ?? DEFAULT_ACCUMULATING_FIELDS);
    return mergeMappings(parent, child, '', accumulate);
}
