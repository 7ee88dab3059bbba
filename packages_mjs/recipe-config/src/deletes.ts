import { InvalidDirectiveError } from './errors.js';
import { deletePath } from './path.js';
import type { RawMapping } from './value.js';

export const DELETE_KEY = 'delete';

/**
 * Paths listed under the `delete` key, in order. Missing or null means none.
 */
export function readDeleteDirective(doc: RawMapping, recipeId: string | null = null): string[] {
    const directive = doc.entries.get(DELETE_KEY);
    if (directive === undefined || (directive.kind === 'scalar' && directive.value === null)) {
        return [];
    }
    if (directive.kind !== 'sequence') {
        throw new InvalidDirectiveError(DELETE_KEY, 'expected a list of dotted paths', recipeId);
    }

    return directive.items.map((item, index) => {
        if (item.kind !== 'scalar' || typeof item.value !== 'string' || item.value.length === 0) {
            throw new InvalidDirectiveError(DELETE_KEY, `entry ${index} is not a non-empty string`, recipeId);
        }
        return item.value;
    });
}

export function applyDeletes(doc: RawMapping, recipeId: string | null = null): RawMapping {
    const paths = readDeleteDirective(doc, recipeId);

    let result = doc;
    for (const path of paths) {
        result = deletePath(result, path, recipeId);
    }

    if (!result.entries.has(DELETE_KEY)) {
        return result;
    }
    const entries = new Map(result.entries);
    entries.delete(DELETE_KEY);
    return { kind: 'mapping', entries };
}
