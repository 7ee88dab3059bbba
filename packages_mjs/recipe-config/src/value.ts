/**
 * Raw configuration values.
 *
 * A recipe document before validation is a tree of scalars, mappings and
 * sequences. Every operation in this package dispatches on `kind` and
 * treats values as immutable: an update builds a new tree that shares the
 * untouched branches with the old one.
 */

export type ScalarValue = string | number | boolean | null;

export interface RawScalar {
    readonly kind: 'scalar';
    readonly value: ScalarValue;
}

export interface RawMapping {
    readonly kind: 'mapping';
    readonly entries: ReadonlyMap<string, RawValue>;
}

export interface RawSequence {
    readonly kind: 'sequence';
    readonly items: readonly RawValue[];
}

export type RawValue = RawScalar | RawMapping | RawSequence;

export type PlainValue = ScalarValue | PlainValue[] | PlainObject;
export type PlainObject = { [key: string]: PlainValue };

export function scalar(value: ScalarValue): RawScalar {
    return { kind: 'scalar', value };
}

export function mapping(entries: Iterable<readonly [string, RawValue]> = []): RawMapping {
    return { kind: 'mapping', entries: new Map(entries) };
}

export function sequence(items: readonly RawValue[]): RawSequence {
    return { kind: 'sequence', items: [...items] };
}

export function emptyMapping(): RawMapping {
    return mapping();
}

export function describeKind(value: RawValue): string {
    switch (value.kind) {
        case 'mapping':
            return 'mapping';
        case 'sequence':
            return 'sequence';
        case 'scalar':
            return value.value === null ? 'null' : typeof value.value;
    }
}

/**
 * Thrown by fromPlain for values a recipe document cannot hold.
 * Callers that know the document identifier translate it into a RecipeParseError.
 */
export class UnsupportedValueError extends Error {
    constructor(public readonly location: string, public readonly found: string) {
        super(`Unsupported value of type ${found} at '${location || '<root>'}'`);
        this.name = 'UnsupportedValueError';
    }
}

function isPlainRecord(value: object): value is Record<string, unknown> {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function childLocation(location: string, key: string | number): string {
    return location ? `${location}.${key}` : String(key);
}

export function fromPlain(value: unknown, location: string = ''): RawValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return scalar(value);
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new UnsupportedValueError(location, String(value));
        }
        return scalar(value);
    }
    if (Array.isArray(value)) {
        return sequence(value.map((item: unknown, index) => fromPlain(item, childLocation(location, index))));
    }
    if (typeof value !== 'object' || value === null) {
        throw new UnsupportedValueError(location, typeof value);
    }
    if (!isPlainRecord(value)) {
        throw new UnsupportedValueError(location, value.constructor.name);
    }
    return mapping(
        Object.entries(value).map(([key, item]): [string, RawValue] => [key, fromPlain(item, childLocation(location, key))])
    );
}

export function toPlain(value: RawMapping): PlainObject;
export function toPlain(value: RawValue): PlainValue;
export function toPlain(value: RawValue): PlainValue {
    switch (value.kind) {
        case 'scalar':
            return value.value;
        case 'sequence':
            return value.items.map(item => toPlain(item));
        case 'mapping':
            // fromEntries defines data properties, so a "__proto__" key stays a key
            return Object.fromEntries([...value.entries].map(([key, item]): [string, PlainValue] => [key, toPlain(item)]));
    }
}
