import { applyDeletes, readDeleteDirective } from '../src/deletes.js';
import { InvalidDirectiveError, StructuralConflictError } from '../src/errors.js';
import { scalar, sequence, toPlain } from '../src/value.js';
import { setPath } from '../src/path.js';
import { doc } from './helpers.js';

describe('readDeleteDirective', () => {
    it('reads paths in order', () => {
        expect(readDeleteDirective(doc({ delete: ['b.c', 'a'] }))).toEqual(['b.c', 'a']);
    });

    it('treats missing and null as empty', () => {
        expect(readDeleteDirective(doc({}))).toEqual([]);
        expect(readDeleteDirective(doc({ delete: null }))).toEqual([]);
    });

    it('rejects a scalar directive', () => {
        expect(() => readDeleteDirective(doc({ delete: 'transform.steps' }), 'child.yaml'))
            .toThrow("Invalid 'delete' directive: expected a list of dotted paths");
    });

    it('rejects non-string entries', () => {
        expect(() => readDeleteDirective(doc({ delete: ['a', 3] }))).toThrow(InvalidDirectiveError);
        expect(() => readDeleteDirective(doc({ delete: [''] }))).toThrow('entry 0 is not a non-empty string');
    });
});

describe('applyDeletes', () => {
    it('deletes listed paths and strips the directive', () => {
        const result = applyDeletes(doc({
            transform: { steps: [{ type: 'x' }] },
            runtime: { batch_size: 1, max_retries: 2 },
            delete: ['transform.steps', 'runtime.batch_size']
        }));

        expect(toPlain(result)).toEqual({ transform: {}, runtime: { max_retries: 2 } });
    });

    it('ignores absent paths', () => {
        expect(toPlain(applyDeletes(doc({ a: 1, delete: ['b.c'] })))).toEqual({ a: 1 });
    });

    it('an empty directive still gets stripped', () => {
        expect(toPlain(applyDeletes(doc({ a: 1, delete: [] })))).toEqual({ a: 1 });
    });

    it('applying the same paths again changes nothing', () => {
        const directive = sequence([scalar('a.b'), scalar('missing.key')]);
        const once = applyDeletes(setPath(doc({ a: { b: 1, c: 2 } }), 'delete', directive));
        const twice = applyDeletes(setPath(once, 'delete', directive));

        expect(toPlain(once)).toEqual({ a: { c: 2 } });
        expect(toPlain(twice)).toEqual(toPlain(once));
    });

    it('fails when a path runs through a scalar', () => {
        expect(() => applyDeletes(doc({ transform: 'none', delete: ['transform.steps'] }), 'child.yaml'))
            .toThrow(StructuralConflictError);
    });
});
