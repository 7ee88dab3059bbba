import * as path from 'path';

import { RecipeResolver, loadRecipe } from '../src/core.js';
import { FileDocumentLoader, MemoryDocumentLoader } from '../src/loader.js';
import {
    InheritanceCycleError,
    RecipeNotFoundError,
    RecipeParseError,
    RecipeValidationError,
    UnresolvedReferenceError
} from '../src/errors.js';
import { createSilentLogger } from './helpers.js';

const FIXTURES = path.join(__dirname, 'fixtures');
const env = { RECIPE_TEST_DB_HOST: 'db.test' };

const silentLogger = createSilentLogger();

function fileResolver(): RecipeResolver {
    return new RecipeResolver({
        loader: new FileDocumentLoader({ baseDir: FIXTURES, logger: silentLogger }),
        env,
        logger: silentLogger
    });
}

describe('RecipeResolver with files', () => {
    it('resolves a child over its base', async () => {
        const recipe = await fileResolver().resolve('child.yaml', { vars: { table: 'events_v2' } });

        expect(recipe).toEqual({
            name: 'events_child',
            source: {
                type: 'postgres',
                host: 'db.test',
                database: 'analytics',
                user: 'loader',
                table: 'events_v2'
            },
            transform: {
                steps: [
                    { type: 'add_column', name: '_loaded_at' },
                    { type: 'rename_columns', mapping: { a: 'b' } }
                ]
            },
            destination: {
                type: 'duckdb',
                database: 'warehouse.duckdb',
                table: 'events_child',
                write_mode: 'append'
            },
            runtime: { batch_size: 5000, max_retries: 0 }
        });
    });

    it('applies mid-chain deletes and renders the final name', async () => {
        const { document } = await fileResolver().resolveDocument('nested/grandchild.yaml', { vars: { table: 't' } });

        expect(document.name).toBe('events_grandchild');
        expect(document.transform).toEqual({});
        expect(document.runtime).toEqual({});
        expect(document.destination).toEqual({
            type: 'duckdb',
            database: 'warehouse.duckdb',
            table: 'events_grandchild',
            write_mode: 'overwrite'
        });
        expect(document).not.toHaveProperty('extends');
        expect(document).not.toHaveProperty('delete');
    });

    it('reintroduced steps contain only the descendant entries', async () => {
        const recipe = await fileResolver().resolve('nested/reintroduce.yaml', { vars: { table: 't' } });

        expect(recipe.transform.steps).toEqual([{ type: 'cast', columns: { id: 'int' } }]);
        expect(recipe.runtime.batch_size).toBe(10000);
        expect(recipe.destination.table).toBe('events_reintroduced');
    });

    it('returns the identifier of the resolved file', async () => {
        const { identifier } = await fileResolver().resolveDocument('base.yaml');
        expect(identifier).toBe(path.join(FIXTURES, 'base.yaml'));
    });

    it('fails on a cycle', async () => {
        await expect(fileResolver().resolve('cycle_a.yaml')).rejects.toMatchObject({
            name: 'InheritanceCycleError',
            chain: [
                path.join(FIXTURES, 'cycle_a.yaml'),
                path.join(FIXTURES, 'cycle_b.yaml'),
                path.join(FIXTURES, 'cycle_a.yaml')
            ]
        });
        await expect(fileResolver().resolve('cycle_b.yaml')).rejects.toThrow(InheritanceCycleError);
    });

    it('fails on a missing parent', async () => {
        await expect(fileResolver().resolve('missing_parent.yaml')).rejects.toMatchObject({
            name: 'RecipeNotFoundError',
            recipeId: path.join(FIXTURES, 'does_not_exist.yaml'),
            referencedBy: path.join(FIXTURES, 'missing_parent.yaml')
        });
    });

    it('fails on a missing variable', async () => {
        await expect(fileResolver().resolve('child.yaml')).rejects.toThrow(UnresolvedReferenceError);
        await expect(fileResolver().resolve('child.yaml')).rejects.toMatchObject({
            recipeId: path.join(FIXTURES, 'child.yaml'),
            reference: 'table',
            valuePath: 'source.table'
        });
    });

    it('fails on invalid YAML', async () => {
        await expect(fileResolver().resolve('invalid.yaml')).rejects.toThrow(RecipeParseError);
    });

    it('forwards schema failures', async () => {
        await expect(fileResolver().resolve('bad_batch.yaml')).rejects.toThrow(RecipeValidationError);
        await expect(fileResolver().resolve('bad_batch.yaml')).rejects.toMatchObject({
            issues: [expect.objectContaining({ path: ['runtime', 'batch_size'], code: 'too_small' })]
        });
    });

    it('resolveMany loads a shared base once', async () => {
        const loader = new FileDocumentLoader({ baseDir: FIXTURES, logger: silentLogger });
        const load = jest.spyOn(loader, 'load');
        const resolver = new RecipeResolver({ loader, env, logger: silentLogger });

        const recipes = await resolver.resolveMany(['child.yaml', 'nested/grandchild.yaml'], { vars: { table: 't' } });

        expect(recipes.map(recipe => recipe.name)).toEqual(['events_child', 'events_grandchild']);
        expect(load).toHaveBeenCalledTimes(3);
    });
});

describe('RecipeResolver with memory documents', () => {
    it('resolves a document with no parent, deletes or templates to itself', async () => {
        const plain = {
            name: 'plain',
            source: { type: 'csv', filepath: 'in.csv' },
            transform: { steps: [{ type: 'cast', columns: { id: 'int' } }] },
            destination: { type: 'filestore', filepath: 'out.parquet' },
            runtime: { batch_size: 10, max_retries: 1 }
        };
        const resolver = new RecipeResolver({ loader: new MemoryDocumentLoader({ plain }), env: {}, logger: silentLogger });

        const { document } = await resolver.resolveDocument('plain');
        expect(document).toEqual(plain);
    });

    it('uses process.env when no environment is given', async () => {
        const originalEnv = process.env;
        process.env = { ...originalEnv, RECIPE_TEST_REGION: 'eu-west-1' };
        try {
            const resolver = new RecipeResolver({
                loader: new MemoryDocumentLoader({ r: { region: "{{ env_var('RECIPE_TEST_REGION') }}" } }),
                logger: silentLogger
            });
            const { document } = await resolver.resolveDocument('r');
            expect(document).toEqual({ region: 'eu-west-1' });
        } finally {
            process.env = originalEnv;
        }
    });
});

describe('loadRecipe', () => {
    it('loads a recipe file by path', async () => {
        const recipe = await loadRecipe(path.join(FIXTURES, 'child.yaml'), { table: 'x' }, { env, logger: silentLogger });
        expect(recipe.name).toBe('events_child');
        expect(recipe.source.table).toBe('x');
    });

    it('reports a missing file', async () => {
        await expect(loadRecipe(path.join(FIXTURES, 'absent.yaml'), {}, { env, logger: silentLogger }))
            .rejects.toThrow(RecipeNotFoundError);
    });
});
