import { extractExpressions, parseExpression, containsExpression } from '../src/extractor.js';

describe('parseExpression', () => {
    test('env_var call with single quotes', () => {
        expect(parseExpression("env_var('DB_HOST')")).toEqual({ provider: 'env', name: 'DB_HOST' });
    });

    test('var call with double quotes and inner spaces', () => {
        expect(parseExpression('var( "run_date" )')).toEqual({ provider: 'vars', name: 'run_date' });
    });

    test('recipe attribute', () => {
        expect(parseExpression('recipe.name')).toEqual({ provider: 'recipe', name: 'name' });
    });

    test('mismatched quotes are not recognized', () => {
        expect(parseExpression("env_var('DB_HOST\")")).toBeNull();
    });

    test('unknown function', () => {
        expect(parseExpression("secret('x')")).toBeNull();
    });
});

describe('extractExpressions', () => {
    test('finds every expression with its position', () => {
        const tpl = "{{ recipe.name }}-{{var('env')}}";
        const expressions = extractExpressions(tpl);

        expect(expressions).toHaveLength(2);
        expect(expressions[0]).toEqual({
            raw: '{{ recipe.name }}',
            source: 'recipe.name',
            start: 0,
            end: 17,
            reference: { provider: 'recipe', name: 'name' }
        });
        expect(expressions[1].raw).toBe("{{var('env')}}");
        expect(expressions[1].start).toBe(18);
        expect(expressions[1].reference).toEqual({ provider: 'vars', name: 'env' });
    });

    test('unrecognized expression has a null reference', () => {
        const [expression] = extractExpressions('{{ upper(name) }}');
        expect(expression.source).toBe('upper(name)');
        expect(expression.reference).toBeNull();
    });

    test('repeated calls are independent of regex state', () => {
        expect(extractExpressions('{{ recipe.name }}')).toHaveLength(1);
        expect(extractExpressions('{{ recipe.name }}')).toHaveLength(1);
    });
});

describe('containsExpression', () => {
    test('plain strings', () => {
        expect(containsExpression('postgres://localhost/db')).toBe(false);
        expect(containsExpression('only { braces }')).toBe(false);
    });

    test('empty braces are not an expression', () => {
        expect(containsExpression('a{{}}b')).toBe(false);
        expect(containsExpression('{{ }}')).toBe(true);
    });

    test('strings with an expression', () => {
        expect(containsExpression('x-{{ recipe.name }}')).toBe(true);
    });
});
