/**
 * Template rendering over a fully merged recipe document.
 *
 * Runs after inheritance resolution so that `{{ recipe.name }}` sees the
 * final name rather than an ancestor's.
 */

import {
    createTemplateContext,
    renderString,
    TemplateError,
    UnresolvedTemplateReferenceError,
    UnsupportedExpressionError,
    type StringSource,
    type TemplateContext
} from '@datarecipe/template-resolver';

import { TemplateSyntaxError, UnresolvedReferenceError } from './errors.js';
import { scalar, type RawMapping, type RawValue } from './value.js';

export interface RenderOptions {
    recipeId: string;
    /** Environment variables; defaults to process.env */
    env?: StringSource;
    /** Caller-supplied variables */
    vars?: StringSource;
}

function translate(error: TemplateError, recipeId: string, valuePath: string): Error {
    if (error instanceof UnresolvedTemplateReferenceError) {
        return new UnresolvedReferenceError(recipeId, error.provider, error.reference, valuePath, { cause: error });
    }
    if (error instanceof UnsupportedExpressionError) {
        return new TemplateSyntaxError(recipeId, error.expression, valuePath, { cause: error });
    }
    return error;
}

function renderText(text: string, context: TemplateContext, recipeId: string, valuePath: string): string {
    try {
        return renderString(text, context);
    } catch (e) {
        if (e instanceof TemplateError) {
            throw translate(e, recipeId, valuePath);
        }
        throw e;
    }
}

function renderValue(value: RawValue, context: TemplateContext, recipeId: string, valuePath: string): RawValue {
    switch (value.kind) {
        case 'scalar': {
            if (typeof value.value !== 'string') return value;
            const rendered = renderText(value.value, context, recipeId, valuePath);
            return rendered === value.value ? value : scalar(rendered);
        }
        case 'sequence':
            return {
                kind: 'sequence',
                items: value.items.map((item, index) => renderValue(item, context, recipeId, `${valuePath}.${index}`))
            };
        case 'mapping':
            return renderMapping(value, context, recipeId, valuePath);
    }
}

function renderMapping(doc: RawMapping, context: TemplateContext, recipeId: string, prefix: string): RawMapping {
    const entries = new Map<string, RawValue>();
    for (const [key, value] of doc.entries) {
        entries.set(key, renderValue(value, context, recipeId, prefix ? `${prefix}.${key}` : key));
    }
    return { kind: 'mapping', entries };
}

/**
 * The recipe's own name as `{{ recipe.name }}` sees it. A name that is
 * itself templated is rendered first, without the recipe provider. A missing
 * name reads as ''; a mapping or sequence leaves the reference unresolved.
 */
function resolveRecipeName(doc: RawMapping, env: StringSource, options: RenderOptions): string | undefined {
    const name = doc.entries.get('name');
    if (name === undefined || (name.kind === 'scalar' && name.value === null)) {
        return '';
    }
    if (name.kind !== 'scalar') {
        return undefined;
    }
    if (typeof name.value !== 'string') {
        return String(name.value);
    }
    const context = createTemplateContext({ env, vars: options.vars });
    return renderText(name.value, context, options.recipeId, 'name');
}

export function renderDocument(doc: RawMapping, options: RenderOptions): RawMapping {
    const env = { ...(options.env ?? process.env) };
    const name = resolveRecipeName(doc, env, options);
    const context = createTemplateContext({
        env,
        vars: options.vars,
        recipe: { name }
    });
    return renderMapping(doc, context, options.recipeId, '');
}
