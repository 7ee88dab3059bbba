/**
 * Error hierarchy for recipe resolution.
 *
 * Every error carries the identifier of the document it was raised for
 * (when known) and a context record with the offending path or chain.
 */

import type { ZodIssue } from 'zod';

export type ErrorContext = Record<string, unknown>;

export class RecipeError extends Error {
    public readonly recipeId: string | null;
    public readonly context: ErrorContext;

    constructor(message: string, recipeId: string | null = null, context: ErrorContext = {}, options?: ErrorOptions) {
        super(message, options);
        this.name = 'RecipeError';
        this.recipeId = recipeId;
        this.context = context;
    }
}

export class RecipeNotFoundError extends RecipeError {
    constructor(recipeId: string, public readonly referencedBy: string | null = null, options?: ErrorOptions) {
        super(
            referencedBy ? `Parent recipe not found: ${recipeId}` : `Recipe not found: ${recipeId}`,
            recipeId,
            referencedBy ? { referencedBy } : {},
            options
        );
        this.name = 'RecipeNotFoundError';
    }
}

export class RecipeParseError extends RecipeError {
    constructor(recipeId: string, detail: string, options?: ErrorOptions) {
        super(`Invalid recipe document: ${detail}`, recipeId, {}, options);
        this.name = 'RecipeParseError';
    }
}

export class InheritanceCycleError extends RecipeError {
    constructor(public readonly chain: string[]) {
        super(
            `Cycle detected in recipe inheritance: ${chain.join(' -> ')}`,
            chain[chain.length - 1] ?? null,
            { chain }
        );
        this.name = 'InheritanceCycleError';
    }
}

export class InvalidPathError extends RecipeError {
    constructor(public readonly path: string, recipeId: string | null = null) {
        super(`Invalid path '${path}': segments must be non-empty keys`, recipeId, { path });
        this.name = 'InvalidPathError';
    }
}

export class StructuralConflictError extends RecipeError {
    constructor(
        public readonly path: string,
        public readonly at: string,
        public readonly found: string,
        recipeId: string | null = null
    ) {
        super(`Cannot address '${path}': '${at}' is a ${found}, not a mapping`, recipeId, { path, at, found });
        this.name = 'StructuralConflictError';
    }
}

export class InvalidDirectiveError extends RecipeError {
    constructor(public readonly directive: string, detail: string, recipeId: string | null = null) {
        super(`Invalid '${directive}' directive: ${detail}`, recipeId, { directive });
        this.name = 'InvalidDirectiveError';
    }
}

export class UnresolvedReferenceError extends RecipeError {
    constructor(
        recipeId: string,
        public readonly provider: string,
        public readonly reference: string,
        public readonly valuePath: string,
        options?: ErrorOptions
    ) {
        super(
            `Unresolved template reference '${reference}' (${provider}) at '${valuePath}'`,
            recipeId,
            { provider, reference, path: valuePath },
            options
        );
        this.name = 'UnresolvedReferenceError';
    }
}

export class TemplateSyntaxError extends RecipeError {
    constructor(
        recipeId: string,
        public readonly expression: string,
        public readonly valuePath: string,
        options?: ErrorOptions
    ) {
        super(`Unsupported template expression ${expression} at '${valuePath}'`, recipeId, { expression, path: valuePath }, options);
        this.name = 'TemplateSyntaxError';
    }
}

export class RecipeValidationError extends RecipeError {
    constructor(recipeId: string, public readonly issues: ZodIssue[], options?: ErrorOptions) {
        super(`Recipe validation failed: ${formatIssues(issues)}`, recipeId, {}, options);
        this.name = 'RecipeValidationError';
    }
}

function formatIssues(issues: ZodIssue[]): string {
    return issues
        .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function formatContextValue(value: unknown): string {
    if (Array.isArray(value)) return value.join(' -> ');
    return String(value);
}

/**
 * Message followed by "key=value" pairs for the document and context.
 */
export function formatRecipeError(error: RecipeError): string {
    const pairs: string[] = [];
    if (error.recipeId) {
        pairs.push(`recipe=${error.recipeId}`);
    }
    for (const [key, value] of Object.entries(error.context)) {
        pairs.push(`${key}=${formatContextValue(value)}`);
    }
    return pairs.length ? `${error.message} (${pairs.join(', ')})` : error.message;
}
