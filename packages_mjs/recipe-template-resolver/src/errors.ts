import type { ProviderName } from './context.js';

export class TemplateError extends Error {
    constructor(message: string, public readonly expression: string) {
        super(message);
        this.name = 'TemplateError';
    }
}

const PROVIDER_LABELS: Record<ProviderName, string> = {
    env: 'Environment variable',
    vars: 'Variable',
    recipe: 'Recipe attribute'
};

export class UnresolvedTemplateReferenceError extends TemplateError {
    constructor(
        public readonly provider: ProviderName,
        public readonly reference: string,
        expression: string
    ) {
        super(`${PROVIDER_LABELS[provider]} '${reference}' not found`, expression);
        this.name = 'UnresolvedTemplateReferenceError';
    }
}

export class UnsupportedExpressionError extends TemplateError {
    constructor(expression: string) {
        super(`Unsupported template expression: ${expression}`, expression);
        this.name = 'UnsupportedExpressionError';
    }
}
