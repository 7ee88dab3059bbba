import { PATTERNS } from './patterns.js';
import { parseExpression } from './extractor.js';
import type { TemplateContext } from './context.js';
import { UnresolvedTemplateReferenceError, UnsupportedExpressionError } from './errors.js';

export function renderString(template: string, context: TemplateContext): string {
    if (!template.includes('{{')) return template;

    // Single pass: replacement text is never scanned again
    return template.replace(PATTERNS.EXPRESSION, (match: string, source: string) => {
        const reference = parseExpression(source);
        if (!reference) {
            throw new UnsupportedExpressionError(match);
        }

        const value = context[reference.provider](reference.name);
        if (value === undefined) {
            throw new UnresolvedTemplateReferenceError(reference.provider, reference.name, match);
        }
        return value;
    });
}
