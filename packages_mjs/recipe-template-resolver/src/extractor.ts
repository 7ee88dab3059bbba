import { PATTERNS } from './patterns.js';
import type { ProviderName } from './context.js';

export interface ParsedReference {
    provider: ProviderName;
    name: string;
}

export interface TemplateExpression {
    raw: string;
    source: string;
    start: number;
    end: number;
    reference: ParsedReference | null;
}

export function parseExpression(source: string): ParsedReference | null {
    const expr = source.trim();

    const envMatch = PATTERNS.ENV_CALL.exec(expr);
    if (envMatch) {
        return { provider: 'env', name: envMatch[2] };
    }

    const varMatch = PATTERNS.VAR_CALL.exec(expr);
    if (varMatch) {
        return { provider: 'vars', name: varMatch[2] };
    }

    const attrMatch = PATTERNS.RECIPE_ATTR.exec(expr);
    if (attrMatch) {
        return { provider: 'recipe', name: attrMatch[1] };
    }

    return null;
}

export function extractExpressions(template: string): TemplateExpression[] {
    const expressions: TemplateExpression[] = [];

    // Reset lastIndex for global regex
    PATTERNS.EXPRESSION.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = PATTERNS.EXPRESSION.exec(template)) !== null) {
        expressions.push({
            raw: match[0],
            source: match[1],
            start: match.index,
            end: match.index + match[0].length,
            reference: parseExpression(match[1])
        });
    }

    return expressions;
}

export function containsExpression(template: string): boolean {
    return extractExpressions(template).length > 0;
}
