export { PATTERNS } from './patterns.js';
export {
    extractExpressions,
    parseExpression,
    containsExpression,
    type ParsedReference,
    type TemplateExpression
} from './extractor.js';
export {
    createTemplateContext,
    type Lookup,
    type ProviderName,
    type StringSource,
    type TemplateContext,
    type TemplateContextOptions
} from './context.js';
export { renderString } from './renderer.js';
export {
    TemplateError,
    UnresolvedTemplateReferenceError,
    UnsupportedExpressionError
} from './errors.js';
