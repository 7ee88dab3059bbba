/**
 * Provider context for template rendering.
 *
 * A context is built once per resolution call from three sources and never
 * changes afterwards: later edits to the source objects (including
 * process.env) are not visible through it.
 */

export type ProviderName = 'env' | 'vars' | 'recipe';

export type Lookup = (name: string) => string | undefined;

export interface TemplateContext {
    readonly env: Lookup;
    readonly vars: Lookup;
    readonly recipe: Lookup;
}

export type StringSource = Readonly<Record<string, string | undefined>>;

export interface TemplateContextOptions {
    /** Environment variables; defaults to process.env */
    env?: StringSource;
    /** Caller-supplied variables */
    vars?: StringSource;
    /** Recipe self-metadata (only `name` is defined) */
    recipe?: StringSource;
}

function snapshot(source: StringSource | undefined): Lookup {
    const values = new Map<string, string>();
    if (source) {
        for (const [key, value] of Object.entries(source)) {
            if (value !== undefined) {
                values.set(key, value);
            }
        }
    }
    return (name: string) => values.get(name);
}

export function createTemplateContext(options: TemplateContextOptions = {}): TemplateContext {
    return Object.freeze({
        env: snapshot(options.env ?? process.env),
        vars: snapshot(options.vars),
        recipe: snapshot(options.recipe)
    });
}
