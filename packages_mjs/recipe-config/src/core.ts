/**
 * Core business logic for recipe resolution.
 *
 * load -> inheritance (merge + deletes per level) -> render -> validate
 */

import type { StringSource } from '@datarecipe/template-resolver';

import { FileDocumentLoader, type DocumentLoader } from './loader.js';
import { InheritanceResolver, createResolutionSession, type ResolutionSession } from './inheritance.js';
import { renderDocument } from './render.js';
import { validateRecipe, type Recipe } from './validators.js';
import { toPlain, type PlainObject } from './value.js';
import { getLogger, type RecipeLogger } from './logger.js';

export interface RecipeResolverOptions {
    loader: DocumentLoader;
    /** Environment consulted by env_var(); defaults to process.env */
    env?: StringSource;
    /** Dotted paths whose sequences concatenate across inheritance */
    accumulate?: readonly string[];
    logger?: RecipeLogger;
}

export interface ResolveOptions {
    /** Values for var() */
    vars?: StringSource;
    /** Share loaded and merged documents with other calls made on this session */
    session?: ResolutionSession;
}

export interface ResolvedDocument {
    identifier: string;
    document: PlainObject;
}

export class RecipeResolver {
    private readonly loader: DocumentLoader;
    private readonly inheritance: InheritanceResolver;
    private readonly env: StringSource | undefined;
    private readonly logger: RecipeLogger;

    constructor(options: RecipeResolverOptions) {
        this.loader = options.loader;
        this.env = options.env;
        this.logger = options.logger ?? getLogger();
        this.inheritance = new InheritanceResolver(options.loader, {
            accumulate: options.accumulate,
            logger: this.logger
        });
    }

    /**
     * Merged, deleted and rendered document: the input handed to validation.
     */
    async resolveDocument(reference: string, options: ResolveOptions = {}): Promise<ResolvedDocument> {
        const identifier = this.loader.resolveReference(reference);
        const session = options.session ?? createResolutionSession();

        const merged = await this.inheritance.resolve(identifier, session);
        const rendered = renderDocument(merged, {
            recipeId: identifier,
            env: this.env,
            vars: options.vars
        });

        return { identifier, document: toPlain(rendered) };
    }

    async resolve(reference: string, options: ResolveOptions = {}): Promise<Recipe> {
        const { identifier, document } = await this.resolveDocument(reference, options);
        const recipe = validateRecipe(document, identifier);
        this.logger.child(identifier).info(`Recipe resolved: ${recipe.name}`);
        return recipe;
    }

    /**
     * Resolves several recipes against one session, so shared ancestors are
     * loaded and merged once. Recipes are resolved one after another.
     */
    async resolveMany(references: string[], options: Omit<ResolveOptions, 'session'> = {}): Promise<Recipe[]> {
        const session = createResolutionSession();
        const recipes: Recipe[] = [];
        for (const reference of references) {
            recipes.push(await this.resolve(reference, { ...options, session }));
        }
        return recipes;
    }
}

export interface LoadRecipeOptions {
    env?: StringSource;
    baseDir?: string;
    logger?: RecipeLogger;
}

/**
 * Load a recipe YAML file with inheritance, deletes and templates resolved.
 */
export async function loadRecipe(filePath: string, vars: StringSource = {}, options: LoadRecipeOptions = {}): Promise<Recipe> {
    const resolver = new RecipeResolver({
        loader: new FileDocumentLoader({ baseDir: options.baseDir, logger: options.logger }),
        env: options.env,
        logger: options.logger
    });
    return resolver.resolve(filePath, { vars });
}
