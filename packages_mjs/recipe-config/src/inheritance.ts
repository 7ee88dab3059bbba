/**
 * Inheritance resolution.
 *
 * Walks the `extends` chain deepest ancestor first. Each level is merged over
 * its resolved parent and then has its own `delete` directive applied, before
 * the next descendant is merged on top:
 *
 *   resolve(C) = deletes(merge(deletes(merge(resolve(A), B)), C))
 *
 * All per-call state lives in a ResolutionSession passed by the caller.
 */

import { InheritanceCycleError, InvalidDirectiveError, RecipeNotFoundError } from './errors.js';
import { applyDeletes } from './deletes.js';
import { mergeDocuments, type MergeOptions } from './merge.js';
import type { DocumentLoader } from './loader.js';
import type { RawMapping } from './value.js';
import { getLogger, type RecipeLogger } from './logger.js';

export const EXTENDS_KEY = 'extends';

export type ResolutionState = 'visiting' | 'resolved';

export interface ResolutionSession {
    readonly states: Map<string, ResolutionState>;
    readonly cache: Map<string, RawMapping>;
    /** Identifiers currently being resolved, outermost first */
    readonly chain: string[];
}

export function createResolutionSession(): ResolutionSession {
    return { states: new Map(), cache: new Map(), chain: [] };
}

export function readExtendsDirective(doc: RawMapping, recipeId: string): string | null {
    const link = doc.entries.get(EXTENDS_KEY);
    if (link === undefined || (link.kind === 'scalar' && link.value === null)) {
        return null;
    }
    if (link.kind === 'sequence') {
        throw new InvalidDirectiveError(EXTENDS_KEY, 'multiple inheritance is not supported', recipeId);
    }
    if (link.kind !== 'scalar' || typeof link.value !== 'string' || link.value.length === 0) {
        throw new InvalidDirectiveError(EXTENDS_KEY, 'expected the path of one parent recipe', recipeId);
    }
    return link.value;
}

function withoutExtends(doc: RawMapping): RawMapping {
    if (!doc.entries.has(EXTENDS_KEY)) return doc;
    const entries = new Map(doc.entries);
    entries.delete(EXTENDS_KEY);
    return { kind: 'mapping', entries };
}

export interface InheritanceResolverOptions extends MergeOptions {
    logger?: RecipeLogger;
}

export class InheritanceResolver {
    private readonly logger: RecipeLogger;
    private readonly mergeOptions: MergeOptions;

    constructor(private readonly loader: DocumentLoader, options: InheritanceResolverOptions = {}) {
        this.logger = options.logger ?? getLogger();
        this.mergeOptions = { accumulate: options.accumulate };
    }

    /**
     * Fully merged and deleted document for `identifier`, without templates rendered.
     * `referrer` is the identifier of the document whose `extends` named this one.
     */
    async resolve(
        identifier: string,
        session: ResolutionSession = createResolutionSession(),
        referrer: string | null = null
    ): Promise<RawMapping> {
        const log = this.logger.child(identifier);
        const state = session.states.get(identifier);
        if (state === 'resolved') {
            const cached = session.cache.get(identifier);
            if (cached) {
                log.trace('cache hit');
                return cached;
            }
        }
        if (state === 'visiting') {
            const start = session.chain.indexOf(identifier);
            throw new InheritanceCycleError([...session.chain.slice(start), identifier]);
        }

        session.states.set(identifier, 'visiting');
        session.chain.push(identifier);
        try {
            const doc = await this.load(identifier, referrer);
            const parentRef = readExtendsDirective(doc, identifier);
            const own = withoutExtends(doc);

            let result: RawMapping;
            if (parentRef === null) {
                log.debug('root recipe');
                result = applyDeletes(own, identifier);
            } else {
                const parentId = this.loader.resolveReference(parentRef, identifier);
                const parent = await this.resolve(parentId, session, identifier);
                log.debug(`merging over ${parentId}`);
                result = applyDeletes(mergeDocuments(parent, own, this.mergeOptions), identifier);
            }

            session.states.set(identifier, 'resolved');
            session.cache.set(identifier, result);
            return result;
        } catch (e) {
            session.states.delete(identifier);
            throw e;
        } finally {
            session.chain.pop();
        }
    }

    private async load(identifier: string, referrer: string | null): Promise<RawMapping> {
        try {
            return await this.loader.load(identifier);
        } catch (e) {
            if (referrer && e instanceof RecipeNotFoundError && e.referencedBy === null) {
                throw new RecipeNotFoundError(identifier, referrer, { cause: e });
            }
            throw e;
        }
    }
}
