/**
 * Document loaders.
 *
 * A loader turns a logical identifier into a raw mapping, and resolves the
 * `extends` reference found in one document into the identifier of its parent.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { RecipeNotFoundError, RecipeParseError } from './errors.js';
import { fromPlain, UnsupportedValueError, type RawMapping } from './value.js';
import { getLogger, type RecipeLogger } from './logger.js';

// Core schema keeps scalars JSON-like (no timestamps or binary); `<<` merge keys still expand
const RECIPE_SCHEMA = yaml.CORE_SCHEMA.extend([yaml.types.merge]);

export interface DocumentLoader {
    /**
     * Identifier for `reference`. With a referrer, the reference is read
     * relative to the referring document.
     */
    resolveReference(reference: string, referrer?: string): string;
    load(identifier: string): Promise<RawMapping>;
}

function toMapping(identifier: string, data: unknown): RawMapping {
    if (data === null || data === undefined) {
        throw new RecipeParseError(identifier, 'document is empty');
    }
    if (typeof data !== 'object' || Array.isArray(data)) {
        throw new RecipeParseError(identifier, 'document must contain a mapping at the top level');
    }
    try {
        const value = fromPlain(data);
        if (value.kind !== 'mapping') {
            throw new RecipeParseError(identifier, 'document must contain a mapping at the top level');
        }
        return value;
    } catch (e) {
        if (e instanceof UnsupportedValueError) {
            throw new RecipeParseError(identifier, e.message, { cause: e });
        }
        throw e;
    }
}

function isMissingFileError(e: unknown): boolean {
    return e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');
}

export interface FileDocumentLoaderOptions {
    /** Directory that root references resolve against; defaults to the working directory */
    baseDir?: string;
    logger?: RecipeLogger;
}

export class FileDocumentLoader implements DocumentLoader {
    private readonly baseDir: string;
    private readonly logger: RecipeLogger;

    constructor(options: FileDocumentLoaderOptions = {}) {
        this.baseDir = path.resolve(options.baseDir ?? process.cwd());
        this.logger = options.logger ?? getLogger();
    }

    resolveReference(reference: string, referrer?: string): string {
        if (path.isAbsolute(reference)) {
            return path.normalize(reference);
        }
        const dir = referrer ? path.dirname(referrer) : this.baseDir;
        return path.resolve(dir, reference);
    }

    async load(identifier: string): Promise<RawMapping> {
        this.logger.child(identifier).debug('loading file');

        let content: string;
        try {
            content = await fs.readFile(identifier, 'utf8');
        } catch (e) {
            if (isMissingFileError(e)) {
                throw new RecipeNotFoundError(identifier, null, { cause: e });
            }
            throw e;
        }

        let data: unknown;
        try {
            data = yaml.load(content, { filename: identifier, schema: RECIPE_SCHEMA });
        } catch (e) {
            if (e instanceof yaml.YAMLException) {
                throw new RecipeParseError(identifier, `invalid YAML: ${e.reason}`, { cause: e });
            }
            throw e;
        }

        return toMapping(identifier, data);
    }
}

/**
 * Serves documents from memory. References are identifiers as they are.
 */
export class MemoryDocumentLoader implements DocumentLoader {
    private readonly documents: Map<string, unknown>;

    constructor(documents: Record<string, unknown> = {}) {
        this.documents = new Map(Object.entries(documents));
    }

    set(identifier: string, document: unknown): this {
        this.documents.set(identifier, document);
        return this;
    }

    resolveReference(reference: string, _referrer?: string): string {
        return reference;
    }

    async load(identifier: string): Promise<RawMapping> {
        if (!this.documents.has(identifier)) {
            throw new RecipeNotFoundError(identifier);
        }
        return toMapping(identifier, this.documents.get(identifier));
    }
}
