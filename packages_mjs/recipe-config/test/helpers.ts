import { fromPlain, type RawMapping } from '../src/value.js';
import type { RecipeLogger } from '../src/logger.js';

export function doc(value: Record<string, unknown>): RawMapping {
    const raw = fromPlain(value);
    if (raw.kind !== 'mapping') {
        throw new Error('expected a mapping');
    }
    return raw;
}

export function createSilentLogger(): RecipeLogger {
    const logger: RecipeLogger = {
        error: jest.fn(),
        warn: jest.fn(),
        info: jest.fn(),
        debug: jest.fn(),
        trace: jest.fn(),
        child: () => logger
    };
    return logger;
}
