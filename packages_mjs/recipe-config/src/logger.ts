/**
 * Recipe Config Logger
 *
 * Leveled console output. Loggers form a tree: `child(scope)` returns a logger
 * whose lines carry the scope after the prefix, so the resolver can tag every
 * line with the document it is working on:
 *
 *   [recipe-config] [orders.yaml] merging over base.yaml
 *
 * The level is process-wide, set from RECIPE_CONFIG_LOG_LEVEL or setLogLevel().
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface RecipeLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
    /** Logger whose lines are additionally tagged with `scope` */
    child(scope: string): RecipeLogger;
}

const SEVERITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

// Looked up at call time so spies installed on console are honoured
const WRITERS: Record<EmitLevel, (line: string, ...args: unknown[]) => void> = {
    error: (line, ...args) => console.error(line, ...args),
    warn: (line, ...args) => console.warn(line, ...args),
    info: (line, ...args) => console.info(line, ...args),
    debug: (line, ...args) => console.debug(line, ...args),
    trace: (line, ...args) => console.log(line, ...args)
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

function levelFromEnv(value: string | undefined): LogLevel {
    const normalized = value?.toLowerCase();
    return normalized && isLogLevel(normalized) ? normalized : 'warn';
}

let currentLevel: LogLevel = levelFromEnv(process.env.RECIPE_CONFIG_LOG_LEVEL);

const PREFIX = process.env.RECIPE_CONFIG_LOG_PREFIX || '[recipe-config]';

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Unknown level names are ignored and reported as false.
 */
export function setLogLevel(level: string): boolean {
    const normalized = level.toLowerCase();
    if (!isLogLevel(normalized)) {
        return false;
    }
    currentLevel = normalized;
    return true;
}

export function isLevelEnabled(level: EmitLevel): boolean {
    return SEVERITY[level] <= SEVERITY[currentLevel];
}

class ScopedConsoleLogger implements RecipeLogger {
    private readonly tag: string;

    constructor(private readonly scopes: readonly string[]) {
        this.tag = [PREFIX, ...scopes.map(scope => `[${scope}]`)].join(' ');
    }

    child(scope: string): RecipeLogger {
        return new ScopedConsoleLogger([...this.scopes, scope]);
    }

    error(message: string, ...args: unknown[]): void {
        this.emit('error', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.emit('warn', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.emit('info', message, args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.emit('debug', message, args);
    }

    trace(message: string, ...args: unknown[]): void {
        this.emit('trace', message, args);
    }

    private emit(level: EmitLevel, message: string, args: unknown[]): void {
        if (isLevelEnabled(level)) {
            WRITERS[level](`${this.tag} ${message}`, ...args);
        }
    }
}

const rootLogger = new ScopedConsoleLogger([]);

export function getLogger(scope?: string): RecipeLogger {
    return scope ? rootLogger.child(scope) : rootLogger;
}
