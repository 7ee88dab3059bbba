import * as fs from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import * as dotenv from 'dotenv';
import { glob } from 'glob';
import * as yaml from 'js-yaml';

import { RecipeResolver } from './core.js';
import { FileDocumentLoader } from './loader.js';
import { createResolutionSession } from './inheritance.js';
import { RecipeError, formatRecipeError } from './errors.js';
import { getLogger, setLogLevel } from './logger.js';

const logger = getLogger();

export interface CliIO {
    out(text: string): void;
    err(text: string): void;
    setExitCode(code: number): void;
}

const processIO: CliIO = {
    out: text => process.stdout.write(`${text}\n`),
    err: text => process.stderr.write(`${text}\n`),
    setExitCode: code => {
        process.exitCode = code;
    }
};

interface CommonOptions {
    var: Record<string, string>;
    envFile?: string;
    logLevel?: string;
}

interface ResolveCommandOptions extends CommonOptions {
    format: 'yaml' | 'json';
    validate: boolean;
}

export function parseVarAssignment(value: string, previous: Record<string, string>): Record<string, string> {
    const index = value.indexOf('=');
    if (index <= 0) {
        throw new InvalidArgumentError(`Expected KEY=VALUE, got '${value}'.`);
    }
    return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

/**
 * Process environment, plus entries from an env file that the process does not already set.
 */
export function loadEnvironment(envFile?: string): Record<string, string | undefined> {
    if (!envFile) {
        return { ...process.env };
    }
    const parsed = dotenv.parse(fs.readFileSync(envFile));
    logger.debug(`Loaded ${Object.keys(parsed).length} variables from ${envFile}`);
    return { ...parsed, ...process.env };
}

function applyLogLevel(level?: string): void {
    if (level && !setLogLevel(level)) {
        logger.warn(`Ignoring unknown log level '${level}'`);
    }
}

function format(value: unknown, kind: 'yaml' | 'json'): string {
    if (kind === 'json') {
        return JSON.stringify(value, null, 2);
    }
    return yaml.dump(value, { noRefs: true, lineWidth: -1 }).trimEnd();
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--var <KEY=VALUE>', 'Variable for var() templates (repeatable)', parseVarAssignment, {})
        .option('--env-file <file>', 'Read extra environment variables from a dotenv file')
        .option('--log-level <level>', 'silent, error, warn, info, debug or trace');
}

export function createProgram(io: CliIO = processIO): Command {
    const program = new Command();

    program
        .name('recipe-resolve')
        .description('Resolve data loading recipes: inheritance, deletes and templates')
        .version('0.1.0')
        .configureOutput({
            writeOut: text => io.out(text.trimEnd()),
            writeErr: text => io.err(text.trimEnd())
        });

    const fail = (error: unknown): void => {
        if (error instanceof RecipeError) {
            io.err(`Error: ${formatRecipeError(error)}`);
        } else if (error instanceof Error) {
            io.err(`Error: ${error.message}`);
        } else {
            io.err(`Error: ${String(error)}`);
        }
        io.setExitCode(1);
    };

    addCommonOptions(
        program
            .command('resolve')
            .description('Print the fully resolved recipe')
            .argument('<recipe>', 'Path to the recipe YAML file')
            .addOption(new Option('-f, --format <format>', 'Output format').choices(['yaml', 'json']).default('yaml'))
            .option('--no-validate', 'Print the resolved document without schema validation')
    ).action(async (recipePath: string, options: ResolveCommandOptions) => {
        applyLogLevel(options.logLevel);
        try {
            const resolver = new RecipeResolver({
                loader: new FileDocumentLoader(),
                env: loadEnvironment(options.envFile)
            });
            const result = options.validate
                ? await resolver.resolve(recipePath, { vars: options.var })
                : (await resolver.resolveDocument(recipePath, { vars: options.var })).document;
            io.out(format(result, options.format));
        } catch (error) {
            fail(error);
        }
    });

    addCommonOptions(
        program
            .command('validate')
            .description('Resolve and validate every recipe matching the given paths or glob patterns')
            .argument('<patterns...>', 'Recipe files or glob patterns')
    ).action(async (patterns: string[], options: CommonOptions) => {
        applyLogLevel(options.logLevel);
        try {
            const files = (await glob(patterns, { absolute: true, nodir: true })).sort();
            if (files.length === 0) {
                throw new Error(`No recipe files matched: ${patterns.join(', ')}`);
            }

            const resolver = new RecipeResolver({
                loader: new FileDocumentLoader(),
                env: loadEnvironment(options.envFile)
            });
            const session = createResolutionSession();

            let failures = 0;
            for (const file of files) {
                try {
                    const recipe = await resolver.resolve(file, { vars: options.var, session });
                    io.out(`OK ${file} (${recipe.name})`);
                } catch (error) {
                    if (!(error instanceof RecipeError)) throw error;
                    failures++;
                    io.out(`FAIL ${file}: ${formatRecipeError(error)}`);
                }
            }

            io.out(`${files.length - failures}/${files.length} recipes valid`);
            if (failures > 0) io.setExitCode(1);
        } catch (error) {
            fail(error);
        }
    });

    return program;
}
