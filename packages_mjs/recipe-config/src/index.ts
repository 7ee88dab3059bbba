export * from './value.js';
export * from './errors.js';
export * from './path.js';
export * from './merge.js';
export * from './deletes.js';
export * from './loader.js';
export * from './inheritance.js';
export * from './render.js';
export * from './validators.js';
export * from './core.js';
export * from './logger.js';
export { createProgram, loadEnvironment, parseVarAssignment, type CliIO } from './cli.js';
