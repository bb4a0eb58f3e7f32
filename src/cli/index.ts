/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { createProgram, runCli } from './publish.js';
export type { CliDeps } from './publish.js';
