/**
 * Report generation module.
 * Turns a completed publish into the machine-readable JSON contract.
 */

export { generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, ReportInput } from './reporter.js';
