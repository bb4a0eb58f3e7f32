/**
 * Configuration module.
 * Resolves runtime options from CLI flags, environment and defaults.
 */

export { CLI_INFO, REGISTRY, TIMEOUTS, DEFAULTS, FLAG_PREFIX } from './defaults.js';
export type { CliInfo } from './defaults.js';
export {
  OPTION_TABLE,
  API_FORMAT_MESSAGE,
  resolveOptions,
  resolveFilePath,
} from './options.js';
export type { OptionRow, FlagValues, Env } from './options.js';
