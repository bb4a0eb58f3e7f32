/**
 * Default configuration values.
 * Flags and environment variables override the per-invocation ones.
 */

export interface CliInfo {
  readonly name: string;
  readonly version: string;
}

export const CLI_INFO: CliInfo = {
  name: 'swaggerpub',
  version: '1.0.0',
};

export const REGISTRY = {
  DEFAULT_BASE_URL: 'https://api.swaggerhub.com/apis',
  BASE_URL_ENV: 'SWAGGERHUB_URL',
} as const;

export const TIMEOUTS = {
  REQUEST_TIMEOUT: 10_000,
} as const;

export const DEFAULTS = {
  FILE_TYPE: 'yml',
  OAS_VERSION: '3.0.0',
} as const;

export const FLAG_PREFIX = '--';
