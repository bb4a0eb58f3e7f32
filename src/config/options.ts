import { ConfigError, UsageError } from '../core/errors.js';
import {
  FILE_TYPES,
  publishOptionsSchema,
} from '../schema/options.js';
import type { PublishOptions } from '../schema/options.js';
import { DEFAULTS, FLAG_PREFIX } from './defaults.js';

// ── Option table ─────────────────────────────────────────────
// One row per PublishOptions field. The CLI registers its flags from
// this list and resolveOptions walks it in order.

export interface OptionRow {
  readonly field: keyof PublishOptions;
  readonly flag: string;
  readonly valueName: string;
  readonly env?: string;
  readonly default?: string;
  readonly required: boolean;
  readonly description: string;
}

export const OPTION_TABLE: readonly OptionRow[] = [
  {
    field: 'accessToken',
    flag: 'access-token',
    valueName: 'token',
    env: 'SWAGGERHUB_ACCESS_TOKEN',
    required: true,
    description: 'SwaggerHub access token',
  },
  {
    field: 'apiIdentifier',
    flag: 'api',
    valueName: 'owner/name',
    env: 'SWAGGERHUB_API',
    required: true,
    description: 'API to publish to, as <owner>/<name>',
  },
  {
    field: 'fileType',
    flag: 'type',
    valueName: 'type',
    default: DEFAULTS.FILE_TYPE,
    required: false,
    description: 'definition format, yml or json',
  },
  {
    field: 'oasVersion',
    flag: 'oas',
    valueName: 'version',
    default: DEFAULTS.OAS_VERSION,
    required: false,
    description: 'OpenAPI version of the definition',
  },
];

export type FlagValues = Readonly<Record<string, string | undefined>>;

export type Env = Readonly<Record<string, string | undefined>>;

export const API_FORMAT_MESSAGE =
  'api is in the wrong format: expected <owner>/<name>';

// ── Resolution ───────────────────────────────────────────────

function present(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Merge flag values, environment and defaults into a validated, frozen
 * options record. Flags win over environment, environment over defaults.
 */
export function resolveOptions(flags: FlagValues, env: Env): PublishOptions {
  const raw: Partial<Record<keyof PublishOptions, string>> = {};

  for (const row of OPTION_TABLE) {
    const value =
      present(flags[row.flag]) ??
      (row.env !== undefined ? present(env[row.env]) : undefined);

    if (value === undefined && row.required) {
      throw new ConfigError(`missing ${row.flag}`, {
        field: row.field,
        ...(row.env !== undefined ? { env: row.env } : {}),
      });
    }

    raw[row.field] = value ?? row.default;
  }

  const parsed = publishOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0];
    switch (field) {
      case 'apiIdentifier':
        throw new ConfigError(API_FORMAT_MESSAGE, { field });
      case 'fileType':
        throw new ConfigError(
          `invalid type '${raw.fileType ?? ''}': expected ${FILE_TYPES.join(' or ')}`,
          { field },
        );
      default: {
        const row = OPTION_TABLE.find((r) => r.field === field);
        throw new ConfigError(`invalid ${row?.flag ?? String(field)}`);
      }
    }
  }

  return Object.freeze(parsed.data);
}

// ── Input file path ──────────────────────────────────────────

/**
 * The definition path is the first CLI token when that token is not a
 * flag, otherwise it must come from `--file`.
 */
export function resolveFilePath(
  argv: readonly string[],
  positional: string | undefined,
  fileFlag: string | undefined,
): string {
  const first = argv[0];
  const startsWithFlag = first !== undefined && first.startsWith(FLAG_PREFIX);

  if (startsWithFlag) {
    if (positional !== undefined) {
      throw new UsageError(`unexpected argument '${positional}'`);
    }
    const file = present(fileFlag);
    if (file === undefined) {
      throw new UsageError('invalid usage: expected a file path or --file');
    }
    return file;
  }

  if (positional !== undefined && fileFlag !== undefined) {
    throw new UsageError('file path given twice');
  }

  const file = present(positional);
  if (file === undefined) {
    throw new UsageError('invalid usage: expected a file path or --file');
  }
  return file;
}
