import { Command, CommanderError } from 'commander';

import type { CliInfo } from '../config/defaults.js';
import { FLAG_PREFIX } from '../config/defaults.js';
import {
  OPTION_TABLE,
  resolveFilePath,
  resolveOptions,
} from '../config/options.js';
import type { Env, FlagValues } from '../config/options.js';
import { readDefinitionFile } from '../core/definition.js';
import {
  exitCodeByError,
  normalizeError,
  UsageError,
} from '../core/errors.js';
import type { SwaggerPubError } from '../core/errors.js';
import { publishDefinition } from '../core/publisher.js';
import { createRegistryClient, loadRegistryConfig } from '../registry/index.js';
import type { RegistryClient, RegistryConfig } from '../registry/index.js';
import { generateJSON, serializeJSON } from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Types ────────────────────────────────────────────────────

export interface CliDeps {
  env?: Env;
  createClient?: (config: RegistryConfig) => RegistryClient;
  readFile?: (filePath: string) => Promise<Uint8Array>;
}

interface PublishCommandOptions {
  file?: string;
  json?: true;
}

const VERSION_FLAG = '--version';

// ── Error output ─────────────────────────────────────────────

function reportError(info: CliInfo, error: SwaggerPubError): number {
  log.error(`${info.name}: ${error.message}\nSee '${info.name} --help'`);
  return exitCodeByError[error.code];
}

// ── Flag collection ──────────────────────────────────────────

function collectFlags(command: Command): FlagValues {
  const flags: Record<string, string> = {};
  for (const option of command.options) {
    const value: unknown = command.getOptionValue(option.attributeName());
    if (option.long !== undefined && typeof value === 'string') {
      flags[option.long.slice(FLAG_PREFIX.length)] = value;
    }
  }
  return flags;
}

// ── Program ──────────────────────────────────────────────────

function describeRow(row: (typeof OPTION_TABLE)[number]): string {
  const notes = [
    ...(row.env !== undefined ? [`env: ${row.env}`] : []),
    ...(row.default !== undefined ? [`default: ${row.default}`] : []),
  ];
  return notes.length > 0
    ? `${row.description} (${notes.join(', ')})`
    : row.description;
}

export function createProgram(info: CliInfo): Command {
  const program = new Command();

  program
    .name(info.name)
    .description('Publish an OpenAPI definition to SwaggerHub.')
    .version(`${info.name} version ${info.version}`, VERSION_FLAG, 'print the version and exit')
    .argument('[file]', 'path to the OpenAPI definition')
    .option('--file <path>', 'path to the OpenAPI definition');

  for (const row of OPTION_TABLE) {
    program.option(`${FLAG_PREFIX}${row.flag} <${row.valueName}>`, describeRow(row));
  }

  program
    .option('--json', 'Output JSON to stdout')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .addHelpText(
      'after',
      `
Examples:
  $ ${info.name} path/to/openapi.yml --type yml --oas 3.0.0 --api acme/sample-api --access-token <token>

Environment variables can also be used:
  $ export SWAGGERHUB_ACCESS_TOKEN="..."
  $ export SWAGGERHUB_API="acme/sample-api"
  $ ${info.name} --file path/to/openapi.json --type json`,
    );

  return program;
}

// ── Publish command ──────────────────────────────────────────

async function publishCommand(
  argv: readonly string[],
  file: string | undefined,
  opts: PublishCommandOptions,
  flags: FlagValues,
  deps: CliDeps,
): Promise<void> {
  const env = deps.env ?? process.env;

  const filePath = resolveFilePath(argv, file, opts.file);
  const options = resolveOptions(flags, env);
  const registry = loadRegistryConfig(env);
  const definition = await (deps.readFile ?? readDefinitionFile)(filePath);

  const client = (deps.createClient ?? createRegistryClient)(registry);
  const { request, result } = await publishDefinition(client, {
    options,
    filePath,
    definition,
    baseUrl: registry.baseUrl,
  });

  if (opts.json) {
    const json = generateJSON({ options, filePath, request, result });
    process.stdout.write(serializeJSON(json) + '\n');
  }
}

/**
 * Run the CLI against the user arguments (without node and script path)
 * and resolve to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  info: CliInfo,
  deps: CliDeps = {},
): Promise<number> {
  const program = createProgram(info);

  if (argv.length === 0) {
    process.stderr.write(program.helpInformation());
    return reportError(info, new UsageError('invalid usage'));
  }

  const versionAt = argv.indexOf(VERSION_FLAG);
  if (versionAt > 0) {
    return reportError(
      info,
      new UsageError(`${VERSION_FLAG} must be the first argument`),
    );
  }

  let exitCode = 0;
  program.action(
    async (
      file: string | undefined,
      opts: PublishCommandOptions,
      command: Command,
    ) => {
      try {
        await publishCommand(argv, file, opts, collectFlags(command), deps);
      } catch (err) {
        exitCode = reportError(info, normalizeError(err));
      }
    },
  );

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    // Commander has already written its own message (and help).
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    return reportError(info, normalizeError(err));
  }

  return exitCode;
}
