import { API_FORMAT_MESSAGE } from '../config/options.js';
import type { RegistryClient } from '../registry/client.js';
import type { FileType, PublishOptions } from '../schema/options.js';
import { MEDIA_TYPES } from '../schema/publish.js';
import type {
  MediaType,
  PublishRequest,
  PublishResult,
} from '../schema/publish.js';
import * as log from '../utils/logger.js';
import { inspectDefinition } from './definition.js';
import { ConfigError } from './errors.js';

// ── Types ────────────────────────────────────────────────────

export interface ApiCoordinates {
  owner: string;
  name: string;
}

export interface PublishInput {
  options: PublishOptions;
  filePath: string;
  definition: Uint8Array;
  baseUrl: string;
}

export interface PublishOutcome {
  request: PublishRequest;
  result: PublishResult;
}

// ── Request building ─────────────────────────────────────────

/**
 * Split `<owner>/<name>`. Options are validated upstream; this guards
 * callers that build PublishOptions by hand.
 */
export function splitApiIdentifier(apiIdentifier: string): ApiCoordinates {
  const parts = apiIdentifier.split('/');
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name) {
    throw new ConfigError(API_FORMAT_MESSAGE, { api: apiIdentifier });
  }
  return { owner, name };
}

export function mediaTypeFor(fileType: FileType): MediaType {
  return fileType === 'json' ? MEDIA_TYPES.json : MEDIA_TYPES.yml;
}

export function buildPublishUrl(
  baseUrl: string,
  api: ApiCoordinates,
  oasVersion: string,
): string {
  const url = new URL(
    `${baseUrl}/${encodeURIComponent(api.owner)}/${encodeURIComponent(api.name)}`,
  );
  url.searchParams.set('oas', oasVersion);
  return url.toString();
}

export function buildPublishRequest(
  options: PublishOptions,
  definition: Uint8Array,
  baseUrl: string,
): PublishRequest {
  const api = splitApiIdentifier(options.apiIdentifier);
  const mediaType = mediaTypeFor(options.fileType);

  return {
    url: buildPublishUrl(baseUrl, api, options.oasVersion),
    mediaType,
    headers: {
      // Sent verbatim; SwaggerHub takes the raw key without a scheme.
      Authorization: options.accessToken,
      Accept: 'application/json',
      'Content-Type': mediaType,
    },
    body: definition,
  };
}

// ── Pre-flight ───────────────────────────────────────────────

/** Never throws: a failing check is reported as a warning. */
function checkDefinition(
  definition: Uint8Array,
  fileType: FileType,
): string | undefined {
  try {
    return inspectDefinition(definition, fileType);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return `definition could not be checked: ${reason}`;
  }
}

// ── Publish ──────────────────────────────────────────────────

/**
 * Send the definition once. Any HTTP status is a completed publish;
 * only transport failures reject.
 */
export async function publishDefinition(
  client: RegistryClient,
  input: PublishInput,
): Promise<PublishOutcome> {
  const { options, filePath, definition, baseUrl } = input;

  log.info(`Publishing ${filePath} to ${options.apiIdentifier}`);

  const request = buildPublishRequest(options, definition, baseUrl);

  const warning = checkDefinition(definition, options.fileType);
  if (warning !== undefined) {
    log.warn(warning);
  }

  log.request(request.url);
  const result = await client.send(request);
  log.response(result.statusLine, result.ok);

  const body = result.body.trim();
  if (body.length > 0) {
    log.detail(body);
  }

  return { request, result };
}
