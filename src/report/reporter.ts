import type { PublishOptions } from '../schema/options.js';
import type { PublishRequest, PublishResult } from '../schema/publish.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput };

export interface ReportInput {
  options: PublishOptions;
  filePath: string;
  request: PublishRequest;
  result: PublishResult;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(input: ReportInput): JsonOutput {
  const { options, filePath, request, result } = input;
  return {
    version: JSON_OUTPUT_VERSION,
    api: options.apiIdentifier,
    file: filePath,
    fileType: options.fileType,
    oasVersion: options.oasVersion,
    url: request.url,
    status: result.status,
    statusLine: result.statusLine,
    ok: result.ok,
    body: result.body,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}
