import { readFile } from 'node:fs/promises';

import { parseDocument } from 'yaml';

import type { FileType } from '../schema/options.js';
import { IOError, isErrnoException } from './errors.js';

// ── File input ───────────────────────────────────────────────

/** Read the whole definition into memory, bytes untouched. */
export async function readDefinitionFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new IOError(`can't read the file ${filePath}`, {
      path: filePath,
      ...(isErrnoException(err) ? { reason: err.code } : {}),
    });
  }
}

// ── Pre-flight check ─────────────────────────────────────────
// Advisory only. The registry owns validation, so a problem here is a
// warning and the bytes are still sent.

const MISSING_VERSION_MESSAGE = 'definition has no openapi or swagger field';

function hasVersionField(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    ('openapi' in value || 'swagger' in value)
  );
}

function parseJson(text: string): { value: unknown } | { error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { value };
  } catch (err) {
    return { error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Returns a warning when the definition does not parse as its declared
 * type or lacks an `openapi`/`swagger` field, otherwise undefined.
 */
export function inspectDefinition(
  content: Uint8Array,
  fileType: FileType,
): string | undefined {
  const text = Buffer.from(content).toString('utf-8');

  if (fileType === 'json') {
    const parsed = parseJson(text);
    if ('error' in parsed) {
      return `definition is not valid JSON: ${parsed.error}`;
    }
    return hasVersionField(parsed.value) ? undefined : MISSING_VERSION_MESSAGE;
  }

  const doc = parseDocument(text);
  const [first] = doc.errors;
  if (first) {
    return `definition is not valid YAML: ${first.message}`;
  }
  // Looked up on the node tree; aliases are never expanded.
  return doc.has('openapi') || doc.has('swagger')
    ? undefined
    : MISSING_VERSION_MESSAGE;
}
