import { z } from 'zod';

import { fileTypeSchema } from './options.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────
// The access token is never part of the contract.

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  api: z.string().min(1),
  file: z.string().min(1),
  fileType: fileTypeSchema,
  oasVersion: z.string().min(1),
  url: z.string().url(),
  status: z.number().int(),
  statusLine: z.string(),
  ok: z.boolean(),
  body: z.string(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
