import { z } from 'zod';

// ── File type ───────────────────────────────────────────────

export const FILE_TYPES = ['yml', 'json'] as const;

export const fileTypeSchema = z.enum(FILE_TYPES);

export type FileType = z.infer<typeof fileTypeSchema>;

// ── API identifier ──────────────────────────────────────────
// Exactly one slash, both segments non-empty: `<owner>/<name>`.

export const API_IDENTIFIER_PATTERN = /^[^/]+\/[^/]+$/;

export const apiIdentifierSchema = z
  .string()
  .regex(API_IDENTIFIER_PATTERN, 'expected <owner>/<name>');

// ── Resolved options ────────────────────────────────────────

export const publishOptionsSchema = z.object({
  accessToken: z.string().min(1),
  apiIdentifier: apiIdentifierSchema,
  fileType: fileTypeSchema,
  oasVersion: z.string().min(1),
});

export type PublishOptions = Readonly<z.infer<typeof publishOptionsSchema>>;
