import { z } from 'zod';

import type { FileType } from './options.js';

// ── Media types ─────────────────────────────────────────────

export const MEDIA_TYPES = {
  yml: 'application/yaml',
  json: 'application/json',
} as const satisfies Record<FileType, string>;

export type MediaType = (typeof MEDIA_TYPES)[FileType];

// ── Outbound request ────────────────────────────────────────

export type PublishHeaders = {
  Authorization: string;
  Accept: 'application/json';
  'Content-Type': MediaType;
};

export interface PublishRequest {
  url: string;
  mediaType: MediaType;
  headers: PublishHeaders;
  body: Uint8Array;
}

// ── Registry response ───────────────────────────────────────

export const publishResultSchema = z.object({
  status: z.number().int().min(100).max(599),
  statusText: z.string(),
  statusLine: z.string().min(1),
  ok: z.boolean(),
  body: z.string(),
});

export type PublishResult = z.infer<typeof publishResultSchema>;
