import { STATUS_CODES } from 'node:http';

import { z } from 'zod';

import { REGISTRY, TIMEOUTS } from '../config/defaults.js';
import type { Env } from '../config/options.js';
import { ConfigError } from '../core/errors.js';
import { publishResultSchema } from '../schema/publish.js';
import type { PublishRequest, PublishResult } from '../schema/publish.js';

// ── RegistryClient interface ─────────────────────────────────

export interface RegistryClient {
  send(request: PublishRequest): Promise<PublishResult>;
}

// ── Config schema ────────────────────────────────────────────

export const registryConfigSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive(),
});

export type RegistryConfig = z.infer<typeof registryConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadRegistryConfig(env: Env = process.env): RegistryConfig {
  const configured = env[REGISTRY.BASE_URL_ENV];
  const baseUrl =
    configured !== undefined && configured !== ''
      ? configured.replace(/\/+$/, '')
      : REGISTRY.DEFAULT_BASE_URL;

  const parsed = registryConfigSchema.safeParse({
    baseUrl,
    timeoutMs: TIMEOUTS.REQUEST_TIMEOUT,
  });
  if (!parsed.success) {
    throw new ConfigError(`invalid ${REGISTRY.BASE_URL_ENV} '${baseUrl}'`);
  }
  return parsed.data;
}

// ── Result construction ──────────────────────────────────────

/** Status line as `<code> <reason>`, falling back to the standard reason. */
export function toPublishResult(
  status: number,
  statusText: string,
  body: string,
): PublishResult {
  const reason = statusText || STATUS_CODES[status] || '';
  return publishResultSchema.parse({
    status,
    statusText,
    statusLine: `${String(status)} ${reason}`.trim(),
    ok: status >= 200 && status < 300,
    body,
  });
}
