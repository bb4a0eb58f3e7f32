import { TIMEOUTS } from '../config/defaults.js';
import { ConnectivityError } from '../core/errors.js';
import type { PublishRequest, PublishResult } from '../schema/publish.js';
import { toPublishResult } from './client.js';
import type { RegistryClient } from './client.js';

// ── Failure description ──────────────────────────────────────

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError') {
      return `request timed out after ${String(timeoutMs / 1000)}s`;
    }
    if (err.cause instanceof Error) {
      return err.cause.message;
    }
    return err.message;
  }
  return String(err);
}

// ── Transport ────────────────────────────────────────────────

interface RawResponse {
  status: number;
  statusText: string;
  body: string;
}

async function post(
  request: PublishRequest,
  timeoutMs: number,
): Promise<RawResponse> {
  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: { ...request.headers },
      body: request.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();
    return { status: response.status, statusText: response.statusText, body };
  } catch (err) {
    throw new ConnectivityError(
      `problem connecting to swaggerhub: ${describeFailure(err, timeoutMs)}`,
      { url: request.url },
    );
  }
}

// ── Provider factory ─────────────────────────────────────────

/**
 * SwaggerHub registry client.
 * One POST per call, bounded by a single timeout that covers connecting
 * and reading the response. Never retries.
 */
export function createSwaggerHubClient(
  timeoutMs: number = TIMEOUTS.REQUEST_TIMEOUT,
): RegistryClient {
  return {
    async send(request: PublishRequest): Promise<PublishResult> {
      const { status, statusText, body } = await post(request, timeoutMs);
      return toPublishResult(status, statusText, body);
    },
  };
}
