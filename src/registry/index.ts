/**
 * Registry module.
 * The only module allowed to talk to SwaggerHub.
 */

import type { RegistryClient, RegistryConfig } from './client.js';
import { createSwaggerHubClient } from './swaggerhub.js';

export * from './client.js';
export { createSwaggerHubClient } from './swaggerhub.js';
export { createMockRegistryClient } from './mock.js';
export type { MockRegistryClient, MockResponse } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createRegistryClient(config: RegistryConfig): RegistryClient {
  return createSwaggerHubClient(config.timeoutMs);
}
