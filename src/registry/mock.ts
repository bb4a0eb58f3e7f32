import type { PublishRequest, PublishResult } from '../schema/publish.js';
import { toPublishResult } from './client.js';
import type { RegistryClient } from './client.js';

export interface MockResponse {
  status: number;
  statusText?: string;
  body?: string;
}

export interface MockRegistryClient extends RegistryClient {
  readonly requests: readonly PublishRequest[];
}

const DEFAULT_RESPONSE: MockResponse = { status: 201, statusText: 'Created' };

/**
 * In-memory registry for testing.
 * Records every request and answers with the canned responses in order,
 * falling back to `201 Created`. An Error entry is thrown instead.
 */
export function createMockRegistryClient(
  responses?: readonly (MockResponse | Error)[],
): MockRegistryClient {
  const requests: PublishRequest[] = [];

  return {
    requests,
    async send(request: PublishRequest): Promise<PublishResult> {
      const response = responses?.[requests.length] ?? DEFAULT_RESPONSE;
      requests.push(request);
      if (response instanceof Error) {
        throw response;
      }
      return toPublishResult(
        response.status,
        response.statusText ?? '',
        response.body ?? '',
      );
    },
  };
}
