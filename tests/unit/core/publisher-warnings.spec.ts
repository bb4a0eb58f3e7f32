import { afterEach, describe, expect, it, vi } from 'vitest';

import { publishDefinition } from '../../../src/core/publisher.js';
import { createMockRegistryClient } from '../../../src/registry/index.js';
import { captureOutput } from '../../helpers/test-env.js';

vi.mock('../../../src/core/definition.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../../src/core/definition.js')>();
  return {
    ...original,
    inspectDefinition: () => {
      throw new RangeError('check exploded');
    }
  };
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('definition check failures', () => {
  it('logs a warning and still sends the definition', async () => {
    const output = captureOutput();
    const client = createMockRegistryClient();

    const { result } = await publishDefinition(client, {
      options: { accessToken: 'tkn123', apiIdentifier: 'acme/widgets', fileType: 'yml', oasVersion: '3.0.0' },
      filePath: 'spec.yml',
      definition: Buffer.from('openapi: 3.0.0\n', 'utf-8'),
      baseUrl: 'https://api.swaggerhub.com/apis'
    });

    expect(result.statusLine).toBe('201 Created');
    expect(client.requests).toHaveLength(1);
    expect(output.stderr()).toContain('⚠️  definition could not be checked: check exploded\n');
  });
});
