import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { runCli } from '../../../src/cli/index.js';
import { CLI_INFO } from '../../../src/config/index.js';
import { createMockRegistryClient } from '../../../src/registry/index.js';
import type { MockRegistryClient, RegistryClient } from '../../../src/registry/index.js';
import { TEST_API, TEST_TOKEN, captureOutput, createDefinitionFile } from '../../helpers/test-env.js';

const USAGE_HINT = "See 'swaggerpub --help'\n";

describe('swaggerpub cli', () => {
  let filePath: string;
  let cleanup: () => Promise<void>;
  let client: MockRegistryClient;
  let createClient: Mock<() => RegistryClient>;
  let output: ReturnType<typeof captureOutput>;

  beforeEach(async () => {
    const fixture = await createDefinitionFile('spec.yml', 'openapi: 3.0.0\n');
    filePath = fixture.filePath;
    cleanup = fixture.cleanup;
    client = createMockRegistryClient();
    createClient = vi.fn<() => RegistryClient>(() => client);
    output = captureOutput();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    await cleanup();
  });

  it('publishes a positional file with flags', async () => {
    const exitCode = await runCli([filePath, '--api', TEST_API, '--access-token', 'tkn123'], CLI_INFO, {
      env: {},
      createClient
    });

    expect(exitCode).toBe(0);
    expect(client.requests).toHaveLength(1);
    const [request] = client.requests;
    expect(request?.url).toBe('https://api.swaggerhub.com/apis/acme/widgets?oas=3.0.0');
    expect(request?.headers).toEqual({
      Authorization: 'tkn123',
      Accept: 'application/json',
      'Content-Type': 'application/yaml'
    });
    expect(Buffer.from(request?.body ?? new Uint8Array()).toString('utf-8')).toBe('openapi: 3.0.0\n');
    expect(output.stderr()).toContain('✅ OpenAPI sent with response: 201 Created\n');
  });

  it('publishes --file with credentials from the environment', async () => {
    const exitCode = await runCli(['--file', filePath, '--oas', '3.1.0'], CLI_INFO, {
      env: { SWAGGERHUB_ACCESS_TOKEN: TEST_TOKEN, SWAGGERHUB_API: TEST_API },
      createClient
    });

    expect(exitCode).toBe(0);
    expect(client.requests[0]?.url).toBe('https://api.swaggerhub.com/apis/acme/widgets?oas=3.1.0');
    expect(client.requests[0]?.headers.Authorization).toBe(TEST_TOKEN);
  });

  it('sends json definitions as application/json', async () => {
    const json = await createDefinitionFile('spec.json', '{"openapi":"3.0.0"}');
    try {
      const exitCode = await runCli(
        [json.filePath, '--type', 'json', '--api', TEST_API, '--access-token', TEST_TOKEN],
        CLI_INFO,
        { env: {}, createClient }
      );

      expect(exitCode).toBe(0);
      expect(client.requests[0]?.headers['Content-Type']).toBe('application/json');
    } finally {
      await json.cleanup();
    }
  });

  it('points the request at SWAGGERHUB_URL', async () => {
    const exitCode = await runCli([filePath, '--api', TEST_API], CLI_INFO, {
      env: { SWAGGERHUB_ACCESS_TOKEN: TEST_TOKEN, SWAGGERHUB_URL: 'https://hub.example.com/apis' },
      createClient
    });

    expect(exitCode).toBe(0);
    expect(client.requests[0]?.url).toBe('https://hub.example.com/apis/acme/widgets?oas=3.0.0');
  });

  it('exits 0 when the registry rejects the definition', async () => {
    client = createMockRegistryClient([{ status: 422, statusText: 'Unprocessable Entity' }]);

    const exitCode = await runCli([filePath, '--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {},
      createClient
    });

    expect(exitCode).toBe(0);
    expect(output.stderr()).toContain('❌ OpenAPI sent with response: 422 Unprocessable Entity\n');
  });

  it('writes the json contract to stdout', async () => {
    const exitCode = await runCli(
      [filePath, '--api', TEST_API, '--access-token', TEST_TOKEN, '--json'],
      CLI_INFO,
      { env: {}, createClient }
    );

    expect(exitCode).toBe(0);
    const stdout = output.stdout();
    expect(stdout).toHaveLength(1);
    expect(JSON.parse(stdout[0] ?? '')).toEqual({
      version: '1.0',
      api: TEST_API,
      file: filePath,
      fileType: 'yml',
      oasVersion: '3.0.0',
      url: 'https://api.swaggerhub.com/apis/acme/widgets?oas=3.0.0',
      status: 201,
      statusLine: '201 Created',
      ok: true,
      body: ''
    });
  });

  it('prints the version without publishing', async () => {
    const exitCode = await runCli(['--version'], CLI_INFO, { env: {}, createClient });

    expect(exitCode).toBe(0);
    expect(output.stdout()).toEqual(['swaggerpub version 1.0.0\n']);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('fails with usage when called without arguments', async () => {
    const exitCode = await runCli([], CLI_INFO, { env: {}, createClient });

    expect(exitCode).toBe(1);
    expect(output.stderr().at(-1)).toBe(`💥 swaggerpub: invalid usage\n${USAGE_HINT}`);
  });

  it('requires --file when the first argument is a flag', async () => {
    const exitCode = await runCli(['--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {},
      createClient
    });

    expect(exitCode).toBe(1);
    expect(output.stderr()).toEqual([
      `💥 swaggerpub: invalid usage: expected a file path or --file\n${USAGE_HINT}`
    ]);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('names a missing access token', async () => {
    const exitCode = await runCli([filePath, '--api', TEST_API], CLI_INFO, { env: {}, createClient });

    expect(exitCode).toBe(1);
    expect(output.stderr()).toEqual([`💥 swaggerpub: missing access-token\n${USAGE_HINT}`]);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('rejects an api without a slash before any network call', async () => {
    const exitCode = await runCli([filePath, '--api', 'ownername', '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {},
      createClient
    });

    expect(exitCode).toBe(1);
    expect(output.stderr()).toEqual([
      `💥 swaggerpub: api is in the wrong format: expected <owner>/<name>\n${USAGE_HINT}`
    ]);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('reports an unreadable file', async () => {
    const missing = path.join(path.dirname(filePath), 'missing.yml');

    const exitCode = await runCli([missing, '--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {},
      createClient
    });

    expect(exitCode).toBe(1);
    expect(output.stderr()).toEqual([`💥 swaggerpub: can't read the file ${missing}\n${USAGE_HINT}`]);
  });

  it('publishes a definition that reuses one anchor many times', async () => {
    const references = Array.from({ length: 120 }, (_, index) => `  p${String(index)}: *ok`);
    const aliased = await createDefinitionFile(
      'aliased.yml',
      ['openapi: 3.0.0', 'components:', '  ok: &ok', '    description: OK', 'paths:', ...references].join('\n') + '\n'
    );
    try {
      const exitCode = await runCli([aliased.filePath, '--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
        env: {},
        createClient
      });

      expect(exitCode).toBe(0);
      expect(client.requests).toHaveLength(1);
      expect(output.stderr().some((line) => line.startsWith('⚠️  '))).toBe(false);
    } finally {
      await aliased.cleanup();
    }
  });

  it('reads the definition through an injected reader', async () => {
    const readFile = vi.fn(async (_filePath: string): Promise<Uint8Array> => Buffer.from('openapi: 3.1.0\n', 'utf-8'));

    const exitCode = await runCli(['virtual.yml', '--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {},
      createClient,
      readFile
    });

    expect(exitCode).toBe(0);
    expect(readFile).toHaveBeenCalledTimes(1);
    expect(readFile).toHaveBeenCalledWith('virtual.yml');
    expect(Buffer.from(client.requests[0]?.body ?? new Uint8Array()).toString('utf-8')).toBe('openapi: 3.1.0\n');
  });

  it('rejects --version after other arguments', async () => {
    const exitCode = await runCli([filePath, '--api', TEST_API, '--version'], CLI_INFO, { env: {}, createClient });

    expect(exitCode).toBe(1);
    expect(output.stdout()).toEqual([]);
    expect(output.stderr()).toEqual([`💥 swaggerpub: --version must be the first argument\n${USAGE_HINT}`]);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('exits 1 on an unknown flag', async () => {
    const exitCode = await runCli([filePath, '--bogus'], CLI_INFO, { env: {}, createClient });

    expect(exitCode).toBe(1);
    expect(output.stderr()[0]).toMatch(/^error: unknown option '--bogus'/);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('exits 1 with a connectivity error when the registry is unreachable', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND api.swaggerhub.com') });
    });
    vi.stubGlobal('fetch', fetchMock);

    const exitCode = await runCli([filePath, '--api', TEST_API, '--access-token', TEST_TOKEN], CLI_INFO, {
      env: {}
    });

    expect(exitCode).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(output.stderr().at(-1)).toBe(
      `💥 swaggerpub: problem connecting to swaggerhub: getaddrinfo ENOTFOUND api.swaggerhub.com\n${USAGE_HINT}`
    );
  });
});
