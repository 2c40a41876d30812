import { describe, it, expect, beforeEach } from 'vitest';
import { readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { FileConfigProvider, deepMerge } from '../../src/config/config.js';
import { ConfigError, ValidationError } from '../../src/errors.js';
import { createTempDir } from '../helpers/test-fixtures.js';

describe('FileConfigProvider', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = createTempDir();
    path = join(dir, 'deskwire.json');
  });

  it('returns defaults when the file is missing and the environment is empty', async () => {
    const provider = new FileConfigProvider({ path, env: {} });
    const config = await provider.get();

    expect(config.inference.model).toBe('mistral');
    expect(config.chatwoot.baseUrl).toBe('');
  });

  it('maps environment variables onto config fields', async () => {
    const provider = new FileConfigProvider({
      path,
      env: {
        CHATWOOT_BASE_URL: 'https://desk.test',
        CHATWOOT_API_TOKEN: 'test-token',
        CHATWOOT_ACCOUNT_ID: '7',
        OLLAMA_ENDPOINT: 'http://llm.test',
        LLM_MODEL: 'llama3',
        SYSTEM_MESSAGE: 'Be brief.',
        HISTORY_MAX_MESSAGES: '12',
        PORT: '8080',
        LOG_LEVEL: 'debug',
      },
    });
    const config = await provider.get();

    expect(config.chatwoot).toEqual({ baseUrl: 'https://desk.test', apiToken: 'test-token', accountId: '7', timeoutMs: 15_000 });
    expect(config.inference.endpoint).toBe('http://llm.test');
    expect(config.inference.model).toBe('llama3');
    expect(config.inference.systemMessage).toBe('Be brief.');
    expect(config.history.maxMessages).toBe(12);
    expect(config.server.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('ignores empty environment variables', async () => {
    const provider = new FileConfigProvider({ path, env: { LLM_MODEL: '', PORT: ' ' } });
    const config = await provider.get();

    expect(config.inference.model).toBe('mistral');
    expect(config.server.port).toBe(5000);
  });

  it('lets the file win over the environment', async () => {
    writeFileSync(path, JSON.stringify({ inference: { model: 'file-model' } }));
    const provider = new FileConfigProvider({ path, env: { LLM_MODEL: 'env-model', SYSTEM_MESSAGE: 'From env.' } });
    const config = await provider.get();

    expect(config.inference.model).toBe('file-model');
    expect(config.inference.systemMessage).toBe('From env.');
  });

  it('re-reads the file on every get', async () => {
    const provider = new FileConfigProvider({ path, env: {} });
    expect((await provider.get()).inference.model).toBe('mistral');

    writeFileSync(path, JSON.stringify({ inference: { model: 'hot-swapped' } }));
    expect((await provider.get()).inference.model).toBe('hot-swapped');
  });

  it('update({ model }) is reflected by get() and leaves the system message unchanged', async () => {
    const provider = new FileConfigProvider({ path, env: { SYSTEM_MESSAGE: 'Be brief.' } });

    await provider.update({ model: 'x' });
    const config = await provider.get();

    expect(config.inference.model).toBe('x');
    expect(config.inference.systemMessage).toBe('Be brief.');
  });

  it('persists updates for a fresh provider and keeps unrelated keys in the file', async () => {
    writeFileSync(path, JSON.stringify({ chatwoot: { accountId: '3' }, history: { maxMessages: 5 } }));

    await new FileConfigProvider({ path, env: {} }).update({ systemMessage: 'Answer in French.' });
    const config = await new FileConfigProvider({ path, env: {} }).get();

    expect(config.inference.systemMessage).toBe('Answer in French.');
    expect(config.chatwoot.accountId).toBe('3');
    expect(config.history.maxMessages).toBe(5);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
      chatwoot: { accountId: '3' },
      history: { maxMessages: 5 },
      inference: { systemMessage: 'Answer in French.' },
    });
  });

  it('maps flat update fields onto their sections', async () => {
    const provider = new FileConfigProvider({ path, env: {} });
    const config = await provider.update({
      baseUrl: 'https://desk.test',
      apiToken: 'test-token',
      accountId: '9',
      inferenceEndpoint: 'http://llm.test',
    });

    expect(config.chatwoot.baseUrl).toBe('https://desk.test');
    expect(config.chatwoot.apiToken).toBe('test-token');
    expect(config.chatwoot.accountId).toBe('9');
    expect(config.inference.endpoint).toBe('http://llm.test');
  });

  it('rejects an update without recognized fields', async () => {
    const provider = new FileConfigProvider({ path, env: {} });

    await expect(provider.update({})).rejects.toBeInstanceOf(ValidationError);
    await expect(provider.update({ model: '   ' })).rejects.toBeInstanceOf(ValidationError);
    expect(readdirSync(dir)).toEqual([]);
  });

  it('serializes concurrent updates so both land', async () => {
    const provider = new FileConfigProvider({ path, env: {} });

    await Promise.all([
      provider.update({ model: 'a' }),
      provider.update({ systemMessage: 'b' }),
    ]);
    const config = await provider.get();

    expect(config.inference.model).toBe('a');
    expect(config.inference.systemMessage).toBe('b');
  });

  it('keeps accepting updates after a failed one', async () => {
    const provider = new FileConfigProvider({ path, env: {} });

    await expect(provider.update({})).rejects.toThrow();
    await provider.update({ model: 'after-failure' });

    expect((await provider.get()).inference.model).toBe('after-failure');
  });

  it('leaves no temp files behind', async () => {
    const provider = new FileConfigProvider({ path, env: {} });
    await provider.update({ model: 'a' });
    await provider.update({ model: 'b' });

    expect(readdirSync(dir)).toEqual(['deskwire.json']);
  });

  it('fails with ConfigError on a malformed file', async () => {
    writeFileSync(path, 'not json');
    const provider = new FileConfigProvider({ path, env: {} });

    await expect(provider.get()).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails with ConfigError when the file holds a non-object', async () => {
    writeFileSync(path, '[1, 2]');
    const provider = new FileConfigProvider({ path, env: {} });

    await expect(provider.get()).rejects.toThrow(`${path} must contain a JSON object`);
  });

  it('fails with ConfigError on a non-numeric PORT', async () => {
    const provider = new FileConfigProvider({ path, env: { PORT: 'eighty' } });

    await expect(provider.get()).rejects.toThrow('PORT must be a number, got "eighty"');
  });

  it('fails with ConfigError when a value violates the schema', async () => {
    writeFileSync(path, JSON.stringify({ history: { maxMessages: -1 } }));
    const provider = new FileConfigProvider({ path, env: {} });

    await expect(provider.get()).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and lets later values win', () => {
    expect(deepMerge(
      { a: { x: 1, y: 2 }, b: 1 },
      { a: { y: 3 }, c: 4 },
    )).toEqual({ a: { x: 1, y: 3 }, b: 1, c: 4 });
  });

  it('skips undefined values and replaces arrays wholesale', () => {
    expect(deepMerge({ a: 1, list: [1, 2] }, { a: undefined, list: [3] })).toEqual({ a: 1, list: [3] });
  });
});
