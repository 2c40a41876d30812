import { describe, it, expect, vi } from 'vitest';
import { ChatwootClient } from '../../src/chatwoot/client.js';
import { ReplyDispatcher, failureHint } from '../../src/dispatch/reply-dispatcher.js';
import { ConfigError, NetworkError } from '../../src/errors.js';
import { createFetchStub, jsonResponse, timeoutError, type FetchHandler } from '../helpers/fetch-stub.js';
import { createTestConfig } from '../helpers/test-fixtures.js';

function createDispatcher(handler: FetchHandler) {
  const stub = createFetchStub(handler);
  return { dispatcher: new ReplyDispatcher(new ChatwootClient({ fetch: stub.fetch })), stub };
}

describe('ReplyDispatcher', () => {
  it('posts the reply as an outgoing message', async () => {
    const { dispatcher, stub } = createDispatcher(() => jsonResponse({ id: 99, content: 'Hello!' }));

    const result = await dispatcher.send(createTestConfig(), '42', 'Hello!');

    expect(result).toEqual({ ok: true });
    expect(stub.requests).toEqual([{
      url: 'https://desk.test/api/v1/accounts/7/conversations/42/messages',
      method: 'POST',
      headers: { 'api_access_token': 'test-token', 'content-type': 'application/json' },
      body: { content: 'Hello!', message_type: 'outgoing' },
    }]);
  });

  it('succeeds even when the response has no body', async () => {
    const { dispatcher } = createDispatcher(() => new Response(null, { status: 204 }));

    expect(await dispatcher.send(createTestConfig(), '42', 'Hello!')).toEqual({ ok: true });
  });

  it('fails with ConfigError and no request when the account id is missing', async () => {
    const { dispatcher, stub } = createDispatcher(() => jsonResponse({}));

    const result = await dispatcher.send(createTestConfig({ chatwoot: { accountId: '' } }), '42', 'Hello!');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(ConfigError);
    expect(!result.ok && result.reason).toBe('CHATWOOT_ACCOUNT_ID is not configured');
    expect(stub.requests).toHaveLength(0);
  });

  it('fails with ConfigError when the base URL is missing', async () => {
    const { dispatcher, stub } = createDispatcher(() => jsonResponse({}));

    const result = await dispatcher.send(createTestConfig({ chatwoot: { baseUrl: '' } }), '42', 'Hello!');

    expect(!result.ok && result.error).toBeInstanceOf(ConfigError);
    expect(stub.requests).toHaveLength(0);
  });

  it('fails on a non-2xx response', async () => {
    const { dispatcher } = createDispatcher(() => jsonResponse({ error: 'Unauthorized' }, 401));

    const result = await dispatcher.send(createTestConfig(), '42', 'Hello!');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NetworkError);
    expect(result.error instanceof NetworkError && result.error.status).toBe(401);
    expect(result.reason).toBe('Chatwoot responded 401');
  });

  it('fails on a network error or timeout', async () => {
    const refused = createDispatcher(() => { throw new TypeError('fetch failed'); });
    const slow = createDispatcher(() => { throw timeoutError(); });

    const refusedResult = await refused.dispatcher.send(createTestConfig(), '42', 'Hello!');
    const slowResult = await slow.dispatcher.send(createTestConfig(), '42', 'Hello!');

    expect(!refusedResult.ok && refusedResult.reason).toBe('Chatwoot request failed: fetch failed');
    expect(!slowResult.ok && slowResult.reason).toBe('Chatwoot request timed out after 1000ms');
  });

  it('adds an operator hint to the failure log for auth errors', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { dispatcher } = createDispatcher(() => jsonResponse({ error: 'Unauthorized' }, 401));

    await dispatcher.send(createTestConfig(), '42', 'Hello!');

    expect(String(errors.mock.calls[0][0])).toContain('Chatwoot responded 401 (check CHATWOOT_API_TOKEN)');
    errors.mockRestore();
  });
});

describe('failureHint', () => {
  it('reads the status and timeout flag of helpdesk errors', () => {
    expect(failureHint(new NetworkError('Chatwoot responded 403', { status: 403 }))).toBe('check CHATWOOT_API_TOKEN');
    expect(failureHint(new NetworkError('Chatwoot responded 404', { status: 404 })))
      .toBe('check CHATWOOT_ACCOUNT_ID and that the conversation exists');
    expect(failureHint(new NetworkError('Chatwoot request timed out after 1000ms', { timedOut: true })))
      .toBe('the helpdesk may still have posted the reply; check the conversation before resending');
  });

  it('has nothing to add for other failures', () => {
    expect(failureHint(new NetworkError('Chatwoot responded 500', { status: 500 }))).toBeUndefined();
    expect(failureHint(new NetworkError('Chatwoot request failed: fetch failed'))).toBeUndefined();
    expect(failureHint(new ConfigError('CHATWOOT_ACCOUNT_ID is not configured'))).toBeUndefined();
  });
});
