import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RequestDispatcher, joinUrl, parseBody } from '../../src/core/dispatcher.js';
import { IntervalRateLimiter } from '../../src/core/rate-limiter.js';
import { MissingCredentialError, TransportError } from '../../src/core/errors.js';
import { Credentials } from '../../src/core/types.js';
import { ACCOUNT_TOKEN, BASE_URL, FakeClock, FakeReply, fakeTransport } from '../helpers.js';

function setup(
  replies: Array<FakeReply | Error>,
  options: { accountToken?: string; tokens?: Record<string, string>; timeoutMs?: number } = {}
) {
  const clock = new FakeClock();
  const tokens = new Map(Object.entries(options.tokens ?? { ALPHA: 'tok123' }));
  const { transport, requests } = fakeTransport(replies);
  const dispatcher = new RequestDispatcher({
    baseUrl: BASE_URL,
    accountToken: options.accountToken,
    credentials: { get: (symbol) => tokens.get(symbol) },
    rateLimiter: new IntervalRateLimiter({ requestsPerPeriod: 2, periodMs: 1000, clock }),
    transport,
    timeoutMs: options.timeoutMs
  });
  return { dispatcher, requests, clock };
}

describe('RequestDispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('attaches the stored agent token', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: { symbol: 'ALPHA' } } }]);

    const response = await dispatcher.dispatch({
      method: 'GET',
      path: 'my/agent',
      credential: Credentials.agent('ALPHA')
    });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ data: { symbol: 'ALPHA' } });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('GET');
    expect(requests[0].url).toBe('https://api.test/v2/my/agent');
    expect(requests[0].headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer tok123'
    });
    expect(requests[0].body).toBeUndefined();
  });

  it('uses the account token for account requests even when agent tokens exist', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: [] } }], {
      accountToken: ACCOUNT_TOKEN
    });

    await dispatcher.dispatch({ method: 'GET', path: 'factions', credential: Credentials.account });

    expect(requests[0].headers['Authorization']).toBe('Bearer test-account-token');
  });

  it('sends an agent without a stored token unauthenticated', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: {} } }]);

    await dispatcher.dispatch({ method: 'GET', path: 'agents/GHOST', credential: Credentials.agent('GHOST') });

    expect(requests[0].headers).toEqual({ Accept: 'application/json' });
  });

  it('sends no credential for public requests', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { status: 'ok' } }], {
      accountToken: ACCOUNT_TOKEN
    });

    await dispatcher.dispatch({ method: 'GET', path: '', credential: Credentials.none });

    expect(requests[0].url).toBe('https://api.test/v2/');
    expect(requests[0].headers).not.toHaveProperty('Authorization');
  });

  it('fails fast without an account token, before consuming a slot', async () => {
    const { dispatcher, requests, clock } = setup([]);

    await expect(
      dispatcher.dispatch({ method: 'POST', path: 'register', credential: Credentials.account, body: {} })
    ).rejects.toThrow(MissingCredentialError);

    expect(requests).toHaveLength(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('serializes JSON bodies and declares the content type', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: {} } }]);

    await dispatcher.dispatch({
      method: 'POST',
      path: '/my/ships/ALPHA-1/navigate',
      credential: Credentials.agent('ALPHA'),
      body: { waypointSymbol: 'X1-DF55-20250Z' }
    });

    expect(requests[0].url).toBe('https://api.test/v2/my/ships/ALPHA-1/navigate');
    expect(requests[0].headers['Content-Type']).toBe('application/json');
    expect(requests[0].body).toBe('{"waypointSymbol":"X1-DF55-20250Z"}');
  });

  it('keeps extra headers but never lets them override the credential', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: {} } }]);

    await dispatcher.dispatch({
      method: 'GET',
      path: 'my/agent',
      credential: Credentials.agent('ALPHA'),
      headers: { 'X-Trace': 'abc', Authorization: 'Bearer spoofed' }
    });

    expect(requests[0].headers).toEqual({
      'X-Trace': 'abc',
      Accept: 'application/json',
      Authorization: 'Bearer tok123'
    });
  });

  it('returns error statuses instead of throwing', async () => {
    const { dispatcher } = setup([
      { status: 404, body: { error: { message: 'Ship not found', code: 404 } } }
    ]);

    const response = await dispatcher.dispatch({
      method: 'GET',
      path: 'my/ships/NOPE',
      credential: Credentials.agent('ALPHA')
    });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: { message: 'Ship not found', code: 404 } });
    expect(response.headers['content-type']).toBe('application/json');
  });

  it('returns a null body for 204 and the raw text for non-JSON bodies', async () => {
    const { dispatcher } = setup([{ status: 204 }, { status: 502, text: 'Bad Gateway' }]);

    const empty = await dispatcher.dispatch({ method: 'GET', path: 'a', credential: Credentials.none });
    const text = await dispatcher.dispatch({ method: 'GET', path: 'b', credential: Credentials.none });

    expect(empty).toMatchObject({ status: 204, body: null });
    expect(text).toMatchObject({ status: 502, body: 'Bad Gateway' });
  });

  it('wraps network failures in TransportError after consuming the slot', async () => {
    const { dispatcher, clock } = setup([new Error('connect ECONNREFUSED')]);

    const attempt = dispatcher.dispatch({ method: 'GET', path: 'my/agent', credential: Credentials.agent('ALPHA') });

    await expect(attempt).rejects.toThrow(TransportError);
    await expect(attempt).rejects.toThrow('GET https://api.test/v2/my/agent failed: connect ECONNREFUSED');
    expect(clock.sleeps).toEqual([500]);
  });

  it('consumes one slot per dispatch', async () => {
    const { dispatcher, clock } = setup([
      { status: 200, body: { data: {} } },
      { status: 500, body: { error: { message: 'boom' } } },
      { status: 200, body: { data: {} } }
    ]);

    for (const path of ['a', 'b', 'c']) {
      await dispatcher.dispatch({ method: 'GET', path, credential: Credentials.none });
    }

    expect(clock.sleeps).toEqual([500, 500, 500]);
    expect(clock.now()).toBe(1500);
  });

  it('attaches a timeout signal when configured', async () => {
    const { dispatcher, requests } = setup([{ status: 200, body: { data: {} } }], { timeoutMs: 1000 });

    await dispatcher.dispatch({ method: 'GET', path: 'my/agent', credential: Credentials.agent('ALPHA') });

    expect(requests[0].signal).toBeInstanceOf(AbortSignal);
  });
});

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('https://api.test/v2/', '/my/agent')).toBe('https://api.test/v2/my/agent');
    expect(joinUrl('https://api.test/v2', 'my/agent')).toBe('https://api.test/v2/my/agent');
    expect(joinUrl('https://api.test/v2', '')).toBe('https://api.test/v2/');
  });
});

describe('parseBody', () => {
  it('parses JSON, keeps other text and maps empty to null', () => {
    expect(parseBody('{"data":1}')).toEqual({ data: 1 });
    expect(parseBody('oops')).toBe('oops');
    expect(parseBody('')).toBeNull();
  });
});
