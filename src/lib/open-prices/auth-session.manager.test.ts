/**
 * Auth session manager tests
 *
 * Login responses come from an in-process fetch stub; time from a test clock.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setImmediate as tick } from 'timers/promises';
import { createLogger, createMemorySink } from '../logging/logger';
import {
  createFetchStub,
  createTestClock,
  jsonResponse,
  type FetchHandler,
} from '../testing/fetch-stub';
import {
  AuthSessionManager,
  extractBodyToken,
  extractSessionCookie,
} from './auth-session.manager';

const SESSION_URL = 'https://auth.test/cgi/session.pl';

function setup(handler: FetchHandler) {
  const clock = createTestClock();
  const fetch = createFetchStub(handler);
  const sink = createMemorySink();
  const manager = new AuthSessionManager({
    sessionUrl: SESSION_URL,
    userAgent: 'TestApp/1.0',
    fetch,
    now: clock.now,
    logger: createLogger('Auth', { sink }),
  });
  return { clock, fetch, sink, manager };
}

const login = (sessionTimeoutSeconds = 60) =>
  ({
    method: 'loginPassword',
    username: 'test-user',
    password: 'test-secret',
    sessionTimeoutSeconds,
  }) as const;

function cookieResponse(value: string): Response {
  return new Response('{}', {
    status: 200,
    headers: { 'set-cookie': `session=${value}; Path=/; HttpOnly` },
  });
}

describe('extractSessionCookie', () => {
  it('should find the session attribute among other cookies', () => {
    assert.strictEqual(
      extractSessionCookie('lang=en; Path=/, session=abc123; HttpOnly'),
      'abc123',
    );
    assert.strictEqual(extractSessionCookie('mysession=nope'), null);
    assert.strictEqual(extractSessionCookie(null), null);
  });
});

describe('extractBodyToken', () => {
  it('should check access_token, token and session_id in that order', () => {
    assert.strictEqual(
      extractBodyToken(
        JSON.stringify({ session_id: 'sid', token: 'tok', access_token: 'acc' }),
      ),
      'acc',
    );
    assert.strictEqual(
      extractBodyToken(JSON.stringify({ session_id: 'sid', token: 'tok' })),
      'tok',
    );
    assert.strictEqual(extractBodyToken(JSON.stringify({ session_id: 'sid' })), 'sid');
    assert.strictEqual(extractBodyToken(JSON.stringify({ token: '' })), null);
    assert.strictEqual(extractBodyToken('not json'), null);
  });
});

describe('AuthSessionManager', () => {
  describe('API token', () => {
    it('should store the token without a network call and never expire', async () => {
      const { clock, fetch, manager } = setup(() => {
        throw new Error('unexpected request');
      });

      const ok = await manager.configure({
        method: 'apiToken',
        token: 'test-token',
        sessionTimeoutSeconds: 60,
      });
      clock.advance(365 * 24 * 60 * 60 * 1000);

      assert.strictEqual(ok, true);
      assert.strictEqual(manager.isExpired(), false);
      assert.strictEqual(manager.isAuthenticated(), true);
      assert.deepStrictEqual(manager.getSession(), {
        method: 'apiToken',
        accessToken: 'test-token',
        expiresAt: null,
        sessionCookie: null,
      });
      assert.strictEqual(await manager.refresh(), true);
      assert.strictEqual(fetch.requests.length, 0);
    });
  });

  describe('login/password', () => {
    it('should post the credential form and keep the session cookie', async () => {
      const { fetch, manager } = setup(() => cookieResponse('abc123'));

      assert.strictEqual(await manager.configure(login()), true);

      const request = fetch.requests[0];
      assert.ok(request);
      assert.strictEqual(request.url, SESSION_URL);
      assert.strictEqual(request.method, 'POST');
      assert.strictEqual(
        request.headers['content-type'],
        'application/x-www-form-urlencoded',
      );
      assert.strictEqual(
        request.body,
        'user_id=test-user&password=test-secret&action=process',
      );
      const session = manager.getSession();
      assert.strictEqual(session.accessToken, 'abc123');
      assert.strictEqual(session.sessionCookie, 'abc123');
      assert.strictEqual(manager.getState(), 'authenticated');
    });

    it('should expire after the session timeout', async () => {
      const { clock, manager } = setup(() => cookieResponse('abc123'));
      await manager.configure(login(60));

      clock.advance(59_000);
      assert.strictEqual(manager.isExpired(), false);
      assert.strictEqual(manager.isAuthenticated(), true);

      clock.advance(2_000);
      assert.strictEqual(manager.isExpired(), true);
      assert.strictEqual(manager.isAuthenticated(), false);
      assert.strictEqual(manager.getState(), 'expired');
    });

    it('should not track expiry without a positive timeout', async () => {
      const { clock, manager } = setup(() => cookieResponse('abc123'));
      await manager.configure(login(0));

      clock.advance(24 * 60 * 60 * 1000);
      assert.strictEqual(manager.getSession().expiresAt, null);
      assert.strictEqual(manager.isExpired(), false);
    });

    it('should fall back to a body token when no cookie is set', async () => {
      const { manager } = setup(() =>
        jsonResponse({ token: 'body-token', session_id: 'body-session' }),
      );

      assert.strictEqual(await manager.configure(login()), true);
      const session = manager.getSession();
      assert.strictEqual(session.accessToken, 'body-token');
      assert.strictEqual(session.sessionCookie, null);
    });

    it('should report a rejected login without throwing', async () => {
      const { manager } = setup(() => new Response('denied', { status: 403 }));

      const outcome = await manager.authenticate(login());

      assert.deepStrictEqual(outcome, {
        ok: false,
        reason: 'http_error',
        status: 403,
      });
      assert.strictEqual(manager.isAuthenticated(), false);
      assert.strictEqual(manager.getState(), 'unauthenticated');
    });

    it('should fail when the response carries no identifier', async () => {
      const { manager } = setup(() => jsonResponse({ status: 'ok' }));

      const outcome = await manager.authenticate(login());

      assert.deepStrictEqual(outcome, {
        ok: false,
        reason: 'no_session_identifier',
        status: 200,
      });
      assert.strictEqual(manager.isAuthenticated(), false);
    });

    it('should report network failures', async () => {
      const { manager } = setup(() => {
        throw new Error('getaddrinfo ENOTFOUND');
      });

      const outcome = await manager.authenticate(login());
      assert.deepStrictEqual(outcome, {
        ok: false,
        reason: 'network_error',
        message: 'getaddrinfo ENOTFOUND',
      });
    });

    it('should never log the password', async () => {
      const { manager, sink } = setup(() => new Response('', { status: 500 }));
      await manager.configure(login());
      assert.ok(sink.lines.every((line) => !line.text.includes('test-secret')));
    });

    it('should log in again with the stored credentials on refresh', async () => {
      const { fetch, manager } = setup((_request, index) =>
        cookieResponse(index === 0 ? 'first' : 'second'),
      );
      await manager.configure(login());

      assert.strictEqual(await manager.refresh(), true);
      assert.strictEqual(fetch.requests.length, 2);
      assert.strictEqual(fetch.requests[1]?.body, fetch.requests[0]?.body);
      assert.strictEqual(manager.getSession().accessToken, 'second');
    });

    it('should share one login between concurrent refreshes', async () => {
      const { fetch, manager } = setup(async (_request, index) => {
        await tick();
        return cookieResponse(`session-${index}`);
      });
      await manager.configure(login());

      const [a, b] = await Promise.all([manager.refresh(), manager.refresh()]);

      assert.strictEqual(a, true);
      assert.strictEqual(b, true);
      assert.strictEqual(fetch.requests.length, 2);
      assert.strictEqual(manager.getSession().accessToken, 'session-1');
    });

    it('should let configure wait for a refresh in flight', async () => {
      const { manager } = setup(async () => {
        await tick();
        return cookieResponse('from-login');
      });
      await manager.configure(login());

      const refreshing = manager.refresh();
      assert.strictEqual(manager.getState(), 'refreshing');
      const configured = manager.configure({
        method: 'apiToken',
        token: 'test-token',
        sessionTimeoutSeconds: 3600,
      });

      assert.deepStrictEqual(await Promise.all([refreshing, configured]), [
        true,
        true,
      ]);
      assert.strictEqual(manager.method, 'apiToken');
      assert.strictEqual(manager.getSession().accessToken, 'test-token');
    });

    it('should discard a login that completes after reset', async () => {
      let release: () => void = () => {};
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      const { manager } = setup(async (_request, index) => {
        if (index > 0) await held;
        return cookieResponse(`s${index + 1}`);
      });
      await manager.configure(login());

      const refreshing = manager.refreshSession();
      manager.reset();
      release();

      assert.deepStrictEqual(await refreshing, {
        ok: false,
        reason: 'cancelled',
      });
      assert.deepStrictEqual(manager.getSession(), {
        method: 'none',
        accessToken: null,
        expiresAt: null,
        sessionCookie: null,
      });
      assert.deepStrictEqual(manager.getStatus(), {
        authenticated: false,
        method: 'none',
        expired: false,
        hasStoredCredentials: false,
      });
    });
  });

  describe('no credentials', () => {
    it('should stay unauthenticated without a network call', async () => {
      const { fetch, manager } = setup(() => {
        throw new Error('unexpected request');
      });

      assert.strictEqual(
        await manager.configure({ method: 'none', sessionTimeoutSeconds: 3600 }),
        false,
      );
      assert.strictEqual(await manager.refresh(), false);
      assert.strictEqual(fetch.requests.length, 0);
      assert.deepStrictEqual(manager.getStatus(), {
        authenticated: false,
        method: 'none',
        expired: false,
        hasStoredCredentials: false,
      });
    });
  });
});
