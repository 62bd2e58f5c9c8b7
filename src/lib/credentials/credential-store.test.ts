/**
 * Credential store tests (env, static, chained, file discovery)
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger, createMemorySink } from '../logging/logger';
import {
  ChainedCredentialStore,
  EnvCredentialStore,
  StaticCredentialStore,
} from './credential-store';
import { FileCredentialStore } from './file-credential-store';

describe('EnvCredentialStore', () => {
  it('should read a login and session timeout from the environment', async () => {
    const store = new EnvCredentialStore({
      OPEN_PRICES_USERNAME: 'test-user',
      OPEN_PRICES_PASSWORD: 'test-secret',
      OPEN_PRICES_SESSION_TIMEOUT: '120',
    });
    await store.load();

    assert.strictEqual(store.hasCredentials(), true);
    assert.deepStrictEqual(store.resolve(), {
      method: 'loginPassword',
      username: 'test-user',
      password: 'test-secret',
      sessionTimeoutSeconds: 120,
    });
  });

  it('should report no credentials when nothing is set', async () => {
    const store = new EnvCredentialStore({});
    await store.load();
    assert.strictEqual(store.hasCredentials(), false);
    assert.strictEqual(store.resolve().method, 'none');
  });

  it('should forget everything on clear', async () => {
    const store = new EnvCredentialStore({
      OPEN_PRICES_AUTH_TOKEN: 'test-token',
    });
    await store.load();
    assert.strictEqual(store.resolve().method, 'apiToken');

    store.clear();
    assert.strictEqual(store.hasCredentials(), false);
    assert.strictEqual(store.resolve().method, 'none');
  });
});

describe('ChainedCredentialStore', () => {
  it('should use the first store with a usable method', async () => {
    const chained = new ChainedCredentialStore([
      new StaticCredentialStore({ username: 'test-user' }),
      new StaticCredentialStore({ token: 'test-token' }),
    ]);
    await chained.load();

    const bundle = chained.resolve();
    assert.strictEqual(bundle.method, 'apiToken');
    assert.strictEqual(chained.hasCredentials(), true);
  });

  it('should resolve to none when no store has credentials', () => {
    const chained = new ChainedCredentialStore([
      new StaticCredentialStore(),
      new EnvCredentialStore({}),
    ]);
    assert.strictEqual(chained.resolve().method, 'none');
    assert.strictEqual(chained.origin, 'static+env');
  });
});

describe('FileCredentialStore', () => {
  let root: string;
  const sink = createMemorySink();
  const logger = createLogger('Credentials', { sink, debug: false });

  const tokenDocument = (token: string) =>
    JSON.stringify({ open_prices: { auth_token: token } });

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'credential-store-'));
    sink.lines.length = 0;
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should prefer the test directory over the project root', async () => {
    await fs.mkdir(path.join(root, 'test'));
    await fs.writeFile(
      path.join(root, 'test', 'open_prices_credentials.json'),
      tokenDocument('test-token-a'),
    );
    await fs.writeFile(
      path.join(root, 'open_prices_credentials.json'),
      tokenDocument('test-token-b'),
    );

    const store = new FileCredentialStore({ cwd: root, logger });
    await store.load();

    assert.deepStrictEqual(store.resolve(), {
      method: 'apiToken',
      token: 'test-token-a',
      sessionTimeoutSeconds: 3600,
    });
    assert.strictEqual(
      store.origin,
      `file:${path.join(root, 'test', 'open_prices_credentials.json')}`,
    );
  });

  it('should scan upward for the project marker', async () => {
    await fs.writeFile(
      path.join(root, 'package.json'),
      JSON.stringify({ name: 'product-facts-resolver' }),
    );
    const nested = path.join(root, 'packages', 'app');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(
      path.join(nested, 'package.json'),
      JSON.stringify({ name: 'some-other-package' }),
    );

    const store = new FileCredentialStore({ cwd: nested, logger });
    assert.strictEqual(
      await store.locate(),
      path.join(root, 'open_prices_credentials.json'),
    );
  });

  it('should fall back to the working directory', async () => {
    const store = new FileCredentialStore({
      cwd: root,
      projectMarker: 'marker-that-does-not-exist',
      logger,
    });
    assert.strictEqual(
      await store.locate(),
      path.join(root, 'open_prices_credentials.json'),
    );
    await store.load();
    assert.strictEqual(store.hasCredentials(), false);
  });

  it('should stay empty and log when the file is not JSON', async () => {
    await fs.writeFile(path.join(root, 'open_prices_credentials.json'), '{ nope');

    const store = new FileCredentialStore({
      cwd: root,
      projectMarker: null,
      includeTestDirectory: false,
      logger,
    });
    await store.load();

    assert.strictEqual(store.hasCredentials(), false);
    assert.strictEqual(store.resolve().method, 'none');
    assert.strictEqual(
      sink.lines.filter((line) => line.level === 'error').length,
      1,
    );
  });

  it('should accept older files that still carry endpoint keys', async () => {
    await fs.writeFile(
      path.join(root, 'open_prices_credentials.json'),
      JSON.stringify({
        open_prices: {
          auth_token: ' test-token ',
          api_url: 'https://prices.test/api/v1',
          app_name: 'OldApp/0.1',
        },
      }),
    );

    const store = new FileCredentialStore({
      cwd: root,
      projectMarker: 'marker-that-does-not-exist',
      logger,
    });
    await store.load();

    assert.deepStrictEqual(store.resolve(), {
      method: 'apiToken',
      token: 'test-token',
      sessionTimeoutSeconds: 3600,
    });
  });

  it('should write a template that resolves to no credentials', async () => {
    const store = new FileCredentialStore({
      cwd: root,
      projectMarker: 'marker-that-does-not-exist',
      createTemplate: true,
      logger,
    });
    await store.load();

    const written = await fs.readFile(
      path.join(root, 'open_prices_credentials.json'),
      'utf-8',
    );
    assert.ok(written.includes('your_api_token_here'));
    assert.ok(!written.includes('api_url'));

    await store.load();
    assert.strictEqual(store.hasCredentials(), true);
    assert.strictEqual(store.resolve().method, 'none');
  });
});
