import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createLogger, createMemorySink, isDebugLogEnabled } from './logger';

describe('createLogger', () => {
  it('should prefix lines with the scope', () => {
    const sink = createMemorySink();
    const logger = createLogger('OpenPrices', { sink, debug: false });

    logger.info('Price submitted for', '3000000000001');
    logger.child('auth').warn('Login rejected: HTTP 403');

    assert.deepStrictEqual(sink.lines, [
      { level: 'info', text: '[OpenPrices] Price submitted for 3000000000001' },
      { level: 'warn', text: '[OpenPrices:auth] Login rejected: HTTP 403' },
    ]);
  });

  it('should drop debug lines unless enabled', () => {
    const sink = createMemorySink();
    createLogger('Quiet', { sink, debug: false }).debug('hidden');
    createLogger('Loud', { sink, debug: true }).debug('shown');

    assert.deepStrictEqual(sink.lines, [{ level: 'debug', text: '[Loud] shown' }]);
  });
});

describe('isDebugLogEnabled', () => {
  it('should read the debug flag', () => {
    assert.strictEqual(isDebugLogEnabled({ PRODUCT_FACTS_DEBUG_LOG: 'true' }), true);
    assert.strictEqual(isDebugLogEnabled({ PRODUCT_FACTS_DEBUG_LOG: '1' }), true);
    assert.strictEqual(isDebugLogEnabled({ PRODUCT_FACTS_DEBUG_LOG: 'no' }), false);
    assert.strictEqual(isDebugLogEnabled({}), false);
  });
});
