import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createLogger, createMemorySink } from '../logging/logger';
import { mapCatalogProduct } from './open-facts.adapter';
import { LanguageFallbackResolver } from './language-fallback.resolver';
import type { CatalogFetcher, CatalogLookupResult } from './catalog.types';
import type { LanguageCode } from './languages';

const BARCODE = '3000000000001';

function productIn(language: LanguageCode): CatalogLookupResult {
  return {
    found: true,
    product: mapCatalogProduct(
      { product_name: `name-${language}` },
      BARCODE,
      'food',
      language,
      new Date('2026-03-01T12:00:00Z'),
    ),
  };
}

function scriptedFetcher(
  answers: Partial<Record<LanguageCode, CatalogLookupResult | Error>>,
): CatalogFetcher & { calls: LanguageCode[] } {
  const calls: LanguageCode[] = [];
  const fetcher: CatalogFetcher = async (_barcode, language) => {
    calls.push(language);
    const answer = answers[language];
    if (answer instanceof Error) throw answer;
    return answer ?? { found: false, reason: 'not_found' };
  };
  return Object.assign(fetcher, { calls });
}

describe('LanguageFallbackResolver', () => {
  it('should return the second language and never try the third', async () => {
    const fetcher = scriptedFetcher({
      fr: { found: false, reason: 'not_found' },
      de: productIn('de'),
      es: productIn('es'),
    });
    const resolver = new LanguageFallbackResolver(
      fetcher,
      createLogger('Test', { sink: createMemorySink() }),
    );

    const product = await resolver.resolve(BARCODE, ['fr', 'de', 'es']);

    assert.strictEqual(product?.name, 'name-de');
    assert.strictEqual(product?.language, 'de');
    assert.deepStrictEqual(fetcher.calls, ['fr', 'de']);
  });

  it('should continue past errors and malformed responses', async () => {
    const fetcher = scriptedFetcher({
      fr: new Error('connection reset'),
      de: { found: false, reason: 'malformed', message: 'Response is not JSON' },
      en: productIn('en'),
    });
    const sink = createMemorySink();
    const resolver = new LanguageFallbackResolver(
      fetcher,
      createLogger('Test', { sink }),
    );

    const result = await resolver.resolveDetailed(BARCODE, ['fr', 'de', 'en']);

    assert.strictEqual(result.found, true);
    assert.deepStrictEqual(result.attempts, [
      { language: 'fr', outcome: 'error', message: 'connection reset' },
      { language: 'de', outcome: 'malformed', message: 'Response is not JSON' },
      { language: 'en', outcome: 'found' },
    ]);
    assert.strictEqual(
      sink.lines.filter((line) => line.level === 'warn').length,
      2,
    );
  });

  it('should distinguish true absence from failed lookups', async () => {
    const absent = new LanguageFallbackResolver(
      scriptedFetcher({}),
      createLogger('Test', { sink: createMemorySink() }),
    );
    const notFound = await absent.resolveDetailed(BARCODE, ['en', 'fr']);
    assert.strictEqual(notFound.found, false);
    if (!notFound.found) assert.strictEqual(notFound.reason, 'not_found');

    const flaky = new LanguageFallbackResolver(
      scriptedFetcher({ fr: { found: false, reason: 'rate_limited' } }),
      createLogger('Test', { sink: createMemorySink() }),
    );
    const unavailable = await flaky.resolveDetailed(BARCODE, ['en', 'fr']);
    if (unavailable.found) assert.fail('expected no product');
    assert.strictEqual(unavailable.reason, 'unavailable');
    assert.strictEqual(await flaky.resolve(BARCODE, ['en', 'fr']), null);
  });

  it('should fall back to the default language for an empty list', async () => {
    const fetcher = scriptedFetcher({ en: productIn('en') });
    const resolver = new LanguageFallbackResolver(
      fetcher,
      createLogger('Test', { sink: createMemorySink() }),
    );

    const product = await resolver.resolve(BARCODE, []);

    assert.strictEqual(product?.language, 'en');
    assert.deepStrictEqual(fetcher.calls, ['en']);
  });
});
