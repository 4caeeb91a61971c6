import { JsonCatalogProvider } from '@/services/providers/catalog/catalog-provider';
import { JsonPersonaProvider } from '@/services/providers/personas/persona-provider';
import { loadAppConfig } from '@/config/app.config';
import { safeParseJson } from '@/services/safe-parse-json';
import path from 'path';
import { DATA_DIR } from './helpers/fakes';

describe('JsonCatalogProvider', () => {
  const catalog = new JsonCatalogProvider({
    'itm-1': { name: 'Catalog Name', price: 150, rating: 'excellent', labels: ['Bestseller'] },
  });

  it('overlays catalog fields onto shard metadata', () => {
    const metadata = catalog.describe({
      itemId: 'itm-1',
      similarityScore: 0.5,
      shardId: 'north',
      rawMetadata: { name: 'Shard Name', price: 120, dietary: 'VEG', cuisines: ['Thai'] },
    });

    expect(metadata).toEqual({
      name: 'Catalog Name',
      price: 150,
      dietary: 'veg',
      cuisines: ['thai'],
      labels: ['bestseller'],
    });
  });

  it('falls back to shard metadata and the item id', () => {
    const metadata = catalog.describe({
      itemId: 'itm-9',
      similarityScore: 0.5,
      shardId: 'north',
      rawMetadata: { price: '80', cuisines: 'not a list' },
    });
    expect(metadata).toEqual({ name: 'itm-9', price: 80, cuisines: [], labels: [] });
  });

  it('loads the bundled catalog', () => {
    const bundled = JsonCatalogProvider.fromFile(path.join(DATA_DIR, 'catalog.json'));
    expect(bundled.size).toBe(40);
    expect(bundled.get('itm-001')?.name).toBe('Hyderabadi Veg Dum Biryani');
    expect(bundled.get('missing')).toBeUndefined();
  });
});

describe('JsonPersonaProvider', () => {
  it('maps known users and defaults the rest', () => {
    const personas = JsonPersonaProvider.fromFile(path.join(DATA_DIR, 'personas.json'));
    expect(personas.personaFor('user-1003')).toBe('explorer');
    expect(personas.personaFor('user-9999')).toBe('default');
    expect(personas.personaFor(undefined)).toBe('default');
  });
});

describe('loadAppConfig', () => {
  it('applies defaults', () => {
    const config = loadAppConfig({});
    expect(config.port).toBe(4000);
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.retrieval.embedder).toBe('hash');
    expect(config.corsOrigins).toEqual(['http://localhost:3000']);
    expect(config.paths.catalog).toBe(path.resolve(process.cwd(), 'node/data/catalog.json'));
  });

  it('reads numbers and lists from the environment', () => {
    const config = loadAppConfig({ SHARD_TIMEOUT_MS: '250', CORS_ORIGIN: 'http://a.test,http://b.test' });
    expect(config.retrieval.shardTimeoutMs).toBe(250);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('rejects an unknown embedder', () => {
    expect(() => loadAppConfig({ EMBEDDER: 'quantum' })).toThrow();
  });
});

describe('safeParseJson', () => {
  it('strips code fences', () => {
    expect(safeParseJson('```json\n{"a": 1}\n```', 'test')).toEqual({ a: 1 });
  });

  it('accepts single-quoted objects', () => {
    expect(safeParseJson("{'intent': 'greeting'}", 'test')).toEqual({ intent: 'greeting' });
  });

  it('returns null for anything but an object', () => {
    expect(safeParseJson('[1, 2]', 'test')).toBeNull();
    expect(safeParseJson('not json', 'test')).toBeNull();
  });
});
