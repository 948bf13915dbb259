import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { canonicalizeFieldText, PositionCache } from '../PositionCache';
import { RenderParameters } from '../types';

const FIELDS = { name: 'Test Participant', event: 'Sample Workshop', organiser: 'Example Society' };
const PAYLOAD: RenderParameters = { offsets: { name: { dx: 1, dy: -2 } } };

describe('PositionCache', () => {
  let cache: PositionCache;

  beforeEach(() => {
    cache = new PositionCache({ ttlSeconds: 60, checkPeriodSeconds: 0 });
  });

  afterEach(() => {
    cache.close();
    jest.useRealTimers();
  });

  describe('keys', () => {
    test('canonicalizes whitespace and case', () => {
      expect(canonicalizeFieldText('  Test PARTICIPANT ')).toBe('test participant');
    });

    test('ignores field order, case and surrounding whitespace', () => {
      const shuffled = { organiser: 'EXAMPLE SOCIETY', event: ' Sample Workshop', name: 'test participant ' };
      expect(PositionCache.keyFor(shuffled)).toBe(PositionCache.keyFor(FIELDS));
    });

    test('differs when any field text differs', () => {
      expect(PositionCache.keyFor({ ...FIELDS, event: 'Another Workshop' })).not.toBe(PositionCache.keyFor(FIELDS));
    });

    test('is a sha256 hex digest', () => {
      expect(PositionCache.keyFor(FIELDS)).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  test('returns what was stored', () => {
    cache.set(FIELDS, PAYLOAD);
    expect(cache.get(FIELDS)).toEqual(PAYLOAD);
  });

  test('returns a copy that callers cannot corrupt', () => {
    cache.set(FIELDS, PAYLOAD);
    const first = cache.get(FIELDS);
    if (first) {
      first.offsets.name = { dx: 99, dy: 99 };
    }
    expect(cache.get(FIELDS)).toEqual(PAYLOAD);
  });

  test('counts hits and misses', () => {
    expect(cache.get(FIELDS)).toBeUndefined();
    cache.set(FIELDS, PAYLOAD);
    cache.get(FIELDS);
    cache.get(FIELDS);

    expect(cache.stats()).toEqual({ size: 1, hits: 2, misses: 1 });
  });

  test('expires entries after their TTL', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    cache.set(FIELDS, PAYLOAD, 1);
    expect(cache.get(FIELDS)).toEqual(PAYLOAD);

    jest.setSystemTime(new Date('2026-01-01T00:00:01.001Z'));
    expect(cache.get(FIELDS)).toBeUndefined();
    expect(cache.stats().size).toBe(0);
  });

  test('clearExpired drops only expired entries', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    cache.set(FIELDS, PAYLOAD, 1);
    cache.set({ ...FIELDS, name: 'Other Participant' }, PAYLOAD, 60);

    jest.setSystemTime(new Date('2026-01-01T00:00:05Z'));
    expect(cache.clearExpired()).toBe(1);
    expect(cache.stats().size).toBe(1);
  });

  test('invalidate removes a single entry', () => {
    cache.set(FIELDS, PAYLOAD);
    expect(cache.invalidate(FIELDS)).toBe(true);
    expect(cache.invalidate(FIELDS)).toBe(false);
    expect(cache.get(FIELDS)).toBeUndefined();
  });

  test('clearAll empties the cache and resets counters', () => {
    cache.set(FIELDS, PAYLOAD);
    cache.get(FIELDS);
    cache.clearAll();
    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0 });
  });

  describe('invalidateIf', () => {
    test('removes the entry that was looked up', () => {
      cache.set(FIELDS, PAYLOAD);
      const seen = cache.lookup(FIELDS);

      expect(seen?.payload).toEqual(PAYLOAD);
      expect(seen && cache.invalidateIf(FIELDS, seen)).toBe(true);
      expect(cache.get(FIELDS)).toBeUndefined();
    });

    test('keeps an entry written after the lookup', () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      cache.set(FIELDS, PAYLOAD);
      const seen = cache.lookup(FIELDS);

      jest.setSystemTime(new Date('2026-01-01T00:00:01Z'));
      cache.set(FIELDS, PAYLOAD);
      expect(seen && cache.invalidateIf(FIELDS, seen)).toBe(false);

      cache.set(FIELDS, { offsets: {} });
      expect(seen && cache.invalidateIf(FIELDS, seen)).toBe(false);
      expect(cache.get(FIELDS)).toEqual({ offsets: {} });
    });

    test('reports false when nothing is stored', () => {
      expect(cache.invalidateIf(FIELDS, { createdAt: 0, payload: PAYLOAD })).toBe(false);
    });
  });

  test('rejects non-positive TTLs', () => {
    expect(() => new PositionCache({ ttlSeconds: 0 })).toThrow(RangeError);
    expect(() => cache.set(FIELDS, PAYLOAD, -1)).toThrow(RangeError);
  });

  describe('snapshot and restore', () => {
    test('carries entries and their remaining lifetime into another cache', () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      cache.set(FIELDS, PAYLOAD, 10);

      const snapshot = cache.snapshot();
      expect(snapshot).toHaveLength(1);
      expect(snapshot[0]).toMatchObject({
        key: PositionCache.keyFor(FIELDS),
        payload: PAYLOAD,
        ttlSeconds: 10,
        expiresAt: Date.parse('2026-01-01T00:00:10Z'),
      });

      const other = new PositionCache({ checkPeriodSeconds: 0 });
      try {
        jest.setSystemTime(new Date('2026-01-01T00:00:05Z'));
        expect(other.restore(snapshot)).toBe(1);
        expect(other.get(FIELDS)).toEqual(PAYLOAD);

        jest.setSystemTime(new Date('2026-01-01T00:00:10.001Z'));
        expect(other.get(FIELDS)).toBeUndefined();
      } finally {
        other.close();
      }
    });

    test('skips entries that have already expired', () => {
      expect(
        cache.restore([
          { key: 'stale', payload: PAYLOAD, createdAt: 0, ttlSeconds: 1, expiresAt: Date.now() - 1000 },
        ])
      ).toBe(0);
    });
  });

  describe('file persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'position-cache-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    test('saves and loads entries', async () => {
      const filePath = path.join(dir, 'nested', 'cache.json');
      cache.set(FIELDS, PAYLOAD);
      expect(await cache.saveToFile(filePath)).toBe(1);

      const loaded = new PositionCache({ checkPeriodSeconds: 0 });
      try {
        expect(await loaded.loadFromFile(filePath)).toBe(1);
        expect(loaded.get(FIELDS)).toEqual(PAYLOAD);
      } finally {
        loaded.close();
      }
    });

    test('starts empty when the file does not exist', async () => {
      expect(await cache.loadFromFile(path.join(dir, 'missing.json'))).toBe(0);
    });

    test('starts empty when the file is corrupt', async () => {
      const filePath = path.join(dir, 'cache.json');
      await fs.writeFile(filePath, '{ not json', 'utf8');
      expect(await cache.loadFromFile(filePath)).toBe(0);

      await fs.writeFile(filePath, JSON.stringify({ version: 2, entries: [] }), 'utf8');
      expect(await cache.loadFromFile(filePath)).toBe(0);
      expect(cache.stats().size).toBe(0);
    });
  });
});
