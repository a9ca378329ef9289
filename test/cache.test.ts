import { describe, it, expect } from 'vitest';
import { CompletionCaches, TtlCache } from '../src/completion/cache';

describe('TtlCache', () => {
  it('should not reload a key within its time to live', () => {
    let now = 0;
    let loads = 0;
    const cache = new TtlCache<string>(1000, () => now);
    const load = () => {
      loads++;
      return `value-${loads}`;
    };

    expect(cache.getOrLoad('k', load)).toBe('value-1');
    now = 500;
    expect(cache.getOrLoad('k', load)).toBe('value-1');
    expect(loads).toBe(1);
  });

  it('should extend the expiry on every hit', () => {
    let now = 0;
    const cache = new TtlCache<string>(1000, () => now);
    cache.set('k', 'v');

    now = 900;
    expect(cache.get('k')).toBe('v');
    now = 1800;
    expect(cache.get('k')).toBe('v');
    now = 2800;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should reload after expiry', () => {
    let now = 0;
    let loads = 0;
    const cache = new TtlCache<number>(100, () => now);
    cache.getOrLoad('k', () => ++loads);
    now = 100;
    expect(cache.getOrLoad('k', () => ++loads)).toBe(2);
  });

  it('should not extend the expiry on has()', () => {
    let now = 0;
    const cache = new TtlCache<string>(1000, () => now);
    cache.set('k', 'v');
    now = 999;
    expect(cache.has('k')).toBe(true);
    now = 1000;
    expect(cache.has('k')).toBe(false);
  });

  it('should report whether extendTtl found a live entry', () => {
    let now = 0;
    const cache = new TtlCache<string>(1000, () => now);
    cache.set('k', 'v');
    now = 800;
    expect(cache.extendTtl('k')).toBe(true);
    now = 1700;
    expect(cache.has('k')).toBe(true);
    expect(cache.extendTtl('missing')).toBe(false);
  });

  it('should store nothing when the loader throws', () => {
    const cache = new TtlCache<string>(1000, () => 0);
    expect(() =>
      cache.getOrLoad('k', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(cache.size).toBe(0);
  });

  it('should cache async loads', async () => {
    let loads = 0;
    const cache = new TtlCache<string[]>(1000, () => 0);
    const load = async () => {
      loads++;
      return ['a'];
    };
    await cache.getOrLoadAsync('k', load);
    expect(await cache.getOrLoadAsync('k', load)).toEqual(['a']);
    expect(loads).toBe(1);
  });
});

describe('CompletionCaches', () => {
  it('should give each cache its configured time to live', () => {
    const caches = new CompletionCaches({ paths: 1, scripts: 2, users: 3, groups: 4, interfaces: 5 });
    expect([
      caches.paths.ttlMs,
      caches.scripts.ttlMs,
      caches.users.ttlMs,
      caches.groups.ttlMs,
      caches.interfaces.ttlMs,
    ]).toEqual([1, 2, 3, 4, 5]);
  });

  it('should clear every cache', () => {
    const caches = new CompletionCaches();
    caches.paths.set('/tmp', []);
    caches.scripts.set('make', ['all']);
    caches.clear();
    expect(caches.paths.size).toBe(0);
    expect(caches.scripts.size).toBe(0);
  });
});
