/**
 * @fileoverview Time-bounded caches for completion data.
 *
 * Each cache has one fixed time-to-live. A hit on a live entry extends its
 * expiry by the TTL, a miss or an expired entry is replaced wholesale by the
 * loader's result. There is no size bound: keys are resolved queries (an
 * absolute directory, a substituted command, `all`/`normal`), so the key
 * space stays small in practice.
 *
 * @module completion/cache
 */

import type { CacheTtlConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';

/** Source of the current time in milliseconds */
export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Key/value cache whose entries expire a fixed time after their last use.
 *
 * @example
 * const cache = new TtlCache<string[]>(2000);
 * const entries = cache.getOrLoad('/tmp', () => fs.readdirSync('/tmp'));
 */
export class TtlCache<V> {
  private entries: Map<string, CacheEntry<V>> = new Map();

  constructor(
    readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * Get a live value and extend its expiry. Expired entries are dropped.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    const now = this.clock();
    if (now >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    entry.expiresAt = now + this.ttlMs;
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });
  }

  /**
   * Push a live entry's expiry one TTL into the future.
   *
   * @returns False if the key is absent or already expired
   */
  extendTtl(key: string): boolean {
    return this.get(key) !== undefined;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.clock() < entry.expiresAt;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of stored entries, expired ones included until next touched */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Return the cached value or compute, store and return a fresh one.
   * A loader that throws stores nothing.
   */
  getOrLoad(key: string, load: () => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = load();
    this.set(key, value);
    return value;
  }

  /**
   * Async variant of `getOrLoad()`. Concurrent misses on one key each run the
   * loader; the last result written wins.
   */
  async getOrLoadAsync(key: string, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await load();
    this.set(key, value);
    return value;
  }
}

/**
 * The caches one completion engine shares across requests.
 */
export class CompletionCaches {
  /** Directory listings keyed by absolute directory */
  readonly paths: TtlCache<DirectoryListing>;
  /** Names of the executables in a PATH directory, same lifetime as `paths` */
  readonly executables: TtlCache<string[]>;
  /** Output lines of ad hoc commands keyed by the substituted command */
  readonly scripts: TtlCache<string[]>;
  /** Account names keyed by `all` / `normal` */
  readonly users: TtlCache<UserRecord[]>;
  readonly groups: TtlCache<GroupRecord[]>;
  readonly interfaces: TtlCache<InterfaceRecord[]>;

  constructor(ttl: CacheTtlConfig = DEFAULT_CONFIG.cacheTtl, clock: Clock = Date.now) {
    this.paths = new TtlCache(ttl.paths, clock);
    this.executables = new TtlCache(ttl.paths, clock);
    this.scripts = new TtlCache(ttl.scripts, clock);
    this.users = new TtlCache(ttl.users, clock);
    this.groups = new TtlCache(ttl.groups, clock);
    this.interfaces = new TtlCache(ttl.interfaces, clock);
  }

  clear(): void {
    this.paths.clear();
    this.executables.clear();
    this.scripts.clear();
    this.users.clear();
    this.groups.clear();
    this.interfaces.clear();
  }
}

/** One directory entry as seen by path completion */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export type DirectoryListing = DirectoryEntry[];

export interface UserRecord {
  name: string;
  uid: number;
  /** GECOS field, when non-empty */
  description?: string;
}

export interface GroupRecord {
  name: string;
  gid: number;
}

export interface InterfaceRecord {
  name: string;
  /** `ethernet`, `loopback`, `wireless` or `other` */
  kind: string;
  /** Operational state, e.g. `up`, `down`, `unknown` */
  state: string;
}
