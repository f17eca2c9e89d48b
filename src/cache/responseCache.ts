/**
 * Response Cache Module
 * In-memory TTL cache with LRU eviction and optional JSON file persistence,
 * used to avoid refetching market metainfo within one session.
 * @module
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { errorMessage } from '../errors/mod.ts'
import { type Logger, logger as defaultLogger } from '../utils/logger.ts'

/**
 * Cache configuration options
 */
export type CacheConfig = {
  /** Whether caching is enabled (default: false) */
  enabled: boolean

  /** Time-to-live in milliseconds (default: 1 hour) */
  ttlMs: number

  /** Maximum number of cache entries (default: 100) */
  maxEntries: number

  /** Optional file path for persistent cache storage */
  persistPath?: string
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: false,
  ttlMs: 3600000, // 1 hour
  maxEntries: 100,
}

type CacheEntry<T> = {
  value: T
  createdAt: number
  expiresAt: number
  /** For LRU */
  lastAccessedAt: number
  accessCount: number
}

/**
 * Cache statistics
 */
export type CacheStats = {
  hits: number
  misses: number
  size: number
  maxSize: number
  /** Hit rate percentage (0-100), two decimals */
  hitRate: number
  evictions: number
}

/**
 * Constructor options of {@link ResponseCache}
 */
export type ResponseCacheOptions<T> = Partial<CacheConfig> & {
  /** Validates a value read back from the persisted file */
  parse: (value: unknown) => T
  /** Receives warnings about unreadable or unwritable cache files */
  logger?: Logger
  /** Clock, in milliseconds */
  now?: () => number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT'
}

/**
 * TTL + LRU cache of upstream responses
 *
 * @example
 * ```ts
 * const cache = new ResponseCache<unknown>({
 *   enabled: true,
 *   ttlMs: 600000,
 *   persistPath: './cache/metainfo.json',
 *   parse: (value) => value,
 * })
 * await cache.loadFromFile()
 *
 * const key = ResponseCache.key('https://scanner.tradingview.com', 'coin', 'metainfo')
 * const cached = cache.get(key)
 * if (cached === undefined) {
 *   await cache.set(key, await fetchMetainfo('coin'))
 * }
 * ```
 */
export class ResponseCache<T> {
  private readonly config: CacheConfig
  private readonly entries: Map<string, CacheEntry<T>> = new Map()
  private readonly parse: (value: unknown) => T
  private readonly logger: Logger
  private readonly now: () => number
  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
  }

  constructor({ parse, logger = defaultLogger, now = Date.now, ...config }: ResponseCacheOptions<T>) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config }
    this.parse = parse
    this.logger = logger
    this.now = now
  }

  /**
   * Build a cache key from its parts
   */
  static key(...parts: string[]): string {
    return parts.join(':')
  }

  get enabled(): boolean {
    return this.config.enabled
  }

  /**
   * Cached value, or `undefined` when absent, expired or disabled
   */
  get(key: string): T | undefined {
    if (!this.config.enabled) {
      return undefined
    }

    const entry = this.entries.get(key)
    if (!entry) {
      this.stats.misses++
      return undefined
    }

    const now = this.now()
    if (now > entry.expiresAt) {
      this.entries.delete(key)
      this.stats.misses++
      return undefined
    }

    entry.lastAccessedAt = now
    entry.accessCount++
    this.stats.hits++
    return entry.value
  }

  /**
   * Store a value; evicts the least recently used entry when full
   */
  async set(key: string, value: T): Promise<void> {
    if (!this.config.enabled) {
      return
    }

    if (this.entries.size >= this.config.maxEntries && !this.entries.has(key)) {
      this.evictLRU()
    }

    const now = this.now()
    this.entries.set(key, {
      value,
      createdAt: now,
      expiresAt: now + this.config.ttlMs,
      lastAccessedAt: now,
      accessCount: 0,
    })

    await this.persistToFile()
  }

  /**
   * Remove one entry
   *
   * @returns Whether the entry existed
   */
  async invalidate(key: string): Promise<boolean> {
    if (!this.config.enabled) {
      return false
    }

    const existed = this.entries.delete(key)
    if (existed) {
      await this.persistToFile()
    }
    return existed
  }

  /**
   * Drop every entry, reset statistics and delete the persisted file
   */
  async clear(): Promise<void> {
    if (!this.config.enabled) {
      return
    }

    this.entries.clear()
    this.stats = { hits: 0, misses: 0, evictions: 0 }

    if (this.config.persistPath) {
      await rm(this.config.persistPath, { force: true })
    }
  }

  getStats(): CacheStats {
    const totalRequests = this.stats.hits + this.stats.misses
    const hitRate = totalRequests > 0 ? (this.stats.hits / totalRequests) * 100 : 0

    return {
      hits: this.stats.hits,
      misses: this.stats.misses,
      size: this.entries.size,
      maxSize: this.config.maxEntries,
      hitRate: Math.round(hitRate * 100) / 100,
      evictions: this.stats.evictions,
    }
  }

  /**
   * Load non-expired entries from the persisted file
   *
   * A missing file is not an error. Unreadable files and entries that fail
   * `parse` are skipped with a warning.
   *
   * @returns Number of entries loaded
   */
  async loadFromFile(): Promise<number> {
    if (!this.config.enabled || !this.config.persistPath) {
      return 0
    }

    let raw: unknown
    try {
      raw = JSON.parse(await readFile(this.config.persistPath, 'utf8'))
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn(`Failed to load cache from ${this.config.persistPath}: ${errorMessage(error)}`)
      }
      return 0
    }

    if (!Array.isArray(raw)) {
      this.logger.warn(`Ignoring cache file ${this.config.persistPath}: expected an array of entries`)
      return 0
    }

    const now = this.now()
    let loaded = 0
    for (const item of raw) {
      const key: unknown = Array.isArray(item) ? item[0] : undefined
      const entry: unknown = Array.isArray(item) ? item[1] : undefined
      if (typeof key !== 'string' || !isRecord(entry)) {
        continue
      }
      const { expiresAt, createdAt } = entry
      if (typeof expiresAt !== 'number' || typeof createdAt !== 'number' || now > expiresAt) {
        continue
      }
      try {
        this.entries.set(key, {
          value: this.parse(entry.value),
          createdAt,
          expiresAt,
          lastAccessedAt: createdAt,
          accessCount: 0,
        })
        loaded++
      } catch (error) {
        this.logger.warn(`Skipping cache entry ${key}: ${errorMessage(error)}`)
      }
    }
    return loaded
  }

  private async persistToFile(): Promise<void> {
    if (!this.config.persistPath) {
      return
    }

    try {
      await mkdir(dirname(this.config.persistPath), { recursive: true })
      await writeFile(this.config.persistPath, JSON.stringify([...this.entries.entries()], null, 2), 'utf8')
    } catch (error) {
      this.logger.warn(`Failed to persist cache to ${this.config.persistPath}: ${errorMessage(error)}`)
    }
  }

  private evictLRU(): void {
    let oldestKey: string | undefined
    let oldestTime = Infinity

    for (const [key, entry] of this.entries) {
      if (entry.lastAccessedAt < oldestTime) {
        oldestTime = entry.lastAccessedAt
        oldestKey = key
      }
    }

    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey)
      this.stats.evictions++
    }
  }
}
