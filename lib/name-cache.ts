/**
 * Read-through cache of deck or model names.
 *
 * The lists are advisory: Anki can change under us at any time, so callers
 * use them for suggestions and pre-checks, not as the source of truth.
 * No eviction; `refresh()` replaces everything.
 */

import type { CallOptions } from './notes-api.js'

export type NameLoader<V> = (options?: CallOptions) => Promise<ReadonlyMap<string, V>>

export interface NameCacheStats {
  size: number
  refreshes: number
  lastRefreshedAt: number | null
}

export class NameCache<V> {
  private entries = new Map<string, V>()
  private refreshes = 0
  private lastRefreshedAt: number | null = null

  constructor(
    private readonly label: string,
    private readonly loader: NameLoader<V>,
    private readonly quiet = false
  ) {}

  /**
   * Replaces all entries with the latest list from Anki.
   */
  async refresh(options: CallOptions = {}): Promise<this> {
    const latest = await this.loader(options)
    this.entries = new Map(latest)
    this.markRefreshed()

    if (!this.quiet) {
      console.log(`[NameCache] ${this.label}: ${this.entries.size} name(s) loaded`)
    }
    return this
  }

  /**
   * Adds names Anki reports that the cache has not seen; known entries are
   * left as they are, and names Anki no longer reports are kept.
   */
  async hydrateNames(options: CallOptions = {}): Promise<this> {
    const latest = await this.loader(options)
    let added = 0
    for (const [name, value] of latest) {
      if (!this.entries.has(name)) {
        this.entries.set(name, value)
        added++
      }
    }
    this.markRefreshed()

    if (!this.quiet) {
      console.log(`[NameCache] ${this.label}: ${added} new name(s)`)
    }
    return this
  }

  get isHydrated(): boolean {
    return this.lastRefreshedAt !== null
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  get(name: string): V | undefined {
    return this.entries.get(name)
  }

  names(): string[] {
    return Array.from(this.entries.keys())
  }

  /**
   * Entries for the given names, skipping unknown ones. Order follows `names`.
   */
  findMany(names: Iterable<string>): Array<[string, V]> {
    const found: Array<[string, V]> = []
    for (const name of names) {
      const value = this.entries.get(name)
      if (value !== undefined) {
        found.push([name, value])
      }
    }
    return found
  }

  clear(): void {
    this.entries.clear()
    this.lastRefreshedAt = null
  }

  getStats(): NameCacheStats {
    return {
      size: this.entries.size,
      refreshes: this.refreshes,
      lastRefreshedAt: this.lastRefreshedAt
    }
  }

  private markRefreshed(): void {
    this.refreshes++
    this.lastRefreshedAt = Date.now()
  }
}
