import { NewsApiClient } from "../adapters/newsapi.js";
import {
  Item,
  SourceCatalog,
  SourceFacets,
  SourceFilter,
  SourceItem,
  SourceProfile,
  SourceProfiler,
} from "../core/types.js";

const PROFILE_ARTICLES = 10;
const DEFAULT_CACHE_ENTRIES = 32;

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

function normalizeFilterValue(value: string | undefined): string | undefined {
  const v = value?.trim().toLowerCase();
  return v ? v : undefined;
}

function cacheKey(filter: SourceFilter): string {
  return `src:${filter.country ?? ""}|${filter.category ?? ""}|${filter.language ?? ""}`;
}

function distinctSorted(values: (string | null)[]): string[] {
  const set = new Set<string>();
  for (const v of values) {
    const t = v?.trim();
    if (t) set.add(t);
  }
  return [...set].sort();
}

function publishedMs(item: Item): number {
  return item.publishedAt ? new Date(item.publishedAt).getTime() || 0 : 0;
}

export interface SourceServiceOptions {
  cacheTtlMs?: number;
  /** Distinct filters kept at once; the oldest is dropped past this. */
  maxCacheEntries?: number;
  now?: () => number;
}

/** Source catalog and source profiles, backed by the News API sources list. */
export class SourceService implements SourceCatalog, SourceProfiler {
  private cache = new Map<string, CacheEntry<SourceItem[]>>();
  private cacheTtlMs: number;
  private maxCacheEntries: number;
  private now: () => number;

  constructor(
    private client: NewsApiClient,
    options?: SourceServiceOptions,
  ) {
    this.cacheTtlMs = options?.cacheTtlMs ?? 3_600_000;
    this.maxCacheEntries = options?.maxCacheEntries ?? DEFAULT_CACHE_ENTRIES;
    this.now = options?.now ?? Date.now;
  }

  // ── Catalog ─────────────────────────────────────────────────

  async listSources(filter: SourceFilter = {}): Promise<SourceItem[]> {
    const normalized: SourceFilter = {
      country: normalizeFilterValue(filter.country),
      category: normalizeFilterValue(filter.category),
      language: normalizeFilterValue(filter.language),
    };
    const key = cacheKey(normalized);
    const hit = this.cache.get(key);
    if (hit) {
      if (hit.expiresAt > this.now()) return hit.value;
      this.cache.delete(key);
    }

    const raw = await this.client.listSources(normalized);
    const byKey = new Map<string, SourceItem>();
    for (const source of raw) {
      const k = source.id ?? source.url ?? source.name;
      if (!byKey.has(k)) byKey.set(k, source);
    }
    const processed = [...byKey.values()].sort((a, b) =>
      a.name.toLowerCase().localeCompare(b.name.toLowerCase()),
    );

    this.remember(key, processed);
    return processed;
  }

  cacheSize(): number {
    return this.cache.size;
  }

  private remember(key: string, value: SourceItem[]): void {
    this.cache.delete(key);
    this.cache.set(key, { value, expiresAt: this.now() + this.cacheTtlMs });
    while (this.cache.size > this.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  async facets(): Promise<SourceFacets> {
    const all = await this.listSources();
    return {
      countries: distinctSorted(all.map((s) => s.country)),
      categories: distinctSorted(all.map((s) => s.category)),
      languages: distinctSorted(all.map((s) => s.language)),
    };
  }

  // ── Profiles ────────────────────────────────────────────────

  async profile(sourceName: string): Promise<SourceProfile> {
    const needle = sourceName.trim().toLowerCase();
    const all = await this.listSources();
    const match = all.find(
      (s) => s.name.toLowerCase() === needle || (s.id !== null && s.id.toLowerCase() === needle),
    );

    const articles = await this.recentArticles(match?.id ?? null, sourceName);

    return {
      source: match ?? {
        id: null,
        name: sourceName,
        description: null,
        url: null,
        category: null,
        language: null,
        country: null,
      },
      found: match !== undefined,
      articles,
    };
  }

  private async recentArticles(sourceId: string | null, sourceName: string): Promise<Item[]> {
    if (sourceId) {
      const headlines = await this.client.topHeadlinesBySource(sourceId, PROFILE_ARTICLES);
      if (headlines.items.length > 0) return headlines.items;
    }

    const needle = sourceName.toLowerCase();
    const everything = await this.client.searchEverything(sourceName, "publishedAt", 100);
    return everything.items
      .filter((item) => (item.sourceName ?? "").toLowerCase() === needle)
      .sort((a, b) => publishedMs(b) - publishedMs(a))
      .slice(0, PROFILE_ARTICLES);
  }
}
