// ── Item: the atom of a result batch ─────────────────────────────

export interface Item {
  title: string;
  /** Canonical link, also the identity used for de-duplication. */
  url: string | null;
  summary: string | null;
  sourceId: string | null;
  sourceName: string | null;
  publishedAt: string | null;
}

export function sourceDisplayName(item: Item): string {
  if (item.sourceName && item.sourceName.trim()) return item.sourceName;
  if (item.sourceId && item.sourceId.trim()) return item.sourceId;
  return "Unknown Source";
}

// ── Sorting ───────────────────────────────────────────────────────

export const SORT_MODES = ["recency", "relevance", "popularity"] as const;
export type SortMode = (typeof SORT_MODES)[number];

export const DEFAULT_SORT_MODE: SortMode = "recency";

const UPSTREAM_SORT: Record<SortMode, string> = {
  recency: "publishedAt",
  relevance: "relevancy",
  popularity: "popularity",
};

export function toUpstreamSort(mode: SortMode): string {
  return UPSTREAM_SORT[mode];
}

/** Accepts domain names and upstream names alike; anything else is recency. */
export function parseSortMode(raw: string | undefined | null): SortMode {
  if (!raw) return DEFAULT_SORT_MODE;
  const value = raw.trim();
  for (const mode of SORT_MODES) {
    if (value === mode || value === UPSTREAM_SORT[mode]) return mode;
  }
  return DEFAULT_SORT_MODE;
}

// ── Analytic payloads ─────────────────────────────────────────────

export interface ReadabilityScore {
  gradeLevel: number;
  readingEase: number;
  interpretation: string;
  isValid: boolean;
}

export type SentimentLabel = "positive" | "negative" | "neutral";

export interface WordFrequency {
  word: string;
  count: number;
}

export interface WordStats {
  totalArticles: number;
  totalWords: number;
  uniqueWords: number;
  wordFrequencies: WordFrequency[];
}

export interface SourceItem {
  id: string | null;
  name: string;
  description: string | null;
  url: string | null;
  category: string | null;
  language: string | null;
  country: string | null;
}

export interface SourceFilter {
  country?: string;
  category?: string;
  language?: string;
}

export interface SourceFacets {
  countries: string[];
  categories: string[];
  languages: string[];
}

export interface SourceProfile {
  source: SourceItem;
  found: boolean;
  articles: Item[];
}

interface Fallible {
  isValid: boolean;
  error?: string;
}

export interface ReadabilityPayload extends Fallible {
  gradeLevel: number;
  readingEase: number;
  interpretation: string;
  articleCount: number;
  articleScores: ReadabilityScore[];
}

export interface SentimentPayload extends Fallible {
  sentiment: SentimentLabel;
  emoji: string;
}

export interface WordStatsPayload extends Fallible, WordStats {}

export interface SourceProfilePayload extends Fallible {
  sourceName: string;
  source: SourceItem | null;
  articles: Item[];
}

export interface SourceCatalogPayload extends Fallible {
  sources: SourceItem[];
  count: number;
  country: string;
  category: string;
  language: string;
}

// ── Worker tasks and results ──────────────────────────────────────

export interface WorkerPayloads {
  readability: ReadabilityPayload;
  sentiment: SentimentPayload;
  wordStats: WordStatsPayload;
  sourceProfile: SourceProfilePayload;
  sources: SourceCatalogPayload;
}

export type WorkerKind = keyof WorkerPayloads;

export const WORKER_KINDS: readonly WorkerKind[] = [
  "readability",
  "sentiment",
  "wordStats",
  "sourceProfile",
  "sources",
];

export type WorkerTask =
  | { kind: "readability"; items: Item[] }
  | { kind: "sentiment"; items: Item[] }
  | { kind: "wordStats"; items: Item[] }
  | { kind: "sourceProfile"; items: Item[] }
  | { kind: "sources"; filter: SourceFilter };

export type TaskOf<K extends WorkerKind> = Extract<WorkerTask, { kind: K }>;

export interface ResultOf<K extends WorkerKind> {
  kind: K;
  data: WorkerPayloads[K];
}

export type WorkerResult = { [K in WorkerKind]: ResultOf<K> }[WorkerKind];

// ── Result batches ────────────────────────────────────────────────

export interface BatchAnalytics {
  readability: ReadabilityScore;
  articleReadability: ReadabilityScore[];
  articleSentiment: SentimentLabel[];
}

export interface ResultBatch {
  query: string;
  sortMode: SortMode;
  totalResults: number;
  items: Item[];
  createdAt: string;
  analytics: BatchAnalytics;
}

// ── Collaborator contracts ────────────────────────────────────────

export interface SearchProvider {
  search(query: string, sortMode: SortMode): Promise<ResultBatch>;
}

export interface ReadabilityScorer {
  scoreItem(item: Item): ReadabilityScore;
  averageScore(items: Item[]): ReadabilityScore;
}

export interface SentimentScorer {
  analyzeItems(items: Item[]): SentimentLabel;
}

export interface WordCounter {
  count(items: Item[]): WordStats;
}

export interface SourceProfiler {
  profile(sourceName: string): Promise<SourceProfile>;
}

export interface SourceCatalog {
  listSources(filter: SourceFilter): Promise<SourceItem[]>;
  facets(): Promise<SourceFacets>;
}
