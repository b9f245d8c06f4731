import { z } from "zod";
import { UpstreamError, errorMessage } from "../core/errors.js";
import { Item, SourceFilter, SourceItem } from "../core/types.js";

// ── Wire schemas ──────────────────────────────────────────────────

const nullableText = z.string().nullish().transform((v) => v ?? null);

const articleSchema = z.object({
  title: nullableText,
  url: nullableText,
  description: nullableText,
  publishedAt: nullableText,
  source: z
    .object({ id: nullableText, name: nullableText })
    .nullish()
    .transform((v) => v ?? { id: null, name: null }),
});

const envelopeSchema = z.object({
  status: z.string().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
});

const searchSchema = z.object({
  totalResults: z.number().int().nonnegative().catch(0).default(0),
  articles: z.array(z.unknown()).catch([]).default([]),
});

const sourceSchema = z.object({
  id: nullableText,
  name: nullableText,
  description: nullableText,
  url: nullableText,
  category: nullableText,
  language: nullableText,
  country: nullableText,
});

const sourcesSchema = z.object({
  sources: z.array(z.unknown()).catch([]).default([]),
});

// ── Client ────────────────────────────────────────────────────────

export interface SearchResponse {
  items: Item[];
  totalResults: number;
}

export interface NewsApiClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function parseArticle(raw: unknown): Item | null {
  const parsed = articleSchema.safeParse(raw);
  if (!parsed.success) return null;
  const a = parsed.data;
  if (!a.title || !a.title.trim()) return null;
  return {
    title: a.title,
    url: a.url,
    summary: a.description,
    sourceId: a.source.id,
    sourceName: a.source.name,
    publishedAt: a.publishedAt,
  };
}

function parseSource(raw: unknown): SourceItem | null {
  const parsed = sourceSchema.safeParse(raw);
  if (!parsed.success) return null;
  const s = parsed.data;
  if (!s.name || !s.name.trim()) return null;
  return { ...s, name: s.name };
}

export class NewsApiClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NewsApiClientOptions) {
    if (!options.apiKey) throw new Error("Missing configuration: NEWSAPI_KEY");
    if (!options.baseUrl) throw new Error("Missing configuration: NEWSAPI_BASE_URL");
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async searchEverything(query: string, sortBy: string, pageSize: number): Promise<SearchResponse> {
    const body = await this.request("/everything", {
      q: query,
      sortBy,
      pageSize: String(pageSize),
    });
    return this.toSearchResponse(body);
  }

  async topHeadlinesBySource(sourceId: string, pageSize: number): Promise<SearchResponse> {
    const body = await this.request("/top-headlines", {
      sources: sourceId,
      pageSize: String(pageSize),
    });
    return this.toSearchResponse(body);
  }

  async listSources(filter: SourceFilter = {}): Promise<SourceItem[]> {
    const body = await this.request("/top-headlines/sources", {
      country: filter.country,
      category: filter.category,
      language: filter.language,
    });
    const { sources } = sourcesSchema.parse(body);
    return sources.map(parseSource).filter((s): s is SourceItem => s !== null);
  }

  // ── Transport ───────────────────────────────────────────────

  private toSearchResponse(body: unknown): SearchResponse {
    const parsed = searchSchema.parse(body);
    const items = parsed.articles.map(parseArticle).filter((a): a is Item => a !== null);
    return { items, totalResults: parsed.totalResults };
  }

  private async request(path: string, params: Record<string, string | undefined>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value.trim() !== "") url.searchParams.set(key, value);
    }

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        headers: { "X-Api-Key": this.apiKey, Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new UpstreamError("timeout", `News API timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new UpstreamError("connectivity", `News API unreachable: ${errorMessage(err)}`, { cause: err });
    }

    if (resp.status === 429) {
      throw new UpstreamError("rate_limit", "News API rate limit exceeded (429)", { status: 429 });
    }

    let body: unknown;
    try {
      body = JSON.parse(await resp.text());
    } catch (err) {
      if (isTimeout(err)) {
        throw new UpstreamError("timeout", `News API timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new UpstreamError("parse", `News API returned a malformed body (HTTP ${resp.status})`, {
        status: resp.status,
        cause: err,
      });
    }

    const envelope = envelopeSchema.safeParse(body);
    const status = envelope.success ? envelope.data.status : undefined;
    if (!resp.ok || status !== "ok") {
      const code = envelope.success ? envelope.data.code : undefined;
      const message = (envelope.success ? envelope.data.message : undefined) ?? `HTTP ${resp.status}`;
      if (code === "rateLimited") {
        throw new UpstreamError("rate_limit", `News API rate limited: ${message}`, { status: resp.status });
      }
      throw new UpstreamError("http", `News API error: ${message}`, { status: resp.status });
    }

    return body;
  }
}
