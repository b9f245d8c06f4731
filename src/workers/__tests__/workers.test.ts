import { afterEach, describe, it, expect, vi } from "vitest";
import { FleschReadabilityScorer } from "../../analytics/readability.js";
import { FrequencyWordCounter } from "../../analytics/word-stats.js";
import { LexiconSentimentScorer } from "../../analytics/sentiment.js";
import { SourceCatalog, SourceProfile, SourceProfiler, WORKER_KINDS } from "../../core/types.js";
import { buildWorkerRegistry } from "../index.js";
import { ReadabilityWorker } from "../readability.js";
import { SentimentWorker } from "../sentiment.js";
import { SourceCatalogWorker } from "../source-catalog.js";
import { SourceProfileWorker } from "../source-profile.js";
import { WordStatsWorker } from "../word-stats.js";
import { makeItem, silentLogger } from "../../__tests__/helpers/index.js";

const DENSE = "Government officials announced comprehensive regulations.";

function profiler(impl: (name: string) => Promise<SourceProfile>): SourceProfiler {
  return { profile: vi.fn(impl) };
}

function catalog(listSources: SourceCatalog["listSources"]): SourceCatalog {
  return {
    listSources: vi.fn(listSources),
    facets: async () => ({ countries: [], categories: [], languages: [] }),
  };
}

describe("analysis workers", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("computes readability for a batch", async () => {
    const worker = new ReadabilityWorker(new FleschReadabilityScorer(), { logger: silentLogger() });
    const result = await worker.handle({ kind: "readability", items: [makeItem("a", { summary: DENSE })] });

    expect(result.kind).toBe("readability");
    expect(result.data).toEqual({
      gradeLevel: 26.5,
      readingEase: 0,
      interpretation: "Very Difficult",
      articleCount: 1,
      isValid: true,
      articleScores: [{ gradeLevel: 26.5, readingEase: 0, interpretation: "Very Difficult", isValid: true }],
    });
  });

  it("answers an empty batch with the fallback without calling the scorer", async () => {
    const scorer = new FleschReadabilityScorer();
    const spy = vi.spyOn(scorer, "averageScore");
    const worker = new ReadabilityWorker(scorer, { logger: silentLogger() });

    const result = await worker.handle({ kind: "readability", items: [] });

    expect(spy).not.toHaveBeenCalled();
    expect(result.data.isValid).toBe(false);
    expect(result.data.interpretation).toBe("Unknown");
    expect(result.data.error).toBe("Failed to compute readability");
  });

  it("replaces a failing scorer with a neutral sentiment", async () => {
    const worker = new SentimentWorker(
      {
        analyzeItems: () => {
          throw new Error("lexicon unavailable");
        },
      },
      { logger: silentLogger() },
    );
    const result = await worker.handle({ kind: "sentiment", items: [makeItem("a")] });

    expect(result.data).toEqual({
      sentiment: "neutral",
      emoji: "😐",
      isValid: false,
      error: "Failed to compute sentiment",
    });
  });

  it("labels a batch with the lexicon", async () => {
    const worker = new SentimentWorker(new LexiconSentimentScorer(), { logger: silentLogger() });
    const result = await worker.handle({ kind: "sentiment", items: [makeItem("a", { title: "Peace and growth" })] });
    expect(result.data).toEqual({ sentiment: "positive", emoji: "😊", isValid: true });
  });

  it("counts words of a batch", async () => {
    const worker = new WordStatsWorker(new FrequencyWordCounter(), { logger: silentLogger() });
    const result = await worker.handle({ kind: "wordStats", items: [makeItem("a", { summary: "wind and wind" })] });

    expect(result.data.isValid).toBe(true);
    expect(result.data.totalWords).toBe(3);
    expect(result.data.wordFrequencies[0]).toEqual({ word: "wind", count: 2 });
  });

  it("profiles the source of the first item", async () => {
    const source = { id: "wire", name: "The Wire", description: null, url: null, category: null, language: null, country: null };
    const profiles = profiler(async () => ({ source, found: true, articles: [] }));
    const worker = new SourceProfileWorker(profiles, { logger: silentLogger() });

    const result = await worker.handle({
      kind: "sourceProfile",
      items: [makeItem("a"), makeItem("b", { sourceName: "Other Post" })],
    });

    expect(profiles.profile).toHaveBeenCalledWith("The Wire");
    expect(result.data).toEqual({ sourceName: "The Wire", source, articles: [], isValid: true });
  });

  it("falls back when a profile does not arrive in time", async () => {
    vi.useFakeTimers();
    const profiles = profiler(() => new Promise<SourceProfile>(() => undefined));
    const worker = new SourceProfileWorker(profiles, { timeoutMs: 50, logger: silentLogger() });

    const pending = worker.handle({ kind: "sourceProfile", items: [makeItem("a", { sourceName: null, sourceId: null })] });
    await vi.advanceTimersByTimeAsync(50);

    expect((await pending).data).toEqual({
      sourceName: "Unknown Source",
      source: null,
      articles: [],
      isValid: false,
      error: "Failed to load source profile",
    });
  });

  it("echoes the filter with the source list", async () => {
    const worker = new SourceCatalogWorker(catalog(async () => []), { logger: silentLogger() });
    const result = await worker.handle({ kind: "sources", filter: { country: "gb" } });
    expect(result.data).toEqual({ sources: [], count: 0, country: "gb", category: "", language: "", isValid: true });
  });

  it("reports an unreachable catalog as unable to load", async () => {
    const worker = new SourceCatalogWorker(
      catalog(async () => {
        throw new Error("down");
      }),
      { logger: silentLogger() },
    );
    const result = await worker.handle({ kind: "sources", filter: {} });
    expect(result.data.isValid).toBe(false);
    expect(result.data.error).toBe("Unable to load sources");
  });

  it("refuses work after dispose", async () => {
    const worker = new WordStatsWorker(new FrequencyWordCounter(), { logger: silentLogger() });
    worker.dispose();
    await expect(worker.handle({ kind: "wordStats", items: [makeItem("a")] })).rejects.toThrow(
      "wordStats worker received a task after dispose",
    );
  });

  it("registers all five kinds", () => {
    const registry = buildWorkerRegistry({
      readability: new FleschReadabilityScorer(),
      sentiment: new LexiconSentimentScorer(),
      wordCounter: new FrequencyWordCounter(),
      profiler: profiler(async () => {
        throw new Error("unused");
      }),
      catalog: catalog(async () => []),
    });

    expect(registry.missing()).toEqual([]);
    for (const kind of WORKER_KINDS) expect(registry.get(kind)().kind).toBe(kind);
  });
});
