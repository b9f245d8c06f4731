import { describe, it, expect } from "vitest";
import { FrequencyWordCounter, extractWords } from "../word-stats.js";
import { Item } from "../../core/types.js";

function item(summary: string | null): Item {
  return { title: "ignored title", url: null, summary, sourceId: null, sourceName: null, publishedAt: null };
}

describe("extractWords", () => {
  it("keeps runs of two or more letters, lower-cased", () => {
    expect(extractWords("A Solar-power plant, 2024 in EU")).toEqual(["solar", "power", "plant", "in", "eu"]);
  });
});

describe("FrequencyWordCounter", () => {
  it("counts summaries and orders by count then word", () => {
    const stats = new FrequencyWordCounter().count([
      item("Solar power grows"),
      item("solar storage grows fast"),
      item(null),
    ]);

    expect(stats).toEqual({
      totalArticles: 3,
      totalWords: 7,
      uniqueWords: 5,
      wordFrequencies: [
        { word: "grows", count: 2 },
        { word: "solar", count: 2 },
        { word: "fast", count: 1 },
        { word: "power", count: 1 },
        { word: "storage", count: 1 },
      ],
    });
  });

  it("keeps only the top words", () => {
    const stats = new FrequencyWordCounter(2).count([item("alpha beta gamma alpha")]);
    expect(stats.wordFrequencies).toEqual([
      { word: "alpha", count: 2 },
      { word: "beta", count: 1 },
    ]);
    expect(stats.uniqueWords).toBe(3);
  });

  it("handles an empty batch", () => {
    expect(new FrequencyWordCounter().count([])).toEqual({
      totalArticles: 0,
      totalWords: 0,
      uniqueWords: 0,
      wordFrequencies: [],
    });
  });
});
