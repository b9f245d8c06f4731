import { Item, WordCounter, WordFrequency, WordStats } from "../core/types.js";

const WORD_PATTERN = /[a-zA-Z]{2,}/g;
const TOP_WORDS = 50;

export function extractWords(text: string): string[] {
  return (text.match(WORD_PATTERN) ?? []).map((w) => w.toLowerCase());
}

export class FrequencyWordCounter implements WordCounter {
  constructor(private readonly topN = TOP_WORDS) {}

  count(items: Item[]): WordStats {
    const counts = new Map<string, number>();
    for (const item of items) {
      if (!item.summary || !item.summary.trim()) continue;
      for (const word of extractWords(item.summary)) {
        counts.set(word, (counts.get(word) ?? 0) + 1);
      }
    }

    const frequencies: WordFrequency[] = [...counts.entries()]
      .map(([word, count]) => ({ word, count }))
      .sort((a, b) => b.count - a.count || a.word.localeCompare(b.word));

    let totalWords = 0;
    for (const n of counts.values()) totalWords += n;

    return {
      totalArticles: items.length,
      totalWords,
      uniqueWords: counts.size,
      wordFrequencies: frequencies.slice(0, this.topN),
    };
  }
}
