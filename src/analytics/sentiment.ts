import lexicon from "../../data/sentiment-lexicon.json" with { type: "json" };
import { Item, SentimentLabel, SentimentScorer } from "../core/types.js";

const SHARE_THRESHOLD = 0.6;

const EMOJI: Record<SentimentLabel, string> = {
  positive: "😊",
  negative: "😢",
  neutral: "😐",
};

export function sentimentEmoji(label: SentimentLabel): string {
  return EMOJI[label];
}

export function normalizeToken(raw: string): string {
  return raw.toLowerCase().replace(/[^a-zA-Z0-9\u0080-\uffff]/g, "");
}

export function labelFromShares(positiveShare: number, negativeShare: number): SentimentLabel {
  if (positiveShare > SHARE_THRESHOLD) return "positive";
  if (negativeShare > SHARE_THRESHOLD) return "negative";
  return "neutral";
}

export interface Lexicon {
  positive: readonly string[];
  negative: readonly string[];
}

export class LexiconSentimentScorer implements SentimentScorer {
  private positive: Set<string>;
  private negative: Set<string>;

  constructor(words: Lexicon = lexicon) {
    this.positive = new Set(words.positive.map((w) => w.toLowerCase()));
    this.negative = new Set(words.negative.map((w) => w.toLowerCase()));
  }

  analyzeWords(words: string[]): SentimentLabel {
    let positive = 0;
    let negative = 0;
    for (const raw of words) {
      const token = normalizeToken(raw);
      if (!token) continue;
      if (this.positive.has(token)) positive++;
      if (this.negative.has(token)) negative++;
    }
    const total = positive + negative;
    if (total === 0) return "neutral";
    return labelFromShares(positive / total, negative / total);
  }

  analyzeItem(item: Item): SentimentLabel {
    return this.analyzeWords(itemWords(item));
  }

  analyzeItems(items: Item[]): SentimentLabel {
    return this.analyzeWords(items.flatMap(itemWords));
  }
}

function itemWords(item: Item): string[] {
  const text = [item.title, item.summary ?? ""].join(" ").trim();
  return text ? text.split(/\s+/) : [];
}
