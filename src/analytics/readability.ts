import { Item, ReadabilityScore, ReadabilityScorer } from "../core/types.js";

const MAX_ITEMS_FOR_AVERAGE = 50;
const VOWELS = "aeiouy";

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function interpretReadingEase(readingEase: number): string {
  if (readingEase >= 90) return "Very Easy";
  if (readingEase >= 80) return "Easy";
  if (readingEase >= 70) return "Fairly Easy";
  if (readingEase >= 60) return "Standard";
  if (readingEase >= 50) return "Fairly Difficult";
  if (readingEase >= 30) return "Difficult";
  return "Very Difficult";
}

/** Clamps and rounds raw Flesch values into a reportable score. */
export function makeScore(rawGrade: number, rawEase: number): ReadabilityScore {
  const gradeLevel = Math.max(0, round1(rawGrade));
  const readingEase = Math.max(0, Math.min(100, round1(rawEase)));
  return {
    gradeLevel,
    readingEase,
    interpretation: interpretReadingEase(readingEase),
    isValid: gradeLevel > 0,
  };
}

export const ZERO_SCORE: ReadabilityScore = makeScore(0, 0);

function wordTokens(text: string): string[] {
  return text
    .trim()
    .split(/\s+/)
    .filter((w) => /[a-zA-Z]/.test(w));
}

function countSentences(text: string): number {
  const count = text.split(/[.!?\n]+/).filter((s) => s.trim().length > 0).length;
  return Math.max(1, count);
}

export function countSyllables(rawWord: string): number {
  const word = rawWord.toLowerCase().replace(/[^a-z]/g, "");
  if (word.length === 0) return 0;
  if (word.length <= 2) return 1;

  let count = 0;
  let previousWasVowel = false;
  for (const c of word) {
    const isVowel = VOWELS.includes(c);
    if (isVowel && !previousWasVowel) count++;
    previousWasVowel = isVowel;
  }

  if (word.endsWith("e") && count > 1) count--;
  if (word.endsWith("le") && !VOWELS.includes(word.charAt(word.length - 3))) count++;

  return Math.max(1, count);
}

export function scoreText(text: string | null): ReadabilityScore {
  if (!text || !text.trim()) return ZERO_SCORE;

  const words = wordTokens(text);
  if (words.length === 0) return ZERO_SCORE;

  const sentences = countSentences(text);
  const syllables = words.reduce((sum, w) => sum + countSyllables(w), 0);

  const wordsPerSentence = words.length / sentences;
  const syllablesPerWord = syllables / words.length;

  // Flesch-Kincaid grade level and Flesch reading ease
  const grade = 0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59;
  const ease = 206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord;
  return makeScore(grade, ease);
}

export class FleschReadabilityScorer implements ReadabilityScorer {
  scoreItem(item: Item): ReadabilityScore {
    return scoreText(item.summary);
  }

  averageScore(items: Item[]): ReadabilityScore {
    const valid = items
      .slice(0, MAX_ITEMS_FOR_AVERAGE)
      .map((item) => this.scoreItem(item))
      .filter((s) => s.isValid);
    if (valid.length === 0) return ZERO_SCORE;

    const grade = valid.reduce((sum, s) => sum + s.gradeLevel, 0) / valid.length;
    const ease = valid.reduce((sum, s) => sum + s.readingEase, 0) / valid.length;
    return makeScore(grade, ease);
  }
}
