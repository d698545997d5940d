import { splitSentences, splitWords } from '../shared/text.js';

export const BASE_DIFFICULTY = 1.0;
const MAX_DIFFICULTY = 5.0;

export interface TextStats {
  wordCount: number;
  sentenceCount: number;
  meanWordLength: number;
  meanSentenceLength: number;
}

export function textStats(text: string): TextStats {
  const words = splitWords(text);
  const sentences = splitSentences(text).filter((s) => splitWords(s).length > 0);
  const letters = words.reduce((sum, w) => sum + w.length, 0);
  return {
    wordCount: words.length,
    sentenceCount: sentences.length,
    meanWordLength: words.length === 0 ? 0 : letters / words.length,
    meanSentenceLength: sentences.length === 0 ? 0 : words.length / sentences.length,
  };
}

/** Score from mean word length (chars) and mean sentence length (words). */
export function scoreFromMeans(meanWordLength: number, meanSentenceLength: number): number {
  let score = BASE_DIFFICULTY;
  if (meanWordLength > 6) score += 1.0;
  if (meanWordLength > 8) score += 0.5;
  if (meanSentenceLength > 20) score += 1.0;
  if (meanSentenceLength > 30) score += 0.5;
  return Math.min(score, MAX_DIFFICULTY);
}

/** Reading difficulty in [1, 5]. Text without words gets the base score. */
export function difficultyScore(text: string): number {
  const stats = textStats(text);
  return scoreFromMeans(stats.meanWordLength, stats.meanSentenceLength);
}
