/**
 * Sentence-aware text chunking
 *
 * Packs whole sentences into chunks of at most `maxTokens` estimated tokens.
 * A sentence longer than the budget stays whole while it is within
 * `maxTokens * (1 + toleranceRatio)`; beyond that it is cut at the last
 * whitespace inside the window, or at the token limit when there is none.
 */

import { estimateTokens, prefixLengthWithin } from '../../utils/token-counter.js';

const SENTENCE_TERMINATOR = /[.!?。！？]/;
const WHITESPACE = /\s/;

/**
 * Split text into sentences. Trailing whitespace stays attached to the
 * sentence it follows, so joining the result reproduces the input exactly.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    i++;

    const atBoundary =
      char === '\n' ||
      (SENTENCE_TERMINATOR.test(char) && (i >= text.length || WHITESPACE.test(text.charAt(i))));

    if (atBoundary) {
      while (i < text.length && WHITESPACE.test(text.charAt(i))) {
        i++;
      }
      sentences.push(text.slice(start, i));
      start = i;
    }
  }

  if (start < text.length) {
    sentences.push(text.slice(start));
  }

  return sentences;
}

/**
 * Cut an over-long sentence into pieces of at most `maxTokens`
 */
function splitLongSentence(sentence: string, maxTokens: number): string[] {
  const pieces: string[] = [];
  let remaining = sentence;

  while (remaining.length > 0) {
    const limit = prefixLengthWithin(remaining, maxTokens);
    if (limit >= remaining.length) {
      pieces.push(remaining);
      break;
    }

    let cut = Math.max(limit, 1);
    for (let i = limit - 1; i > 0; i--) {
      if (WHITESPACE.test(remaining.charAt(i))) {
        cut = i + 1;
        break;
      }
    }

    pieces.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut);
  }

  return pieces;
}

/**
 * Chunk text on sentence boundaries. Returned chunks are trimmed and
 * non-empty; concatenated in order they reproduce the input up to
 * whitespace at the split points.
 */
export function chunkText(text: string, maxTokens: number, toleranceRatio: number = 0.2): string[] {
  if (maxTokens <= 0) {
    throw new RangeError(`maxTokens must be positive, got ${maxTokens}`);
  }

  const hardLimit = maxTokens * (1 + toleranceRatio);
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) {
      chunks.push(trimmed);
    }
    current = '';
  };

  for (const sentence of splitSentences(text)) {
    if (estimateTokens((current + sentence).trim()) <= maxTokens) {
      current += sentence;
      continue;
    }

    flush();

    const sentenceTokens = estimateTokens(sentence.trim());
    if (sentenceTokens <= maxTokens) {
      current = sentence;
    } else if (sentenceTokens <= hardLimit) {
      current = sentence;
      flush();
    } else {
      for (const piece of splitLongSentence(sentence, maxTokens)) {
        current = piece;
        flush();
      }
    }
  }

  flush();
  return chunks;
}
