/**
 * Character-class token estimation
 *
 * Exact counts need a tokenizer per model; the document builder only needs a
 * budget check, so tokens are approximated from character counts:
 * - CJK (Hangul, Kana, Han): ~1.5 chars per token
 * - everything else: ~4 chars per token
 */

const CHARS_PER_TOKEN_LATIN = 4;
const CHARS_PER_TOKEN_CJK = 1.5;

// Hangul Jamo, CJK symbols/Kana/Han, Hangul syllables, compatibility ideographs
const CJK_REGEX = /[\u1100-\u11FF\u3000-\u9FFF\uAC00-\uD7AF\uF900-\uFAFF]/g;
const CJK_CHAR = /^[\u1100-\u11FF\u3000-\u9FFF\uAC00-\uD7AF\uF900-\uFAFF]$/;

export function estimateTokens(text: string): number {
  if (!text) return 0;

  const cjkCount = text.match(CJK_REGEX)?.length ?? 0;
  const otherCount = text.length - cjkCount;

  return Math.ceil(cjkCount / CHARS_PER_TOKEN_CJK + otherCount / CHARS_PER_TOKEN_LATIN);
}

/**
 * Longest prefix of `text` whose estimate stays within `maxTokens`
 */
export function prefixLengthWithin(text: string, maxTokens: number): number {
  let budget = maxTokens;
  let length = 0;

  for (const char of text) {
    const cost = CJK_CHAR.test(char) ? 1 / CHARS_PER_TOKEN_CJK : 1 / CHARS_PER_TOKEN_LATIN;
    if (budget - cost < -1e-9) break;
    budget -= cost;
    length += char.length;
  }

  return length;
}
