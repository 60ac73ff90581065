/**
 * Answer Generator Tests
 * Evidence formatting and error mapping
 */

import { describe, it, expect, vi } from 'vitest';
import {
  LLMAnswerGenerator,
  buildAnswerMessages,
  formatChunkEvidence,
  formatSummaryEvidence,
} from '../src/services/rag/answer-generator.js';
import type { LLMClient } from '../src/services/llm/client.js';
import { ProviderError } from '../src/types/errors.js';
import type { SearchHit, SummaryMetadata } from '../src/types/vector-db.js';

const CHUNK_HIT: SearchHit = {
  id: 'video123_seg_1',
  text: '예산안을 검토하겠습니다',
  distance: 0.2,
  metadata: {
    sourceId: 'video123',
    sourceType: 'youtube',
    documentType: 'chunk',
    title: 'Weekly sync',
    speaker: '2',
    startTime: 65.2,
    endTime: 70,
    confidence: 0.9,
    segmentId: 1,
  },
};

const SUMMARY_HIT: SearchHit & { metadata: SummaryMetadata } = {
  id: 'video123_youtube_summary_0_0',
  text: '## 예산\n예산안 검토를 진행했습니다.',
  distance: 0.3,
  metadata: {
    sourceId: 'video123',
    sourceType: 'youtube',
    documentType: 'summary',
    subtopic: '예산',
    subtopicIndex: 0,
    partIndex: 0,
    createdAt: '2024-03-01T00:00:00.000Z',
    citedSegmentIds: [],
  },
};

describe('evidence formatting', () => {
  it('should mark empty groups', () => {
    expect(formatSummaryEvidence([])).toBe('(none)');
    expect(formatChunkEvidence([])).toBe('(none)');
  });

  it('should list the segments a summary section cites', () => {
    const cited: SearchHit = {
      ...SUMMARY_HIT,
      metadata: { ...SUMMARY_HIT.metadata, documentType: 'summary', subtopic: '예산', citedSegmentIds: [1, 4] },
    };
    expect(formatSummaryEvidence([cited])).toBe(
      '[S1] youtube/video123 - 예산 (segments 1, 4)\n## 예산\n예산안 검토를 진행했습니다.'
    );
  });

  it('should label summary sections with source and subtopic', () => {
    expect(formatSummaryEvidence([SUMMARY_HIT])).toBe('[S1] youtube/video123 - 예산\n## 예산\n예산안 검토를 진행했습니다.');
  });

  it('should label utterances with speaker and start time', () => {
    expect(formatChunkEvidence([CHUNK_HIT])).toBe('[T1] Weekly sync | Speaker 2 @ 1:05: 예산안을 검토하겠습니다');
  });

  it('should keep the two groups separate in the prompt', () => {
    const messages = buildAnswerMessages('예산은?', [SUMMARY_HIT], [CHUNK_HIT]);

    expect(messages).toHaveLength(2);
    expect(messages[0]?.role).toBe('system');
    expect(messages[1]).toEqual({
      role: 'user',
      content: [
        '## SUMMARY EVIDENCE',
        '[S1] youtube/video123 - 예산\n## 예산\n예산안 검토를 진행했습니다.',
        '',
        '## TRANSCRIPT EVIDENCE',
        '[T1] Weekly sync | Speaker 2 @ 1:05: 예산안을 검토하겠습니다',
        '',
        '## QUESTION',
        '예산은?',
      ].join('\n'),
    });
  });
});

describe('LLMAnswerGenerator', () => {
  it('should call the model with the configured sampling', async () => {
    const chat = vi.fn<LLMClient['chat']>().mockResolvedValue('다음 주까지입니다.');
    const generator = new LLMAnswerGenerator({ chat }, { temperature: 0.1 });

    const answer = await generator.generateAnswer('언제까지?', [], [CHUNK_HIT]);

    expect(answer).toBe('다음 주까지입니다.');
    expect(chat).toHaveBeenCalledWith(buildAnswerMessages('언제까지?', [], [CHUNK_HIT]), {
      temperature: 0.1,
      maxTokens: 1024,
    });
  });

  it('should pass answer provider errors through unchanged', async () => {
    const failure = new ProviderError('Request timeout after 60000ms', 'timeout', 'answer', true);
    const chat = vi.fn<LLMClient['chat']>().mockRejectedValue(failure);
    const generator = new LLMAnswerGenerator({ chat });

    await expect(generator.generateAnswer('q', [], [])).rejects.toBe(failure);
  });

  it('should classify other failures as answer provider errors', async () => {
    const chat = vi.fn<LLMClient['chat']>().mockRejectedValue(new Error('Rate limit exceeded'));
    const generator = new LLMAnswerGenerator({ chat });

    const error = await generator.generateAnswer('q', [], []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ code: 'rate_limit', provider: 'answer', retryable: true, statusCode: 429 });
  });
});
