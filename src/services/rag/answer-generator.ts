/**
 * Answer Generator
 * Produces a natural-language answer from two labelled evidence groups
 */

import pino from 'pino';
import type { ChatMessage } from '../../types/llm.js';
import type { SearchHit } from '../../types/vector-db.js';
import { ProviderError } from '../../types/errors.js';
import type { LLMClient } from '../llm/client.js';

const logger = pino({
  name: 'answer-generator',
  level: process.env.LOG_LEVEL || 'info',
});

export interface AnswerGenerator {
  generateAnswer(question: string, summaryEvidence: SearchHit[], chunkEvidence: SearchHit[]): Promise<string>;
}

export interface AnswerGeneratorConfig {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_ANSWER_CONFIG: AnswerGeneratorConfig = {
  temperature: 0.3,
  maxTokens: 1024,
};

const SYSTEM_PROMPT = `You are an assistant that answers questions about recorded meetings, lectures and videos.
You are given two groups of evidence retrieved from transcripts:
- SUMMARY EVIDENCE: sections of generated summaries, each labelled with its subtopic.
- TRANSCRIPT EVIDENCE: verbatim utterances with speaker and start time.

Rules:
1. Answer only from the evidence. Do not guess.
2. When the evidence does not contain the answer, say so plainly.
3. Mention the speaker and time when citing an utterance.
4. Be concise. Answer in the language of the question.`;

function formatSeconds(seconds: number): string {
  const total = Math.floor(seconds);
  const minutes = Math.floor(total / 60);
  const secs = total % 60;
  return `${minutes}:${secs.toString().padStart(2, '0')}`;
}

export function formatSummaryEvidence(hits: SearchHit[]): string {
  if (hits.length === 0) return '(none)';

  return hits.map((hit, index) => {
    const { metadata } = hit;
    const label = metadata.documentType === 'summary' ? metadata.subtopic : 'summary';
    const source = metadata.title ?? `${metadata.sourceType}/${metadata.sourceId}`;
    const cited = metadata.documentType === 'summary' && metadata.citedSegmentIds.length > 0
      ? ` (segments ${metadata.citedSegmentIds.join(', ')})`
      : '';
    return `[S${index + 1}] ${source} - ${label}${cited}\n${hit.text}`;
  }).join('\n\n');
}

export function formatChunkEvidence(hits: SearchHit[]): string {
  if (hits.length === 0) return '(none)';

  return hits.map((hit, index) => {
    const { metadata } = hit;
    const source = metadata.title ?? `${metadata.sourceType}/${metadata.sourceId}`;
    const speaker = metadata.documentType === 'chunk'
      ? `Speaker ${metadata.speaker} @ ${formatSeconds(metadata.startTime)}`
      : 'Unknown speaker';
    return `[T${index + 1}] ${source} | ${speaker}: ${hit.text}`;
  }).join('\n');
}

/**
 * Messages for the answer model. The two groups stay separate and labelled.
 */
export function buildAnswerMessages(
  question: string,
  summaryEvidence: SearchHit[],
  chunkEvidence: SearchHit[]
): ChatMessage[] {
  const user = [
    '## SUMMARY EVIDENCE',
    formatSummaryEvidence(summaryEvidence),
    '',
    '## TRANSCRIPT EVIDENCE',
    formatChunkEvidence(chunkEvidence),
    '',
    '## QUESTION',
    question,
  ].join('\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

export class LLMAnswerGenerator implements AnswerGenerator {
  private config: AnswerGeneratorConfig;

  constructor(
    private llm: Pick<LLMClient, 'chat'>,
    config?: Partial<AnswerGeneratorConfig>
  ) {
    this.config = { ...DEFAULT_ANSWER_CONFIG, ...config };
  }

  async generateAnswer(question: string, summaryEvidence: SearchHit[], chunkEvidence: SearchHit[]): Promise<string> {
    const messages = buildAnswerMessages(question, summaryEvidence, chunkEvidence);

    try {
      const answer = await this.llm.chat(messages, {
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });
      logger.debug({ answerLength: answer.length }, 'Answer generated');
      return answer;
    } catch (error) {
      const providerError = ProviderError.fromError(error, 'answer');
      logger.error({ code: providerError.code, retryable: providerError.retryable }, 'Answer generation failed');
      throw providerError;
    }
  }
}
