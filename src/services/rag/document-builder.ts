/**
 * Document Builder
 *
 * Turns transcript segments and markdown summaries into indexable documents
 * with deterministic ids and validated metadata. Pure: no I/O.
 */

import type { SourceType, ValidSegment } from '../../types/transcript.js';
import { SegmentSchema } from '../../types/transcript.js';
import {
  ChunkMetadataSchema,
  SummaryMetadataSchema,
  type ChunkMetadata,
  type PreparedDocument,
  type SummaryMetadata,
} from '../../types/vector-db.js';
import { estimateTokens } from '../../utils/token-counter.js';
import { parseSummarySections } from './summary-parser.js';
import { chunkText } from './text-chunker.js';

export const DEFAULT_SUBTOPIC_LABEL = '전체';

export interface DocumentLabels {
  /** Original file name, audio sources only */
  filename?: string;
  title?: string;
}

export interface ChunkBuildResult {
  documents: PreparedDocument<ChunkMetadata>[];
  skipped: number;
  /** Why each skipped segment was dropped */
  skipReasons: string[];
}

export interface SummaryBuildOptions extends DocumentLabels {
  maxTokens: number;
  toleranceRatio?: number;
  defaultSubtopicLabel?: string;
}

export function chunkDocumentId(sourceId: string, segmentId: number): string {
  return `${sourceId}_seg_${segmentId}`;
}

/**
 * Summaries of both source types share one collection, so the type is part of the id
 */
export function summaryDocumentId(
  sourceId: string,
  sourceType: SourceType,
  subtopicIndex: number,
  partIndex: number
): string {
  return `${sourceId}_${sourceType}_summary_${subtopicIndex}_${partIndex}`;
}

function labelFields(labels: DocumentLabels): DocumentLabels {
  return {
    ...(labels.filename !== undefined ? { filename: labels.filename } : {}),
    ...(labels.title !== undefined ? { title: labels.title } : {}),
  };
}

/**
 * Build one chunk document per valid, non-empty segment.
 *
 * Segments are ordered by segmentId. A missing endTime is taken from the
 * startTime of the next valid segment; the last one stays null.
 */
export function buildChunkDocuments(
  sourceId: string,
  sourceType: SourceType,
  segments: ReadonlyArray<unknown>,
  labels: DocumentLabels = {}
): ChunkBuildResult {
  const skipReasons: string[] = [];
  const valid: ValidSegment[] = [];
  const seen = new Set<number>();

  segments.forEach((raw, position) => {
    const parsed = SegmentSchema.safeParse(raw);
    if (!parsed.success) {
      skipReasons.push(`segment at position ${position}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
      return;
    }
    if (seen.has(parsed.data.segmentId)) {
      skipReasons.push(`segment ${parsed.data.segmentId}: duplicate segmentId`);
      return;
    }
    seen.add(parsed.data.segmentId);
    valid.push(parsed.data);
  });

  valid.sort((a, b) => a.segmentId - b.segmentId);

  const documents: PreparedDocument<ChunkMetadata>[] = [];

  valid.forEach((segment, index) => {
    if (!segment.text.trim()) {
      skipReasons.push(`segment ${segment.segmentId}: empty text`);
      return;
    }

    const next = valid[index + 1];
    const endTime = segment.endTime ?? next?.startTime ?? null;

    const metadata = ChunkMetadataSchema.parse({
      sourceId,
      sourceType,
      documentType: 'chunk',
      ...labelFields(labels),
      speaker: String(segment.speaker),
      startTime: segment.startTime,
      endTime,
      confidence: segment.confidence ?? 0,
      segmentId: segment.segmentId,
      ...(segment.originalLanguage !== undefined ? { originalLanguage: segment.originalLanguage } : {}),
    });

    documents.push({
      id: chunkDocumentId(sourceId, segment.segmentId),
      text: segment.text,
      metadata,
    });
  });

  return { documents, skipped: skipReasons.length, skipReasons };
}

/**
 * Build summary documents, one per subtopic section, splitting sections
 * that exceed the token budget into numbered parts. Every part carries the
 * citations of its whole section.
 */
export function buildSummaryDocuments(
  sourceId: string,
  sourceType: SourceType,
  summaryMarkdown: string,
  createdAt: Date,
  options: SummaryBuildOptions
): PreparedDocument<SummaryMetadata>[] {
  const sections = parseSummarySections(
    summaryMarkdown,
    options.defaultSubtopicLabel ?? DEFAULT_SUBTOPIC_LABEL
  );
  const documents: PreparedDocument<SummaryMetadata>[] = [];

  sections.forEach((section, subtopicIndex) => {
    const parts = estimateTokens(section.text) <= options.maxTokens
      ? [section.text]
      : chunkText(section.text, options.maxTokens, options.toleranceRatio);

    parts.forEach((text, partIndex) => {
      const metadata = SummaryMetadataSchema.parse({
        sourceId,
        sourceType,
        documentType: 'summary',
        ...labelFields(options),
        subtopic: section.subtopic,
        subtopicIndex,
        partIndex,
        createdAt: createdAt.toISOString(),
        citedSegmentIds: section.citedSegmentIds,
      });

      documents.push({
        id: summaryDocumentId(sourceId, sourceType, subtopicIndex, partIndex),
        text,
        metadata,
      });
    });
  });

  return documents;
}

/**
 * Reassemble summary text from its documents, ordered by subtopic then part
 */
export function assembleSummary(documents: ReadonlyArray<{ text: string; metadata: SummaryMetadata }>): string {
  return [...documents]
    .sort((a, b) =>
      a.metadata.subtopicIndex - b.metadata.subtopicIndex || a.metadata.partIndex - b.metadata.partIndex
    )
    .map(doc => doc.text)
    .join('\n');
}
