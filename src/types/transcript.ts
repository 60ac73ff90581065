/**
 * Transcript Types
 * Sources, segments and listings shared by the relational store and the retrieval core
 */

import { z } from 'zod';

export const SOURCE_TYPES = ['youtube', 'audio'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

/**
 * One speaker-attributed, timestamped utterance produced by transcription
 */
export interface Segment {
  segmentId: number;
  speaker: string | number;
  startTime: number;
  endTime?: number | null;
  text: string;
  confidence?: number;
  originalLanguage?: string;
}

/**
 * Segment schema used at document-construction time.
 * Transcription output is untrusted, so every segment is checked individually.
 */
export const SegmentSchema = z.object({
  segmentId: z.number().int().nonnegative(),
  speaker: z.union([z.string(), z.number()]),
  startTime: z.number().nonnegative(),
  endTime: z.number().nonnegative().nullable().optional(),
  text: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  originalLanguage: z.string().optional(),
});

export type ValidSegment = z.infer<typeof SegmentSchema>;

/**
 * Source record as held by the relational metadata store
 */
export interface SourceRecord {
  sourceId: string;
  sourceType: SourceType;
  title: string | null;
  filename: string | null;
  url: string | null;
  summary: string | null;
  createdAt: Date;
}

export interface SaveSourceInput {
  sourceId: string;
  sourceType: SourceType;
  title?: string | null;
  filename?: string | null;
  url?: string | null;
  segments: Segment[];
}

/**
 * Row returned by source listings for management screens
 */
export interface SourceListing {
  sourceId: string;
  sourceType: SourceType;
  title: string | null;
  filename: string | null;
  createdAt: Date;
  segmentCount: number;
  hasSummary: boolean;
}

/**
 * Relational Metadata Store contract.
 * The single source of truth for whether a source exists.
 */
export interface SourceStore {
  sourceExists(sourceId: string, sourceType: SourceType): Promise<boolean>;
  getSource(sourceId: string, sourceType: SourceType): Promise<SourceRecord | null>;
  /** Upserts the source record and replaces its segments */
  saveSource(input: SaveSourceInput): Promise<void>;
  getSegments(sourceId: string, sourceType: SourceType): Promise<Segment[]>;
  saveSummary(sourceId: string, sourceType: SourceType, summary: string): Promise<boolean>;
  updateTitle(sourceId: string, sourceType: SourceType, title: string): Promise<boolean>;
  /** Deletes the record; segments cascade. Returns false when nothing was deleted. */
  deleteSourceRecord(sourceId: string, sourceType: SourceType): Promise<boolean>;
  listSources(sourceType?: SourceType): Promise<SourceListing[]>;
}
