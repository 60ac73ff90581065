/**
 * Database row types for the relational metadata store
 * Rows use snake_case columns; mappers convert them to domain objects
 */

import type { Segment, SourceListing, SourceRecord, SourceType } from './transcript.js';

export interface SourceRow {
  source_type: SourceType;
  source_id: string;
  title: string | null;
  filename: string | null;
  url: string | null;
  summary: string | null;
  summary_updated_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface SegmentRow {
  source_type: SourceType;
  source_id: string;
  segment_id: number;
  speaker: string;
  start_time: number;
  end_time: number | null;
  text: string;
  confidence: number | null;
  original_language: string | null;
}

export interface SourceListingRow {
  source_type: SourceType;
  source_id: string;
  title: string | null;
  filename: string | null;
  created_at: Date;
  segment_count: string;     // COUNT(*) comes back as bigint text
  has_summary: boolean;
}

export function mapSourceRow(row: SourceRow): SourceRecord {
  return {
    sourceId: row.source_id,
    sourceType: row.source_type,
    title: row.title,
    filename: row.filename,
    url: row.url,
    summary: row.summary,
    createdAt: row.created_at,
  };
}

export function mapSegmentRow(row: SegmentRow): Segment {
  return {
    segmentId: row.segment_id,
    speaker: row.speaker,
    startTime: row.start_time,
    endTime: row.end_time,
    text: row.text,
    ...(row.confidence !== null ? { confidence: row.confidence } : {}),
    ...(row.original_language !== null ? { originalLanguage: row.original_language } : {}),
  };
}

export function mapSourceListingRow(row: SourceListingRow): SourceListing {
  return {
    sourceId: row.source_id,
    sourceType: row.source_type,
    title: row.title,
    filename: row.filename,
    createdAt: row.created_at,
    segmentCount: parseInt(row.segment_count, 10),
    hasSummary: row.has_summary,
  };
}
