/**
 * Source Repository
 *
 * PostgreSQL implementation of the relational metadata store: one row per
 * source, its ordered segments, and the current summary.
 */

import type { Pool } from 'pg';
import type {
  SaveSourceInput,
  Segment,
  SourceListing,
  SourceRecord,
  SourceStore,
  SourceType,
} from '../../types/transcript.js';
import {
  mapSegmentRow,
  mapSourceListingRow,
  mapSourceRow,
  type SegmentRow,
  type SourceListingRow,
  type SourceRow,
} from '../../types/database.js';
import { loggers } from '../../services/logging/log-helpers.js';

export class PgSourceRepository implements SourceStore {
  constructor(private pool: Pool) {}

  async sourceExists(sourceId: string, sourceType: SourceType): Promise<boolean> {
    const result = await this.pool.query<{ exists: boolean }>(`
      SELECT EXISTS(
        SELECT 1 FROM sources WHERE source_type = $1 AND source_id = $2
      ) AS exists
    `, [sourceType, sourceId]);

    return result.rows[0]?.exists ?? false;
  }

  async getSource(sourceId: string, sourceType: SourceType): Promise<SourceRecord | null> {
    const result = await this.pool.query<SourceRow>(`
      SELECT * FROM sources WHERE source_type = $1 AND source_id = $2
    `, [sourceType, sourceId]);

    return result.rows[0] ? mapSourceRow(result.rows[0]) : null;
  }

  /**
   * Upsert the source row and replace all of its segments in one transaction
   */
  async saveSource(input: SaveSourceInput): Promise<void> {
    const start = Date.now();
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      await client.query(`
        INSERT INTO sources (source_type, source_id, title, filename, url)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (source_type, source_id) DO UPDATE SET
          title = COALESCE(EXCLUDED.title, sources.title),
          filename = COALESCE(EXCLUDED.filename, sources.filename),
          url = COALESCE(EXCLUDED.url, sources.url),
          updated_at = NOW()
      `, [
        input.sourceType,
        input.sourceId,
        input.title ?? null,
        input.filename ?? null,
        input.url ?? null,
      ]);

      await client.query(
        'DELETE FROM source_segments WHERE source_type = $1 AND source_id = $2',
        [input.sourceType, input.sourceId]
      );

      for (const segment of input.segments) {
        await client.query(`
          INSERT INTO source_segments (
            source_type, source_id, segment_id, speaker, start_time,
            end_time, text, confidence, original_language
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
          ON CONFLICT (source_type, source_id, segment_id) DO UPDATE SET
            speaker = EXCLUDED.speaker,
            start_time = EXCLUDED.start_time,
            end_time = EXCLUDED.end_time,
            text = EXCLUDED.text,
            confidence = EXCLUDED.confidence,
            original_language = EXCLUDED.original_language
        `, [
          input.sourceType,
          input.sourceId,
          segment.segmentId,
          String(segment.speaker),
          segment.startTime,
          segment.endTime ?? null,
          segment.text,
          segment.confidence ?? null,
          segment.originalLanguage ?? null,
        ]);
      }

      await client.query('COMMIT');
      loggers.dbOperation('upsert', 'sources', Date.now() - start, true, input.segments.length);
    } catch (error) {
      await client.query('ROLLBACK');
      loggers.dbOperation('upsert', 'sources', Date.now() - start, false);
      throw error;
    } finally {
      client.release();
    }
  }

  async getSegments(sourceId: string, sourceType: SourceType): Promise<Segment[]> {
    const result = await this.pool.query<SegmentRow>(`
      SELECT * FROM source_segments
      WHERE source_type = $1 AND source_id = $2
      ORDER BY segment_id ASC
    `, [sourceType, sourceId]);

    return result.rows.map(mapSegmentRow);
  }

  async saveSummary(sourceId: string, sourceType: SourceType, summary: string): Promise<boolean> {
    const result = await this.pool.query(`
      UPDATE sources
      SET summary = $3, summary_updated_at = NOW(), updated_at = NOW()
      WHERE source_type = $1 AND source_id = $2
    `, [sourceType, sourceId, summary]);

    return (result.rowCount ?? 0) > 0;
  }

  async updateTitle(sourceId: string, sourceType: SourceType, title: string): Promise<boolean> {
    // Audio sources are listed by file name, so the name follows the title
    const result = await this.pool.query(`
      UPDATE sources
      SET title = $3,
          filename = CASE WHEN source_type = 'audio' THEN $3 ELSE filename END,
          updated_at = NOW()
      WHERE source_type = $1 AND source_id = $2
    `, [sourceType, sourceId, title]);

    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Segments go with the row through ON DELETE CASCADE
   */
  async deleteSourceRecord(sourceId: string, sourceType: SourceType): Promise<boolean> {
    const start = Date.now();
    const result = await this.pool.query(
      'DELETE FROM sources WHERE source_type = $1 AND source_id = $2',
      [sourceType, sourceId]
    );
    const deleted = result.rowCount ?? 0;
    loggers.dbOperation('delete', 'sources', Date.now() - start, true, deleted);
    return deleted > 0;
  }

  async listSources(sourceType?: SourceType): Promise<SourceListing[]> {
    const params: unknown[] = [];
    let where = '';
    if (sourceType) {
      params.push(sourceType);
      where = 'WHERE s.source_type = $1';
    }

    const result = await this.pool.query<SourceListingRow>(`
      SELECT
        s.source_type,
        s.source_id,
        s.title,
        s.filename,
        s.created_at,
        COUNT(seg.segment_id) AS segment_count,
        (s.summary IS NOT NULL) AS has_summary
      FROM sources s
      LEFT JOIN source_segments seg
        ON seg.source_type = s.source_type AND seg.source_id = s.source_id
      ${where}
      GROUP BY s.source_type, s.source_id
      ORDER BY s.created_at DESC
    `, params);

    return result.rows.map(mapSourceListingRow);
  }
}
