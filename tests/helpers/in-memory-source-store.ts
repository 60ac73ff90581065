/**
 * In-process SourceStore for service and route tests
 */

import type {
  SaveSourceInput,
  Segment,
  SourceListing,
  SourceRecord,
  SourceStore,
  SourceType,
} from '../../src/types/transcript.js';

interface StoredSource {
  record: SourceRecord;
  segments: Segment[];
}

export class InMemorySourceStore implements SourceStore {
  private sources = new Map<string, StoredSource>();

  private key(sourceId: string, sourceType: SourceType): string {
    return `${sourceType}:${sourceId}`;
  }

  async sourceExists(sourceId: string, sourceType: SourceType): Promise<boolean> {
    return this.sources.has(this.key(sourceId, sourceType));
  }

  async getSource(sourceId: string, sourceType: SourceType): Promise<SourceRecord | null> {
    const stored = this.sources.get(this.key(sourceId, sourceType));
    return stored ? { ...stored.record } : null;
  }

  async saveSource(input: SaveSourceInput): Promise<void> {
    const key = this.key(input.sourceId, input.sourceType);
    const existing = this.sources.get(key)?.record;

    this.sources.set(key, {
      record: {
        sourceId: input.sourceId,
        sourceType: input.sourceType,
        title: input.title ?? existing?.title ?? null,
        filename: input.filename ?? existing?.filename ?? null,
        url: input.url ?? existing?.url ?? null,
        summary: existing?.summary ?? null,
        createdAt: existing?.createdAt ?? new Date('2024-01-01T00:00:00Z'),
      },
      segments: [...input.segments].sort((a, b) => a.segmentId - b.segmentId),
    });
  }

  async getSegments(sourceId: string, sourceType: SourceType): Promise<Segment[]> {
    return [...(this.sources.get(this.key(sourceId, sourceType))?.segments ?? [])];
  }

  async saveSummary(sourceId: string, sourceType: SourceType, summary: string): Promise<boolean> {
    const stored = this.sources.get(this.key(sourceId, sourceType));
    if (!stored) return false;
    stored.record.summary = summary;
    return true;
  }

  async updateTitle(sourceId: string, sourceType: SourceType, title: string): Promise<boolean> {
    const stored = this.sources.get(this.key(sourceId, sourceType));
    if (!stored) return false;
    stored.record.title = title;
    if (sourceType === 'audio') stored.record.filename = title;
    return true;
  }

  async deleteSourceRecord(sourceId: string, sourceType: SourceType): Promise<boolean> {
    return this.sources.delete(this.key(sourceId, sourceType));
  }

  async listSources(sourceType?: SourceType): Promise<SourceListing[]> {
    return [...this.sources.values()]
      .filter(stored => !sourceType || stored.record.sourceType === sourceType)
      .map(stored => ({
        sourceId: stored.record.sourceId,
        sourceType: stored.record.sourceType,
        title: stored.record.title,
        filename: stored.record.filename,
        createdAt: stored.record.createdAt,
        segmentCount: stored.segments.length,
        hasSummary: stored.record.summary !== null,
      }));
  }
}
