/**
 * Index Manager Tests
 * Full-replace semantics, deletion, title patching and per-source locking
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { IndexManager } from '../src/services/rag/index-manager.js';
import { MemoryVectorClient } from '../src/services/vector-db/memory-vector-client.js';
import type {
  CollectionName,
  IndexedDocument,
  MetadataPatch,
} from '../src/types/vector-db.js';
import { IndexUnavailableError, ProviderError } from '../src/types/errors.js';
import { FakeEmbedder } from './helpers/fake-embedder.js';
import { LECTURE_SEGMENTS, MEETING_SEGMENTS, MEETING_SUMMARY } from './helpers/fixtures.js';

const CHUNKS = 'transcript_chunks_youtube';

class UpsertFailingClient extends MemoryVectorClient {
  failUpserts = false;

  async upsert(collection: CollectionName, documents: IndexedDocument[]): Promise<void> {
    if (this.failUpserts) throw new Error('connection refused');
    return super.upsert(collection, documents);
  }
}

class PatchingClient extends MemoryVectorClient {
  readonly patchCalls: Array<{ collection: CollectionName; ids: string[]; patch: MetadataPatch }> = [];

  async patchMetadata(collection: CollectionName, ids: string[], patch: MetadataPatch): Promise<number> {
    this.patchCalls.push({ collection, ids: [...ids].sort(), patch });
    return ids.length;
  }
}

describe('IndexManager', () => {
  let vectorIndex: UpsertFailingClient;
  let embedder: FakeEmbedder;
  let manager: IndexManager;

  beforeEach(() => {
    vectorIndex = new UpsertFailingClient();
    embedder = new FakeEmbedder();
    manager = new IndexManager(vectorIndex, embedder);
  });

  describe('storeChunks', () => {
    it('should store one document per segment', async () => {
      const result = await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);

      expect(result).toEqual({ stored: 3, skipped: 0 });
      expect(vectorIndex.size(CHUNKS)).toBe(3);
      expect(embedder.calls.embedBatch).toBe(1);
    });

    it('should be idempotent', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      const first = await vectorIndex.get(CHUNKS, { sourceId: 'video123' });

      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      const second = await vectorIndex.get(CHUNKS, { sourceId: 'video123' });

      expect(second).toEqual(first);
    });

    it('should prune documents of segments that are gone', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS.slice(0, 2));

      expect((await vectorIndex.listIds(CHUNKS, { sourceId: 'video123' })).sort()).toEqual([
        'video123_seg_0',
        'video123_seg_1',
      ]);
    });

    it('should leave other sources alone', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      await manager.storeChunks('lecture1', 'youtube', LECTURE_SEGMENTS);
      await manager.storeChunks('video123', 'youtube', []);

      expect(await vectorIndex.listIds(CHUNKS, { sourceId: 'video123' })).toEqual([]);
      expect(await vectorIndex.listIds(CHUNKS, { sourceId: 'lecture1' })).toHaveLength(2);
    });

    it('should keep the previous documents when embedding fails', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      embedder.failWith = new Error('Service unavailable');

      await expect(manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS.slice(0, 1)))
        .rejects.toBeInstanceOf(ProviderError);
      expect(vectorIndex.size(CHUNKS)).toBe(3);
    });

    it('should raise IndexUnavailableError when the index rejects writes', async () => {
      vectorIndex.failUpserts = true;

      const error = await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexUnavailableError);
      expect(error).toMatchObject({ operation: 'upsert' });
    });

    it('should report skipped segments', async () => {
      const result = await manager.storeChunks('video123', 'youtube', [...MEETING_SEGMENTS, { speaker: '1' }]);
      expect(result).toEqual({ stored: 3, skipped: 1 });
    });

    it('should apply concurrent stores in call order when embedding latency varies', async () => {
      embedder.latencyPerTextMs = 5;

      await Promise.all([
        manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS),
        manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS.slice(0, 1)),
      ]);

      // The single-segment batch embeds first but was called last
      expect(await vectorIndex.listIds(CHUNKS, { sourceId: 'video123' })).toEqual(['video123_seg_0']);
    });

    it('should leave the index consistent under concurrent stores', async () => {
      await Promise.all([
        manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS),
        manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS.slice(0, 1)),
        manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS),
      ]);

      // The last store wins whole; no mix of sets
      expect((await vectorIndex.listIds(CHUNKS, { sourceId: 'video123' })).sort()).toEqual([
        'video123_seg_0',
        'video123_seg_1',
        'video123_seg_2',
      ]);
    });
  });

  describe('storeSummary', () => {
    it('should store and reassemble a summary', async () => {
      const result = await manager.storeSummary('video123', 'youtube', MEETING_SUMMARY, {
        createdAt: new Date('2024-03-01T00:00:00Z'),
      });

      expect(result).toEqual({ stored: 2 });
      expect(await manager.getSummary('video123', 'youtube')).toBe(MEETING_SUMMARY);
    });

    it('should store the segments each subtopic cites', async () => {
      await manager.storeSummary('video123', 'youtube', '## 예산\n검토 [cite: 2, 0]\n## 일정\n제출 기한');

      const documents = await vectorIndex.get('summaries', { sourceId: 'video123' });
      const cited = documents.map(doc =>
        doc.metadata.documentType === 'summary' ? [doc.metadata.subtopic, doc.metadata.citedSegmentIds] : []
      );
      expect(cited).toEqual(expect.arrayContaining([['예산', [0, 2]], ['일정', []]]));
      expect(cited).toHaveLength(2);
    });

    it('should prune everything when the summary is empty', async () => {
      await manager.storeSummary('video123', 'youtube', MEETING_SUMMARY);
      await manager.storeSummary('video123', 'youtube', '');

      expect(await manager.getSummary('video123', 'youtube')).toBeNull();
      expect(vectorIndex.size('summaries')).toBe(0);
    });

    it('should keep summaries of different source types apart', async () => {
      await manager.storeSummary('video123', 'youtube', MEETING_SUMMARY);
      await manager.storeSummary('video123', 'audio', '## Other\nDifferent text');

      expect(await manager.getSummary('video123', 'youtube')).toBe(MEETING_SUMMARY);
      expect(await manager.getSummary('video123', 'audio')).toBe('## Other\nDifferent text');
    });
  });

  describe('deleteSource', () => {
    it('should delete chunks and summaries and count them', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      await manager.storeSummary('video123', 'youtube', MEETING_SUMMARY);
      await manager.storeChunks('lecture1', 'youtube', LECTURE_SEGMENTS);

      expect(await manager.deleteSource('video123', 'youtube')).toBe(5);
      expect(await manager.countDocuments('video123', 'youtube')).toEqual({ chunks: 0, summaries: 0 });
      expect(await manager.countDocuments('lecture1', 'youtube')).toEqual({ chunks: 2, summaries: 0 });
    });

    it('should return 0 when nothing is indexed', async () => {
      expect(await manager.deleteSource('missing', 'audio')).toBe(0);
    });
  });

  describe('updateTitle', () => {
    it('should re-insert documents with patched metadata when the backend has no patch primitive', async () => {
      await manager.storeChunks('a1', 'audio', MEETING_SEGMENTS, { filename: 'meeting.m4a' });
      await manager.storeSummary('a1', 'audio', MEETING_SUMMARY, { filename: 'meeting.m4a' });
      const before = await vectorIndex.get('transcript_chunks_audio', { sourceId: 'a1' });
      const callsBefore = embedder.totalCalls;

      expect(await manager.updateTitle('a1', 'audio', 'Budget Review')).toBe(5);

      const after = await vectorIndex.get('transcript_chunks_audio', { sourceId: 'a1' });
      expect(after.map(d => d.metadata.filename)).toEqual(['Budget Review', 'Budget Review', 'Budget Review']);
      expect(after.map(d => d.metadata.title)).toEqual(['Budget Review', 'Budget Review', 'Budget Review']);
      expect(after.map(d => d.embedding)).toEqual(before.map(d => d.embedding));
      expect(after.map(d => d.text)).toEqual(before.map(d => d.text));
      expect(embedder.totalCalls).toBe(callsBefore);
    });

    it('should only set the title for youtube sources', async () => {
      await manager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      await manager.updateTitle('video123', 'youtube', 'Weekly sync');

      const docs = await vectorIndex.get(CHUNKS, { sourceId: 'video123' });
      expect(docs[0]?.metadata.title).toBe('Weekly sync');
      expect(docs[0]?.metadata.filename).toBeUndefined();
    });

    it('should use the backend patch primitive when there is one', async () => {
      const patching = new PatchingClient();
      const patchingManager = new IndexManager(patching, embedder);
      await patchingManager.storeChunks('video123', 'youtube', MEETING_SEGMENTS);
      const upsertSpy = vi.spyOn(patching, 'upsert');

      expect(await patchingManager.updateTitle('video123', 'youtube', 'Weekly sync')).toBe(3);

      expect(upsertSpy).not.toHaveBeenCalled();
      expect(patching.patchCalls).toEqual([
        {
          collection: CHUNKS,
          ids: ['video123_seg_0', 'video123_seg_1', 'video123_seg_2'],
          patch: { title: 'Weekly sync' },
        },
      ]);
    });

    it('should touch nothing for an unindexed source', async () => {
      expect(await manager.updateTitle('missing', 'youtube', 'Title')).toBe(0);
    });
  });
});
