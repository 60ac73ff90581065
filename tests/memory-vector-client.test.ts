/**
 * In-process vector index tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryVectorClient, cosineDistance } from '../src/services/vector-db/memory-vector-client.js';
import type { ChunkMetadata, IndexedDocument } from '../src/types/vector-db.js';

function chunk(id: string, sourceId: string, segmentId: number, embedding: number[]): IndexedDocument<ChunkMetadata> {
  return {
    id,
    text: `text of ${id}`,
    embedding,
    metadata: {
      sourceId,
      sourceType: 'youtube',
      documentType: 'chunk',
      speaker: '1',
      startTime: segmentId,
      endTime: null,
      confidence: 0,
      segmentId,
    },
  };
}

describe('cosineDistance', () => {
  it('should be 0 for identical directions', () => {
    expect(cosineDistance([1, 0], [2, 0])).toBeCloseTo(0);
  });

  it('should be 1 for orthogonal vectors', () => {
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1);
  });

  it('should treat zero vectors as maximally distant', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });
});

describe('MemoryVectorClient', () => {
  const collection = 'transcript_chunks_youtube';
  let client: MemoryVectorClient;

  beforeEach(async () => {
    client = new MemoryVectorClient();
    await client.upsert(collection, [
      chunk('a_seg_0', 'a', 0, [1, 0, 0]),
      chunk('a_seg_1', 'a', 1, [0, 1, 0]),
      chunk('b_seg_0', 'b', 0, [1, 1, 0]),
    ]);
  });

  it('should return hits by ascending distance', async () => {
    const hits = await client.query(collection, [1, 0, 0], 3);
    expect(hits.map(h => h.id)).toEqual(['a_seg_0', 'b_seg_0', 'a_seg_1']);
    expect(hits[0]?.distance).toBeCloseTo(0);
  });

  it('should apply filters and topK', async () => {
    const hits = await client.query(collection, [1, 0, 0], 1, { sourceId: 'a' });
    expect(hits.map(h => h.id)).toEqual(['a_seg_0']);
    expect(await client.query(collection, [1, 0, 0], 0)).toEqual([]);
  });

  it('should overwrite documents with the same id', async () => {
    await client.upsert(collection, [{ ...chunk('a_seg_0', 'a', 0, [0, 0, 1]), text: 'replaced' }]);

    expect(client.size(collection)).toBe(3);
    const [doc] = await client.get(collection, { sourceId: 'a', documentType: 'chunk' });
    expect(doc?.text).toBe('replaced');
  });

  it('should list and delete by filter', async () => {
    expect((await client.listIds(collection, { sourceId: 'a' })).sort()).toEqual(['a_seg_0', 'a_seg_1']);
    expect(await client.deleteByFilter(collection, { sourceId: 'a' })).toBe(2);
    expect(await client.deleteByFilter(collection, { sourceId: 'a' })).toBe(0);
    expect(client.size(collection)).toBe(1);
  });

  it('should delete by ids and count only existing ones', async () => {
    expect(await client.deleteByIds(collection, ['a_seg_1', 'missing'])).toBe(1);
    expect(await client.listIds(collection, {})).toEqual(['a_seg_0', 'b_seg_0']);
  });

  it('should keep collections separate', async () => {
    expect(await client.listIds('transcript_chunks_audio', {})).toEqual([]);
    expect(await client.query('summaries', [1, 0, 0], 5)).toEqual([]);
  });

  it('should return copies', async () => {
    const [doc] = await client.get(collection, { sourceId: 'b' });
    doc?.embedding.fill(0);

    const [again] = await client.get(collection, { sourceId: 'b' });
    expect(again?.embedding).toEqual([1, 1, 0]);
  });

  it('should report healthy', async () => {
    expect(await client.ping()).toBe(true);
  });
});
