/**
 * ChromaDB Client Tests
 * The chromadb SDK is mocked; collections are in-process stand-ins
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ChunkMetadata, SummaryMetadata } from '../src/types/vector-db.js';

const { mockCollection, mockGetOrCreateCollection, mockHeartbeat } = vi.hoisted(() => {
  const mockCollection = {
    upsert: vi.fn(),
    query: vi.fn(),
    get: vi.fn(),
    delete: vi.fn(),
    update: vi.fn(),
  };
  return {
    mockCollection,
    mockGetOrCreateCollection: vi.fn(async () => mockCollection),
    mockHeartbeat: vi.fn(),
  };
});

vi.mock('chromadb', () => {
  class ChromaClient {
    getOrCreateCollection = mockGetOrCreateCollection;
    heartbeat = mockHeartbeat;
  }
  return {
    ChromaClient,
    IncludeEnum: { Documents: 'documents', Metadatas: 'metadatas', Embeddings: 'embeddings' },
  };
});

import {
  ChromaVectorClient,
  fromChromaMetadata,
  toChromaMetadata,
  toChromaWhere,
} from '../src/services/vector-db/chroma-client.js';
import { IndexUnavailableError } from '../src/types/errors.js';

const chunkMetadata: ChunkMetadata = {
  documentType: 'chunk',
  sourceId: 'video123',
  sourceType: 'youtube',
  speaker: '1',
  startTime: 12,
  endTime: null,
  confidence: 1,
  segmentId: 3,
  title: 'Weekly sync',
};

const summaryMetadata: SummaryMetadata = {
  documentType: 'summary',
  sourceId: 'video123',
  sourceType: 'youtube',
  subtopic: '예산',
  subtopicIndex: 0,
  partIndex: 0,
  createdAt: '2024-03-01T09:00:00.000Z',
  citedSegmentIds: [1, 12],
};

describe('chroma metadata helpers', () => {
  it('should drop null values on write', () => {
    expect(toChromaMetadata(chunkMetadata)).toEqual({
      documentType: 'chunk',
      sourceId: 'video123',
      sourceType: 'youtube',
      speaker: '1',
      startTime: 12,
      confidence: 1,
      segmentId: 3,
      title: 'Weekly sync',
    });
  });

  it('should restore a missing endTime as null on read', () => {
    expect(fromChromaMetadata(toChromaMetadata(chunkMetadata))).toEqual(chunkMetadata);
  });

  it('should keep a stored endTime', () => {
    expect(fromChromaMetadata({ ...toChromaMetadata(chunkMetadata), endTime: 20 })).toEqual({
      ...chunkMetadata,
      endTime: 20,
    });
  });

  it('should store cited segment ids as a comma-joined string', () => {
    expect(toChromaMetadata(summaryMetadata).citedSegmentIds).toBe('1,12');
    expect(fromChromaMetadata(toChromaMetadata(summaryMetadata))).toEqual(summaryMetadata);
  });

  it('should read empty or missing citations back as an empty list', () => {
    const none = { ...summaryMetadata, citedSegmentIds: [] };
    expect(toChromaMetadata(none).citedSegmentIds).toBe('');
    expect(fromChromaMetadata(toChromaMetadata(none))).toEqual(none);

    const { citedSegmentIds: _omitted, ...legacy } = toChromaMetadata(summaryMetadata);
    expect(fromChromaMetadata(legacy)).toEqual(none);
  });

  it('should return null for metadata that does not describe a document', () => {
    expect(fromChromaMetadata({ sourceId: 'video123' })).toBeNull();
    expect(fromChromaMetadata(null)).toBeNull();
  });

  it('should build where clauses', () => {
    expect(toChromaWhere(undefined)).toBeUndefined();
    expect(toChromaWhere({})).toBeUndefined();
    expect(toChromaWhere({ sourceId: 'video123' })).toEqual({ sourceId: 'video123' });
    expect(toChromaWhere({ sourceId: 'video123', documentType: 'summary' })).toEqual({
      $and: [{ sourceId: 'video123' }, { documentType: 'summary' }],
    });
  });
});

describe('ChromaVectorClient', () => {
  let client: ChromaVectorClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new ChromaVectorClient({ collectionPrefix: 'test_' });
  });

  it('should create prefixed cosine collections once', async () => {
    mockCollection.get.mockResolvedValue({ ids: [] });

    await client.listIds('summaries', { sourceId: 'video123' });
    await client.listIds('summaries', { sourceId: 'video123' });

    expect(mockGetOrCreateCollection).toHaveBeenCalledTimes(1);
    expect(mockGetOrCreateCollection).toHaveBeenCalledWith({
      name: 'test_summaries',
      metadata: { 'hnsw:space': 'cosine', description: 'Transcript retrieval: summaries' },
    });
  });

  it('should map query responses to hits and skip invalid metadata', async () => {
    mockCollection.query.mockResolvedValue({
      ids: [['video123_seg_3', 'broken']],
      documents: [['예산안 검토', 'x']],
      metadatas: [[toChromaMetadata(chunkMetadata), { sourceId: 'video123' }]],
      distances: [[0.12, 0.5]],
    });

    const hits = await client.query('transcript_chunks_youtube', [1, 0], 5, { sourceType: 'youtube' });

    expect(mockCollection.query).toHaveBeenCalledWith({
      queryEmbeddings: [[1, 0]],
      nResults: 5,
      where: { sourceType: 'youtube' },
    });
    expect(hits).toEqual([
      { id: 'video123_seg_3', text: '예산안 검토', metadata: chunkMetadata, distance: 0.12 },
    ]);
  });

  it('should skip the query for a non-positive topK', async () => {
    expect(await client.query('summaries', [1], 0)).toEqual([]);
    expect(mockCollection.query).not.toHaveBeenCalled();
  });

  it('should delete by filter through listed ids', async () => {
    mockCollection.get.mockResolvedValue({ ids: ['a', 'b'] });

    const deleted = await client.deleteByFilter('summaries', { sourceId: 'video123' });

    expect(deleted).toBe(2);
    expect(mockCollection.get).toHaveBeenCalledWith({ where: { sourceId: 'video123' }, include: [] });
    expect(mockCollection.delete).toHaveBeenCalledWith({ ids: ['a', 'b'] });
  });

  it('should patch only the given metadata fields', async () => {
    const count = await client.patchMetadata('transcript_chunks_audio', ['a1_seg_0'], { title: 'Lecture' });

    expect(count).toBe(1);
    expect(mockCollection.update).toHaveBeenCalledWith({
      ids: ['a1_seg_0'],
      metadatas: [{ title: 'Lecture' }],
    });
  });

  it('should wrap backend failures as IndexUnavailableError', async () => {
    mockCollection.upsert.mockRejectedValue(new Error('connection refused'));

    await expect(
      client.upsert('transcript_chunks_youtube', [
        { id: 'video123_seg_3', text: 't', embedding: [1], metadata: chunkMetadata },
      ])
    ).rejects.toBeInstanceOf(IndexUnavailableError);
  });

  it('should report ping failures as false', async () => {
    mockHeartbeat.mockRejectedValue(new Error('down'));
    expect(await client.ping()).toBe(false);
  });
});
