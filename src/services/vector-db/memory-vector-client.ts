/**
 * In-process vector index
 *
 * Brute-force cosine search over documents held in memory. Used for local
 * runs without a database (VECTOR_DB_PROVIDER=memory) and by the tests.
 * It has no metadata-patch primitive, so title updates go through the
 * delete + reinsert path.
 */

import {
  matchesFilter,
  type CollectionName,
  type IndexedDocument,
  type SearchHit,
  type VectorFilter,
  type VectorIndexClient,
} from '../../types/vector-db.js';

/**
 * Cosine distance (1 - cosine similarity). Zero vectors are maximally distant.
 */
export function cosineDistance(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < len; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 1;
  return 1 - dotProduct / denominator;
}

function cloneDocument(doc: IndexedDocument): IndexedDocument {
  return {
    id: doc.id,
    text: doc.text,
    embedding: [...doc.embedding],
    metadata: { ...doc.metadata },
  };
}

export class MemoryVectorClient implements VectorIndexClient {
  readonly provider = 'memory' as const;
  private collections = new Map<CollectionName, Map<string, IndexedDocument>>();

  private collection(name: CollectionName): Map<string, IndexedDocument> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  async upsert(collection: CollectionName, documents: IndexedDocument[]): Promise<void> {
    const docs = this.collection(collection);
    for (const doc of documents) {
      docs.set(doc.id, cloneDocument(doc));
    }
  }

  async query(
    collection: CollectionName,
    embedding: number[],
    topK: number,
    filter?: VectorFilter
  ): Promise<SearchHit[]> {
    if (topK <= 0) return [];

    const scored: SearchHit[] = [];
    for (const doc of this.collection(collection).values()) {
      if (!matchesFilter(doc.metadata, filter)) continue;
      scored.push({
        id: doc.id,
        text: doc.text,
        metadata: { ...doc.metadata },
        distance: cosineDistance(embedding, doc.embedding),
      });
    }

    scored.sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id));
    return scored.slice(0, topK);
  }

  async get(collection: CollectionName, filter: VectorFilter): Promise<IndexedDocument[]> {
    return [...this.collection(collection).values()]
      .filter(doc => matchesFilter(doc.metadata, filter))
      .map(cloneDocument);
  }

  async listIds(collection: CollectionName, filter: VectorFilter): Promise<string[]> {
    return [...this.collection(collection).values()]
      .filter(doc => matchesFilter(doc.metadata, filter))
      .map(doc => doc.id);
  }

  async deleteByFilter(collection: CollectionName, filter: VectorFilter): Promise<number> {
    const docs = this.collection(collection);
    let deleted = 0;
    for (const [id, doc] of docs) {
      if (matchesFilter(doc.metadata, filter)) {
        docs.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  async deleteByIds(collection: CollectionName, ids: string[]): Promise<number> {
    const docs = this.collection(collection);
    let deleted = 0;
    for (const id of ids) {
      if (docs.delete(id)) deleted++;
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /**
   * Number of documents in a collection
   */
  size(collection: CollectionName): number {
    return this.collection(collection).size;
  }

  clear(): void {
    this.collections.clear();
  }
}
