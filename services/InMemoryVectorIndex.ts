import { ChunkRecord, ScoredChunk } from '../types';
import { VectorIndex, compareScoredChunks, cosineSimilarity } from './VectorIndex';

/**
 * Process-local vector index for development and tests. Records are keyed by chunk id with a
 * secondary index on document id for bulk deletes.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private records: Map<string, ChunkRecord> = new Map();
  private byDocument: Map<string, Set<string>> = new Map();

  async upsert(chunks: ChunkRecord[]): Promise<void> {
    for (const chunk of chunks) {
      this.records.set(chunk.id, { ...chunk, accessTags: [...chunk.accessTags], embedding: [...chunk.embedding] });
      let ids = this.byDocument.get(chunk.documentId);
      if (!ids) {
        ids = new Set();
        this.byDocument.set(chunk.documentId, ids);
      }
      ids.add(chunk.id);
    }
  }

  async search(queryVector: number[], allowed: ReadonlyMap<string, number>, k: number): Promise<ScoredChunk[]> {
    if (allowed.size === 0 || k <= 0) {
      return [];
    }

    const results: ScoredChunk[] = [];
    for (const [documentId, version] of allowed) {
      for (const id of this.byDocument.get(documentId) ?? []) {
        const record = this.records.get(id);
        if (!record || record.version !== version) continue;

        results.push({
          chunkId: record.id,
          documentId: record.documentId,
          sequenceIndex: record.sequenceIndex,
          span: { ...record.span },
          text: record.text,
          filename: record.filename,
          section: record.section,
          score: cosineSimilarity(queryVector, record.embedding)
        });
      }
    }

    return results.sort(compareScoredChunks).slice(0, k);
  }

  async delete(documentId: string): Promise<void> {
    for (const id of this.byDocument.get(documentId) ?? []) {
      this.records.delete(id);
    }
    this.byDocument.delete(documentId);
  }

  async deleteStaleVersions(documentId: string, keepVersion: number): Promise<void> {
    const ids = this.byDocument.get(documentId);
    if (!ids) return;

    for (const id of [...ids]) {
      const record = this.records.get(id);
      if (!record || record.version !== keepVersion) {
        this.records.delete(id);
        ids.delete(id);
      }
    }
    if (ids.size === 0) {
      this.byDocument.delete(documentId);
    }
  }

  async updateAccessTags(documentId: string, accessTags: string[]): Promise<void> {
    for (const id of this.byDocument.get(documentId) ?? []) {
      const record = this.records.get(id);
      if (record) {
        record.accessTags = [...accessTags];
      }
    }
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async clear(): Promise<void> {
    this.records.clear();
    this.byDocument.clear();
  }

  /** Chunk ids currently stored for a document, in sequence order. */
  chunkIdsFor(documentId: string): string[] {
    return [...(this.byDocument.get(documentId) ?? [])]
      .map(id => this.records.get(id))
      .filter((record): record is ChunkRecord => record !== undefined)
      .sort((a, b) => a.version - b.version || a.sequenceIndex - b.sequenceIndex)
      .map(record => record.id);
  }

  getChunk(id: string): ChunkRecord | undefined {
    return this.records.get(id);
  }
}
