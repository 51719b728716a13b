import { ChunkRecord, ScoredChunk } from '../types';

/**
 * Chunk vectors plus metadata. `search` only ever considers chunks whose
 * (documentId, version) pair is in `allowed`: the filter runs inside the store, before ranking.
 */
export interface VectorIndex {
  upsert(chunks: ChunkRecord[]): Promise<void>;
  search(queryVector: number[], allowed: ReadonlyMap<string, number>, k: number): Promise<ScoredChunk[]>;
  delete(documentId: string): Promise<void>;
  /** Removes every generation of `documentId` except `keepVersion`. */
  deleteStaleVersions(documentId: string, keepVersion: number): Promise<void>;
  updateAccessTags(documentId: string, accessTags: string[]): Promise<void>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

export function chunkId(documentId: string, version: number, sequenceIndex: number): string {
  return `${documentId}::v${version}::chunk::${sequenceIndex}`;
}

/**
 * Canonical result order: score desc, then document id asc, then sequence index asc.
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.sequenceIndex - b.sequenceIndex;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0, magA = 0, magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  return denom === 0 ? 0 : dot / denom;
}
