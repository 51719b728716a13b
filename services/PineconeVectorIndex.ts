import { Index, Pinecone } from '@pinecone-database/pinecone';
import { ChunkRecord, ScoredChunk } from '../types';
import { errorMessage } from '../utils/errors';
import { VectorIndex, compareScoredChunks } from './VectorIndex';

// Pinecone metadata values cannot be undefined, so `section` is '' when absent
type PineconeChunkMetadata = {
  doc_id: string;
  version: number;
  chunk_index: number;
  span_start: number;
  span_end: number;
  text: string;
  filename: string;
  section: string;
  access_tags: string[];
};

export interface ScopeFilter {
  $or: Array<{ doc_id: { $eq: string }; version: { $eq: number } }>;
}

/**
 * Metadata filter restricting a query to the committed generation of each permitted document.
 */
export function buildScopeFilter(allowed: ReadonlyMap<string, number>): ScopeFilter {
  return {
    $or: [...allowed.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([docId, version]) => ({ doc_id: { $eq: docId }, version: { $eq: version } }))
  };
}

/**
 * Splits a scope into filters of at most `batchSize` documents. The top k of the whole scope is
 * always within the union of each batch's top k.
 */
export function buildScopeFilters(allowed: ReadonlyMap<string, number>, batchSize: number): ScopeFilter[] {
  const { $or: clauses } = buildScopeFilter(allowed);
  const filters: ScopeFilter[] = [];
  for (let i = 0; i < clauses.length; i += batchSize) {
    filters.push({ $or: clauses.slice(i, i + batchSize) });
  }
  return filters;
}

const UPSERT_BATCH_SIZE = 100;
const DELETE_BATCH_SIZE = 1000;
const FETCH_BATCH_SIZE = 100;
const UPDATE_CONCURRENCY = 20;
// keeps each metadata filter well inside Pinecone's request size limits
const SCOPE_FILTER_BATCH_SIZE = 100;

export class PineconeVectorIndex implements VectorIndex {
  private index: Index<PineconeChunkMetadata>;
  private dimension: number;
  private scopeBatchSize: number;

  constructor(apiKey: string, indexName: string, dimension: number, scopeBatchSize: number = SCOPE_FILTER_BATCH_SIZE) {
    const pinecone = new Pinecone({ apiKey });
    this.index = pinecone.index<PineconeChunkMetadata>(indexName);
    this.dimension = dimension;
    this.scopeBatchSize = scopeBatchSize;
  }

  async upsert(chunks: ChunkRecord[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    for (const chunk of chunks) {
      if (chunk.embedding.length !== this.dimension) {
        const errorMsg = `Vector dimension mismatch: expected ${this.dimension} but chunk ${chunk.id} has ${chunk.embedding.length}`;
        console.error(`[PineconeVectorIndex] ERROR: ${errorMsg}`);
        throw new Error(errorMsg);
      }
    }

    const records = chunks.map(chunk => ({
      id: chunk.id,
      values: chunk.embedding,
      metadata: {
        doc_id: chunk.documentId,
        version: chunk.version,
        chunk_index: chunk.sequenceIndex,
        span_start: chunk.span.start,
        span_end: chunk.span.end,
        text: chunk.text,
        filename: chunk.filename,
        section: chunk.section ?? '',
        access_tags: chunk.accessTags
      }
    }));

    try {
      for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
        await this.index.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeVectorIndex] ERROR: Failed to upsert vectors:`, error);
      throw new Error(`Failed to upsert vectors to Pinecone: ${errorMessage(error)}`);
    }
  }

  async search(queryVector: number[], allowed: ReadonlyMap<string, number>, k: number): Promise<ScoredChunk[]> {
    if (allowed.size === 0 || k <= 0) {
      return [];
    }

    try {
      const responses = await Promise.all(buildScopeFilters(allowed, this.scopeBatchSize).map(filter =>
        this.index.query({
          vector: queryVector,
          topK: k,
          filter,
          includeMetadata: true,
          includeValues: false
        })
      ));

      const matches: ScoredChunk[] = [];
      for (const match of responses.flatMap(response => response.matches)) {
        const metadata = match.metadata;
        // the filter already ran server-side; this only guards against a stale replica
        if (!metadata || allowed.get(metadata.doc_id) !== metadata.version) {
          continue;
        }
        matches.push({
          chunkId: match.id,
          documentId: metadata.doc_id,
          sequenceIndex: metadata.chunk_index,
          span: { start: metadata.span_start, end: metadata.span_end },
          text: metadata.text,
          filename: metadata.filename,
          section: metadata.section || undefined,
          score: match.score ?? 0
        });
      }
      return matches.sort(compareScoredChunks).slice(0, k);
    } catch (error) {
      console.error(`[PineconeVectorIndex] ERROR: Failed to query Pinecone:`, error);
      throw new Error(`Failed to query Pinecone: ${errorMessage(error)}`);
    }
  }

  async delete(documentId: string): Promise<void> {
    const ids = await this.listIds(`${documentId}::`);
    await this.deleteIds(ids);
  }

  async deleteStaleVersions(documentId: string, keepVersion: number): Promise<void> {
    const keepPrefix = `${documentId}::v${keepVersion}::`;
    const ids = await this.listIds(`${documentId}::`);
    await this.deleteIds(ids.filter(id => !id.startsWith(keepPrefix)));
  }

  async updateAccessTags(documentId: string, accessTags: string[]): Promise<void> {
    const ids = await this.listIds(`${documentId}::`);
    try {
      // Pinecone has limits on URL length, so fetch in batches
      for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
        const fetchResponse = await this.index.fetch(ids.slice(i, i + FETCH_BATCH_SIZE));
        const records = Object.values(fetchResponse.records ?? {});

        for (let j = 0; j < records.length; j += UPDATE_CONCURRENCY) {
          await Promise.all(records.slice(j, j + UPDATE_CONCURRENCY).map(record => {
            if (!record.metadata) {
              return Promise.resolve();
            }
            return this.index.update({ id: record.id, metadata: { ...record.metadata, access_tags: accessTags } });
          }));
        }
      }
    } catch (error) {
      console.error(`[PineconeVectorIndex] ERROR: Failed to update access tags for ${documentId}:`, error);
      throw new Error(`Failed to update access tags in Pinecone: ${errorMessage(error)}`);
    }
  }

  async count(): Promise<number> {
    const stats = await this.index.describeIndexStats();
    return stats.totalRecordCount ?? 0;
  }

  async clear(): Promise<void> {
    await this.index.deleteAll();
  }

  private async listIds(prefix: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;

    try {
      do {
        const page = await this.index.listPaginated({ prefix, paginationToken });
        for (const vector of page.vectors ?? []) {
          if (vector.id) ids.push(vector.id);
        }
        paginationToken = page.pagination?.next;
      } while (paginationToken);
    } catch (error) {
      console.error(`[PineconeVectorIndex] ERROR: Failed to list vectors with prefix ${prefix}:`, error);
      throw new Error(`Failed to list vectors in Pinecone: ${errorMessage(error)}`);
    }

    return ids;
  }

  private async deleteIds(ids: string[]): Promise<void> {
    try {
      for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
        await this.index.deleteMany(ids.slice(i, i + DELETE_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeVectorIndex] ERROR: Failed to delete vectors:`, error);
      throw new Error(`Failed to delete vectors from Pinecone: ${errorMessage(error)}`);
    }
  }
}
