import { AccessScope, ScoredChunk } from '../types';
import { PermissionDeniedError } from '../utils/errors';
import { Embedder } from './EmbeddingService';
import { VectorIndex } from './VectorIndex';

export class RetrieverService {
  private embedder: Embedder;
  private vectorIndex: VectorIndex;

  constructor(embedder: Embedder, vectorIndex: VectorIndex) {
    this.embedder = embedder;
    this.vectorIndex = vectorIndex;
  }

  /**
   * Top-`k` chunks for `question` among the committed chunks the scope permits.
   * With `documentId` the search is narrowed to that single document.
   */
  async retrieve(question: string, scope: AccessScope, k: number, documentId?: string): Promise<ScoredChunk[]> {
    let allowed: ReadonlyMap<string, number> = scope.documents;

    if (documentId !== undefined) {
      const version = scope.documents.get(documentId);
      if (version === undefined) {
        console.warn(`[RetrieverService] Caller ${scope.callerId} asked about a document outside their scope`);
        throw new PermissionDeniedError();
      }
      allowed = new Map([[documentId, version]]);
    }

    if (allowed.size === 0) {
      return [];
    }

    const queryVector = await this.embedder.embedText(question);
    const chunks = await this.vectorIndex.search(queryVector, allowed, k);
    console.log(`[RetrieverService] Retrieved ${chunks.length} chunks across ${allowed.size} permitted documents`);
    return chunks;
  }
}
