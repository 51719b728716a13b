import {
  AskResult,
  CallerIdentity,
  DocumentRecord,
  DocumentSummary,
  QueryRequest,
  SubmitDocumentInput,
  SubmitDocumentResult,
  SystemStats
} from '../types';
import { DocQAError, NotFoundError, PermissionDeniedError, RateLimitedError, ValidationError, errorMessage } from '../utils/errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { RetryPolicy } from '../utils/retry';
import { FileValidator, normalizeTags, validateQuestion, validateSuggestionTopic } from '../utils/validators';
import { WorkerPool } from '../utils/WorkerPool';
import { AccessControlService } from './AccessControlService';
import { DocumentCatalog } from './DocumentCatalog';
import { DocumentIndexingService, documentLockKey } from './DocumentIndexingService';
import { Embedder } from './EmbeddingService';
import { DocumentArchive } from './GCStorageService';
import { LanguageModel } from './LanguageModel';
import { QuestionInsightService } from './QuestionInsightService';
import { RateLimiter } from './RateLimiter';
import { RetrieverService } from './RetrieverService';
import { SynthesisService } from './SynthesisService';
import { TextExtractionService } from './TextExtractionService';
import { VectorIndex } from './VectorIndex';

export const MAX_BATCH_QUESTIONS = 20;

export interface DocumentQAOptions {
  chunkSize: number;
  chunkOverlap: number;
  retrievalTopK: number;
  contextCharBudget: number;
  maxFileSize: number;
  allowedFormats: string[];
  rateLimitPerMinute: number;
  workerConcurrency: number;
  llmTimeoutMs: number;
  extractionTimeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Clock for the rate limiter. */
  now?: () => number;
}

export interface DocumentQABackends {
  catalog: DocumentCatalog;
  vectorIndex: VectorIndex;
  embedder: Embedder;
  llm: LanguageModel;
  archive?: DocumentArchive | null;
}

export function toDocumentSummary(doc: DocumentRecord): DocumentSummary {
  return {
    documentId: doc.docId,
    filename: doc.filename,
    format: doc.format,
    sizeBytes: doc.sizeBytes,
    ownerId: doc.ownerId,
    accessTags: [...doc.accessTags],
    status: doc.status,
    version: doc.version,
    chunkCount: doc.chunkCount,
    indexedAt: doc.indexedAt ? doc.indexedAt.toISOString() : null,
    ...(doc.error ? { error: doc.error } : {})
  };
}

/**
 * Entry point for uploads, questions and document management. Holds the shared stores by
 * reference; nothing here is a module-level singleton.
 */
export class DocumentQAService {
  private catalog: DocumentCatalog;
  private vectorIndex: VectorIndex;
  private embedder: Embedder;
  private archive: DocumentArchive | null;
  private access: AccessControlService;
  private retriever: RetrieverService;
  private synthesizer: SynthesisService;
  private indexer: DocumentIndexingService;
  private rateLimiter: RateLimiter;
  private pool: WorkerPool;
  private locks: KeyedMutex;
  private retrievalTopK: number;

  constructor(backends: DocumentQABackends, options: DocumentQAOptions) {
    this.catalog = backends.catalog;
    this.vectorIndex = backends.vectorIndex;
    this.embedder = backends.embedder;
    this.archive = backends.archive ?? null;
    this.locks = new KeyedMutex();
    this.access = new AccessControlService(this.catalog);
    this.retriever = new RetrieverService(this.embedder, this.vectorIndex);
    this.synthesizer = new SynthesisService(backends.llm, {
      contextCharBudget: options.contextCharBudget,
      retryPolicy: options.retryPolicy,
      timeoutMs: options.llmTimeoutMs
    });
    this.indexer = new DocumentIndexingService({
      catalog: this.catalog,
      vectorIndex: this.vectorIndex,
      embedder: this.embedder,
      access: this.access,
      locks: this.locks,
      fileValidator: new FileValidator({ maxFileSize: options.maxFileSize, allowedFormats: options.allowedFormats }),
      extractor: new TextExtractionService(options.extractionTimeoutMs),
      archive: this.archive,
      chunkSize: options.chunkSize,
      chunkOverlap: options.chunkOverlap
    });
    this.rateLimiter = new RateLimiter(options.rateLimitPerMinute, 60_000, options.now);
    this.pool = new WorkerPool(options.workerConcurrency);
    this.retrievalTopK = options.retrievalTopK;
  }

  async submitDocument(input: SubmitDocumentInput, caller: CallerIdentity): Promise<SubmitDocumentResult> {
    this.rateLimiter.consume(caller.callerId);
    return this.pool.run(() => this.indexer.indexDocument(input, caller));
  }

  async ask(request: QueryRequest): Promise<AskResult> {
    try {
      this.rateLimiter.consume(request.caller.callerId);
      return await this.pool.run(() => this.answer(request));
    } catch (error) {
      if (error instanceof DocQAError) {
        return {
          status: 'error',
          error: {
            kind: error.kind,
            message: error.message,
            ...(error instanceof RateLimitedError ? { retryAfterMs: error.retryAfterMs } : {})
          }
        };
      }
      console.error(`[DocumentQAService] ERROR: Question failed:`, errorMessage(error));
      throw new Error(`Failed to answer question: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Asks each question in turn; every question counts against the caller's rate limit. */
  async askBatch(questions: unknown, caller: CallerIdentity): Promise<AskResult[]> {
    if (!Array.isArray(questions) || questions.length === 0) {
      throw new ValidationError('Questions must be a non-empty array');
    }
    if (questions.length > MAX_BATCH_QUESTIONS) {
      throw new ValidationError(`A batch cannot exceed ${MAX_BATCH_QUESTIONS} questions`);
    }

    const results: AskResult[] = [];
    for (const question of questions) {
      results.push(await this.ask({ question: typeof question === 'string' ? question : '', caller }));
    }
    return results;
  }

  getSuggestedQuestions(caller: CallerIdentity, topic?: unknown): string[] {
    this.rateLimiter.consume(caller.callerId);
    return QuestionInsightService.suggestQuestions(validateSuggestionTopic(topic));
  }

  async listDocuments(caller: CallerIdentity): Promise<DocumentSummary[]> {
    this.rateLimiter.consume(caller.callerId);
    const documents = await this.access.listVisible(caller);
    return documents.map(toDocumentSummary);
  }

  async getStats(caller: CallerIdentity): Promise<SystemStats> {
    this.rateLimiter.consume(caller.callerId);
    const [counts, totalChunks] = await Promise.all([
      this.catalog.countByStatus(),
      this.vectorIndex.count()
    ]);
    return {
      totalDocuments: counts.total,
      indexedDocuments: counts.indexed,
      totalChunks,
      embeddingModel: this.embedder.modelName,
      llmModel: this.synthesizer.modelName
    };
  }

  /**
   * Catalog entry first, then chunks, then the archived original. Non-admins get the same
   * PermissionDenied for a missing document as for someone else's.
   */
  async deleteDocument(documentId: string, caller: CallerIdentity): Promise<true> {
    this.rateLimiter.consume(caller.callerId);
    return this.locks.runExclusive<true>(documentLockKey(documentId), async () => {
      const doc = await this.requireManageable(documentId, caller);

      await this.catalog.delete(documentId);
      await this.vectorIndex.delete(documentId);
      if (this.archive && doc.storagePath) {
        try {
          await this.archive.deleteFile(doc.storagePath);
        } catch (error) {
          console.warn(`[DocumentQAService] Could not remove archived copy of ${documentId}:`, errorMessage(error));
        }
      }
      console.log(`[DocumentQAService] Deleted ${documentId} at the request of ${caller.callerId}`);
      return true;
    });
  }

  async updateDocumentAccess(documentId: string, tags: unknown, caller: CallerIdentity): Promise<DocumentSummary> {
    this.rateLimiter.consume(caller.callerId);
    const accessTags = normalizeTags(tags);
    return this.locks.runExclusive(documentLockKey(documentId), async () => {
      await this.requireManageable(documentId, caller);

      // catalog first: scope resolution reads tags from there, so access narrows immediately
      const updated = await this.catalog.updateAccessTags(documentId, accessTags);
      await this.vectorIndex.updateAccessTags(documentId, accessTags);
      console.log(`[DocumentQAService] Access tags of ${documentId} set to [${accessTags.join(', ')}]`);
      return toDocumentSummary(updated);
    });
  }

  async clearIndex(caller: CallerIdentity): Promise<{ documentsRemoved: number }> {
    this.rateLimiter.consume(caller.callerId);
    if (caller.role !== 'admin') {
      throw new PermissionDeniedError();
    }
    const documentsRemoved = await this.catalog.clear();
    await this.vectorIndex.clear();
    console.log(`[DocumentQAService] Cleared ${documentsRemoved} documents at the request of ${caller.callerId}`);
    return { documentsRemoved };
  }

  private async answer(request: QueryRequest): Promise<AskResult> {
    const question = validateQuestion(request.question);
    const scope = await this.access.resolveScope(request.caller);
    const chunks = await this.retriever.retrieve(question, scope, this.retrievalTopK, request.documentId);
    const result = await this.synthesizer.synthesize(question, chunks);

    if (result.insufficientEvidence) {
      return { status: 'insufficient_evidence', result };
    }
    return { status: 'ok', result };
  }

  private async requireManageable(documentId: string, caller: CallerIdentity): Promise<DocumentRecord> {
    const doc = await this.catalog.get(documentId);
    if (!doc) {
      if (caller.role === 'admin') {
        throw new NotFoundError(`Document ${documentId}`);
      }
      throw new PermissionDeniedError();
    }
    if (!this.access.canManage(caller, doc)) {
      throw new PermissionDeniedError();
    }
    return doc;
  }
}
