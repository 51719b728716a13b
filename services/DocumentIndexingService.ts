import { v4 as uuidv4 } from 'uuid';
import { CallerIdentity, ChunkRecord, DocumentRecord, SubmitDocumentInput, SubmitDocumentResult } from '../types';
import { DocQAError, ExtractionError, NotFoundError, PermissionDeniedError, errorMessage } from '../utils/errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { FileValidator, normalizeTags } from '../utils/validators';
import { AccessControlService } from './AccessControlService';
import { ChunkingService } from './ChunkingService';
import { DocumentCatalog, DocumentUpdate } from './DocumentCatalog';
import { DocumentReuseService } from './DocumentReuseService';
import { Embedder } from './EmbeddingService';
import { DocumentArchive, MIME_TYPES } from './GCStorageService';
import { TextCleaningService } from './TextCleaningService';
import { TextExtractionService } from './TextExtractionService';
import { VectorIndex, chunkId } from './VectorIndex';

export interface DocumentIndexingDependencies {
  catalog: DocumentCatalog;
  vectorIndex: VectorIndex;
  embedder: Embedder;
  access: AccessControlService;
  locks: KeyedMutex;
  fileValidator: FileValidator;
  extractor: TextExtractionService;
  archive?: DocumentArchive | null;
  chunkSize: number;
  chunkOverlap: number;
}

interface IndexingRun {
  bytes: Buffer;
  filename: string;
  format: string;
  contentHash: string;
  accessTags: string[];
}

export const documentLockKey = (docId: string) => `doc:${docId}`;
const hashLockKey = (ownerId: string, contentHash: string) => `hash:${ownerId}:${contentHash}`;

/**
 * Extract -> clean -> chunk -> embed -> upsert -> commit, one run per document at a time.
 *
 * Each run writes a new chunk generation next to the committed one. `catalog.markIndexed` flips
 * the document's version and is the only step that changes what queries see; older generations
 * are purged afterwards. A failed run marks the document failed and purges all of its chunks.
 */
export class DocumentIndexingService {
  private catalog: DocumentCatalog;
  private vectorIndex: VectorIndex;
  private embedder: Embedder;
  private access: AccessControlService;
  private locks: KeyedMutex;
  private fileValidator: FileValidator;
  private textExtractor: TextExtractionService;
  private textCleaner: TextCleaningService;
  private chunker: ChunkingService;
  private archive: DocumentArchive | null;
  private chunkSize: number;
  private chunkOverlap: number;

  constructor(deps: DocumentIndexingDependencies) {
    this.catalog = deps.catalog;
    this.vectorIndex = deps.vectorIndex;
    this.embedder = deps.embedder;
    this.access = deps.access;
    this.locks = deps.locks;
    this.fileValidator = deps.fileValidator;
    this.textExtractor = deps.extractor;
    this.textCleaner = new TextCleaningService();
    this.chunker = new ChunkingService();
    this.archive = deps.archive ?? null;
    this.chunkSize = deps.chunkSize;
    this.chunkOverlap = deps.chunkOverlap;
  }

  async indexDocument(input: SubmitDocumentInput, caller: CallerIdentity): Promise<SubmitDocumentResult> {
    const format = this.fileValidator.validateUpload(input.filename, input.bytes.length, input.format);
    const contentHash = DocumentReuseService.calculateFileHash(input.bytes);

    if (input.documentId !== undefined) {
      return this.reindexDocument(input.documentId, input, format, contentHash, caller);
    }

    const accessTags = normalizeTags(input.accessTags);
    const ownerId = caller.callerId;

    // Held for the whole run so an identical concurrent upload waits and then reuses the result
    return this.locks.runExclusive(hashLockKey(ownerId, contentHash), async () => {
      const reuse = await DocumentReuseService.checkDocumentReuse(this.catalog, ownerId, contentHash);

      if (reuse.existing && !reuse.needsProcessing) {
        console.log(`[DocumentIndexingService] Reusing indexed document ${reuse.existing.docId} for identical upload`);
        return { documentId: reuse.existing.docId, status: reuse.existing.status, reused: true };
      }

      const docId = reuse.existing ? reuse.existing.docId : `doc:${uuidv4()}`;
      if (!reuse.existing) {
        await this.catalog.create({
          docId,
          contentHash,
          filename: input.filename,
          sizeBytes: input.bytes.length,
          format,
          ownerId,
          accessTags
        });
        console.log(`[DocumentIndexingService] Created document ${docId} (${input.filename}) for ${ownerId}`);
      } else {
        console.log(`[DocumentIndexingService] Retrying ${reuse.existing.status} document ${docId}`);
      }

      const record = await this.locks.runExclusive(documentLockKey(docId), () =>
        this.runExclusively(docId, { bytes: input.bytes, filename: input.filename, format, contentHash, accessTags })
      );
      return { documentId: record.docId, status: record.status, reused: false };
    });
  }

  private async reindexDocument(
    docId: string,
    input: SubmitDocumentInput,
    format: string,
    contentHash: string,
    caller: CallerIdentity
  ): Promise<SubmitDocumentResult> {
    return this.locks.runExclusive(documentLockKey(docId), async () => {
      const existing = await this.catalog.get(docId);
      if (!existing || !this.access.canManage(caller, existing)) {
        if (!existing && caller.role === 'admin') {
          throw new NotFoundError(`Document ${docId}`);
        }
        throw new PermissionDeniedError();
      }

      const accessTags = input.accessTags === undefined ? existing.accessTags : normalizeTags(input.accessTags);
      console.log(`[DocumentIndexingService] Re-indexing ${docId} (${input.filename}) at the request of ${caller.callerId}`);

      const record = await this.runExclusively(docId, { bytes: input.bytes, filename: input.filename, format, contentHash, accessTags });
      return { documentId: record.docId, status: record.status, reused: false };
    });
  }

  /** Caller must hold the document lock. */
  private async runExclusively(docId: string, run: IndexingRun): Promise<DocumentRecord> {
    const doc = await this.catalog.get(docId);
    if (!doc) {
      throw new Error(`Document ${docId} disappeared before indexing started`);
    }

    const committedVersion = doc.version;
    const generation = committedVersion + 1;

    try {
      const extraction = await this.textExtractor.extractText(run.bytes, run.format, run.filename);
      const cleanedText = this.textCleaner.cleanText(extraction.text);
      const chunks = this.chunker.chunkText(cleanedText, this.chunkSize, this.chunkOverlap);
      if (chunks.length === 0) {
        throw new ExtractionError(`No text content extracted from ${run.filename}`);
      }

      const embeddings = await this.embedder.embedTexts(chunks.map(chunk => chunk.text));

      const records: ChunkRecord[] = chunks.map((chunk, i) => ({
        id: chunkId(docId, generation, chunk.index),
        documentId: docId,
        version: generation,
        sequenceIndex: chunk.index,
        span: { start: chunk.start, end: chunk.end },
        text: chunk.text,
        embedding: embeddings[i],
        accessTags: run.accessTags,
        filename: run.filename,
        section: chunk.section
      }));

      // leftovers of an abandoned run could share ids with this generation
      await this.vectorIndex.deleteStaleVersions(docId, committedVersion);
      await this.vectorIndex.upsert(records);

      const updates: DocumentUpdate = {
        contentHash: run.contentHash,
        filename: run.filename,
        sizeBytes: run.bytes.length,
        format: run.format,
        accessTags: run.accessTags
      };
      const committed = await this.catalog.markIndexed(docId, {
        expectedVersion: committedVersion,
        version: generation,
        chunkCount: records.length,
        indexedAt: new Date(),
        updates
      });
      console.log(`[DocumentIndexingService] Indexed ${docId} v${generation}: ${records.length} chunks, ~${extraction.pages} pages`);

      await this.purgeStaleGenerations(docId, generation);
      return await this.archiveOriginal(committed, doc, run);
    } catch (error) {
      console.error(`[DocumentIndexingService] ERROR: Indexing failed for ${docId}:`, errorMessage(error));
      await this.failDocument(docId, committedVersion, error);
      if (error instanceof DocQAError) {
        throw error;
      }
      throw new Error(`Failed to index document ${run.filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async purgeStaleGenerations(docId: string, keepVersion: number): Promise<void> {
    try {
      await this.vectorIndex.deleteStaleVersions(docId, keepVersion);
    } catch (error) {
      // stale generations are invisible to queries; the next run removes them
      console.warn(`[DocumentIndexingService] Could not purge stale chunks of ${docId}:`, errorMessage(error));
    }
  }

  /**
   * Drops the uncommitted generation, then fails the document. The committed generation is only
   * purged once the catalog no longer reports the document as indexed.
   */
  private async failDocument(docId: string, committedVersion: number, cause: unknown): Promise<void> {
    try {
      await this.vectorIndex.deleteStaleVersions(docId, committedVersion);
    } catch (error) {
      console.error(`[DocumentIndexingService] ERROR: Could not purge the partial generation of ${docId}:`, errorMessage(error));
    }

    try {
      await this.catalog.markFailed(docId, errorMessage(cause));
    } catch (error) {
      console.error(`[DocumentIndexingService] ERROR: Could not mark ${docId} as failed, keeping v${committedVersion}:`, errorMessage(error));
      return;
    }

    try {
      await this.vectorIndex.delete(docId);
    } catch (error) {
      console.error(`[DocumentIndexingService] ERROR: Could not purge chunks of failed document ${docId}:`, errorMessage(error));
    }
  }

  private async archiveOriginal(committed: DocumentRecord, previous: DocumentRecord, run: IndexingRun): Promise<DocumentRecord> {
    if (!this.archive || (previous.storagePath && previous.contentHash === run.contentHash)) {
      return committed;
    }

    try {
      const storagePath = await this.archive.uploadFile(
        run.bytes,
        committed.docId,
        run.filename,
        MIME_TYPES[run.format] ?? 'application/octet-stream'
      );
      const updated = await this.catalog.update(committed.docId, { storagePath });
      if (previous.storagePath) {
        await this.archive.deleteFile(previous.storagePath);
      }
      return updated;
    } catch (error) {
      console.warn(`[DocumentIndexingService] Archiving ${committed.docId} failed, continuing without a stored copy:`, errorMessage(error));
      return committed;
    }
  }
}
