import { DocumentRecord, DocumentStatus } from '../types';

export interface NewDocument {
  docId: string;
  contentHash: string;
  filename: string;
  sizeBytes: number;
  format: string;
  ownerId: string;
  accessTags: string[];
}

export type DocumentUpdate = Partial<Pick<DocumentRecord,
  'contentHash' | 'filename' | 'sizeBytes' | 'format' | 'accessTags' | 'status' | 'error' | 'storagePath'>>;

export interface IndexCommit {
  /** Version the run started from; the commit is rejected if another run moved it. */
  expectedVersion: number;
  version: number;
  chunkCount: number;
  indexedAt: Date;
  /** Content fields that become visible together with the new generation. */
  updates?: DocumentUpdate;
}

export interface ReadableQuery {
  ownerId: string;
  tags: string[];
  /** Admin callers read everything. */
  all: boolean;
  status?: DocumentStatus;
}

/**
 * Durable document metadata and the single source of truth for indexing status.
 */
export interface DocumentCatalog {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  create(doc: NewDocument): Promise<DocumentRecord>;
  get(docId: string): Promise<DocumentRecord | null>;
  findByOwnerAndHash(ownerId: string, contentHash: string): Promise<DocumentRecord | null>;
  list(): Promise<DocumentRecord[]>;
  findReadable(query: ReadableQuery): Promise<DocumentRecord[]>;
  update(docId: string, updates: DocumentUpdate): Promise<DocumentRecord>;
  markIndexed(docId: string, commit: IndexCommit): Promise<DocumentRecord>;
  markFailed(docId: string, error: string): Promise<DocumentRecord>;
  updateAccessTags(docId: string, accessTags: string[]): Promise<DocumentRecord>;
  delete(docId: string): Promise<boolean>;
  clear(): Promise<number>;
  countByStatus(): Promise<{ total: number; indexed: number }>;
}

export class StaleCommitError extends Error {
  constructor(docId: string, expectedVersion: number) {
    super(`Document ${docId} moved past version ${expectedVersion} before this run committed`);
    this.name = 'StaleCommitError';
  }
}
