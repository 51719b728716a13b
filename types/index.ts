import { ErrorKind } from '../utils/errors';

export type DocumentStatus = 'pending' | 'indexed' | 'failed';

export interface DocumentRecord {
  docId: string; // e.g. "doc:5f1c..."
  contentHash: string;
  filename: string;
  sizeBytes: number;
  format: string;
  ownerId: string;
  accessTags: string[];
  status: DocumentStatus;
  /** Committed chunk generation visible to queries, 0 until the first successful run. */
  version: number;
  chunkCount: number;
  indexedAt?: Date;
  error?: string;
  storagePath?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface TextSpan {
  start: number;
  end: number;
}

export interface ChunkRecord {
  id: string; // "<docId>::v<version>::chunk::<sequenceIndex>"
  documentId: string;
  version: number;
  sequenceIndex: number;
  span: TextSpan;
  text: string;
  embedding: number[];
  accessTags: string[];
  filename: string;
  section?: string;
}

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  span: TextSpan;
  text: string;
  filename: string;
  section?: string;
  score: number;
}

export type CallerRole = 'admin' | 'member';

export interface CallerIdentity {
  callerId: string;
  role: CallerRole;
  /** Access tags granted to the caller by the upstream gateway. */
  tags: string[];
}

/**
 * Documents a caller may read, with the committed version of each. Built per request.
 */
export interface AccessScope {
  callerId: string;
  documents: ReadonlyMap<string, number>;
}

export interface QueryRequest {
  question: string;
  caller: CallerIdentity;
  documentId?: string;
}

export interface Citation {
  documentId: string;
  chunkId: string;
  filename: string;
  sequenceIndex: number;
  span: TextSpan;
  score: number;
}

export type QuestionType = 'summary' | 'specific' | 'comparison' | 'analysis' | 'general';

export interface QueryResult {
  answer: string;
  questionType: QuestionType;
  citations: Citation[];
  confidence: number | null;
  insufficientEvidence: boolean;
}

export type AskResult =
  | { status: 'ok'; result: QueryResult }
  | { status: 'insufficient_evidence'; result: QueryResult }
  | { status: 'error'; error: { kind: ErrorKind; message: string; retryAfterMs?: number } };

export interface SubmitDocumentInput {
  bytes: Buffer;
  filename: string;
  /** Declared format; derived from the filename extension when omitted. */
  format?: string;
  /** Omitted on a re-index to keep the document's current tags. */
  accessTags?: string[];
  /** Re-index an existing document with new content. */
  documentId?: string;
}

export interface SubmitDocumentResult {
  documentId: string;
  status: DocumentStatus;
  reused: boolean;
}

export interface DocumentSummary {
  documentId: string;
  filename: string;
  format: string;
  sizeBytes: number;
  ownerId: string;
  accessTags: string[];
  status: DocumentStatus;
  version: number;
  chunkCount: number;
  indexedAt: string | null;
  error?: string;
}

export interface SystemStats {
  totalDocuments: number;
  indexedDocuments: number;
  totalChunks: number;
  embeddingModel: string;
  llmModel: string;
}
