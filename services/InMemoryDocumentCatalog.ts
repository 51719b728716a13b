import { DocumentRecord } from '../types';
import { DocumentCatalog, DocumentUpdate, IndexCommit, NewDocument, ReadableQuery, StaleCommitError } from './DocumentCatalog';

const copy = (doc: DocumentRecord): DocumentRecord => ({ ...doc, accessTags: [...doc.accessTags] });

export class InMemoryDocumentCatalog implements DocumentCatalog {
  private documents: Map<string, DocumentRecord> = new Map();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async create(doc: NewDocument): Promise<DocumentRecord> {
    if (this.documents.has(doc.docId)) {
      throw new Error(`Document ${doc.docId} already exists`);
    }
    const now = new Date();
    const record: DocumentRecord = {
      ...doc,
      accessTags: [...doc.accessTags],
      status: 'pending',
      version: 0,
      chunkCount: 0,
      createdAt: now,
      updatedAt: now
    };
    this.documents.set(doc.docId, record);
    return copy(record);
  }

  async get(docId: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(docId);
    return doc ? copy(doc) : null;
  }

  async findByOwnerAndHash(ownerId: string, contentHash: string): Promise<DocumentRecord | null> {
    for (const doc of this.documents.values()) {
      if (doc.ownerId === ownerId && doc.contentHash === contentHash) {
        return copy(doc);
      }
    }
    return null;
  }

  async list(): Promise<DocumentRecord[]> {
    return [...this.documents.values()].map(copy);
  }

  async findReadable(query: ReadableQuery): Promise<DocumentRecord[]> {
    const tags = new Set(query.tags);
    return [...this.documents.values()]
      .filter(doc => query.status === undefined || doc.status === query.status)
      .filter(doc => query.all || doc.ownerId === query.ownerId || doc.accessTags.some(tag => tags.has(tag)))
      .map(copy);
  }

  async update(docId: string, updates: DocumentUpdate): Promise<DocumentRecord> {
    return this.mutate(docId, doc => {
      Object.assign(doc, updates);
      if (updates.accessTags) doc.accessTags = [...updates.accessTags];
    });
  }

  async markIndexed(docId: string, commit: IndexCommit): Promise<DocumentRecord> {
    const current = this.documents.get(docId);
    if (current && current.version !== commit.expectedVersion) {
      throw new StaleCommitError(docId, commit.expectedVersion);
    }
    return this.mutate(docId, doc => {
      Object.assign(doc, commit.updates);
      doc.status = 'indexed';
      doc.version = commit.version;
      doc.chunkCount = commit.chunkCount;
      doc.indexedAt = commit.indexedAt;
      delete doc.error;
    });
  }

  async markFailed(docId: string, error: string): Promise<DocumentRecord> {
    return this.mutate(docId, doc => {
      doc.status = 'failed';
      doc.error = error;
      doc.chunkCount = 0;
    });
  }

  async updateAccessTags(docId: string, accessTags: string[]): Promise<DocumentRecord> {
    return this.mutate(docId, doc => {
      doc.accessTags = [...accessTags];
    });
  }

  async delete(docId: string): Promise<boolean> {
    return this.documents.delete(docId);
  }

  async clear(): Promise<number> {
    const count = this.documents.size;
    this.documents.clear();
    return count;
  }

  async countByStatus(): Promise<{ total: number; indexed: number }> {
    let indexed = 0;
    for (const doc of this.documents.values()) {
      if (doc.status === 'indexed') indexed++;
    }
    return { total: this.documents.size, indexed };
  }

  private mutate(docId: string, apply: (doc: DocumentRecord) => void): DocumentRecord {
    const doc = this.documents.get(docId);
    if (!doc) {
      throw new Error(`Document ${docId} not found`);
    }
    apply(doc);
    doc.updatedAt = new Date();
    return copy(doc);
  }
}
