import { MongoClient, Db, Collection, Filter } from 'mongodb';
import { DocumentRecord } from '../types';
import { DocumentCatalog, DocumentUpdate, IndexCommit, NewDocument, ReadableQuery, StaleCommitError } from './DocumentCatalog';

export class MongoDocumentCatalog implements DocumentCatalog {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private documentsCollection: Collection<DocumentRecord> | null = null;
  private isConnected = false;
  private uri: string;
  private dbName: string;

  constructor(uri: string, dbName: string) {
    this.uri = uri;
    this.dbName = dbName;
  }

  async connect(): Promise<void> {
    if (this.isConnected && this.db) {
      return;
    }

    this.client = new MongoClient(this.uri);
    await this.client.connect();
    this.db = this.client.db(this.dbName);
    this.documentsCollection = this.db.collection<DocumentRecord>('documents');
    await this.documentsCollection.createIndex({ docId: 1 }, { unique: true });
    await this.documentsCollection.createIndex({ ownerId: 1, contentHash: 1 });
    await this.documentsCollection.createIndex({ accessTags: 1, status: 1 });
    this.isConnected = true;
    console.log(`[MongoDocumentCatalog] Connected to database '${this.dbName}'`);
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.isConnected = false;
      this.db = null;
      this.documentsCollection = null;
    }
  }

  private async documents(): Promise<Collection<DocumentRecord>> {
    if (!this.isConnected) {
      await this.connect();
    }
    if (!this.documentsCollection) throw new Error('Database not initialized');
    return this.documentsCollection;
  }

  async create(doc: NewDocument): Promise<DocumentRecord> {
    const collection = await this.documents();
    const now = new Date();
    const record: DocumentRecord = {
      ...doc,
      status: 'pending',
      version: 0,
      chunkCount: 0,
      createdAt: now,
      updatedAt: now
    };
    await collection.insertOne({ ...record });
    return record;
  }

  async get(docId: string): Promise<DocumentRecord | null> {
    const collection = await this.documents();
    return await collection.findOne({ docId }, { projection: { _id: 0 } });
  }

  async findByOwnerAndHash(ownerId: string, contentHash: string): Promise<DocumentRecord | null> {
    const collection = await this.documents();
    return await collection.findOne({ ownerId, contentHash }, { projection: { _id: 0 } });
  }

  async list(): Promise<DocumentRecord[]> {
    const collection = await this.documents();
    return await collection.find({}, { projection: { _id: 0 } }).sort({ createdAt: 1 }).toArray();
  }

  async findReadable(query: ReadableQuery): Promise<DocumentRecord[]> {
    const collection = await this.documents();
    const filter: Filter<DocumentRecord> = {};
    if (query.status) {
      filter.status = query.status;
    }
    if (!query.all) {
      filter.$or = [{ ownerId: query.ownerId }, { accessTags: { $in: query.tags } }];
    }
    return await collection.find(filter, { projection: { _id: 0 } }).toArray();
  }

  async update(docId: string, updates: DocumentUpdate): Promise<DocumentRecord> {
    const collection = await this.documents();
    const result = await collection.findOneAndUpdate(
      { docId },
      { $set: { ...updates, updatedAt: new Date() } },
      { returnDocument: 'after', projection: { _id: 0 } }
    );

    if (!result) {
      throw new Error(`Document ${docId} not found`);
    }
    return result;
  }

  async markIndexed(docId: string, commit: IndexCommit): Promise<DocumentRecord> {
    const collection = await this.documents();
    // compare-and-set on version: the flip of `version` is what makes a new generation visible
    const result = await collection.findOneAndUpdate(
      { docId, version: commit.expectedVersion },
      {
        $set: {
          ...commit.updates,
          status: 'indexed',
          version: commit.version,
          chunkCount: commit.chunkCount,
          indexedAt: commit.indexedAt,
          updatedAt: new Date()
        },
        $unset: { error: '' }
      },
      { returnDocument: 'after', projection: { _id: 0 } }
    );

    if (!result) {
      const existing = await collection.findOne({ docId });
      if (existing) {
        throw new StaleCommitError(docId, commit.expectedVersion);
      }
      throw new Error(`Document ${docId} not found`);
    }
    return result;
  }

  async markFailed(docId: string, error: string): Promise<DocumentRecord> {
    const collection = await this.documents();
    const result = await collection.findOneAndUpdate(
      { docId },
      { $set: { status: 'failed', error, chunkCount: 0, updatedAt: new Date() } },
      { returnDocument: 'after', projection: { _id: 0 } }
    );

    if (!result) {
      throw new Error(`Document ${docId} not found`);
    }
    return result;
  }

  async updateAccessTags(docId: string, accessTags: string[]): Promise<DocumentRecord> {
    const collection = await this.documents();
    const result = await collection.findOneAndUpdate(
      { docId },
      { $set: { accessTags, updatedAt: new Date() } },
      { returnDocument: 'after', projection: { _id: 0 } }
    );

    if (!result) {
      throw new Error(`Document ${docId} not found`);
    }
    return result;
  }

  async delete(docId: string): Promise<boolean> {
    const collection = await this.documents();
    const result = await collection.deleteOne({ docId });
    return result.deletedCount === 1;
  }

  async clear(): Promise<number> {
    const collection = await this.documents();
    const result = await collection.deleteMany({});
    return result.deletedCount;
  }

  async countByStatus(): Promise<{ total: number; indexed: number }> {
    const collection = await this.documents();
    const [total, indexed] = await Promise.all([
      collection.countDocuments({}),
      collection.countDocuments({ status: 'indexed' })
    ]);
    return { total, indexed };
  }
}
