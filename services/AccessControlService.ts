import { AccessScope, CallerIdentity, DocumentRecord } from '../types';
import { normalizeTags } from '../utils/validators';
import { DocumentCatalog } from './DocumentCatalog';

/**
 * Decides which documents a caller may read or manage. Nothing is cached: every scope is
 * read from the catalog so access changes and deletes apply to the next request.
 */
export class AccessControlService {
  private catalog: DocumentCatalog;

  constructor(catalog: DocumentCatalog) {
    this.catalog = catalog;
  }

  async resolveScope(caller: CallerIdentity): Promise<AccessScope> {
    const readable = await this.catalog.findReadable({
      ownerId: caller.callerId,
      tags: normalizeTags(caller.tags),
      all: caller.role === 'admin',
      status: 'indexed'
    });

    const documents = new Map<string, number>();
    for (const doc of readable) {
      // a catalog replica could lag behind the query filter
      if (doc.status === 'indexed' && this.canRead(caller, doc)) {
        documents.set(doc.docId, doc.version);
      }
    }
    return { callerId: caller.callerId, documents };
  }

  canRead(caller: CallerIdentity, doc: Pick<DocumentRecord, 'ownerId' | 'accessTags'>): boolean {
    if (caller.role === 'admin' || doc.ownerId === caller.callerId) {
      return true;
    }
    // document tags are stored normalized; caller tags may come straight from a core caller
    const tags = new Set(normalizeTags(caller.tags));
    return doc.accessTags.some(tag => tags.has(tag));
  }

  canManage(caller: CallerIdentity, doc: Pick<DocumentRecord, 'ownerId'>): boolean {
    return caller.role === 'admin' || doc.ownerId === caller.callerId;
  }

  /** Owned documents in any status, plus readable documents that finished indexing. */
  async listVisible(caller: CallerIdentity): Promise<DocumentRecord[]> {
    const candidates = await this.catalog.findReadable({
      ownerId: caller.callerId,
      tags: normalizeTags(caller.tags),
      all: caller.role === 'admin'
    });

    return candidates
      .filter(doc => doc.ownerId === caller.callerId || (doc.status === 'indexed' && this.canRead(caller, doc)))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0));
  }
}
