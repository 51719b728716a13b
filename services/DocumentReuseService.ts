import { createHash } from 'crypto';
import { DocumentRecord } from '../types';
import { DocumentCatalog } from './DocumentCatalog';

export interface DocumentReuseResult {
  /** Catalog entry with the same owner and content, if any. */
  existing: DocumentRecord | null;
  needsProcessing: boolean;
}

/**
 * Service for handling document reuse based on file hashes
 */
export class DocumentReuseService {
  /**
   * Calculate SHA-256 hash of file buffer
   */
  static calculateFileHash(buffer: Buffer): string {
    return createHash('sha256').update(buffer).digest('hex');
  }

  /**
   * An indexed document with the same owner and hash is returned as-is. A pending or failed
   * one is handed back for another indexing run on the same id.
   */
  static async checkDocumentReuse(
    catalog: DocumentCatalog,
    ownerId: string,
    fileHash: string
  ): Promise<DocumentReuseResult> {
    const existing = await catalog.findByOwnerAndHash(ownerId, fileHash);

    if (!existing) {
      return { existing: null, needsProcessing: true };
    }

    return {
      existing,
      needsProcessing: existing.status !== 'indexed'
    };
  }
}
