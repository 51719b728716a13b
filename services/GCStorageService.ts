import { Bucket, Storage } from '@google-cloud/storage';

export const MIME_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  txt: 'text/plain',
  md: 'text/markdown'
};

/**
 * Keeps the original bytes of indexed documents.
 */
export interface DocumentArchive {
  /** Returns the storage path recorded on the document. */
  uploadFile(buffer: Buffer, documentId: string, originalName: string, mimetype: string): Promise<string>;
  deleteFile(path: string): Promise<void>;
}

export class GCStorageService implements DocumentArchive {
  private storage: Storage;
  private bucket: Bucket;

  constructor(bucketName: string, projectId?: string) {
    const credentialsPath = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    if (credentialsPath) {
      this.storage = new Storage({
        projectId,
        keyFilename: credentialsPath
      });
    } else {
      this.storage = new Storage({
        projectId
      });
    }

    this.bucket = this.storage.bucket(bucketName);
  }

  async uploadFile(
    buffer: Buffer,
    documentId: string,
    originalName: string,
    mimetype: string
  ): Promise<string> {
    const timestamp = Date.now();
    const safeName = `${documentId.replace(/:/g, '_')}/${timestamp}_${originalName.replace(/\s+/g, '_')}`;

    const file = this.bucket.file(safeName);

    await new Promise<void>((resolve, reject) => {
      const stream = file.createWriteStream({
        metadata: {
          contentType: mimetype
        },
        resumable: false
      });

      stream.on('error', (err: Error) => {
        reject(new Error(`GCS upload failed: ${err.message}`));
      });

      stream.on('finish', () => {
        resolve();
      });

      stream.end(buffer);
    });

    return safeName;
  }

  async deleteFile(path: string): Promise<void> {
    await this.bucket.file(path).delete({ ignoreNotFound: true });
  }
}
