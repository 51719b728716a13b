import { Writable } from 'stream';
import { GCStorageService } from '../services/GCStorageService';

const mockFile = {
  createWriteStream: jest.fn(),
  delete: jest.fn()
};
const mockBucket = {
  file: jest.fn(() => mockFile)
};

jest.mock('@google-cloud/storage', () => ({
  Storage: jest.fn().mockImplementation(() => ({ bucket: () => mockBucket }))
}));

function capturingStream(received: Buffer[], failWith?: Error): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (failWith) {
        callback(failWith);
        return;
      }
      received.push(chunk);
      callback();
    }
  });
}

describe('GCStorageService', () => {
  let storage: GCStorageService;
  let clock: jest.SpyInstance<number, []>;

  beforeEach(() => {
    jest.clearAllMocks();
    clock = jest.spyOn(Date, 'now').mockReturnValue(1767225600000);
    storage = new GCStorageService('test-bucket', 'test-project');
  });

  afterEach(() => {
    clock.mockRestore();
  });

  it('should stream the file under a per-document path', async () => {
    const received: Buffer[] = [];
    mockFile.createWriteStream.mockImplementation(() => capturingStream(received));

    const path = await storage.uploadFile(Buffer.from('leave policy'), 'doc:abc', 'leave policy.txt', 'text/plain');

    expect(path).toBe('doc_abc/1767225600000_leave_policy.txt');
    expect(mockBucket.file).toHaveBeenCalledWith('doc_abc/1767225600000_leave_policy.txt');
    expect(mockFile.createWriteStream).toHaveBeenCalledWith({ metadata: { contentType: 'text/plain' }, resumable: false });
    expect(Buffer.concat(received).toString()).toBe('leave policy');
  });

  it('should reject when the upload stream fails', async () => {
    mockFile.createWriteStream.mockImplementation(() => capturingStream([], new Error('quota exceeded')));

    await expect(storage.uploadFile(Buffer.from('x'), 'doc:abc', 'a.txt', 'text/plain'))
      .rejects.toThrow('GCS upload failed: quota exceeded');
  });

  it('should ignore missing objects on delete', async () => {
    mockFile.delete.mockResolvedValue([{}]);

    await storage.deleteFile('doc_abc/1767225600000_a.txt');

    expect(mockBucket.file).toHaveBeenCalledWith('doc_abc/1767225600000_a.txt');
    expect(mockFile.delete).toHaveBeenCalledWith({ ignoreNotFound: true });
  });
});
