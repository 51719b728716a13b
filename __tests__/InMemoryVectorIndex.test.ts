import { InMemoryVectorIndex } from '../services/InMemoryVectorIndex';
import { chunkId, cosineSimilarity } from '../services/VectorIndex';
import { ChunkRecord } from '../types';

function chunk(documentId: string, version: number, sequenceIndex: number, embedding: number[]): ChunkRecord {
  return {
    id: chunkId(documentId, version, sequenceIndex),
    documentId,
    version,
    sequenceIndex,
    span: { start: sequenceIndex * 10, end: sequenceIndex * 10 + 10 },
    text: `${documentId} v${version} #${sequenceIndex}`,
    embedding,
    accessTags: ['hr'],
    filename: `${documentId}.txt`
  };
}

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(() => {
    index = new InMemoryVectorIndex();
  });

  it('should build chunk ids from document, version and sequence', () => {
    expect(chunkId('doc:a', 3, 7)).toBe('doc:a::v3::chunk::7');
  });

  it('should compute cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });

  it('should only return chunks of allowed documents at their committed version', async () => {
    await index.upsert([
      chunk('doc:a', 1, 0, [1, 0]),
      chunk('doc:a', 2, 0, [1, 0]),
      chunk('doc:b', 1, 0, [1, 0]),
      chunk('doc:c', 1, 0, [1, 0])
    ]);

    const results = await index.search([1, 0], new Map([['doc:a', 2], ['doc:b', 1]]), 10);

    expect(results.map(result => result.chunkId)).toEqual(['doc:a::v2::chunk::0', 'doc:b::v1::chunk::0']);
  });

  it('should fill k from permitted chunks when better matches are out of scope', async () => {
    await index.upsert([
      chunk('doc:x', 1, 0, [1, 0]),
      chunk('doc:x', 1, 1, [1, 0]),
      chunk('doc:x', 1, 2, [1, 0]),
      chunk('doc:a', 1, 0, [1, 0]),
      chunk('doc:a', 2, 0, [1, 1]),
      chunk('doc:b', 1, 0, [1, 1]),
      chunk('doc:b', 1, 1, [0, 1])
    ]);

    const results = await index.search([1, 0], new Map([['doc:b', 1], ['doc:a', 2]]), 2);

    expect(results.map(result => result.chunkId)).toEqual(['doc:a::v2::chunk::0', 'doc:b::v1::chunk::0']);
    for (const result of results) {
      expect(result.score).toBeCloseTo(Math.SQRT1_2);
    }
  });

  it('should order by score, then document id, then sequence index', async () => {
    await index.upsert([
      chunk('doc:b', 1, 1, [1, 0]),
      chunk('doc:b', 1, 0, [1, 0]),
      chunk('doc:a', 1, 0, [1, 0]),
      chunk('doc:a', 1, 1, [0, 1])
    ]);

    const results = await index.search([1, 0], new Map([['doc:a', 1], ['doc:b', 1]]), 3);

    expect(results.map(result => [result.documentId, result.sequenceIndex, result.score])).toEqual([
      ['doc:a', 0, 1],
      ['doc:b', 0, 1],
      ['doc:b', 1, 1]
    ]);
  });

  it('should return nothing for an empty scope', async () => {
    await index.upsert([chunk('doc:a', 1, 0, [1, 0])]);

    await expect(index.search([1, 0], new Map(), 5)).resolves.toEqual([]);
  });

  it('should purge every generation except the kept one', async () => {
    await index.upsert([chunk('doc:a', 1, 0, [1, 0]), chunk('doc:a', 2, 0, [1, 0]), chunk('doc:a', 2, 1, [1, 0])]);

    await index.deleteStaleVersions('doc:a', 2);

    expect(index.chunkIdsFor('doc:a')).toEqual(['doc:a::v2::chunk::0', 'doc:a::v2::chunk::1']);
    await expect(index.count()).resolves.toBe(2);
  });

  it('should delete all chunks of a document', async () => {
    await index.upsert([chunk('doc:a', 1, 0, [1, 0]), chunk('doc:b', 1, 0, [1, 0])]);

    await index.delete('doc:a');

    expect(index.chunkIdsFor('doc:a')).toEqual([]);
    expect(index.chunkIdsFor('doc:b')).toEqual(['doc:b::v1::chunk::0']);
  });

  it('should rewrite access tags on every chunk of a document', async () => {
    await index.upsert([chunk('doc:a', 1, 0, [1, 0]), chunk('doc:a', 1, 1, [1, 0])]);

    await index.updateAccessTags('doc:a', ['eng']);

    expect(index.getChunk('doc:a::v1::chunk::0')?.accessTags).toEqual(['eng']);
    expect(index.getChunk('doc:a::v1::chunk::1')?.accessTags).toEqual(['eng']);
  });

  it('should clear everything', async () => {
    await index.upsert([chunk('doc:a', 1, 0, [1, 0])]);

    await index.clear();

    await expect(index.count()).resolves.toBe(0);
  });
});
