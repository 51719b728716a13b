import { InMemoryVectorIndex } from '../services/InMemoryVectorIndex';
import { INSUFFICIENT_EVIDENCE_ANSWER } from '../services/SynthesisService';
import { AskResult, ScoredChunk } from '../types';
import { NotFoundError, PermissionDeniedError, RateLimitedError, ValidationError } from '../utils/errors';
import { ENG_TEXT, POLICY_TEXT, Responder, admin, createHarness, member, seededRandom } from './helpers/fakes';

const ROLLBACK_QUESTION = 'How do I roll back a failed deployment?';

const answerFromRunbook = (prompt: string): string =>
  prompt.includes('redeploying') ? 'Redeploy the previous release tag [1].' : 'INSUFFICIENT_EVIDENCE';

function citedDocuments(result: AskResult): string[] {
  if (result.status === 'error') {
    throw new Error(`Unexpected error: ${result.error.message}`);
  }
  return [...new Set(result.result.citations.map(citation => citation.documentId))].sort();
}

class OfflineVectorIndex extends InMemoryVectorIndex {
  async search(_queryVector: number[], _allowed: ReadonlyMap<string, number>, _k: number): Promise<ScoredChunk[]> {
    throw new Error('index offline');
  }
}

describe('DocumentQAService', () => {
  const alice = member('alice', ['hr']);
  const erin = member('erin', ['eng']);
  const carol = member('carol', ['hr']);
  const dave = member('dave', ['eng']);

  async function seed(respond: Responder = answerFromRunbook) {
    const harness = createHarness({ respond });
    const policy = await harness.submitText(alice, 'policy.txt', POLICY_TEXT, ['hr']);
    const runbook = await harness.submitText(erin, 'runbook.txt', ENG_TEXT, ['eng']);
    return { ...harness, policyId: policy.documentId, runbookId: runbook.documentId };
  }

  describe('ask', () => {
    it('should answer from documents the caller can read', async () => {
      const { service, runbookId } = await seed();

      const result = await service.ask({ question: ROLLBACK_QUESTION, caller: dave });

      expect(result.status).toBe('ok');
      if (result.status !== 'ok') return;
      expect(result.result.answer).toBe('Redeploy the previous release tag [1].');
      expect(result.result.citations).toHaveLength(1);
      expect(result.result.citations[0]).toMatchObject({ documentId: runbookId, filename: 'runbook.txt', sequenceIndex: 0 });
      expect(result.result.insufficientEvidence).toBe(false);
    });

    it('should never show a caller text from documents outside their scope', async () => {
      const { service, llm } = await seed();

      const result = await service.ask({ question: ROLLBACK_QUESTION, caller: carol });

      expect(result).toEqual({
        status: 'insufficient_evidence',
        result: {
          answer: INSUFFICIENT_EVIDENCE_ANSWER,
          questionType: 'specific',
          citations: [],
          confidence: null,
          insufficientEvidence: true
        }
      });
      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0]).toContain(POLICY_TEXT);
      expect(llm.prompts[0]).not.toContain(ENG_TEXT);
    });

    it('should not embed or call the model when the caller can read nothing', async () => {
      const { service, embedder, llm } = createHarness();

      const result = await service.ask({ question: 'What is the leave policy?', caller: member('newcomer') });

      expect(result.status).toBe('insufficient_evidence');
      expect(embedder.calls).toBe(0);
      expect(llm.calls).toBe(0);
    });

    it('should give the same answer for a forbidden document and a missing one', async () => {
      const { service, runbookId } = await seed();

      const forbidden = await service.ask({ question: ROLLBACK_QUESTION, caller: carol, documentId: runbookId });
      const missing = await service.ask({ question: ROLLBACK_QUESTION, caller: carol, documentId: 'doc:missing' });

      expect(forbidden).toEqual({
        status: 'error',
        error: { kind: 'permission_denied', message: 'You do not have access to this document' }
      });
      expect(missing).toEqual(forbidden);
    });

    it('should narrow retrieval to one readable document', async () => {
      const { service, policyId } = await seed(() => 'Two vacation days a month [1].');

      const result = await service.ask({ question: ROLLBACK_QUESTION, caller: admin(), documentId: policyId });

      expect(citedDocuments(result)).toEqual([policyId]);
    });

    it('should report invalid questions as validation errors', async () => {
      const { service } = createHarness();

      await expect(service.ask({ question: '   ', caller: alice })).resolves.toEqual({
        status: 'error',
        error: { kind: 'validation', message: 'Question cannot be empty' }
      });
      await expect(service.ask({ question: 'hi', caller: alice })).resolves.toEqual({
        status: 'error',
        error: { kind: 'validation', message: 'Question must be at least 3 characters long' }
      });
    });

    it('should rethrow failures that are not domain errors', async () => {
      const harness = createHarness({ vectorIndex: new OfflineVectorIndex() });
      await harness.submitText(alice, 'policy.txt', POLICY_TEXT, ['hr']);

      await expect(harness.service.ask({ question: 'What is the leave policy?', caller: alice }))
        .rejects.toThrow('Failed to answer question: index offline');
    });
  });

  describe('rate limiting', () => {
    it('should reject requests over the per-caller limit', async () => {
      const { service, submitText } = createHarness({ options: { rateLimitPerMinute: 2, now: () => 5000 } });

      await submitText(alice, 'policy.txt', POLICY_TEXT, ['hr']);
      await service.ask({ question: 'What is the leave policy?', caller: alice });
      const limited = await service.ask({ question: 'What is the leave policy?', caller: alice });

      expect(limited).toEqual({
        status: 'error',
        error: { kind: 'rate_limited', message: 'Rate limit exceeded, retry in 60s', retryAfterMs: 60000 }
      });
      await expect(submitText(alice, 'runbook.txt', ENG_TEXT)).rejects.toBeInstanceOf(RateLimitedError);
      await expect(service.ask({ question: 'What is the leave policy?', caller: erin })).resolves.toHaveProperty('status', 'insufficient_evidence');
    });

    it('should count document management against the same limit', async () => {
      const { service } = createHarness({ options: { rateLimitPerMinute: 3, now: () => 5000 } });

      await service.listDocuments(alice);
      await service.getStats(alice);
      expect(service.getSuggestedQuestions(alice)).toHaveLength(4);

      await expect(service.deleteDocument('doc:missing', alice)).rejects.toBeInstanceOf(RateLimitedError);
      await expect(service.updateDocumentAccess('doc:missing', ['hr'], alice)).rejects.toBeInstanceOf(RateLimitedError);
      await expect(service.clearIndex(alice)).rejects.toBeInstanceOf(RateLimitedError);
      await expect(service.listDocuments(erin)).resolves.toEqual([]);
    });
  });

  describe('suggestions', () => {
    it('should suggest questions about a sanitized topic', () => {
      const { service } = createHarness();

      const suggestions = service.getSuggestedQuestions(alice, ' "remote work" ');

      expect(suggestions).toContain('How is remote work addressed?');
      expect(() => service.getSuggestedQuestions(alice, 42)).toThrow('Topic must be a string');
    });
  });

  describe('askBatch', () => {
    it('should answer each question in order', async () => {
      const { service } = await seed();

      const results = await service.askBatch([ROLLBACK_QUESTION, 42], dave);

      expect(results.map(result => result.status)).toEqual(['ok', 'error']);
      expect(results[1]).toEqual({ status: 'error', error: { kind: 'validation', message: 'Question cannot be empty' } });
    });

    it('should reject an empty or oversized batch', async () => {
      const { service } = createHarness();

      await expect(service.askBatch([], alice)).rejects.toThrow('Questions must be a non-empty array');
      await expect(service.askBatch('not a list', alice)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.askBatch(new Array(21).fill('What is the leave policy?'), alice))
        .rejects.toThrow('A batch cannot exceed 20 questions');
    });
  });

  describe('document management', () => {
    it('should list what the caller can see', async () => {
      const { service, policyId } = await seed();

      const documents = await service.listDocuments(carol);

      expect(documents).toEqual([{
        documentId: policyId,
        filename: 'policy.txt',
        format: 'txt',
        sizeBytes: Buffer.byteLength(POLICY_TEXT),
        ownerId: 'alice',
        accessTags: ['hr'],
        status: 'indexed',
        version: 1,
        chunkCount: 1,
        indexedAt: expect.any(String)
      }]);
    });

    it('should delete a document together with its chunks', async () => {
      const { service, catalog, vectorIndex, llm, policyId } = await seed();

      await expect(service.deleteDocument(policyId, alice)).resolves.toBe(true);

      await expect(catalog.get(policyId)).resolves.toBeNull();
      expect(vectorIndex.chunkIdsFor(policyId)).toEqual([]);
      const result = await service.ask({ question: 'What is the leave policy?', caller: carol });
      expect(result.status).toBe('insufficient_evidence');
      expect(llm.calls).toBe(0);
    });

    it('should only let the owner or an admin delete', async () => {
      const { service, policyId } = await seed();

      await expect(service.deleteDocument(policyId, carol)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(service.deleteDocument('doc:missing', carol)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(service.deleteDocument('doc:missing', admin())).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.deleteDocument(policyId, admin())).resolves.toBe(true);
    });

    it('should apply new access tags to the next request', async () => {
      const { service, vectorIndex, policyId } = await seed();

      const summary = await service.updateDocumentAccess(policyId, 'ENG, ops', alice);

      expect(summary.accessTags).toEqual(['eng', 'ops']);
      await expect(service.listDocuments(carol)).resolves.toEqual([]);
      await expect(service.listDocuments(dave)).resolves.toHaveLength(2);
      expect(vectorIndex.getChunk(`${policyId}::v1::chunk::0`)?.accessTags).toEqual(['eng', 'ops']);
    });

    it('should reject access changes from readers', async () => {
      const { service, policyId } = await seed();

      await expect(service.updateDocumentAccess(policyId, ['eng'], carol)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(service.updateDocumentAccess(policyId, [7], alice)).rejects.toThrow('Access tags must be a list of strings');
    });

    it('should report stats and let only admins clear the index', async () => {
      const { service } = await seed();

      await expect(service.getStats(alice)).resolves.toEqual({
        totalDocuments: 2,
        indexedDocuments: 2,
        totalChunks: 2,
        embeddingModel: 'keyword-embedder',
        llmModel: 'scripted-llm'
      });
      await expect(service.clearIndex(alice)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(service.clearIndex(admin())).resolves.toEqual({ documentsRemoved: 2 });
      await expect(service.getStats(alice)).resolves.toMatchObject({ totalDocuments: 0, indexedDocuments: 0, totalChunks: 0 });
    });
  });

  it('should only ever cite documents the caller may read', async () => {
    const random = seededRandom(7);
    const owners = ['u1', 'u2', 'u3'];
    const tagPool = ['hr', 'eng', 'legal', 'ops'];
    const subset = () => tagPool.filter(() => random() < 0.4);

    for (let round = 0; round < 5; round++) {
      const { service, submitText } = createHarness({
        options: { retrievalTopK: 20 },
        respond: () => 'Summary of the handbook entries.'
      });
      const docs: Array<{ documentId: string; ownerId: string; accessTags: string[] }> = [];

      for (let i = 0; i < 12; i++) {
        const ownerId = owners[Math.floor(random() * owners.length)];
        const accessTags = subset();
        const { documentId } = await submitText(member(ownerId), `entry-${i}.txt`, `Handbook entry ${i} of round ${round} describes a procedure.`, accessTags);
        docs.push({ documentId, ownerId, accessTags });
      }

      for (const caller of [...owners.map(ownerId => member(ownerId, subset())), member('outsider', subset())]) {
        const result = await service.ask({ question: 'What does the handbook entry describe?', caller });
        const expected = docs
          .filter(doc => doc.ownerId === caller.callerId || doc.accessTags.some(tag => caller.tags.includes(tag)))
          .map(doc => doc.documentId)
          .sort();

        expect(citedDocuments(result)).toEqual(expected);
      }
    }
  });
});
