import { Citation, QueryResult, QuestionType, ScoredChunk } from '../types';
import { SynthesisUnavailableError, errorMessage } from '../utils/errors';
import { RetryPolicy, withRetry } from '../utils/retry';
import { meanNormalizedScore } from '../utils/scoreNormalization';
import { LanguageModel } from './LanguageModel';
import { QuestionInsightService } from './QuestionInsightService';

export const INSUFFICIENT_EVIDENCE_ANSWER =
  'There is not enough information in the documents you can access to answer this question.';

const INSUFFICIENT_EVIDENCE_REPLY = /^INSUFFICIENT_EVIDENCE\b/i;
const CITATION_MARKER = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

export interface SynthesisOptions {
  /** Upper bound on the summed length of the chunk texts placed in the prompt. */
  contextCharBudget: number;
  retryPolicy: RetryPolicy;
  timeoutMs: number;
}

export interface ContextBlock {
  marker: number;
  chunk: ScoredChunk;
}

/**
 * Numbers chunks in rank order, skipping exact duplicates, until the next chunk would
 * overflow the budget. Chunks are never cut.
 */
export function buildContextBlocks(chunks: ScoredChunk[], charBudget: number): ContextBlock[] {
  const blocks: ContextBlock[] = [];
  const seen = new Set<string>();
  let used = 0;

  for (const chunk of chunks) {
    if (seen.has(chunk.text)) continue;
    if (used + chunk.text.length > charBudget) break;

    seen.add(chunk.text);
    used += chunk.text.length;
    blocks.push({ marker: blocks.length + 1, chunk });
  }
  return blocks;
}

/** Valid `[n]` markers in order of first appearance; `[1, 3]` counts as two. */
export function parseCitationMarkers(answer: string, blockCount: number): number[] {
  const markers: number[] = [];
  for (const match of answer.matchAll(CITATION_MARKER)) {
    for (const part of match[1].split(',')) {
      const marker = Number(part.trim());
      if (marker >= 1 && marker <= blockCount && !markers.includes(marker)) {
        markers.push(marker);
      }
    }
  }
  return markers;
}

export function insufficientEvidenceResult(questionType: QuestionType): QueryResult {
  return {
    answer: INSUFFICIENT_EVIDENCE_ANSWER,
    questionType,
    citations: [],
    confidence: null,
    insufficientEvidence: true
  };
}

export class SynthesisService {
  private llm: LanguageModel;
  private options: SynthesisOptions;

  constructor(llm: LanguageModel, options: SynthesisOptions) {
    this.llm = llm;
    this.options = options;
  }

  get modelName(): string {
    return this.llm.modelName;
  }

  async synthesize(question: string, chunks: ScoredChunk[]): Promise<QueryResult> {
    const questionType = QuestionInsightService.classifyQuestion(question);
    const blocks = buildContextBlocks(chunks, this.options.contextCharBudget);
    if (blocks.length === 0) {
      console.log(`[SynthesisService] No context for question, skipping the language model`);
      return insufficientEvidenceResult(questionType);
    }

    const prompt = this.buildPrompt(question, blocks);
    const answer = (await this.callLLM(prompt)).trim();

    if (answer === '' || INSUFFICIENT_EVIDENCE_REPLY.test(answer)) {
      console.log(`[SynthesisService] Model reported insufficient evidence across ${blocks.length} blocks`);
      return insufficientEvidenceResult(questionType);
    }

    let markers = parseCitationMarkers(answer, blocks.length);
    if (markers.length === 0) {
      console.warn(`[SynthesisService] Answer carried no citation markers, citing all ${blocks.length} blocks`);
      markers = blocks.map(block => block.marker);
    }

    const cited = markers.map(marker => blocks[marker - 1].chunk);
    const citations: Citation[] = cited.map(chunk => ({
      documentId: chunk.documentId,
      chunkId: chunk.chunkId,
      filename: chunk.filename,
      sequenceIndex: chunk.sequenceIndex,
      span: { ...chunk.span },
      score: chunk.score
    }));

    return {
      answer,
      questionType,
      citations,
      confidence: meanNormalizedScore(cited.map(chunk => chunk.score)),
      insufficientEvidence: false
    };
  }

  private buildPrompt(question: string, blocks: ContextBlock[]): string {
    const contextSections = blocks.map(({ marker, chunk }) => {
      const source = chunk.section ? `${chunk.filename}, ${chunk.section}` : chunk.filename;
      return `[${marker}] (${source})\n${chunk.text}`;
    }).join('\n\n---\n\n');

    return `You are a helpful assistant answering questions about a private document collection.

Context:

${contextSections}

Question: ${question}

Instructions:
- Answer only from the context above. Do not use outside knowledge.
- Cite every block you rely on with its number in brackets, like [1] or [2].
- If the context does not answer the question, reply with exactly INSUFFICIENT_EVIDENCE and nothing else.
- Be concise and accurate.

Answer:`;
  }

  private async callLLM(prompt: string): Promise<string> {
    try {
      return await withRetry(
        signal => this.llm.generate(prompt, signal),
        this.options.retryPolicy,
        { label: 'Answer generation', timeoutMs: this.options.timeoutMs }
      );
    } catch (error) {
      console.error(`[SynthesisService] ERROR: LLM call failed:`, error);
      throw new SynthesisUnavailableError(
        `Failed to generate answer after ${this.options.retryPolicy.maxAttempts} attempts: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
