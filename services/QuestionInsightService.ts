import { QuestionType } from '../types';

// first match wins
const QUESTION_TYPE_PATTERNS: Array<[QuestionType, RegExp]> = [
  ['summary', /\b(summary|summarize|overview|brief)\b/],
  ['specific', /\b(what|how|why|when|where|who)\b/],
  ['comparison', /\b(compare|difference|similar|versus|vs)\b/],
  ['analysis', /\b(analyze|analysis|examine|study)\b/]
];

const GENERAL_SUGGESTIONS = [
  'What is the main topic of the documents?',
  'Can you summarize the key points?',
  'What are the most important findings?',
  'What are the main conclusions?'
];

export class QuestionInsightService {
  static classifyQuestion(question: string): QuestionType {
    const lower = question.toLowerCase();
    for (const [type, pattern] of QUESTION_TYPE_PATTERNS) {
      if (pattern.test(lower)) {
        return type;
      }
    }
    return 'general';
  }

  /**
   * Starter questions, plus a few about `topic` when one is given.
   */
  static suggestQuestions(topic?: string): string[] {
    if (!topic) {
      return [...GENERAL_SUGGESTIONS];
    }
    return [
      ...GENERAL_SUGGESTIONS,
      `What do the documents say about ${topic}?`,
      `How is ${topic} addressed?`,
      `What are the implications for ${topic}?`
    ];
  }
}
