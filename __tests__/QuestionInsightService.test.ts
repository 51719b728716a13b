import { QuestionInsightService } from '../services/QuestionInsightService';

describe('QuestionInsightService', () => {
  describe('classifyQuestion', () => {
    it('should classify by the first matching pattern', () => {
      expect(QuestionInsightService.classifyQuestion('Give me an overview of the runbook')).toBe('summary');
      expect(QuestionInsightService.classifyQuestion('How do I request leave?')).toBe('specific');
      expect(QuestionInsightService.classifyQuestion('Compare the two leave policies')).toBe('comparison');
      expect(QuestionInsightService.classifyQuestion('Analyze the incident timeline')).toBe('analysis');
      expect(QuestionInsightService.classifyQuestion('Leave policy for contractors')).toBe('general');
    });

    it('should prefer summary over specific when both match', () => {
      expect(QuestionInsightService.classifyQuestion('What is a brief summary of the policy?')).toBe('summary');
    });
  });

  describe('suggestQuestions', () => {
    it('should return the starter questions without a topic', () => {
      expect(QuestionInsightService.suggestQuestions()).toEqual([
        'What is the main topic of the documents?',
        'Can you summarize the key points?',
        'What are the most important findings?',
        'What are the main conclusions?'
      ]);
    });

    it('should add questions about a topic', () => {
      const suggestions = QuestionInsightService.suggestQuestions('parental leave');

      expect(suggestions).toHaveLength(7);
      expect(suggestions.slice(4)).toEqual([
        'What do the documents say about parental leave?',
        'How is parental leave addressed?',
        'What are the implications for parental leave?'
      ]);
    });
  });
});
