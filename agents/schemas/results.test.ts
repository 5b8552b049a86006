import { describe, it, expect } from 'vitest';
import { SchemaViolation } from '../../core/errors.js';
import {
  countWords,
  parseCodeAnalysisResult,
  parseCreativeContentResult,
  parseResearchResult,
} from './results.js';

const research = (keyPoints: string[]) => ({
  topic: 'solar storage',
  summary: 'Grid batteries are getting cheaper.',
  keyPoints,
  confidence: 'High',
  sourcesNeeded: ['Utility filings'],
});

const codeAnalysis = (complexityScore: number) => ({
  language: 'Python',
  complexityScore,
  issues: [],
  suggestions: ['Add type hints'],
  securityConcerns: [],
});

describe('parseResearchResult', () => {
  it('accepts three to five key points', () => {
    expect(parseResearchResult(research(['a', 'b', 'c'])).keyPoints).toEqual(['a', 'b', 'c']);
    expect(parseResearchResult(research(['a', 'b', 'c', 'd', 'e'])).keyPoints).toHaveLength(5);
  });

  it('rejects two key points', () => {
    expect(() => parseResearchResult(research(['a', 'b']))).toThrow(SchemaViolation);
  });

  it('rejects six key points and names the field', () => {
    try {
      parseResearchResult(research(['a', 'b', 'c', 'd', 'e', 'f']));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaViolation);
      if (error instanceof SchemaViolation) {
        expect(error.schemaName).toBe('research_result');
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^keyPoints: /);
      }
    }
  });

  it('rejects an unknown confidence level', () => {
    expect(() => parseResearchResult({ ...research(['a', 'b', 'c']), confidence: 'Certain' })).toThrow(
      SchemaViolation
    );
  });

  it('defaults missing sources to an empty list', () => {
    const { sourcesNeeded: _omitted, ...rest } = research(['a', 'b', 'c']);
    expect(parseResearchResult(rest).sourcesNeeded).toEqual([]);
  });

  it('rejects values that are not objects', () => {
    expect(() => parseResearchResult('not json')).toThrow(SchemaViolation);
    expect(() => parseResearchResult(null)).toThrow(SchemaViolation);
  });
});

describe('parseCodeAnalysisResult', () => {
  it('accepts the bounds of the complexity scale', () => {
    expect(parseCodeAnalysisResult(codeAnalysis(1)).complexityScore).toBe(1);
    expect(parseCodeAnalysisResult(codeAnalysis(10)).complexityScore).toBe(10);
  });

  it('rejects 0 and 11', () => {
    expect(() => parseCodeAnalysisResult(codeAnalysis(0))).toThrow(SchemaViolation);
    expect(() => parseCodeAnalysisResult(codeAnalysis(11))).toThrow(SchemaViolation);
  });

  it('rejects fractional scores', () => {
    expect(() => parseCodeAnalysisResult(codeAnalysis(4.5))).toThrow(SchemaViolation);
  });
});

describe('parseCreativeContentResult', () => {
  it('recomputes the word count from the body', () => {
    const result = parseCreativeContentResult({
      contentType: 'email',
      title: 'Project update',
      body: 'The migration   finished on time.\nNext up: cleanup.',
      targetAudience: 'team',
      tone: 'professional',
      wordCount: 42,
    });

    expect(result.wordCount).toBe(8);
  });

  it('fills in a missing word count', () => {
    const result = parseCreativeContentResult({
      contentType: 'tweet',
      title: 'Launch',
      body: 'We shipped it',
      targetAudience: 'general',
      tone: 'casual',
    });

    expect(result.wordCount).toBe(3);
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('   ')).toBe(0);
    expect(countWords(' one two\tthree\n')).toBe(3);
  });
});
