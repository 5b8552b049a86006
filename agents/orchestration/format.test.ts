import { describe, it, expect } from 'vitest';
import type { CodeAnalysisResult, CreativeContentResult, ResearchResult } from '../schemas/index.js';
import { formatCodeResult, formatComposite, formatResearchResult, summarizeResult } from './format.js';

const research: ResearchResult = {
  topic: 'tides',
  summary: 'Tides follow the moon.',
  keyPoints: ['gravity', 'rotation', 'coastline shape'],
  confidence: 'High',
  sourcesNeeded: [],
};

const code: CodeAnalysisResult = {
  language: 'Go',
  complexityScore: 3,
  issues: ['unchecked error'],
  suggestions: [],
  securityConcerns: ['shell injection'],
};

const report: CreativeContentResult = {
  contentType: 'report',
  title: 'Tides',
  body: 'The moon pulls.',
  targetAudience: 'professional',
  tone: 'analytical',
  wordCount: 3,
};

describe('formatting', () => {
  it('renders research, listing sources only when present', () => {
    expect(formatResearchResult(research)).toBe(
      [
        '📊 Topic: tides',
        '📝 Summary: Tides follow the moon.',
        '🔑 Key Points:',
        '   1. gravity',
        '   2. rotation',
        '   3. coastline shape',
        '📈 Confidence: High',
      ].join('\n')
    );
    expect(formatResearchResult({ ...research, sourcesNeeded: ['tide tables'] })).toMatch(
      /\n📚 Recommended Sources: tide tables$/
    );
  });

  it('skips empty code analysis lists', () => {
    expect(formatCodeResult(code)).toBe(
      [
        '💻 Language: Go',
        '📊 Complexity Score: 3/10',
        '⚠️  Issues Found:',
        '   • unchecked error',
        '🔒 Security Concerns:',
        '   • shell injection',
      ].join('\n')
    );
  });

  it('puts research before the report in composites', () => {
    const text = formatComposite(research, report);
    expect(text.startsWith('🔍 RESEARCH COMPLETED\n📊 Topic: tides\n')).toBe(true);
    expect(text).toContain('\n\n📄 ANALYSIS REPORT\n✍️  Content Type: report\n');
    expect(text.endsWith('📄 Content:\nThe moon pulls.')).toBe(true);
  });

  it('summarizes each kind of result in one line', () => {
    expect(summarizeResult({ kind: 'research', data: research })).toBe('Researched: tides (Confidence: High)');
    expect(summarizeResult({ kind: 'code_analysis', data: code })).toBe('Analyzed Go code (Complexity: 3/10)');
    expect(summarizeResult({ kind: 'content_creation', data: report })).toBe('Created report: Tides (3 words)');
  });
});
