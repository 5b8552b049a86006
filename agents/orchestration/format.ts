/**
 * Response Formatting
 *
 * Turns specialist results into the text sections of a response, and into
 * the one-line summaries kept in the task log.
 */

import type {
  CodeAnalysisResult,
  CreativeContentResult,
  ResearchResult,
  SpecialistResult,
} from '../schemas/index.js';

export const SECTION_MARKERS = {
  research: '🔍 RESEARCH RESULTS',
  code_analysis: '💻 CODE ANALYSIS',
  content_creation: '✍️  CREATED CONTENT',
  compositeResearch: '🔍 RESEARCH COMPLETED',
  compositeReport: '📄 ANALYSIS REPORT',
} as const;

export function formatResearchResult(result: ResearchResult): string {
  const lines = [`📊 Topic: ${result.topic}`, `📝 Summary: ${result.summary}`, '🔑 Key Points:'];
  result.keyPoints.forEach((point, i) => lines.push(`   ${i + 1}. ${point}`));
  lines.push(`📈 Confidence: ${result.confidence}`);
  if (result.sourcesNeeded.length > 0) {
    lines.push(`📚 Recommended Sources: ${result.sourcesNeeded.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatCodeResult(result: CodeAnalysisResult): string {
  const lines = [`💻 Language: ${result.language}`, `📊 Complexity Score: ${result.complexityScore}/10`];
  const lists: Array<[heading: string, items: string[]]> = [
    ['⚠️  Issues Found:', result.issues],
    ['💡 Suggestions:', result.suggestions],
    ['🔒 Security Concerns:', result.securityConcerns],
  ];
  for (const [heading, items] of lists) {
    if (items.length === 0) continue;
    lines.push(heading, ...items.map((item) => `   • ${item}`));
  }
  return lines.join('\n');
}

export function formatCreativeResult(result: CreativeContentResult): string {
  return [
    `✍️  Content Type: ${result.contentType}`,
    `📝 Title: ${result.title}`,
    `🎯 Audience: ${result.targetAudience} | Tone: ${result.tone}`,
    `📊 Word Count: ${result.wordCount}`,
    `📄 Content:\n${result.body}`,
  ].join('\n');
}

/**
 * Section for a single-specialist route.
 */
export function formatSection(result: SpecialistResult): string {
  switch (result.kind) {
    case 'research':
      return `${SECTION_MARKERS.research}\n${formatResearchResult(result.data)}`;
    case 'code_analysis':
      return `${SECTION_MARKERS.code_analysis}\n${formatCodeResult(result.data)}`;
    case 'content_creation':
      return `${SECTION_MARKERS.content_creation}\n${formatCreativeResult(result.data)}`;
  }
}

export function formatComposite(research: ResearchResult, report: CreativeContentResult): string {
  return (
    `${SECTION_MARKERS.compositeResearch}\n${formatResearchResult(research)}\n\n` +
    `${SECTION_MARKERS.compositeReport}\n${formatCreativeResult(report)}`
  );
}

/**
 * One-line task log summary for a completed specialist call.
 */
export function summarizeResult(result: SpecialistResult): string {
  switch (result.kind) {
    case 'research':
      return `Researched: ${result.data.topic} (Confidence: ${result.data.confidence})`;
    case 'code_analysis':
      return `Analyzed ${result.data.language} code (Complexity: ${result.data.complexityScore}/10)`;
    case 'content_creation':
      return `Created ${result.data.contentType}: ${result.data.title} (${result.data.wordCount} words)`;
  }
}
