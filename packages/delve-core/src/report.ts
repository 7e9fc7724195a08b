import { Source } from './types';

export interface ReportInput {
  readonly topic: string;
  readonly runningSummary?: string;
  readonly sources: readonly Source[];
  readonly degraded: boolean;
  readonly failureReason?: string;
}

/**
 * Sources by descending relevance; equal scores keep discovery order
 */
export const rankSources = (sources: readonly Source[]): Source[] =>
  sources
    .map((source, order) => ({ source, order }))
    .sort((a, b) => b.source.relevanceScore - a.source.relevanceScore || a.order - b.order)
    .map(({ source }) => source);

export const degradedNotice = (reason: string | undefined): string =>
  `> **Partial report:** research stopped early (${reason ?? 'unknown reason'}). ` +
  'Only information gathered before that point is included.';

/**
 * Markdown report: optional degraded notice, the summary, then numbered sources
 */
export const composeReport = (input: ReportInput): string => {
  const sections: string[] = [`# ${input.topic}`];

  if (input.degraded) {
    sections.push(degradedNotice(input.failureReason));
  }

  sections.push(`## Summary\n\n${input.runningSummary || '_No findings were gathered._'}`);

  const ranked = rankSources(input.sources);
  const sourceLines = ranked.length > 0
    ? ranked.map((source, index) => `${index + 1}. [${source.title}](${source.url}) (relevance ${source.relevanceScore.toFixed(2)})`).join('\n')
    : '_No sources were gathered._';
  sections.push(`## Sources\n\n${sourceLines}`);

  return `${sections.join('\n\n')}\n`;
};
