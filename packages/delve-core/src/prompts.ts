/**
 * Prompt templates for the research loop
 */

import { z } from 'zod';
import { Prompt } from './llm';
import { Source } from './types';
import { truncate } from './utils';

// ---------- Query writing ----------

export const QuerySchema = z.object({
  query: z.string().trim().min(1),
  rationale: z.string().optional()
});

export const queryWriterPrompt = (topic: string, currentDate: string): Prompt => ({
  system: `Your goal is to generate a targeted web search query.

<CONTEXT>
Current date: ${currentDate}
Make sure the query reflects the most current information available as of this date.
</CONTEXT>

<TOPIC>
${topic}
</TOPIC>

<FORMAT>
Respond with a JSON object containing exactly these keys:
   - "query": the search query string
   - "rationale": one sentence on why this query is relevant
</FORMAT>`,
  user: 'Generate a query for web search:'
});

// ---------- Summarization ----------

const SUMMARIZER_SYSTEM = `<GOAL>
Write a high-quality summary of the provided context.
</GOAL>

<REQUIREMENTS>
When creating a NEW summary:
1. Highlight the most relevant information related to the user topic
2. Keep a logical flow of information

When EXTENDING an existing summary:
1. Read the existing summary and the new search results carefully
2. Integrate new information that relates to existing content into the relevant paragraph
3. Add a new paragraph for genuinely new information, with a smooth transition
4. Skip information that is not relevant to the topic
5. Do not repeat information already covered
6. Never drop content from the existing summary
</REQUIREMENTS>

<FORMATTING>
Start directly with the updated summary, without preamble or titles. Do not use XML tags in the output.
</FORMATTING>`;

export interface SourceFormatOptions {
  readonly maxCharsPerSource: number;
  readonly fetchFullPage: boolean;
}

/**
 * Render sources as prompt context
 *
 * Full page content is included only when `fetchFullPage` is set; every text
 * field is cut to `maxCharsPerSource`.
 */
export const formatSources = (sources: readonly Source[], options: SourceFormatOptions): string => {
  const blocks = sources.map(source => {
    const lines = [
      `Source: ${source.title}`,
      `URL: ${source.url}`,
      `Most relevant content from source: ${truncate(source.snippet, options.maxCharsPerSource)}`
    ];
    if (options.fetchFullPage && source.rawContent) {
      lines.push(
        `Full source content limited to ${options.maxCharsPerSource} characters: ${truncate(source.rawContent, options.maxCharsPerSource)}`
      );
    }
    return lines.join('\n');
  });
  return `Sources:\n\n${blocks.join('\n\n')}`;
};

export const summarizePrompt = (topic: string, context: string, existingSummary?: string): Prompt => ({
  system: SUMMARIZER_SYSTEM,
  user: existingSummary
    ? `<Existing Summary>\n${existingSummary}\n</Existing Summary>\n\n` +
      `<New Context>\n${context}\n</New Context>\n\n` +
      `Merge the New Context into the Existing Summary for this topic. Keep everything the Existing Summary already covers:\n` +
      `<Topic>\n${topic}\n</Topic>`
    : `<Context>\n${context}\n</Context>\n\n` +
      `Create a Summary using the Context on this topic:\n` +
      `<Topic>\n${topic}\n</Topic>`
});

// ---------- Reflection ----------

export const ReflectionSchema = z.object({
  is_sufficient: z.boolean(),
  knowledge_gap: z.string(),
  follow_up_query: z.string().nullish()
});

export type ReflectionPayload = z.infer<typeof ReflectionSchema>;

export const reflectionPrompt = (topic: string, summary: string): Prompt => ({
  system: `You are an expert research assistant analyzing a summary about ${topic}.

<GOAL>
1. Decide whether the summary covers the topic well enough to stop researching
2. Identify the most important knowledge gap or area that needs deeper exploration
3. Generate a follow-up question that would help expand understanding
</GOAL>

<REQUIREMENTS>
Make the follow-up question self-contained and include the context needed for a web search.
</REQUIREMENTS>

<FORMAT>
Respond with a JSON object containing exactly these keys:
- "is_sufficient": true when no further research is needed, otherwise false
- "knowledge_gap": what information is missing or needs clarification
- "follow_up_query": a specific question addressing the gap
</FORMAT>`,
  user: summary
    ? `Reflect on our existing knowledge:\n===\n${summary}\n===\nIdentify a knowledge gap and generate a follow-up web search query:`
    : 'Nothing has been found yet. Identify what to search for first and generate a web search query:'
});

/**
 * Second chance after a malformed reply: the same request plus what was wrong
 */
export const repairPrompt = (original: Prompt, issues: readonly string[], previousReply: string): Prompt => ({
  system: original.system,
  user: `${original.user}

Your previous reply could not be used:
${previousReply}

Problems:
${issues.map(issue => `- ${issue}`).join('\n')}

Reply again with only the JSON object in the required format.`
});
