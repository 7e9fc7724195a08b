import { errorMessage, isFatal } from './errors';
import { LLMProvider } from './llm';
import { createLogger } from './logger';
import { QuerySchema, queryWriterPrompt } from './prompts';
import { CallPolicy, guardedCall } from './resilience';
import { Query } from './types';

const log = createLogger('QueryWriter');

export const followUpFallback = (topic: string): string => `Tell me more about ${topic}`;

/**
 * First-iteration query: an LLM refinement of the topic, or the topic itself
 * when refinement is off or fails.
 */
export async function writeInitialQuery(
  topic: string,
  llm: LLMProvider | undefined,
  policy: CallPolicy,
  now: Date = new Date()
): Promise<Query> {
  if (!llm) return { text: topic, loopIndex: 1 };

  try {
    const refined = await guardedCall(
      'Query generation',
      'llm',
      () => llm.generateStructured(queryWriterPrompt(topic, now.toISOString().slice(0, 10)), QuerySchema),
      policy
    );
    return {
      text: refined.query,
      loopIndex: 1,
      ...(refined.rationale ? { rationale: refined.rationale } : {})
    };
  } catch (error) {
    if (isFatal(error)) throw error;
    log.warn(`query refinement failed, using the topic: ${errorMessage(error)}`);
    return { text: topic, loopIndex: 1, rationale: 'topic used verbatim' };
  }
}

/**
 * Query for iteration `loopIndex` after the first
 */
export const followUpQuery = (topic: string, loopIndex: number, suggested?: string, rationale?: string): Query => ({
  text: suggested ?? followUpFallback(topic),
  loopIndex,
  ...(rationale ? { rationale } : {})
});
