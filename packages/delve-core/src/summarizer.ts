import { ProviderMalformedResponseError, SummaryGenerationError, errorMessage, isFatal } from './errors';
import { LLMProvider, stripThinkingTokens } from './llm';
import { createLogger } from './logger';
import { formatSources, summarizePrompt } from './prompts';
import { CallPolicy, guardedCall } from './resilience';
import { Source } from './types';

const log = createLogger('Summarizer');

export interface SummarizerOptions {
  readonly maxCharsPerSource: number;
  readonly fetchFullPage: boolean;
  readonly stripThinkingTokens: boolean;
}

/**
 * Folds newly found sources into the running summary
 */
export class Summarizer {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: SummarizerOptions,
    private readonly policy: CallPolicy
  ) {}

  /**
   * With no existing summary the sources alone are summarized; otherwise the
   * model is asked to merge them into the existing summary.
   *
   * @throws SummaryGenerationError once the retry budget is spent
   */
  async summarize(existingSummary: string | undefined, sources: readonly Source[], topic: string): Promise<string> {
    if (sources.length === 0) {
      log.debug('no new sources, summary unchanged');
      return existingSummary ?? '';
    }

    const context = formatSources(sources, this.options);
    const prompt = summarizePrompt(topic, context, existingSummary || undefined);

    try {
      return await guardedCall('Summarization', 'llm', async () => {
        const reply = await this.llm.generate(prompt);
        const summary = this.options.stripThinkingTokens ? stripThinkingTokens(reply) : reply.trim();
        if (!summary) {
          throw new ProviderMalformedResponseError(['empty summary'], reply);
        }
        return summary;
      }, this.policy);
    } catch (error) {
      if (isFatal(error)) throw error;
      throw new SummaryGenerationError(`Summary generation failed: ${errorMessage(error)}`, {
        cause: error,
        context: { topic, sources: sources.length }
      });
    }
  }
}
