import { ProviderMalformedResponseError, ReflectionParseError } from './errors';
import { LLMProvider, Prompt } from './llm';
import { createLogger } from './logger';
import { ReflectionPayload, ReflectionSchema, reflectionPrompt, repairPrompt } from './prompts';
import { CallPolicy, guardedCall } from './resilience';
import { ReflectionResult } from './types';

const log = createLogger('Reflection');

const notMalformed = (error: unknown): boolean => !(error instanceof ProviderMalformedResponseError);

const toResult = (payload: ReflectionPayload): ReflectionResult => {
  const followUp = payload.follow_up_query?.trim();
  return {
    isSufficient: payload.is_sufficient,
    knowledgeGap: payload.knowledge_gap.trim(),
    ...(followUp ? { followUpQuery: followUp } : {})
  };
};

/**
 * Gap analysis over the running summary; the only source of the stop signal
 */
export class ReflectionEngine {
  constructor(
    private readonly llm: LLMProvider,
    private readonly policy: CallPolicy
  ) {}

  /**
   * @throws ReflectionParseError when the reply is malformed twice
   * @throws ProviderError when the provider fails past the retry budget
   */
  async reflect(topic: string, summary: string): Promise<ReflectionResult> {
    const prompt = reflectionPrompt(topic, summary);

    try {
      return toResult(await this.ask('Reflection', prompt));
    } catch (error) {
      if (!(error instanceof ProviderMalformedResponseError)) throw error;

      log.warn('malformed reflection, asking for a repair', { issues: error.issues });
      try {
        return toResult(await this.ask('Reflection repair', repairPrompt(prompt, error.issues, error.raw)));
      } catch (repairError) {
        if (repairError instanceof ProviderMalformedResponseError) {
          throw new ReflectionParseError(`Reflection output could not be parsed: ${repairError.issues.join('; ')}`, {
            cause: repairError,
            context: { raw: repairError.raw }
          });
        }
        throw repairError;
      }
    }
  }

  // malformed replies go to the repair path instead of the retry budget
  private ask(operation: string, prompt: Prompt): Promise<ReflectionPayload> {
    return guardedCall(operation, 'llm', () => this.llm.generateStructured(prompt, ReflectionSchema), this.policy, notMalformed);
  }
}
