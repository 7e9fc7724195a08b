/**
 * LLM and embedding providers
 *
 * The research loop only sees the LLMProvider and EmbeddingProvider interfaces.
 * The bundled implementation talks to any OpenAI-compatible endpoint, which
 * covers OpenAI itself, Ollama (/v1) and LM Studio.
 */

import { OpenAI } from 'openai';
import { z } from 'zod';
import { ResearchConfig, LlmProviderName } from './config';
import {
  ConfigurationError,
  ProviderError,
  ProviderKind,
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  errorMessage
} from './errors';
import { createLogger } from './logger';

const log = createLogger('LLM');

// ---------- Provider Types ----------

export interface Prompt {
  readonly system?: string;
  readonly user: string;
}

export interface LLMProvider {
  readonly name: string;
  generate(prompt: Prompt): Promise<string>;
  /**
   * @throws ProviderMalformedResponseError when the reply is not valid JSON for `schema`
   */
  generateStructured<T>(prompt: Prompt, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
}

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

// ---------- Response Parsing ----------

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

/**
 * Remove <think>...</think> reasoning blocks some local models emit
 */
export const stripThinkingTokens = (text: string): string => {
  return text.replace(THINK_BLOCK, '').trim();
};

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Parse a model reply into `schema`
 *
 * Think blocks and a surrounding markdown code fence are removed first.
 */
export const parseStructured = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
  const stripped = stripThinkingTokens(raw);
  const fenced = CODE_FENCE.exec(stripped);
  const text = fenced?.[1] ?? stripped;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ProviderMalformedResponseError([`invalid JSON: ${errorMessage(error)}`], raw);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ProviderMalformedResponseError(issues, raw);
  }
  return result.data;
};

// ---------- Error Classification ----------

export const statusOf = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

/**
 * Map an SDK error onto the provider error taxonomy
 */
export const toProviderError = (
  error: unknown,
  provider: ProviderKind,
  operation: string,
  timeoutMs = 0
): ProviderError => {
  if (error instanceof ProviderError) return error;

  const name = error instanceof Error ? error.name : '';
  if (name === 'APIConnectionTimeoutError') {
    return new ProviderTimeoutError(operation, timeoutMs, provider);
  }

  const status = statusOf(error);
  const detail = status === undefined ? errorMessage(error) : `HTTP ${status}: ${errorMessage(error)}`;
  return new ProviderUnavailableError(`${operation} failed: ${detail}`, provider, {
    cause: error,
    context: status === undefined ? undefined : { status }
  });
};

// ---------- OpenAI-compatible Implementation ----------

const DEFAULT_BASE_URLS: Record<LlmProviderName, string | undefined> = {
  openai: undefined,
  ollama: 'http://localhost:11434/v1',
  lmstudio: 'http://localhost:1234/v1'
};

export interface OpenAICompatibleOptions {
  readonly provider: LlmProviderName;
  readonly model: string;
  readonly baseURL?: string;
  readonly apiKey?: string;
  readonly timeoutMs?: number;
  readonly temperature?: number;
}

/**
 * Ollama serves its OpenAI-compatible API under /v1
 */
const resolveBaseUrl = (provider: LlmProviderName, baseURL: string | undefined): string | undefined => {
  if (!baseURL) return DEFAULT_BASE_URLS[provider];
  const trimmed = baseURL.replace(/\/+$/, '');
  return provider === 'ollama' && !trimmed.endsWith('/v1') ? `${trimmed}/v1` : trimmed;
};

const createClient = (options: OpenAICompatibleOptions): OpenAI => {
  if (options.provider === 'openai' && !options.apiKey) {
    throw new ConfigurationError('OpenAI API key is required', ['openaiApiKey: missing']);
  }

  return new OpenAI({
    // local servers ignore the key but the SDK insists on one
    apiKey: options.apiKey ?? options.provider,
    baseURL: resolveBaseUrl(options.provider, options.baseURL),
    timeout: options.timeoutMs,
    maxRetries: 0
  });
};

export class OpenAICompatibleProvider implements LLMProvider {
  public readonly name: string;
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAICompatibleOptions) {
    this.name = `${options.provider}:${options.model}`;
    this.client = createClient(options);
  }

  async generate(prompt: Prompt): Promise<string> {
    return this.complete(prompt, false);
  }

  async generateStructured<T>(prompt: Prompt, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const content = await this.complete(prompt, true);
    return parseStructured(content, schema);
  }

  private async complete(prompt: Prompt, json: boolean): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (prompt.system) {
      messages.push({ role: 'system', content: prompt.system });
    }
    messages.push({ role: 'user', content: prompt.user });

    log.debug('completion request', { provider: this.name, json });

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: this.options.temperature ?? 0,
        response_format: json ? { type: 'json_object' } : undefined
      });
    } catch (error) {
      throw toProviderError(error, 'llm', 'Chat completion', this.options.timeoutMs);
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new ProviderMalformedResponseError(['empty completion'], '');
    }
    return content;
  }
}

export class OpenAICompatibleEmbedder implements EmbeddingProvider {
  public readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(
    options: OpenAICompatibleOptions,
    public readonly dimension: number
  ) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.client = createClient(options);
  }

  async embed(text: string): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: text });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      throw toProviderError(error, 'embedding', 'Embedding', this.timeoutMs);
    }

    if (!embedding) {
      throw new ProviderUnavailableError('Embedding response contained no vector', 'embedding');
    }
    return embedding;
  }
}

// ---------- Factory Functions ----------

export function createLLMProvider(config: ResearchConfig): LLMProvider {
  return new OpenAICompatibleProvider({
    provider: config.llmProvider,
    model: config.llmModel,
    baseURL: config.llmBaseUrl,
    apiKey: config.openaiApiKey,
    timeoutMs: config.callTimeoutMs
  });
}

export function createEmbeddingProvider(config: ResearchConfig): EmbeddingProvider {
  return new OpenAICompatibleEmbedder(
    {
      provider: config.llmProvider,
      model: config.embeddingModel,
      baseURL: config.llmBaseUrl,
      apiKey: config.openaiApiKey,
      timeoutMs: config.callTimeoutMs
    },
    config.embeddingDimension
  );
}
