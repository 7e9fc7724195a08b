import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Research configuration
 *
 * A session receives one immutable, validated ResearchConfig at start. Nothing
 * here reads ambient process state except createConfigFromEnv, which the
 * command line calls once. The logger is the exception in this package: it
 * reads LOG_LEVEL, LOG_FILE and NODE_ENV when it loads.
 */

export const SEARCH_APIS = ['firecrawl', 'searxng', 'duckduckgo', 'tavily', 'perplexity'] as const;
export const LLM_PROVIDERS = ['openai', 'ollama', 'lmstudio'] as const;
export const RELEVANCE_SCORERS = ['lexical', 'embedding'] as const;

export const MIN_LOOPS = 1;
export const MAX_LOOPS = 10;

export type SearchApi = typeof SEARCH_APIS[number];
export type LlmProviderName = typeof LLM_PROVIDERS[number];
export type RelevanceScorerName = typeof RELEVANCE_SCORERS[number];

export const ResearchConfigSchema = z.object({
  maxLoops: z.number().int().min(MIN_LOOPS).max(MAX_LOOPS).default(3),
  searchApi: z.enum(SEARCH_APIS).default('duckduckgo'),
  fetchFullPage: z.boolean().default(true),
  maxResultsPerQuery: z.number().int().positive().default(3),
  maxCharsPerSource: z.number().int().positive().default(4000),
  fingerprintChars: z.number().int().nonnegative().default(500),
  refineInitialQuery: z.boolean().default(true),
  relevanceScorer: z.enum(RELEVANCE_SCORERS).default('lexical'),

  llmProvider: z.enum(LLM_PROVIDERS).default('ollama'),
  llmModel: z.string().min(1).default('llama3.2'),
  llmBaseUrl: z.string().url().optional(),
  stripThinkingTokens: z.boolean().default(true),

  embeddingModel: z.string().min(1).default('nomic-embed-text'),
  embeddingDimension: z.number().int().positive().default(768),

  callTimeoutMs: z.number().int().positive().default(60000),
  maxRetries: z.number().int().min(0).max(5).default(1),
  retryDelayMs: z.number().int().nonnegative().default(1000),

  historyPath: z.string().min(1).default('research_history.db'),
  enableLedger: z.boolean().default(false),

  openaiApiKey: z.string().optional(),
  firecrawlApiKey: z.string().optional(),
  firecrawlApiUrl: z.string().url().optional(),
  searxngUrl: z.string().url().default('http://localhost:8888'),
  tavilyApiKey: z.string().optional(),
  perplexityApiKey: z.string().optional(),
  perplexityModel: z.string().min(1).default('sonar')
});

export type ResearchConfig = Readonly<z.infer<typeof ResearchConfigSchema>>;
export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;

/**
 * Validate and freeze a configuration; unspecified options take their defaults
 *
 * @throws ConfigurationError listing every invalid option
 */
export const resolveConfig = (input: ResearchConfigInput = {}): ResearchConfig => {
  const result = ResearchConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError('Invalid research configuration', issues);
  }
  return Object.freeze(result.data);
};

// ---------- Environment ----------

type Env = Readonly<Record<string, string | undefined>>;

const parseInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  // keep non-numeric input so validation reports it instead of silently defaulting
  return Number.isNaN(parsed) ? Number.NaN : parsed;
};

const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim().toLowerCase() === 'true';
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value.trim();

/**
 * Build a configuration input from environment variables
 */
export const readEnvConfig = (env: Env = process.env): ResearchConfigInput => {
  const llmProvider = nonEmpty(env.LLM_PROVIDER);
  const baseUrl =
    llmProvider === 'lmstudio' ? nonEmpty(env.LMSTUDIO_BASE_URL) :
    llmProvider === 'openai' ? nonEmpty(env.OPENAI_BASE_URL) :
    nonEmpty(env.OLLAMA_BASE_URL);

  const input: Record<string, unknown> = {
    maxLoops: parseInteger(env.MAX_WEB_RESEARCH_LOOPS),
    searchApi: nonEmpty(env.SEARCH_API),
    fetchFullPage: parseBoolean(env.FETCH_FULL_PAGE),
    llmProvider,
    llmModel: nonEmpty(env.LOCAL_LLM),
    llmBaseUrl: baseUrl,
    stripThinkingTokens: parseBoolean(env.STRIP_THINKING_TOKENS),
    embeddingModel: nonEmpty(env.EMBEDDING_MODEL),
    embeddingDimension: parseInteger(env.EMBEDDING_DIMENSION),
    callTimeoutMs: parseInteger(env.DELVE_CALL_TIMEOUT_MS),
    maxRetries: parseInteger(env.DELVE_MAX_RETRIES),
    retryDelayMs: parseInteger(env.DELVE_RETRY_DELAY_MS),
    historyPath: nonEmpty(env.DELVE_HISTORY_PATH),
    enableLedger: parseBoolean(env.DELVE_LEDGER),
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    firecrawlApiKey: nonEmpty(env.FIRECRAWL_API_KEY),
    firecrawlApiUrl: nonEmpty(env.FIRECRAWL_BASE_URL),
    searxngUrl: nonEmpty(env.SEARXNG_URL),
    tavilyApiKey: nonEmpty(env.TAVILY_API_KEY),
    perplexityApiKey: nonEmpty(env.PERPLEXITY_API_KEY),
    perplexityModel: nonEmpty(env.PERPLEXITY_MODEL)
  };

  // drop unset keys so schema defaults apply
  const defined = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
  return ResearchConfigSchema.partial().parse(defined);
};

/**
 * Environment-aware configuration: env values first, then explicit overrides
 */
export const createConfigFromEnv = (
  env: Env = process.env,
  overrides: ResearchConfigInput = {}
): ResearchConfig => {
  let fromEnv: ResearchConfigInput;
  try {
    fromEnv = readEnvConfig(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigurationError(
        'Invalid environment configuration',
        error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
  return resolveConfig({ ...fromEnv, ...overrides });
};
