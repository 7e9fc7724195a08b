/**
 * Delve - iterative web research
 * Public API surface
 */

// ---------- Core Types ----------
export type {
  BaseContext,
  Step,
  SessionStatus,
  LoopPhase,
  Discovery,
  Source,
  Query,
  ReflectionResult,
  ResearchSession,
  HistoryRecord,
  SimilarRecord
} from './types';

// ---------- Core Composition ----------
export { sequence, loopWhile, step, identity } from './composition';
export { updateState } from './lenses';

// ---------- Errors ----------
export {
  DelveError,
  ProviderError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  ProviderMalformedResponseError,
  SearchUnavailableError,
  SearchRateLimitedError,
  ParseError,
  ReflectionParseError,
  SummaryGenerationError,
  ConfigurationError,
  InvalidArgumentError,
  StoreError,
  StoreWriteError,
  isFatal,
  errorMessage
} from './errors';

// ---------- Configuration & Logging ----------
export {
  ResearchConfigSchema,
  resolveConfig,
  readEnvConfig,
  createConfigFromEnv,
  SEARCH_APIS,
  LLM_PROVIDERS,
  RELEVANCE_SCORERS,
  MIN_LOOPS,
  MAX_LOOPS
} from './config';
export type { ResearchConfig, ResearchConfigInput, SearchApi, LlmProviderName, RelevanceScorerName } from './config';
export { createLogger, setLogLevel } from './logger';
export type { LogLevel, CategoryLogger } from './logger';
export { EventLedger } from './ledger';
export type { LedgerEvent } from './ledger';

// ---------- Providers ----------
export {
  OpenAICompatibleProvider,
  OpenAICompatibleEmbedder,
  createLLMProvider,
  createEmbeddingProvider,
  parseStructured,
  stripThinkingTokens
} from './llm';
export type { LLMProvider, EmbeddingProvider, Prompt } from './llm';
export { FirecrawlSearch, SearxngSearch, DuckDuckGoSearch, TavilySearch, PerplexitySearch, createSearchProvider } from './search';
export type { SearchProvider, SearchHit } from './search';
export { retry, withTimeout, guardedCall } from './resilience';
export type { RetryOptions, CallPolicy } from './resilience';

// ---------- Research Components ----------
export {
  SourceDeduplicator,
  LexicalOverlapScorer,
  EmbeddingSimilarityScorer,
  normalizeUrl,
  fingerprint,
  mergeSources
} from './dedup';
export type { RelevanceScorer } from './dedup';
export { Summarizer } from './summarizer';
export { ReflectionEngine } from './reflection';
export { HistoryStore } from './history-store';
export type { HistoryStats, HistoryStoreOptions } from './history-store';
export { composeReport, rankSources } from './report';
export { progressOf } from './events';
export type { ResearchEvent, ResearchEventType, EventListener } from './events';
export { ResearchLoopController } from './controller';
export type { ControllerDependencies, RunOptions, ResearchOptions, ResearchOutcome } from './controller';

// ---------- High-Level API ----------
import { ResearchConfig } from './config';
import { ResearchLoopController } from './controller';
import { createEmbeddingProvider, createLLMProvider } from './llm';
import { createSearchProvider } from './search';

/**
 * Controller wired to the providers named in `config`
 */
export function createResearcher(config: ResearchConfig): ResearchLoopController {
  return new ResearchLoopController(config, {
    llm: createLLMProvider(config),
    search: createSearchProvider(config),
    ...(config.relevanceScorer === 'embedding' ? { embedder: createEmbeddingProvider(config) } : {})
  });
}

