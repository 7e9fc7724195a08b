/**
 * Delve - Type System
 * Step/state primitives plus the research domain model
 */

// ---------- Core Types ----------

/**
 * Base context type - simple, extensible record
 */
export interface BaseContext {
  readonly [key: string]: unknown;
}

/**
 * Step type - Kleisli arrow that transforms state in the Promise monad
 */
export type Step<T extends BaseContext = BaseContext> = (state: T) => Promise<T>;

// ---------- Research Domain ----------

export type SessionStatus = 'running' | 'completed' | 'failed';

export type LoopPhase =
  | 'initializing'
  | 'querying'
  | 'searching'
  | 'deduplicating'
  | 'summarizing'
  | 'reflecting'
  | 'finalizing';

/**
 * One (query, iteration) pair that surfaced a source
 */
export interface Discovery {
  readonly query: string;
  readonly loopIndex: number;
}

export interface Source {
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
  readonly rawContent?: string;
  readonly fetchedAt: Date;
  /** In [0,1]; recomputed every time the source is considered */
  readonly relevanceScore: number;
  readonly fingerprint: string;
  readonly discoveries: readonly Discovery[];
}

export interface Query {
  readonly text: string;
  readonly loopIndex: number;
  readonly rationale?: string;
}

export interface ReflectionResult {
  readonly isSufficient: boolean;
  readonly knowledgeGap: string;
  readonly followUpQuery?: string;
}

export interface ResearchSession {
  readonly id: string;
  readonly topic: string;
  readonly createdAt: Date;
  readonly status: SessionStatus;
  readonly phase: LoopPhase;
  readonly loopCount: number;
  readonly maxLoops: number;
  readonly runningSummary?: string;
  readonly sources: readonly Source[];
  readonly queries: readonly Query[];
  readonly finalReport?: string;
  readonly degraded: boolean;
  readonly failureReason?: string;
  readonly completedAt?: Date;
}

export interface HistoryRecord {
  readonly sessionId: string;
  readonly topic: string;
  readonly summary: string;
  readonly sources: readonly string[];
  readonly embedding: readonly number[];
  readonly embeddingModel: string;
  readonly storedAt: Date;
}

export interface SimilarRecord {
  readonly record: HistoryRecord;
  readonly similarity: number;
}
