/**
 * ResearchLoopController - the iterative research state machine
 *
 * initializing -> querying -> searching -> deduplicating -> summarizing
 *   -> reflecting -> (querying | finalizing)
 *
 * Each iteration is a sequence of Steps over LoopState. An iteration that
 * fails past the retry budget is aborted and the session finalizes with what
 * it has, flagged as degraded. Cancellation is checked between iterations and
 * takes the same path.
 */

import { sequence, step, loopWhile } from './composition';
import { ResearchConfig, MIN_LOOPS, MAX_LOOPS } from './config';
import { SourceDeduplicator, EmbeddingSimilarityScorer, LexicalOverlapScorer, RelevanceScorer, mergeSources } from './dedup';
import { ConfigurationError, InvalidArgumentError, StoreError, StoreWriteError, errorMessage } from './errors';
import { EventListener, ResearchEvent, ResearchEventBody, progressOf } from './events';
import { HistoryStore } from './history-store';
import { EventLedger } from './ledger';
import { updateState } from './lenses';
import { EmbeddingProvider, LLMProvider } from './llm';
import { createLogger } from './logger';
import { followUpQuery, writeInitialQuery } from './query-writer';
import { ReflectionEngine } from './reflection';
import { composeReport } from './report';
import { CallPolicy, guardedCall } from './resilience';
import { SearchHit, SearchProvider } from './search';
import { Summarizer } from './summarizer';
import { LoopPhase, Query, ReflectionResult, ResearchSession, Source, Step } from './types';
import { newId } from './utils';

const log = createLogger('Controller');

export interface ControllerDependencies {
  readonly llm: LLMProvider;
  readonly search: SearchProvider;
  /** Required when relevanceScorer is 'embedding' */
  readonly embedder?: EmbeddingProvider;
  readonly now?: () => Date;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
  readonly onEvent?: EventListener;
  /** Defaults to a fresh ledger, enabled by `enableLedger` */
  readonly ledger?: EventLedger;
}

export interface ResearchOptions extends RunOptions {
  readonly historyStore?: HistoryStore;
  readonly maxLoops?: number;
}

export interface ResearchOutcome {
  readonly session: ResearchSession;
  /** Set when the session finished but could not be saved to history */
  readonly storeError?: StoreError;
}

/**
 * State threaded through one iteration
 */
type LoopState = {
  readonly session: ResearchSession;
  /** 1-based index of the iteration in progress */
  readonly loopIndex: number;
  readonly query?: Query;
  readonly hits: readonly SearchHit[];
  readonly fresh: readonly Source[];
  readonly reflection?: ReflectionResult;
};

/**
 * Everything one run owns; nothing here is shared across sessions
 */
interface RunContext {
  readonly policy: CallPolicy;
  readonly summarizer: Summarizer;
  readonly reflection: ReflectionEngine;
  readonly deduplicator: SourceDeduplicator;
  readonly emit: (session: ResearchSession, loop: number, body: ResearchEventBody) => void;
  readonly signal?: AbortSignal;
}

const CANCELLED = 'cancelled';

export class ResearchLoopController {
  private readonly now: () => Date;

  constructor(
    private readonly config: ResearchConfig,
    private readonly deps: ControllerDependencies
  ) {
    this.now = deps.now ?? (() => new Date());
    if (config.relevanceScorer === 'embedding' && !deps.embedder) {
      throw new ConfigurationError('Embedding relevance scoring needs an embedding provider', ['embedder: missing']);
    }
  }

  /**
   * Create a session ready for its first query
   *
   * @throws ConfigurationError for a blank topic or maxLoops outside [1, 10]
   */
  start(topic: string, config: Pick<ResearchConfig, 'maxLoops'> = this.config): ResearchSession {
    const trimmed = topic.trim();
    const issues: string[] = [];
    if (!trimmed) {
      issues.push('topic: must not be empty');
    }
    if (!Number.isInteger(config.maxLoops) || config.maxLoops < MIN_LOOPS || config.maxLoops > MAX_LOOPS) {
      issues.push(`maxLoops: must be an integer in [${MIN_LOOPS}, ${MAX_LOOPS}], got ${config.maxLoops}`);
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Cannot start research session', issues);
    }

    return {
      id: newId(),
      topic: trimmed,
      createdAt: this.now(),
      status: 'running',
      phase: 'querying',
      loopCount: 0,
      maxLoops: config.maxLoops,
      sources: [],
      queries: [],
      degraded: false
    };
  }

  /**
   * Drive a session to completion
   *
   * Never rejects for provider failures: those end the session degraded.
   *
   * @throws InvalidArgumentError when the session has already finished
   */
  async run(session: ResearchSession, options: RunOptions = {}): Promise<ResearchSession> {
    if (session.status !== 'running') {
      throw new InvalidArgumentError(`Session ${session.id} has already finished (${session.status})`);
    }

    const ledger = options.ledger ?? new EventLedger({ enabled: this.config.enableLedger });
    const ctx = this.createContext(options, ledger);

    ledger.logEvent('session:start', { sessionId: session.id, topic: session.topic, maxLoops: session.maxLoops });
    log.info(`researching "${session.topic}"`, { sessionId: session.id, maxLoops: session.maxLoops });

    const iteration = this.guardIteration(this.buildIteration(ctx), ctx);
    const keepGoing = (state: LoopState): boolean => {
      if (state.session.phase === 'finalizing') return false;
      if (ctx.signal?.aborted) return false;
      return state.session.loopCount < state.session.maxLoops;
    };

    const loop = loopWhile(keepGoing, iteration, session.maxLoops);
    const initial: LoopState = { session, loopIndex: session.loopCount, hits: [], fresh: [] };
    const done = await loop(initial);

    let finalSession = done.session;
    if (finalSession.phase !== 'finalizing' && ctx.signal?.aborted) {
      finalSession = this.degrade(finalSession, CANCELLED, ctx);
    }

    const result = this.finalize(finalSession, ctx);
    ledger.logEvent('session:end', { sessionId: result.id, status: result.status, loopCount: result.loopCount });
    return result;
  }

  /**
   * start, run, then save to history when a store is given
   *
   * A failed save is logged and returned beside the finished session as a StoreError.
   */
  async research(topic: string, options: ResearchOptions = {}): Promise<ResearchOutcome> {
    const session = this.start(topic, { maxLoops: options.maxLoops ?? this.config.maxLoops });
    const finished = await this.run(session, options);

    if (!options.historyStore) {
      return { session: finished };
    }
    if (finished.status !== 'completed') {
      log.info(`session ${finished.id} ${finished.status}, not saved to history`);
      return { session: finished };
    }

    try {
      await options.historyStore.save(finished);
      return { session: finished };
    } catch (error) {
      const storeError = error instanceof StoreError
        ? error
        : new StoreWriteError(`Failed to save session ${finished.id}: ${errorMessage(error)}`, { cause: error });
      log.error(`could not save session ${finished.id}: ${storeError.message}`);
      return { session: finished, storeError };
    }
  }

  // ---------- Iteration ----------

  private buildIteration(ctx: RunContext): Step<LoopState>[] {
    const { config } = this;

    const enterPhase = (state: LoopState, phase: LoopPhase): LoopState => {
      const session = { ...state.session, phase };
      ctx.emit(session, state.loopIndex, { type: 'phase', phase });
      return { ...state, session };
    };

    const obtainQuery = step<LoopState>('query', async state => {
      const loopIndex = state.session.loopCount + 1;
      const begun = enterPhase({ ...state, loopIndex, hits: [], fresh: [] }, 'querying');

      const query = loopIndex === 1
        ? await writeInitialQuery(begun.session.topic, config.refineInitialQuery ? this.deps.llm : undefined, ctx.policy, this.now())
        : followUpQuery(begun.session.topic, loopIndex, state.reflection?.followUpQuery, state.reflection?.knowledgeGap);

      const session = { ...begun.session, queries: [...begun.session.queries, query] };
      ctx.emit(session, loopIndex, { type: 'query', query });
      return { ...begun, session, query, reflection: undefined };
    });

    const search = step<LoopState>('search', async state => {
      const next = enterPhase(state, 'searching');
      const query = currentQuery(next);
      const hits = await guardedCall(
        'Search',
        'search',
        () => this.deps.search.search(query.text, config.fetchFullPage),
        ctx.policy
      );
      return updateState<LoopState>({ hits })(next);
    });

    const deduplicate = step<LoopState>('deduplicate', async state => {
      const next = enterPhase(state, 'deduplicating');
      const known = new Set(next.session.sources.map(source => source.fingerprint));
      const fresh = await ctx.deduplicator.filter(next.hits, known, currentQuery(next));
      ctx.emit(next.session, next.loopIndex, {
        type: 'sources',
        added: fresh.length,
        total: mergeSources(next.session.sources, fresh).length
      });
      return updateState<LoopState>({ fresh })(next);
    });

    // sources are committed together with the summary that covers them
    const summarize = step<LoopState>('summarize', async state => {
      const next = enterPhase(state, 'summarizing');
      const summary = await ctx.summarizer.summarize(next.session.runningSummary, next.fresh, next.session.topic);
      const session: ResearchSession = {
        ...next.session,
        sources: mergeSources(next.session.sources, next.fresh),
        ...(summary ? { runningSummary: summary } : {}),
        loopCount: next.loopIndex
      };
      ctx.emit(session, next.loopIndex, { type: 'summary', length: summary.length });
      return { ...next, session };
    });

    const reflect = step<LoopState>('reflect', async state => {
      const next = enterPhase(state, 'reflecting');
      const reflection = await ctx.reflection.reflect(next.session.topic, next.session.runningSummary ?? '');
      ctx.emit(next.session, next.loopIndex, { type: 'reflection', reflection });
      return { ...next, reflection };
    });

    const decide = step<LoopState>('decide', state => {
      const sufficient = state.reflection?.isSufficient === true;
      const exhausted = state.session.loopCount >= state.session.maxLoops;
      if (!sufficient && !exhausted) return state;

      log.info(sufficient ? 'reflection reports sufficient coverage' : 'loop budget reached', {
        sessionId: state.session.id,
        loopCount: state.session.loopCount
      });
      return enterPhase(state, 'finalizing');
    });

    return [obtainQuery, search, deduplicate, summarize, reflect, decide];
  }

  /**
   * Run one iteration; if a step throws, the iteration is aborted and the
   * session finalizes degraded with whatever the completed steps committed.
   * The aborted iteration still counts toward loopCount.
   */
  private guardIteration(steps: Step<LoopState>[], ctx: RunContext): Step<LoopState> {
    return async state => {
      const loopIndex = state.session.loopCount + 1;
      let latest = state;
      const checkpointed = steps.map(phaseStep => async (current: LoopState) => {
        latest = await phaseStep(current);
        return latest;
      });

      try {
        return await sequence(checkpointed)(state);
      } catch (error) {
        log.warn(`iteration ${loopIndex} aborted: ${errorMessage(error)}`, { sessionId: state.session.id });
        const session: ResearchSession = {
          ...latest.session,
          loopCount: Math.min(latest.session.maxLoops, loopIndex)
        };
        // a cancel that cut a retry short is still a cancel
        const reason = ctx.signal?.aborted ? CANCELLED : errorMessage(error);
        return { ...latest, loopIndex, session: this.degrade(session, reason, ctx) };
      }
    };
  }

  private degrade(session: ResearchSession, reason: string, ctx: RunContext): ResearchSession {
    const degraded: ResearchSession = { ...session, phase: 'finalizing', degraded: true, failureReason: reason };
    ctx.emit(degraded, degraded.loopCount, { type: 'degraded', reason });
    return degraded;
  }

  /**
   * Compose the report and settle the terminal status
   *
   * A degraded session with no summary has nothing to report and ends failed.
   */
  private finalize(session: ResearchSession, ctx: RunContext): ResearchSession {
    const atFinal: ResearchSession = session.phase === 'finalizing' ? session : { ...session, phase: 'finalizing' };
    const failed = atFinal.degraded && !atFinal.runningSummary;

    const finished: ResearchSession = {
      ...atFinal,
      status: failed ? 'failed' : 'completed',
      finalReport: composeReport(atFinal),
      completedAt: this.now()
    };

    ctx.emit(finished, finished.loopCount, {
      type: 'completed',
      status: finished.status,
      loopCount: finished.loopCount,
      degraded: finished.degraded
    });
    log.info(`session ${finished.status}`, {
      sessionId: finished.id,
      loopCount: finished.loopCount,
      sources: finished.sources.length,
      degraded: finished.degraded
    });
    return finished;
  }

  // ---------- Wiring ----------

  private createContext(options: RunOptions, ledger: EventLedger): RunContext {
    const { config } = this;

    let latest: { readonly session: ResearchSession; readonly loop: number } | undefined;

    const emit = (session: ResearchSession, loop: number, body: ResearchEventBody): void => {
      latest = { session, loop };
      const event: ResearchEvent = {
        ...body,
        sessionId: session.id,
        loop,
        progress: body.type === 'completed' ? 100 : progressOf(session.phase, loop, session.maxLoops),
        timestamp: this.now()
      };
      ledger.logEvent(event.type, event);
      if (!options.onEvent) return;
      try {
        options.onEvent(event);
      } catch (error) {
        log.warn(`event listener threw: ${errorMessage(error)}`);
      }
    };

    const policy: CallPolicy = {
      timeoutMs: config.callTimeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      signal: options.signal,
      onRetry: (operation, error, attempt) => {
        log.warn(`${operation} failed (attempt ${attempt}), retrying: ${errorMessage(error)}`);
        if (latest) {
          emit(latest.session, latest.loop, { type: 'retry', operation, attempt, error: errorMessage(error) });
        }
      }
    };

    const scorer: RelevanceScorer = config.relevanceScorer === 'embedding' && this.deps.embedder
      ? new EmbeddingSimilarityScorer(this.deps.embedder, policy)
      : new LexicalOverlapScorer();

    return {
      policy,
      summarizer: new Summarizer(this.deps.llm, config, policy),
      reflection: new ReflectionEngine(this.deps.llm, policy),
      deduplicator: new SourceDeduplicator({ scorer, fingerprintChars: config.fingerprintChars, now: this.now }),
      emit,
      signal: options.signal
    };
  }
}

const currentQuery = (state: LoopState): Query => {
  if (!state.query) {
    throw new InvalidArgumentError(`No query for iteration ${state.loopIndex}`);
  }
  return state.query;
};
