import { LoopPhase, Query, ReflectionResult, SessionStatus } from './types';

/**
 * Progress events emitted while a session runs
 */

interface EventBase {
  readonly sessionId: string;
  /** 1-based iteration the event belongs to; 0 before the first */
  readonly loop: number;
  /** Overall progress, 0-100 */
  readonly progress: number;
  readonly timestamp: Date;
}

export type ResearchEventBody =
  | { readonly type: 'phase'; readonly phase: LoopPhase }
  | { readonly type: 'query'; readonly query: Query }
  | { readonly type: 'sources'; readonly added: number; readonly total: number }
  | { readonly type: 'summary'; readonly length: number }
  | { readonly type: 'reflection'; readonly reflection: ReflectionResult }
  | { readonly type: 'retry'; readonly operation: string; readonly attempt: number; readonly error: string }
  | { readonly type: 'degraded'; readonly reason: string }
  | { readonly type: 'completed'; readonly status: SessionStatus; readonly loopCount: number; readonly degraded: boolean };

export type ResearchEvent = EventBase & ResearchEventBody;

export type ResearchEventType = ResearchEvent['type'];

export type EventListener = (event: ResearchEvent) => void;

const PHASE_OFFSET: Record<LoopPhase, number> = {
  initializing: 0,
  querying: 0,
  searching: 0.2,
  deduplicating: 0.4,
  summarizing: 0.6,
  reflecting: 0.8,
  finalizing: 1
};

/**
 * Overall completion for a phase of iteration `loop` out of `maxLoops`
 *
 * Each iteration owns an equal slice; finalizing is always 100.
 */
export const progressOf = (phase: LoopPhase, loop: number, maxLoops: number): number => {
  if (phase === 'finalizing') return 100;
  if (phase === 'initializing' || loop < 1 || maxLoops < 1) return 0;
  const value = ((loop - 1 + PHASE_OFFSET[phase]) / maxLoops) * 100;
  return Math.min(99, Math.round(value));
};
