import { newId } from './utils';

/**
 * Per-run event ledger
 *
 * Each research run owns one ledger; nothing is shared between sessions.
 * A disabled ledger drops events.
 */

const MAX_EVENTS = 1000;
const CLEANUP_THRESHOLD = 1200; // trim back to MAX_EVENTS past this

export interface LedgerEvent {
  readonly id: string;
  readonly name: string;
  readonly timestamp: Date;
  readonly data?: unknown;
}

export class EventLedger {
  private events: LedgerEvent[] = [];
  private enabled: boolean;

  constructor(options: { enabled?: boolean } = {}) {
    this.enabled = options.enabled ?? true;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
    this.events = [];
  }

  logEvent(name: string, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({ id: newId(), name, timestamp: new Date(), data });
    this.cleanupIfNeeded();
  }

  getEvents(limit = 100): LedgerEvent[] {
    return this.events.slice(-limit);
  }

  getEventsByName(name: string): LedgerEvent[] {
    return this.events.filter(event => event.name === name);
  }

  clear(): void {
    this.events = [];
  }

  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const event of this.events) {
      stats[event.name] = (stats[event.name] ?? 0) + 1;
    }
    return stats;
  }

  get size(): number {
    return this.events.length;
  }

  private cleanupIfNeeded(): void {
    if (this.events.length > CLEANUP_THRESHOLD) {
      this.events = this.events.slice(-MAX_EVENTS);
    }
  }
}
