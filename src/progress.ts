import chalk from 'chalk';
import { ResearchEvent } from '../packages/delve-core/src';

/**
 * Terminal rendering of research progress events
 */

const percent = (progress: number): string => chalk.gray(`[${String(progress).padStart(3)}%]`);

/**
 * One line for an event, or undefined for events not worth showing
 */
export function formatEvent(event: ResearchEvent): string | undefined {
  switch (event.type) {
    case 'phase':
      if (event.phase === 'finalizing') return undefined;
      return `${percent(event.progress)} loop ${event.loop}: ${event.phase}`;
    case 'query':
      return `       query: ${chalk.cyan(`"${event.query.text}"`)}`;
    case 'sources':
      return `       sources: +${event.added} (${event.total} total)`;
    case 'summary':
      return `       summary: ${event.length} chars`;
    case 'reflection':
      return event.reflection.isSufficient
        ? `       reflection: ${chalk.green('coverage sufficient')}`
        : `       reflection: gap - ${event.reflection.knowledgeGap || 'unspecified'}`;
    case 'retry':
      return chalk.yellow(`       retry: ${event.operation} attempt ${event.attempt} failed (${event.error})`);
    case 'degraded':
      return chalk.red(`       stopped early: ${event.reason}`);
    case 'completed': {
      const loops = `${event.loopCount} loop${event.loopCount === 1 ? '' : 's'}`;
      const line = `${percent(event.progress)} ${event.status} after ${loops}`;
      return event.degraded ? `${line} ${chalk.yellow('(partial)')}` : line;
    }
  }
}

/**
 * Listener that writes formatted events to `write`
 */
export const progressPrinter = (write: (line: string) => void) => (event: ResearchEvent): void => {
  const line = formatEvent(event);
  if (line !== undefined) write(line);
};
