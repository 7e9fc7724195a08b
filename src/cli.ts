#!/usr/bin/env node

/**
 * delve command line
 *
 *   delve research <topic>   run a research session and print the report
 *   delve similar <text>     search the research history
 *   delve history            list recent sessions
 */

import 'dotenv/config';
import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import chalk from 'chalk';
import { promises as fs } from 'fs';
import {
  CallPolicy,
  ConfigurationError,
  HistoryStore,
  ResearchConfig,
  ResearchConfigInput,
  SEARCH_APIS,
  SearchApi,
  createConfigFromEnv,
  createEmbeddingProvider,
  createResearcher,
  errorMessage,
  setLogLevel
} from '../packages/delve-core/src';
import { progressPrinter } from './progress';

const VERSION = '0.3.0';

interface ResearchCommandOptions {
  maxLoops?: number;
  search?: string;
  fullPage: boolean;
  save: boolean;
  output?: string;
  quiet?: boolean;
}

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CommanderArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const parseSearchApi = (value: string | undefined): SearchApi | undefined => {
  if (value === undefined) return undefined;
  const api = SEARCH_APIS.find(name => name === value);
  if (!api) {
    throw new ConfigurationError('Unknown search backend', [`search: expected one of ${SEARCH_APIS.join(', ')}, got ${value}`]);
  }
  return api;
};

const storePolicy = (config: ResearchConfig): CallPolicy => ({
  timeoutMs: config.callTimeoutMs,
  maxRetries: config.maxRetries,
  retryDelayMs: config.retryDelayMs
});

const openHistory = (config: ResearchConfig): HistoryStore =>
  HistoryStore.open({
    path: config.historyPath,
    embedder: createEmbeddingProvider(config),
    policy: storePolicy(config)
  });

const withHistory = async (config: ResearchConfig, fn: (store: HistoryStore) => Promise<void> | void): Promise<void> => {
  const store = openHistory(config);
  try {
    await fn(store);
  } finally {
    store.close();
  }
};

const program = new Command();

program
  .name('delve')
  .description('Iterative web research with self-reflection and a searchable research history')
  .version(VERSION)
  .option('-v, --verbose', 'debug logging')
  .hook('preAction', command => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug');
    } else if (!process.env.LOG_LEVEL) {
      // keep stdout for the report
      setLogLevel('warn');
    }
  });

// research
program
  .command('research <topic>')
  .description('Research a topic and print a markdown report')
  .option('-l, --max-loops <n>', 'maximum research iterations (1-10)', parsePositiveInteger)
  .option('-s, --search <api>', `search backend (${SEARCH_APIS.join(' | ')})`)
  .option('--no-full-page', 'use search snippets only')
  .option('--no-save', 'do not record the session in history')
  .option('-o, --output <file>', 'write the report to a file')
  .option('-q, --quiet', 'no progress output')
  .action(async (topic: string, options: ResearchCommandOptions) => {
    const searchApi = parseSearchApi(options.search);
    const overrides: ResearchConfigInput = {
      fetchFullPage: options.fullPage,
      ...(options.maxLoops === undefined ? {} : { maxLoops: options.maxLoops }),
      ...(searchApi ? { searchApi } : {})
    };
    const config = createConfigFromEnv(process.env, overrides);

    const researcher = createResearcher(config);
    const historyStore = options.save ? openHistory(config) : undefined;

    const abort = new AbortController();
    const onInterrupt = () => {
      console.error(chalk.yellow('\nInterrupted: finishing with what has been gathered...'));
      abort.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const { session, storeError } = await researcher.research(topic, {
        historyStore,
        signal: abort.signal,
        onEvent: options.quiet ? undefined : progressPrinter(line => console.error(line))
      });

      const report = session.finalReport ?? '';
      if (options.output) {
        await fs.writeFile(options.output, report, 'utf8');
        console.error(chalk.green(`Report written to ${options.output}`));
      } else {
        process.stdout.write(report);
      }

      if (storeError) {
        console.error(chalk.yellow(`Warning: session not saved to history: ${storeError.message}`));
      }
      if (session.status === 'failed') {
        process.exitCode = 1;
      }
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      historyStore?.close();
    }
  });

// similar
program
  .command('similar <text>')
  .description('Find past research sessions similar to the text')
  .option('-k, --top <k>', 'number of results', parsePositiveInteger, 5)
  .action(async (text: string, options: { top: number }) => {
    const config = createConfigFromEnv();
    await withHistory(config, async store => {
      const results = await store.querySimilar(text, options.top);
      if (results.length === 0) {
        console.log(chalk.gray('No research history yet.'));
        return;
      }
      for (const { record, similarity } of results) {
        console.log(`${chalk.cyan(similarity.toFixed(3))}  ${record.topic}  ${chalk.gray(record.storedAt.toISOString())}`);
        console.log(chalk.gray(`       ${record.sessionId} · ${record.sources.length} sources`));
      }
    });
  });

// history
program
  .command('history')
  .description('List recent research sessions')
  .option('-n, --limit <n>', 'number of sessions', parsePositiveInteger, 10)
  .action(async (options: { limit: number }) => {
    const config = createConfigFromEnv();
    await withHistory(config, store => {
      const stats = store.stats();
      console.log(chalk.gray(`${stats.totalRecords} sessions · ${stats.embeddingModel} (${stats.dimension}d) · ${config.historyPath}\n`));
      for (const record of store.recent(options.limit)) {
        console.log(`${chalk.gray(record.storedAt.toISOString())}  ${record.topic}`);
      }
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`error: ${errorMessage(error)}`));
  process.exitCode = 1;
});
