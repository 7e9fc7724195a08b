/**
 * HistoryStore - append-only research history in SQLite
 *
 * One row per finished session, holding the summary and an embedding of
 * `topic + "\n\n" + summary` for similarity search. The embedding dimension is
 * fixed when the store is created and checked every time it is opened.
 *
 * @example
 * const store = HistoryStore.open({ path: 'research_history.db', embedder });
 * await store.save(session);
 * const similar = await store.querySimilar('quantum error correction', 5);
 * store.close();
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, InvalidArgumentError, StoreError, StoreWriteError, errorMessage } from './errors';
import { EmbeddingProvider } from './llm';
import { createLogger } from './logger';
import { rankSources } from './report';
import { CallPolicy, guardedCall } from './resilience';
import { HistoryRecord, ResearchSession, SimilarRecord } from './types';
import { cosineSimilarity } from './utils';

const log = createLogger('HistoryStore');

const SCHEMA = `
CREATE TABLE IF NOT EXISTS research_history (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL UNIQUE,
    topic TEXT NOT NULL,
    summary TEXT NOT NULL,
    sources TEXT NOT NULL,
    embedding BLOB NOT NULL,
    embedding_model TEXT NOT NULL,
    dimension INTEGER NOT NULL,
    stored_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_research_history_stored_at ON research_history(stored_at);

CREATE TABLE IF NOT EXISTS history_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

interface HistoryRow {
  seq: number;
  session_id: string;
  topic: string;
  summary: string;
  sources: string;
  embedding: Buffer;
  embedding_model: string;
  dimension: number;
  stored_at: string;
}

interface MetaRow {
  value: string;
}

export interface HistoryStats {
  readonly totalRecords: number;
  readonly embeddingModel: string;
  readonly dimension: number;
}

export interface HistoryStoreOptions {
  /** File path, or ':memory:' */
  readonly path: string;
  readonly embedder: EmbeddingProvider;
  /** Timeout and retry policy for embedding calls */
  readonly policy?: CallPolicy;
  readonly now?: () => Date;
}

// ---------- Encoding ----------

const encodeVector = (vector: readonly number[]): Buffer => Buffer.from(new Float64Array(vector).buffer);

const decodeVector = (blob: Buffer): number[] => {
  // copy: the blob's offset inside its pool is not guaranteed to be 8-byte aligned
  const bytes = new Uint8Array(blob);
  return Array.from(new Float64Array(bytes.buffer, 0, bytes.byteLength / Float64Array.BYTES_PER_ELEMENT));
};

const parseSources = (json: string): string[] => {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((url): url is string => typeof url === 'string') : [];
};

const toRecord = (row: HistoryRow): HistoryRecord => ({
  sessionId: row.session_id,
  topic: row.topic,
  summary: row.summary,
  sources: parseSources(row.sources),
  embedding: decodeVector(row.embedding),
  embeddingModel: row.embedding_model,
  storedAt: new Date(row.stored_at)
});

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error &&
  (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');

const requirePositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
};

// ---------- Store ----------

export class HistoryStore {
  private writeQueue: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  private constructor(
    private readonly db: Database.Database,
    private readonly embedder: EmbeddingProvider,
    private readonly embeddingModel: string,
    private readonly policy?: CallPolicy,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * Open (or create) a store
   *
   * @throws ConfigurationError when the store was created with a different
   * embedding dimension than `embedder` produces
   */
  static open(options: HistoryStoreOptions): HistoryStore {
    const { embedder } = options;
    if (!Number.isInteger(embedder.dimension) || embedder.dimension < 1) {
      throw new ConfigurationError('Invalid embedding dimension', [`dimension: ${embedder.dimension}`]);
    }

    if (options.path !== ':memory:') {
      const dir = path.dirname(options.path);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    let db: Database.Database;
    try {
      db = new Database(options.path);
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    } catch (error) {
      throw new StoreError(`Cannot open history store at ${options.path}: ${errorMessage(error)}`, 'STORE_OPEN_ERROR', { cause: error });
    }

    try {
      const embeddingModel = HistoryStore.checkMetadata(db, embedder);
      log.info(`opened ${options.path}`, { dimension: embedder.dimension, embeddingModel });
      return new HistoryStore(db, embedder, embeddingModel, options.policy, options.now);
    } catch (error) {
      db.close();
      throw error;
    }
  }

  private static checkMetadata(db: Database.Database, embedder: EmbeddingProvider): string {
    const readMeta = db.prepare<[string], MetaRow>('SELECT value FROM history_meta WHERE key = ?');
    const storedDimension = readMeta.get('dimension');
    const storedModel = readMeta.get('embedding_model');

    if (!storedDimension || !storedModel) {
      const writeMeta = db.prepare<[string, string]>('INSERT OR REPLACE INTO history_meta (key, value) VALUES (?, ?)');
      db.transaction(() => {
        writeMeta.run('dimension', String(embedder.dimension));
        writeMeta.run('embedding_model', embedder.model);
      })();
    } else if (Number(storedDimension.value) !== embedder.dimension) {
      throw new ConfigurationError('Embedding dimension mismatch', [
        `store dimension ${storedDimension.value}`,
        `embedder ${embedder.model} dimension ${embedder.dimension}`
      ]);
    } else if (storedModel.value !== embedder.model) {
      log.warn(`store was built with ${storedModel.value}, now embedding with ${embedder.model}`);
    }

    const stray = db
      .prepare<[number], { dimension: number }>('SELECT DISTINCT dimension FROM research_history WHERE dimension != ?')
      .all(embedder.dimension);
    if (stray.length > 0) {
      throw new ConfigurationError('Stored vectors disagree with the embedding dimension', stray.map(row => `found dimension ${row.dimension}`));
    }

    return storedModel?.value ?? embedder.model;
  }

  /**
   * Persist a finished session
   *
   * Writes are serialized per store; each is a single INSERT.
   *
   * @throws StoreWriteError on a duplicate session id or database failure
   * @throws ConfigurationError when the embedding has the wrong length
   */
  save(session: ResearchSession): Promise<HistoryRecord> {
    return this.enqueue(async () => {
      const summary = session.runningSummary ?? '';
      const embedding = await this.embed(`${session.topic}\n\n${summary}`);

      const record: HistoryRecord = {
        sessionId: session.id,
        topic: session.topic,
        summary,
        sources: rankSources(session.sources).map(source => source.url),
        embedding,
        embeddingModel: this.embedder.model,
        storedAt: this.now()
      };

      try {
        this.db.prepare(`
          INSERT INTO research_history
            (session_id, topic, summary, sources, embedding, embedding_model, dimension, stored_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          record.sessionId,
          record.topic,
          record.summary,
          JSON.stringify(record.sources),
          encodeVector(record.embedding),
          record.embeddingModel,
          record.embedding.length,
          record.storedAt.toISOString()
        );
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new StoreWriteError(`History already contains session ${session.id}`, { cause: error });
        }
        throw new StoreWriteError(`Failed to save session ${session.id}: ${errorMessage(error)}`, { cause: error });
      }

      log.info(`saved session ${session.id}`, { topic: session.topic, sources: record.sources.length });
      return record;
    });
  }

  /**
   * Records closest to `text` by cosine similarity
   *
   * Ties go to the most recently stored record, then the later insertion.
   *
   * @throws InvalidArgumentError unless topK is a positive integer
   */
  async querySimilar(text: string, topK: number): Promise<SimilarRecord[]> {
    requirePositiveInteger('topK', topK);

    const rows = this.db.prepare<[], HistoryRow>('SELECT * FROM research_history').all();
    if (rows.length === 0) return [];

    const query = await this.embed(text);

    return rows
      .map(row => {
        const record = toRecord(row);
        return { record, seq: row.seq, similarity: cosineSimilarity(query, record.embedding) };
      })
      .sort((a, b) =>
        b.similarity - a.similarity ||
        b.record.storedAt.getTime() - a.record.storedAt.getTime() ||
        b.seq - a.seq
      )
      .slice(0, topK)
      .map(({ record, similarity }) => ({ record, similarity }));
  }

  get(sessionId: string): HistoryRecord | undefined {
    const row = this.db.prepare<[string], HistoryRow>('SELECT * FROM research_history WHERE session_id = ?').get(sessionId);
    return row ? toRecord(row) : undefined;
  }

  /**
   * Most recently stored records first
   */
  recent(limit = 10): HistoryRecord[] {
    requirePositiveInteger('limit', limit);
    return this.db
      .prepare<[number], HistoryRow>('SELECT * FROM research_history ORDER BY stored_at DESC, seq DESC LIMIT ?')
      .all(limit)
      .map(toRecord);
  }

  stats(): HistoryStats {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM research_history').get();
    return {
      totalRecords: row?.count ?? 0,
      embeddingModel: this.embeddingModel,
      dimension: this.embedder.dimension
    };
  }

  close(): void {
    this.db.close();
  }

  private async embed(text: string): Promise<number[]> {
    const vector = this.policy
      ? await guardedCall('History embedding', 'embedding', () => this.embedder.embed(text), this.policy)
      : await this.embedder.embed(text);

    if (vector.length !== this.embedder.dimension) {
      throw new ConfigurationError('Embedding dimension mismatch', [
        `expected ${this.embedder.dimension}`,
        `received ${vector.length}`
      ]);
    }
    return vector;
  }

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.then(() => undefined, () => undefined);
    return run;
  }
}
