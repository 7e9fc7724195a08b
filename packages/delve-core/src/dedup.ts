/**
 * Source deduplication and relevance scoring
 *
 * A source's identity is its fingerprint: SHA-256 over the normalized URL and
 * the head of its collapsed, lower-cased content. Scoring is pluggable and
 * fixed for a deployment.
 */

import { uniqBy } from 'lodash';
import stopwordList from './data/stopwords.json';
import { EmbeddingProvider } from './llm';
import { rankSources } from './report';
import { CallPolicy, guardedCall } from './resilience';
import { SearchHit } from './search';
import { Discovery, Query, Source } from './types';
import { collapseWhitespace, cosineSimilarity, sha256 } from './utils';

// ---------- URL normalization ----------

const TRACKING_PARAMS = new Set(['fbclid', 'gclid']);

const isTrackingParam = (name: string): boolean =>
  TRACKING_PARAMS.has(name.toLowerCase()) || name.toLowerCase().startsWith('utm_');

/**
 * Canonical form of a URL for identity comparison
 *
 * Lower-cases the host, drops `www.`, the fragment, tracking parameters and
 * any trailing slash, and sorts the query parameters. Unparseable input is
 * trimmed and lower-cased.
 */
export const normalizeUrl = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim().toLowerCase();
  }

  const host = url.host.toLowerCase().replace(/^www\./, '');
  const params = new URLSearchParams();
  for (const [name, value] of url.searchParams) {
    if (!isTrackingParam(name)) params.append(name, value);
  }
  params.sort();

  const path = url.pathname.replace(/\/+$/, '');
  const query = params.toString();
  return `${url.protocol}//${host}${path}${query ? `?${query}` : ''}`;
};

/**
 * Text a source is judged by: full content when fetched, the snippet otherwise
 */
const contentOf = (hit: Pick<SearchHit, 'snippet' | 'rawContent'>): string => hit.rawContent ?? hit.snippet;

export const fingerprint = (hit: Pick<SearchHit, 'url' | 'snippet' | 'rawContent'>, fingerprintChars: number): string => {
  const head = collapseWhitespace(contentOf(hit)).toLowerCase().slice(0, fingerprintChars);
  return sha256(`${normalizeUrl(hit.url)}\n${head}`);
};

// ---------- Relevance scoring ----------

export interface ScoringInput {
  readonly title: string;
  readonly snippet: string;
  readonly rawContent?: string;
}

export interface RelevanceScorer {
  readonly name: string;
  /** Score in [0,1] */
  score(query: string, source: ScoringInput): Promise<number>;
}

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

/**
 * Lower-cased letter/number runs of length >= 2 in any script, minus stop words
 */
export const tokenize = (text: string): Set<string> => {
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return new Set(tokens.filter(token => token.length >= 2 && !STOPWORDS.has(token)));
};

const coverage = (terms: ReadonlySet<string>, tokens: ReadonlySet<string>): number => {
  if (terms.size === 0) return 0;
  let hits = 0;
  for (const term of terms) {
    if (tokens.has(term)) hits++;
  }
  return hits / terms.size;
};

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Deterministic term-overlap score:
 * 0.8 x coverage(query terms in title+snippet+content) + 0.2 x coverage(query terms in title)
 */
export class LexicalOverlapScorer implements RelevanceScorer {
  readonly name = 'lexical';

  async score(query: string, source: ScoringInput): Promise<number> {
    const terms = tokenize(query);
    const body = tokenize([source.title, source.snippet, source.rawContent ?? ''].join(' '));
    const title = tokenize(source.title);
    return clamp01(0.8 * coverage(terms, body) + 0.2 * coverage(terms, title));
  }
}

/**
 * max(0, cosine(embed(query), embed(source text)))
 */
export class EmbeddingSimilarityScorer implements RelevanceScorer {
  readonly name = 'embedding';
  private cachedQuery?: { readonly text: string; readonly vector: Promise<number[]> };

  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly policy?: CallPolicy,
    private readonly maxChars = 2000
  ) {}

  async score(query: string, source: ScoringInput): Promise<number> {
    const text = [source.title, source.snippet, source.rawContent ?? ''].join('\n').slice(0, this.maxChars);
    const [queryVector, sourceVector] = await Promise.all([this.queryVector(query), this.embed(text)]);
    return clamp01(cosineSimilarity(queryVector, sourceVector));
  }

  // concurrent scores for one query share a single query embedding
  private queryVector(query: string): Promise<number[]> {
    if (this.cachedQuery?.text !== query) {
      this.cachedQuery = { text: query, vector: this.embed(query) };
    }
    return this.cachedQuery.vector;
  }

  private embed(text: string): Promise<number[]> {
    if (!this.policy) return this.embedder.embed(text);
    return guardedCall('Embedding', 'embedding', () => this.embedder.embed(text), this.policy);
  }
}

// ---------- Deduplication ----------

const unionDiscoveries = (a: readonly Discovery[], b: readonly Discovery[]): Discovery[] =>
  uniqBy([...a, ...b], discovery => `${discovery.loopIndex}\u0000${discovery.query}`);

const mergeInto = (kept: Source, duplicate: Source): Source => ({
  ...kept,
  relevanceScore: Math.max(kept.relevanceScore, duplicate.relevanceScore),
  discoveries: unionDiscoveries(kept.discoveries, duplicate.discoveries)
});

const findMatch = (sources: readonly Source[], candidate: Source): number => {
  const url = normalizeUrl(candidate.url);
  return sources.findIndex(source => source.fingerprint === candidate.fingerprint || normalizeUrl(source.url) === url);
};

/**
 * Merge incoming sources into an existing list
 *
 * A match by fingerprint or normalized URL keeps the existing entry with the
 * higher of the two scores and the union of discoveries. Unmatched sources are
 * appended in order.
 */
export const mergeSources = (existing: readonly Source[], incoming: readonly Source[]): Source[] => {
  const merged = [...existing];
  for (const source of incoming) {
    const index = findMatch(merged, source);
    const match = index >= 0 ? merged[index] : undefined;
    if (match) {
      merged[index] = mergeInto(match, source);
    } else {
      merged.push(source);
    }
  }
  return merged;
};

export interface DeduplicatorOptions {
  readonly scorer: RelevanceScorer;
  readonly fingerprintChars: number;
  readonly now?: () => Date;
}

export class SourceDeduplicator {
  private readonly now: () => Date;

  constructor(private readonly options: DeduplicatorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Drop hits already known by fingerprint, merge duplicates within the batch
   * and score the survivors against the query.
   *
   * @returns survivors by descending relevance, stable on ties
   */
  async filter(hits: readonly SearchHit[], existing: ReadonlySet<string>, query: Query): Promise<Source[]> {
    const discovery: Discovery = { query: query.text, loopIndex: query.loopIndex };
    const fetchedAt = this.now();

    let batch: Source[] = [];
    for (const hit of hits) {
      const print = fingerprint(hit, this.options.fingerprintChars);
      if (existing.has(print)) continue;
      const candidate: Source = {
        url: hit.url,
        title: hit.title,
        snippet: hit.snippet,
        ...(hit.rawContent === undefined ? {} : { rawContent: hit.rawContent }),
        fetchedAt,
        relevanceScore: 0,
        fingerprint: print,
        discoveries: [discovery]
      };
      batch = mergeSources(batch, [candidate]);
    }

    if (batch.length === 0) return [];

    const scored = await Promise.all(batch.map(async source => ({
      ...source,
      relevanceScore: await this.options.scorer.score(query.text, source)
    })));

    return rankSources(scored);
  }
}
