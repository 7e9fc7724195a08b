import {
  EmbeddingSimilarityScorer,
  LexicalOverlapScorer,
  SourceDeduplicator,
  fingerprint,
  mergeSources,
  normalizeUrl,
  tokenize
} from '../dedup';
import { Query, Source } from '../types';
import { FakeEmbedder, hit } from './fakes';

const fetchedAt = new Date('2026-01-05T10:00:00Z');
const query: Query = { text: 'solar sails', loopIndex: 1 };

const deduplicator = () =>
  new SourceDeduplicator({ scorer: new LexicalOverlapScorer(), fingerprintChars: 500, now: () => fetchedAt });

const source = (url: string, overrides: Partial<Source> = {}): Source => ({
  url,
  title: 'Title',
  snippet: 'snippet',
  fetchedAt,
  relevanceScore: 0,
  fingerprint: `fp:${url}`,
  discoveries: [{ query: 'solar sails', loopIndex: 1 }],
  ...overrides
});

describe('normalizeUrl', () => {
  it('should drop www, tracking parameters, the fragment and the trailing slash', () => {
    expect(normalizeUrl('https://WWW.Example.com/path/?b=2&utm_source=feed&a=1#section'))
      .toBe('https://example.com/path?a=1&b=2');
  });

  it('should reduce a bare host to scheme and host', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('should keep the port and strip click ids', () => {
    expect(normalizeUrl('http://example.com:8080/x?fbclid=abc&gclid=def')).toBe('http://example.com:8080/x');
  });

  it('should lower-case unparseable input', () => {
    expect(normalizeUrl('  Not A URL ')).toBe('not a url');
  });
});

describe('fingerprint', () => {
  it('should match for equivalent URLs and whitespace-only content differences', () => {
    const a = fingerprint(hit('https://example.com/qc', 'A', 'Quantum  computing\nadvances'), 500);
    const b = fingerprint(hit('https://www.example.com/qc/', 'B', 'quantum computing advances'), 500);
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should prefer full content over the snippet', () => {
    const withRaw = fingerprint(hit('https://example.com', 'A', 'snippet', 'full page'), 500);
    expect(withRaw).toBe(fingerprint(hit('https://example.com', 'A', 'full page'), 500));
  });

  it('should only look at the first fingerprintChars characters', () => {
    const a = fingerprint(hit('https://example.com', 'A', 'same head, tail one'), 9);
    const b = fingerprint(hit('https://example.com', 'A', 'same head, tail two'), 9);
    expect(a).toBe(b);
  });
});

describe('tokenize', () => {
  it('should drop stop words and single characters', () => {
    expect([...tokenize('Tell me about the James Webb telescope in 2 years')]).toEqual(['james', 'webb', 'telescope', 'years']);
  });

  it('should keep words in non-Latin scripts', () => {
    expect([...tokenize('Квантовые вычисления, 量子计算')]).toEqual(['квантовые', 'вычисления', '量子计算']);
  });
});

describe('LexicalOverlapScorer', () => {
  const scorer = new LexicalOverlapScorer();

  it('should weight body coverage 0.8 and title coverage 0.2', async () => {
    const score = await scorer.score('quantum error correction', { title: 'Quantum computing', snippet: 'error rates' });
    expect(score).toBeCloseTo(0.6);
  });

  it('should give 1 for full coverage', async () => {
    await expect(scorer.score('solar sails', { title: 'Solar sails', snippet: 'solar sails' })).resolves.toBe(1);
  });

  it('should score an exact CJK title match as 1', async () => {
    await expect(scorer.score('量子计算', { title: '量子计算', snippet: '量子计算' })).resolves.toBe(1);
  });

  it('should give 0 for a query of stop words only', async () => {
    await expect(scorer.score('what is the', { title: 'what', snippet: 'is the' })).resolves.toBe(0);
  });

  it('should count full page content', async () => {
    const score = await scorer.score('solar sails', { title: 'Other', snippet: 'nothing', rawContent: 'solar sails' });
    expect(score).toBeCloseTo(0.8);
  });
});

describe('EmbeddingSimilarityScorer', () => {
  it('should clamp cosine similarity to [0, 1] and embed the query once', async () => {
    const embedder = new FakeEmbedder(2, text => {
      if (text === 'solar sails') return [1, 0];
      return text.startsWith('Match') ? [2, 0] : [-1, 0];
    });
    const scorer = new EmbeddingSimilarityScorer(embedder);

    const scores = await Promise.all([
      scorer.score('solar sails', { title: 'Match', snippet: 'x' }),
      scorer.score('solar sails', { title: 'Opposite', snippet: 'y' })
    ]);

    expect(scores).toEqual([1, 0]);
    expect(embedder.texts.filter(text => text === 'solar sails')).toHaveLength(1);
  });

  it('should cap the embedded source text', async () => {
    const embedder = new FakeEmbedder(1, () => [1]);
    const scorer = new EmbeddingSimilarityScorer(embedder, undefined, 10);

    await scorer.score('q', { title: 'Title', snippet: 'a long snippet' });

    expect(embedder.texts).toContain('Title\na lo');
  });
});

describe('mergeSources', () => {
  it('should append unmatched sources in order', () => {
    const merged = mergeSources([source('https://a.example')], [source('https://b.example'), source('https://c.example')]);
    expect(merged.map(item => item.url)).toEqual(['https://a.example', 'https://b.example', 'https://c.example']);
  });

  it('should keep the existing entry with the higher score and all discoveries', () => {
    const existing = source('https://a.example', { title: 'First seen', relevanceScore: 0.2 });
    const again = source('https://a.example', {
      title: 'Seen again',
      relevanceScore: 0.5,
      discoveries: [{ query: 'follow-up', loopIndex: 2 }]
    });

    const [merged, ...rest] = mergeSources([existing], [again]);

    expect(rest).toEqual([]);
    expect(merged).toMatchObject({ title: 'First seen', relevanceScore: 0.5 });
    expect(merged?.discoveries).toEqual([
      { query: 'solar sails', loopIndex: 1 },
      { query: 'follow-up', loopIndex: 2 }
    ]);
  });

  it('should match by normalized URL when fingerprints differ', () => {
    const merged = mergeSources(
      [source('https://example.com/a', { fingerprint: 'one' })],
      [source('https://www.example.com/a/', { fingerprint: 'two' })]
    );
    expect(merged).toHaveLength(1);
  });
});

describe('SourceDeduplicator', () => {
  it('should score and rank new sources by relevance', async () => {
    const result = await deduplicator().filter([
      hit('https://a.example/1', 'Boats', 'wind power for boats'),
      hit('https://b.example/2', 'Solar sails explained', 'how solar sails work'),
      hit('https://c.example/3', 'Sails', 'sails of ships')
    ], new Set(), query);

    expect(result.map(item => item.url)).toEqual(['https://b.example/2', 'https://c.example/3', 'https://a.example/1']);
    expect(result[0]?.relevanceScore).toBeCloseTo(1);
    expect(result[1]?.relevanceScore).toBeCloseTo(0.5);
    expect(result[2]?.relevanceScore).toBe(0);
    expect(result[0]).toMatchObject({ fetchedAt, discoveries: [{ query: 'solar sails', loopIndex: 1 }] });
  });

  it('should keep the original order among equal scores', async () => {
    const result = await deduplicator().filter([
      hit('https://a.example', 'One', 'unrelated'),
      hit('https://b.example', 'Two', 'unrelated too')
    ], new Set(), query);

    expect(result.map(item => item.url)).toEqual(['https://a.example', 'https://b.example']);
  });

  it('should skip sources whose fingerprint is already known', async () => {
    const known = hit('https://a.example', 'Solar', 'solar sails');
    const result = await deduplicator().filter(
      [known, hit('https://b.example', 'Sails', 'sails')],
      new Set([fingerprint(known, 500)]),
      query
    );

    expect(result.map(item => item.url)).toEqual(['https://b.example']);
  });

  it('should collapse duplicates within one batch', async () => {
    const result = await deduplicator().filter([
      hit('https://example.com/qc', 'First', 'Quantum computing'),
      hit('https://www.example.com/qc/', 'Second', 'quantum   computing'),
      hit('https://example.com/qc?utm_source=feed', 'Third', 'a different snippet')
    ], new Set(), query);

    expect(result).toHaveLength(1);
    expect(result[0]?.title).toBe('First');
  });

  it('should return nothing for a batch it has already seen', async () => {
    const hits = [hit('https://a.example', 'A', 'solar'), hit('https://b.example', 'B', 'sails')];
    const first = await deduplicator().filter(hits, new Set(), query);

    const second = await deduplicator().filter(hits, new Set(first.map(item => item.fingerprint)), query);

    expect(first).toHaveLength(2);
    expect(second).toEqual([]);
  });

  it('should return nothing for no hits', async () => {
    await expect(deduplicator().filter([], new Set(), query)).resolves.toEqual([]);
  });
});
