/**
 * Web search providers
 *
 * - firecrawl: hosted search with markdown scraping (@mendable/firecrawl-js)
 * - searxng: self-hosted metasearch, JSON API
 * - duckduckgo: Instant Answer API, no key required
 * - tavily: hosted search API (@tavily/core)
 * - perplexity: sonar answers with citations, over the OpenAI-compatible API
 *
 * All of them return SearchHit[]; HTTP 429 maps to SearchRateLimitedError and any
 * other failure to SearchUnavailableError.
 */

import FirecrawlApp from '@mendable/firecrawl-js';
import { tavily } from '@tavily/core';
import { OpenAI } from 'openai';
import { z } from 'zod';
import { ResearchConfig } from './config';
import { ConfigurationError, ProviderError, SearchRateLimitedError, SearchUnavailableError, errorMessage } from './errors';
import { statusOf } from './llm';
import { createLogger } from './logger';
import { collapseWhitespace } from './utils';

const log = createLogger('Search');

export interface SearchHit {
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
  readonly rawContent?: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string, fetchFullPage: boolean): Promise<SearchHit[]>;
}

// ---------- HTTP helpers ----------

const USER_AGENT = 'Mozilla/5.0 (compatible; delve-research/0.3)';
const PAGE_TEXT_LIMIT = 20000;

const httpFailure = (provider: string, status: number, body: string): ProviderError => {
  if (status === 429) {
    return new SearchRateLimitedError(`${provider} rate limit exceeded`, { context: { status } });
  }
  return new SearchUnavailableError(`${provider} returned HTTP ${status}`, { context: { status, body: body.slice(0, 200) } });
};

/**
 * Map an SDK failure onto the search error taxonomy
 */
const sdkFailure = (provider: string, error: unknown): ProviderError => {
  if (error instanceof ProviderError) return error;
  const message = errorMessage(error);
  if (statusOf(error) === 429 || /\b429\b|rate limit/i.test(message)) {
    return new SearchRateLimitedError(`${provider} rate limit exceeded: ${message}`, { cause: error });
  }
  return new SearchUnavailableError(`${provider} search failed: ${message}`, { cause: error });
};

const fetchJson = async (provider: string, url: string): Promise<unknown> => {
  let response: Response;
  try {
    response = await fetch(url, { headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' } });
  } catch (error) {
    throw new SearchUnavailableError(`${provider} request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw httpFailure(provider, response.status, await response.text());
  }

  try {
    return await response.json();
  } catch (error) {
    throw new SearchUnavailableError(`${provider} returned invalid JSON`, { cause: error });
  }
};

/**
 * Reduce an HTML document to plain text
 */
export const htmlToText = (html: string): string => {
  const withoutBlocks = html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ');
  const text = withoutBlocks
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");
  return collapseWhitespace(text);
};

/**
 * Best-effort full page fetch; a page that cannot be read yields undefined
 */
const fetchPageText = async (url: string): Promise<string | undefined> => {
  try {
    const response = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });
    if (!response.ok) {
      log.debug(`page fetch returned ${response.status}`, { url });
      return undefined;
    }
    return htmlToText(await response.text()).slice(0, PAGE_TEXT_LIMIT);
  } catch (error) {
    log.debug(`page fetch failed: ${errorMessage(error)}`, { url });
    return undefined;
  }
};

const withFullPages = async (hits: SearchHit[], fetchFullPage: boolean): Promise<SearchHit[]> => {
  if (!fetchFullPage) return hits;
  return Promise.all(hits.map(async hit => {
    const rawContent = await fetchPageText(hit.url);
    return rawContent ? { ...hit, rawContent } : hit;
  }));
};

// ---------- SearXNG ----------

const SearxngResponseSchema = z.object({
  results: z.array(z.object({
    url: z.string(),
    title: z.string().optional().default(''),
    content: z.string().optional().default('')
  })).default([])
});

export class SearxngSearch implements SearchProvider {
  readonly name = 'searxng';

  constructor(
    private readonly baseUrl: string,
    private readonly maxResults: number
  ) {}

  async search(query: string, fetchFullPage: boolean): Promise<SearchHit[]> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/search?q=${encodeURIComponent(query)}&format=json`;
    const parsed = SearxngResponseSchema.safeParse(await fetchJson('SearXNG', url));
    if (!parsed.success) {
      throw new SearchUnavailableError('SearXNG returned an unexpected payload');
    }

    const hits = parsed.data.results.slice(0, this.maxResults).map(result => ({
      url: result.url,
      title: result.title || result.url,
      snippet: result.content
    }));
    log.info(`SearXNG: ${hits.length} results`, { query });
    return withFullPages(hits, fetchFullPage);
  }
}

// ---------- DuckDuckGo ----------

const DuckDuckGoTopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional()
});

const DuckDuckGoResponseSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  AbstractSource: z.string().optional(),
  // grouped topics must be tried first: every object matches the plain topic shape
  RelatedTopics: z.array(z.union([
    z.object({ Topics: z.array(DuckDuckGoTopicSchema) }),
    DuckDuckGoTopicSchema
  ])).optional()
});

type DuckDuckGoTopic = z.infer<typeof DuckDuckGoTopicSchema>;

export class DuckDuckGoSearch implements SearchProvider {
  readonly name = 'duckduckgo';

  constructor(
    private readonly maxResults: number,
    private readonly endpoint = 'https://api.duckduckgo.com/'
  ) {}

  async search(query: string, fetchFullPage: boolean): Promise<SearchHit[]> {
    const url = `${this.endpoint}?q=${encodeURIComponent(query)}&format=json&no_html=1&skip_disambig=1`;
    const parsed = DuckDuckGoResponseSchema.safeParse(await fetchJson('DuckDuckGo', url));
    if (!parsed.success) {
      throw new SearchUnavailableError('DuckDuckGo returned an unexpected payload');
    }

    const data = parsed.data;
    const hits: SearchHit[] = [];

    if (data.AbstractText && data.AbstractURL) {
      hits.push({
        url: data.AbstractURL,
        title: data.Heading || data.AbstractSource || 'DuckDuckGo',
        snippet: data.AbstractText
      });
    }

    const topics: DuckDuckGoTopic[] = (data.RelatedTopics ?? []).flatMap(topic =>
      'Topics' in topic ? topic.Topics : [topic]
    );
    for (const topic of topics) {
      if (topic.Text && topic.FirstURL) {
        hits.push({
          url: topic.FirstURL,
          title: topic.Text.split(' - ')[0] || topic.Text.slice(0, 80),
          snippet: topic.Text
        });
      }
    }

    const limited = hits.slice(0, this.maxResults);
    log.info(`DuckDuckGo: ${limited.length} results`, { query });
    return withFullPages(limited, fetchFullPage);
  }
}

// ---------- Firecrawl ----------

const FirecrawlResultSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  data: z.array(z.object({
    url: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    markdown: z.string().optional()
  })).default([])
});

export class FirecrawlSearch implements SearchProvider {
  readonly name = 'firecrawl';
  private readonly app: FirecrawlApp;

  constructor(
    options: { apiKey: string; apiUrl?: string },
    private readonly maxResults: number
  ) {
    this.app = new FirecrawlApp({ apiKey: options.apiKey, apiUrl: options.apiUrl });
  }

  async search(query: string, fetchFullPage: boolean): Promise<SearchHit[]> {
    let result: unknown;
    try {
      result = await this.app.search(query, {
        limit: this.maxResults,
        scrapeOptions: fetchFullPage ? { formats: ['markdown' as const] } : undefined
      });
    } catch (error) {
      throw sdkFailure('Firecrawl', error);
    }

    const parsed = FirecrawlResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new SearchUnavailableError('Firecrawl returned an unexpected payload');
    }
    if (parsed.data.success === false) {
      throw new SearchUnavailableError(`Firecrawl search failed: ${parsed.data.error ?? 'unknown error'}`);
    }

    const hits: SearchHit[] = [];
    for (const item of parsed.data.data) {
      if (!item.url) continue;
      hits.push({
        url: item.url,
        title: item.title || 'Untitled Result',
        snippet: item.description ?? '',
        ...(fetchFullPage && item.markdown ? { rawContent: item.markdown } : {})
      });
    }
    log.info(`Firecrawl: ${hits.length} results`, { query });
    return hits;
  }
}

// ---------- Tavily ----------

const TavilyResponseSchema = z.object({
  results: z.array(z.object({
    url: z.string(),
    title: z.string().optional().default(''),
    content: z.string().optional().default('')
  })).default([])
});

type TavilyClient = ReturnType<typeof tavily>;

export class TavilySearch implements SearchProvider {
  readonly name = 'tavily';
  private readonly client: TavilyClient;

  constructor(apiKey: string, private readonly maxResults: number) {
    this.client = tavily({ apiKey });
  }

  async search(query: string, fetchFullPage: boolean): Promise<SearchHit[]> {
    let response: unknown;
    try {
      response = await this.client.search(query, { maxResults: this.maxResults, searchDepth: 'basic' });
    } catch (error) {
      throw sdkFailure('Tavily', error);
    }

    const parsed = TavilyResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new SearchUnavailableError('Tavily returned an unexpected payload');
    }

    const hits = parsed.data.results.slice(0, this.maxResults).map(result => ({
      url: result.url,
      title: result.title || result.url,
      snippet: result.content
    }));
    log.info(`Tavily: ${hits.length} results`, { query });
    return withFullPages(hits, fetchFullPage);
  }
}

// ---------- Perplexity ----------

export const PERPLEXITY_BASE_URL = 'https://api.perplexity.ai';

// citations sit beside choices and are missing from the SDK's completion type
const PerplexityCitationsSchema = z.object({
  citations: z.array(z.string()).default([])
});

const hostnameOf = (url: string): string | undefined => {
  try {
    return new URL(url).hostname;
  } catch {
    return undefined;
  }
};

/**
 * One hit per cited URL. The first citation carries the whole answer; the rest
 * point back to it.
 */
export class PerplexitySearch implements SearchProvider {
  readonly name = 'perplexity';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    options: { apiKey: string; model?: string; timeoutMs?: number },
    private readonly maxResults: number
  ) {
    this.model = options.model ?? 'sonar';
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: PERPLEXITY_BASE_URL,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
  }

  async search(query: string): Promise<SearchHit[]> {
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: 'Search the web and answer factually and concisely.' },
          { role: 'user', content: query }
        ],
        temperature: 0
      });
    } catch (error) {
      throw sdkFailure('Perplexity', error);
    }

    const answer = completion.choices[0]?.message?.content?.trim() ?? '';
    const citations = PerplexityCitationsSchema.safeParse(completion);
    const urls = citations.success ? citations.data.citations : [];
    if (!answer && urls.length === 0) {
      throw new SearchUnavailableError('Perplexity returned an empty answer');
    }

    const hits: SearchHit[] = urls.slice(0, this.maxResults).map((url, index) => {
      const host = hostnameOf(url);
      return {
        url,
        title: `Perplexity source ${index + 1}${host ? `: ${host}` : ''}`,
        snippet: index === 0 ? answer : 'See the first Perplexity source for the full answer.'
      };
    });
    if (hits.length === 0) {
      hits.push({ url: PERPLEXITY_BASE_URL, title: 'Perplexity answer', snippet: answer });
    }
    log.info(`Perplexity: ${hits.length} citations`, { query });
    return hits;
  }
}

// ---------- Factory ----------

export function createSearchProvider(config: ResearchConfig): SearchProvider {
  switch (config.searchApi) {
    case 'firecrawl':
      if (!config.firecrawlApiKey) {
        throw new ConfigurationError('Firecrawl search needs an API key', ['firecrawlApiKey: missing']);
      }
      return new FirecrawlSearch(
        { apiKey: config.firecrawlApiKey, apiUrl: config.firecrawlApiUrl },
        config.maxResultsPerQuery
      );
    case 'searxng':
      return new SearxngSearch(config.searxngUrl, config.maxResultsPerQuery);
    case 'duckduckgo':
      return new DuckDuckGoSearch(config.maxResultsPerQuery);
    case 'tavily':
      if (!config.tavilyApiKey) {
        throw new ConfigurationError('Tavily search needs an API key', ['tavilyApiKey: missing']);
      }
      return new TavilySearch(config.tavilyApiKey, config.maxResultsPerQuery);
    case 'perplexity':
      if (!config.perplexityApiKey) {
        throw new ConfigurationError('Perplexity search needs an API key', ['perplexityApiKey: missing']);
      }
      return new PerplexitySearch(
        { apiKey: config.perplexityApiKey, model: config.perplexityModel, timeoutMs: config.callTimeoutMs },
        config.maxResultsPerQuery
      );
  }
}
