import { ConfigurationError, SummaryGenerationError } from '../errors';
import { CallPolicy } from '../resilience';
import { Summarizer } from '../summarizer';
import { Source } from '../types';
import { ScriptedLLM } from './fakes';

const policy: CallPolicy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };
const options = { maxCharsPerSource: 4000, fetchFullPage: false, stripThinkingTokens: true };

const source: Source = {
  url: 'https://example.com/sails',
  title: 'Solar sails',
  snippet: 'Light pressure pushes thin reflective sails.',
  fetchedAt: new Date('2026-01-05T10:00:00Z'),
  relevanceScore: 1,
  fingerprint: 'fp',
  discoveries: [{ query: 'solar sails', loopIndex: 1 }]
};

describe('Summarizer', () => {
  it('should summarize the first batch of sources from scratch', async () => {
    const llm = new ScriptedLLM(() => 'Solar sails ride on light pressure.');

    const summary = await new Summarizer(llm, options, policy).summarize(undefined, [source], 'solar sails');

    expect(summary).toBe('Solar sails ride on light pressure.');
    expect(llm.calls[0]?.prompt.user).toBe(
      '<Context>\nSources:\n\n' +
      'Source: Solar sails\n' +
      'URL: https://example.com/sails\n' +
      'Most relevant content from source: Light pressure pushes thin reflective sails.\n' +
      '</Context>\n\n' +
      'Create a Summary using the Context on this topic:\n' +
      '<Topic>\nsolar sails\n</Topic>'
    );
  });

  it('should ask for a merge when a summary already exists', async () => {
    const llm = new ScriptedLLM(() => 'Merged summary');

    await new Summarizer(llm, options, policy).summarize('Earlier findings.', [source], 'solar sails');

    const user = llm.calls[0]?.prompt.user ?? '';
    expect(user.startsWith('<Existing Summary>\nEarlier findings.\n</Existing Summary>\n\n<New Context>\nSources:')).toBe(true);
    expect(user).toContain('Merge the New Context into the Existing Summary');
  });

  it('should keep the existing summary without calling the model when there are no sources', async () => {
    const llm = new ScriptedLLM(() => 'unused');
    const summarizer = new Summarizer(llm, options, policy);

    await expect(summarizer.summarize('Earlier findings.', [], 'solar sails')).resolves.toBe('Earlier findings.');
    await expect(summarizer.summarize(undefined, [], 'solar sails')).resolves.toBe('');
    expect(llm.calls).toHaveLength(0);
  });

  it('should strip thinking tokens', async () => {
    const llm = new ScriptedLLM(() => '<think>plan the answer</think>\nThe summary.');

    await expect(new Summarizer(llm, options, policy).summarize(undefined, [source], 'solar sails')).resolves.toBe('The summary.');
  });

  it('should include full page content only when asked to', async () => {
    const llm = new ScriptedLLM(() => 'ok');
    const withRaw: Source = { ...source, rawContent: 'abcdefghij' };

    await new Summarizer(llm, { ...options, fetchFullPage: true, maxCharsPerSource: 5 }, policy)
      .summarize(undefined, [withRaw], 'solar sails');

    expect(llm.calls[0]?.prompt.user).toContain('Full source content limited to 5 characters: abcde...');
    expect(llm.calls[0]?.prompt.user).toContain('Most relevant content from source: Light...');
  });

  it('should retry an empty reply', async () => {
    const llm = new ScriptedLLM((_, call) => call === 1 ? '   ' : 'Second try');

    await expect(new Summarizer(llm, options, policy).summarize(undefined, [source], 'solar sails')).resolves.toBe('Second try');
    expect(llm.calls).toHaveLength(2);
  });

  it('should raise SummaryGenerationError once retries are spent', async () => {
    const llm = new ScriptedLLM(() => new Error('model offline'));

    const result = new Summarizer(llm, options, policy).summarize(undefined, [source], 'solar sails');

    await expect(result).rejects.toThrow(SummaryGenerationError);
    await expect(result).rejects.toThrow('Summary generation failed: model offline');
    expect(llm.calls).toHaveLength(2);
  });

  it('should pass configuration errors through unchanged', async () => {
    const llm = new ScriptedLLM(() => new ConfigurationError('OpenAI API key is required'));

    await expect(new Summarizer(llm, options, policy).summarize(undefined, [source], 'solar sails'))
      .rejects.toThrow(ConfigurationError);
    expect(llm.calls).toHaveLength(1);
  });
});
