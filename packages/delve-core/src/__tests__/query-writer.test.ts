import { ConfigurationError } from '../errors';
import { followUpFallback, followUpQuery, writeInitialQuery } from '../query-writer';
import { CallPolicy } from '../resilience';
import { ScriptedLLM } from './fakes';

const policy: CallPolicy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };
const today = new Date('2026-03-14T09:00:00Z');

describe('query writer', () => {
  describe('writeInitialQuery', () => {
    it('should use the topic verbatim without a model', async () => {
      await expect(writeInitialQuery('solar sails', undefined, policy, today)).resolves.toEqual({ text: 'solar sails', loopIndex: 1 });
    });

    it('should use the refined query and pass the current date', async () => {
      const llm = new ScriptedLLM(() => '{"query": "  solar sail missions 2026 ", "rationale": "recent missions"}');

      const query = await writeInitialQuery('solar sails', llm, policy, today);

      expect(query).toEqual({ text: 'solar sail missions 2026', loopIndex: 1, rationale: 'recent missions' });
      expect(llm.calls[0]?.prompt.system).toContain('Current date: 2026-03-14');
      expect(llm.calls[0]?.prompt.system).toContain('<TOPIC>\nsolar sails\n</TOPIC>');
    });

    it('should fall back to the topic when refinement keeps failing', async () => {
      const llm = new ScriptedLLM(() => '{"query": ""}');

      await expect(writeInitialQuery('solar sails', llm, policy, today)).resolves.toEqual({
        text: 'solar sails',
        loopIndex: 1,
        rationale: 'topic used verbatim'
      });
      expect(llm.calls).toHaveLength(2);
    });

    it('should not hide configuration errors', async () => {
      const llm = new ScriptedLLM(() => new ConfigurationError('OpenAI API key is required'));

      await expect(writeInitialQuery('solar sails', llm, policy, today)).rejects.toThrow(ConfigurationError);
    });
  });

  describe('followUpQuery', () => {
    it('should use the suggested query with the knowledge gap as rationale', () => {
      expect(followUpQuery('solar sails', 2, 'How are sails deployed?', 'deployment')).toEqual({
        text: 'How are sails deployed?',
        loopIndex: 2,
        rationale: 'deployment'
      });
    });

    it('should ask for more about the topic without a suggestion', () => {
      expect(followUpQuery('solar sails', 3)).toEqual({ text: followUpFallback('solar sails'), loopIndex: 3 });
      expect(followUpFallback('solar sails')).toBe('Tell me more about solar sails');
    });
  });
});
