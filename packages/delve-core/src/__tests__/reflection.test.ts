import { ProviderUnavailableError, ReflectionParseError } from '../errors';
import { ReflectionEngine } from '../reflection';
import { CallPolicy } from '../resilience';
import { ScriptedLLM, reflectionJson } from './fakes';

const policy: CallPolicy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };

describe('ReflectionEngine', () => {
  it('should map the reply onto a reflection result', async () => {
    const llm = new ScriptedLLM(() => reflectionJson(false, '  How are sails deployed?  ', ' deployment '));

    await expect(new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.')).resolves.toEqual({
      isSufficient: false,
      knowledgeGap: 'deployment',
      followUpQuery: 'How are sails deployed?'
    });
  });

  it('should omit a blank follow-up query', async () => {
    const llm = new ScriptedLLM(() => reflectionJson(true, '   ', ''));

    await expect(new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.')).resolves.toEqual({
      isSufficient: true,
      knowledgeGap: ''
    });
  });

  it('should accept a fenced reply', async () => {
    const llm = new ScriptedLLM(() => '```json\n' + reflectionJson(true) + '\n```');

    const result = await new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.');

    expect(result.isSufficient).toBe(true);
  });

  it('should send the summary and topic', async () => {
    const llm = new ScriptedLLM(() => reflectionJson(true));

    await new ReflectionEngine(llm, policy).reflect('solar sails', 'Sails use light.');

    expect(llm.calls[0]?.prompt.system).toContain('analyzing a summary about solar sails');
    expect(llm.calls[0]?.prompt.user).toContain('===\nSails use light.\n===');
  });

  it('should ask what to search first when there is no summary yet', async () => {
    const llm = new ScriptedLLM(() => reflectionJson(false, 'solar sail basics'));

    await new ReflectionEngine(llm, policy).reflect('solar sails', '');

    expect(llm.calls[0]?.prompt.user).toBe(
      'Nothing has been found yet. Identify what to search for first and generate a web search query:'
    );
  });

  it('should repair a malformed reply with one follow-up request', async () => {
    const llm = new ScriptedLLM((_, call) => call === 1 ? '{"is_sufficient": "yes"}' : reflectionJson(true));

    const result = await new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.');

    expect(result.isSufficient).toBe(true);
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1]?.prompt.user).toContain(
      'Your previous reply could not be used:\n{"is_sufficient": "yes"}\n\n' +
      'Problems:\n- is_sufficient: Expected boolean, received string\n- knowledge_gap: Required'
    );
  });

  it('should raise ReflectionParseError when the repair is malformed too', async () => {
    const llm = new ScriptedLLM(() => 'I think we need more research.');

    const result = new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.');

    await expect(result).rejects.toThrow(ReflectionParseError);
    await expect(result).rejects.toThrow(/^Reflection output could not be parsed: invalid JSON: /);
    expect(llm.calls).toHaveLength(2);
  });

  it('should retry provider failures and then propagate them', async () => {
    const llm = new ScriptedLLM(() => new ProviderUnavailableError('model offline'));

    await expect(new ReflectionEngine(llm, policy).reflect('solar sails', 'Summary.')).rejects.toThrow(ProviderUnavailableError);
    expect(llm.calls).toHaveLength(2);
  });
});
