// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config/config.ts';
import { createConnector } from '../connector/connector.ts';
import { ConfigError } from '../errors/index.ts';
import type { ModelProvider, ModelRequest, ModelResponse } from '../model/types.ts';
import type { OpenAIChatCreate } from '../model/openai-compat.ts';
import { createToolRegistry } from '../tool/registry.ts';
import type { ToolRegistry } from '../tool/types.ts';
import { createChatClient, createChatClientFromConfig } from './client.ts';

function scriptedProvider(responses: ReadonlyArray<ModelResponse>): {
  provider: ModelProvider;
  requests: Array<ModelRequest>;
} {
  const requests: Array<ModelRequest> = [];
  return {
    requests,
    provider: {
      name: 'scripted',
      async complete(request) {
        const response = responses[Math.min(requests.length, responses.length - 1)];
        requests.push({ ...request, messages: [...request.messages] });
        if (!response) {
          throw new Error('empty script');
        }
        return response;
      },
    },
  };
}

const LOOKUP: ModelResponse = {
  content: [
    { type: 'text', text: 'Let me check.' },
    { type: 'tool_use', id: 'call_1', name: 'kv_get', input: { key: 'colour' } },
  ],
  stop_reason: 'tool_use',
  usage: { input_tokens: 20, output_tokens: 8 },
};

const FINAL: ModelResponse = {
  content: [{ type: 'text', text: 'The colour is teal.' }],
  stop_reason: 'end_turn',
  usage: { input_tokens: 30, output_tokens: 6 },
};

function buildRegistry(calls: Array<string>): ToolRegistry {
  const registry = createToolRegistry();
  const kv = createConnector({ name: 'kv' });
  kv.defineOperation({
    name: 'get',
    description: 'Read a key.',
    idempotent: true,
    parameters: [{ name: 'key', type: 'string', required: true }],
    handler: async (args) => {
      calls.push(String(args['key']));
      return { value: 'teal' };
    },
  });
  registry.registerConnector(kv);
  return registry;
}

describe('createChatClient', () => {
  describe('chat', () => {
    it('appends the message to history and reports tool requests without running them', async () => {
      const calls: Array<string> = [];
      const { provider, requests } = scriptedProvider([LOOKUP]);
      const client = createChatClient({ provider, model: 'test-model', registry: buildRegistry(calls) });

      const response = await client.chat('What colour?', {
        history: [
          { role: 'user', content: 'Hello' },
          { role: 'assistant', content: 'Hi' },
        ],
        system: 'Answer from the store.',
        tools: true,
      });

      expect(response).toEqual({
        content: 'Let me check.',
        usage: { input_tokens: 20, output_tokens: 8 },
        tool_calls: [{ id: 'call_1', name: 'kv_get', arguments: { key: 'colour' } }],
        stop_reason: 'tool_use',
      });
      expect(calls).toEqual([]);
      expect(requests[0]?.messages).toEqual([
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hi' },
        { role: 'user', content: 'What colour?' },
      ]);
      expect(requests[0]?.system).toBe('Answer from the store.');
      expect(requests[0]?.max_tokens).toBe(4096);
      expect(requests[0]?.tools?.map((tool) => tool.name)).toEqual(['kv_get']);
    });

    it('reports a tool request with undecodable arguments instead of throwing', async () => {
      const issues = [{ path: '', message: 'arguments are not valid JSON' }];
      const { provider } = scriptedProvider([
        {
          content: [{ type: 'tool_use', id: 'call_2', name: 'kv_get', input: {}, invalid_arguments: issues }],
          stop_reason: 'tool_use',
          usage: { input_tokens: 4, output_tokens: 2 },
        },
      ]);
      const client = createChatClient({ provider, model: 'test-model', registry: buildRegistry([]) });

      const response = await client.chat('What colour?', { tools: true });

      expect(response.tool_calls).toEqual([
        { id: 'call_2', name: 'kv_get', arguments: {}, invalid_arguments: issues },
      ]);
    });

    it('sends no tools unless asked', async () => {
      const { provider, requests } = scriptedProvider([FINAL]);
      const client = createChatClient({ provider, model: 'test-model', registry: buildRegistry([]) });

      await client.chat('hi');

      expect(requests[0]?.tools).toBeUndefined();
    });

    it('rejects a tool request without a registry', async () => {
      const { provider, requests } = scriptedProvider([FINAL]);
      const client = createChatClient({ provider, model: 'test-model' });

      await expect(client.chat('hi', { tools: true })).rejects.toBeInstanceOf(ConfigError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('invoke', () => {
    it('runs the tool-call loop when use_tools is set', async () => {
      const calls: Array<string> = [];
      const { provider } = scriptedProvider([LOOKUP, FINAL]);
      const client = createChatClient({ provider, model: 'test-model', registry: buildRegistry(calls) });

      const result = await client.invoke('What colour?', { use_tools: true });

      expect(calls).toEqual(['colour']);
      expect(result.content).toBe('The colour is teal.');
      expect(result.round_trips).toBe(2);
      expect(result.usage).toEqual({ input_tokens: 50, output_tokens: 14 });
      expect(result.tool_calls).toEqual([
        { id: 'call_1', name: 'kv_get', arguments: { key: 'colour' }, round_trip: 1, result: { value: 'teal' } },
      ]);
    });

    it('makes a single call when use_tools is off', async () => {
      const calls: Array<string> = [];
      const { provider, requests } = scriptedProvider([LOOKUP]);
      const client = createChatClient({ provider, model: 'test-model', registry: buildRegistry(calls) });

      const result = await client.invoke('What colour?', { use_tools: false });

      expect(requests).toHaveLength(1);
      expect(requests[0]?.tools).toBeUndefined();
      expect(calls).toEqual([]);
      expect(result).toEqual({
        content: 'Let me check.',
        tool_calls: [],
        usage: { input_tokens: 20, output_tokens: 8 },
        round_trips: 1,
        messages: [
          { role: 'user', content: 'What colour?' },
          { role: 'assistant', content: 'Let me check.' },
        ],
      });
    });
  });
});

describe('createChatClientFromConfig', () => {
  it('wires the configured provider, model and loop budget', async () => {
    const config = parseConfig({
      model: { provider: 'ollama', name: 'llama-test', max_tokens: 256 },
      agent: { max_tool_rounds: 3 },
    });
    const create: OpenAIChatCreate = async (params) => ({
      choices: [{ message: { content: `max ${params.max_tokens ?? 0}` }, finish_reason: 'stop' }],
    });

    const client = createChatClientFromConfig(config, { openai_create: create, env: {} });
    const response = await client.chat('hi');

    expect(client.provider).toBe('ollama');
    expect(client.model).toBe('llama-test');
    expect(response.content).toBe('max 256');
  });

  it('requires a [model] section', () => {
    expect(() => createChatClientFromConfig(parseConfig({}))).toThrow(ConfigError);
  });
});
