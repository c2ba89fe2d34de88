import { describe, it, expect } from 'vitest';
import {
  createOpenAICompatibleTools,
  parseOpenAICompatibleResponse,
  parseToolArguments,
  sanitizeToolName,
  toOpenAICompatibleMessages,
} from '../../src/llms/utils.js';

describe('OpenAI-compatible helpers', () => {
  it('sanitizes tool names to the allowed character set', () => {
    expect(sanitizeToolName('web_search')).toBe('web_search');
    expect(sanitizeToolName('search.web v2')).toBe('search_web_v2');
    expect(sanitizeToolName('a-b_c')).toBe('a-b_c');
  });

  it('parses tool arguments and falls back to an empty object', () => {
    expect(parseToolArguments('{"query":"x","limit":2}')).toEqual({ query: 'x', limit: 2 });
    expect(parseToolArguments('not json')).toEqual({});
    expect(parseToolArguments('[1,2]')).toEqual({});
    expect(parseToolArguments('"text"')).toEqual({});
  });

  it('orders messages as system, history, user', () => {
    expect(toOpenAICompatibleMessages({
      systemPrompt: 'sys',
      userContent: 'now',
      history: [{ role: 'assistant', content: 'before' }],
    })).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'assistant', content: 'before' },
      { role: 'user', content: 'now' },
    ]);
  });

  it('formats tools and remembers original names', () => {
    const def = { name: 'lookup.facts', description: 'Facts', parameters: { type: 'object' as const, properties: {} } };
    const { nameMap, formattedTools } = createOpenAICompatibleTools([def]);

    expect(formattedTools).toEqual([{
      type: 'function',
      function: { name: 'lookup_facts', description: 'Facts', parameters: { type: 'object', properties: {} } },
    }]);
    expect(nameMap.get('lookup_facts')).toEqual({ originalName: 'lookup.facts', def });
  });

  it('skips tool calls without a function and keeps unknown names', () => {
    const { nameMap } = createOpenAICompatibleTools([]);
    const res = parseOpenAICompatibleResponse({
      content: '',
      tool_calls: [{}, { function: { name: 'other_tool', arguments: '' } }],
    }, nameMap);

    expect(res).toEqual({ content: undefined, toolCalls: [{ name: 'other_tool', arguments: {} }] });
  });

  it('handles a missing message', () => {
    expect(parseOpenAICompatibleResponse(undefined, new Map())).toEqual({ content: undefined, toolCalls: [] });
  });
});
