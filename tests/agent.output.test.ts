import { describe, it, expect } from 'vitest';
import { classifyAgentOutput, extractAgentText, normalizeAgentOutput } from '../src/agents/output.js';

describe('agent output extraction', () => {
  it('prefers output, output_text and final_output fields', () => {
    expect(extractAgentText({ output: 'Analysis...' })).toBe('Analysis...');
    expect(extractAgentText({ output_text: 'from output_text' })).toBe('from output_text');
    expect(extractAgentText({ final_output: 'from final_output', messages: [{ content: 'ignored' }] })).toBe('from final_output');
  });

  it('joins message contents with newlines', () => {
    expect(extractAgentText({ messages: [{ content: 'A' }, { content: 'B' }] })).toBe('A\nB');
  });

  it('skips messages without text and reads part arrays', () => {
    const output = classifyAgentOutput({
      messages: [
        { role: 'assistant', content: [{ type: 'text', text: 'Part one' }, ' and two'] },
        { role: 'tool' },
        'not a message',
        { content: 'Last' },
      ],
    });
    expect(output).toEqual({ kind: 'messages', texts: ['Part one and two', 'Last'] });
  });

  it('reads a message-like object content', () => {
    expect(extractAgentText({ role: 'assistant', content: 'Refined post' })).toBe('Refined post');
  });

  it('returns plain strings verbatim', () => {
    expect(extractAgentText('Just text')).toBe('Just text');
  });

  it('falls back to the JSON form of unrecognized shapes', () => {
    expect(classifyAgentOutput({ answer: 42 })).toEqual({ kind: 'raw', value: { answer: 42 } });
    expect(extractAgentText({ answer: 42 })).toBe('{"answer":42}');
    expect(extractAgentText(7)).toBe('7');
  });

  it('treats a non-string final field as raw', () => {
    expect(classifyAgentOutput({ output: { text: 'x' } })).toEqual({ kind: 'raw', value: { text: 'x' } });
    expect(extractAgentText({ output: { text: 'x' } })).toBe('{"text":"x"}');
  });

  it('never returns an empty string', () => {
    expect(extractAgentText({ output: '' })).toBe('(no output)');
    expect(extractAgentText({ output: '   ' })).toBe('(no output)');
    expect(extractAgentText({ messages: [] })).toBe('{"messages":[]}');
    expect(extractAgentText(null)).toBe('(no output)');
    expect(extractAgentText(undefined)).toBe('(no output)');
    expect(normalizeAgentOutput({ kind: 'messages', texts: [] })).toBe('(no output)');
  });
});
