import { isRecord } from '../llms/utils.js';
import { EMPTY_OUTPUT_PLACEHOLDER } from '../constants.js';

/**
 * The shapes an agent integration can hand back as its answer.
 * - `final`: a dedicated final-answer string
 * - `messages`: the text of each message in conversation order
 * - `raw`: anything else, kept as is
 */
export type AgentOutput =
  | { kind: 'final'; text: string }
  | { kind: 'messages'; texts: string[] }
  | { kind: 'raw'; value: unknown };

export const FINAL_OUTPUT_KEYS = ['output', 'output_text', 'final_output'] as const;

function contentText(content: unknown): string | undefined {
  if (content === undefined || content === null) return undefined;
  if (typeof content === 'string') return content || undefined;
  if (Array.isArray(content)) {
    const text = content
      .map((part) => {
        if (typeof part === 'string') return part;
        if (isRecord(part) && typeof part.text === 'string') return part.text;
        return '';
      })
      .join('');
    return text || undefined;
  }
  return formatRaw(content) || undefined;
}

/** Sort an arbitrary integration result into one of the AgentOutput shapes. */
export function classifyAgentOutput(value: unknown): AgentOutput {
  if (typeof value === 'string') return { kind: 'final', text: value };
  if (!isRecord(value)) return { kind: 'raw', value };

  for (const key of FINAL_OUTPUT_KEYS) {
    if (!(key in value)) continue;
    const field = value[key];
    return typeof field === 'string' ? { kind: 'final', text: field } : { kind: 'raw', value: field };
  }

  if (Array.isArray(value.messages)) {
    const texts: string[] = [];
    for (const message of value.messages) {
      const text = isRecord(message) ? contentText(message.content) : undefined;
      if (text) texts.push(text);
    }
    if (texts.length > 0) return { kind: 'messages', texts };
    return { kind: 'raw', value };
  }

  const content = contentText(value.content);
  if (content) return { kind: 'final', text: content };

  return { kind: 'raw', value };
}

export function formatRaw(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value) ?? String(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function outputText(output: AgentOutput): string {
  switch (output.kind) {
    case 'final':
      return output.text;
    case 'messages':
      return output.texts.join('\n');
    case 'raw':
      return formatRaw(output.value);
  }
}

/** Collapse an AgentOutput to display text. Never returns an empty string. */
export function normalizeAgentOutput(output: AgentOutput): string {
  const text = outputText(output);
  return text.trim() ? text : EMPTY_OUTPUT_PLACEHOLDER;
}

export function extractAgentText(value: unknown): string {
  return normalizeAgentOutput(classifyAgentOutput(value));
}
