import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { CompletionRequest, JSONSchema, LLMHandle, LLMToolResult } from '../llms/types.js';
import type { AgentTool } from '../tools/types.js';
import type { ObservabilityOptions } from '../types.js';
import type { AgentRole } from '../errors.js';
import { errorMessage } from '../errors.js';
import { defaultLogger } from '../logger.js';
import { noopTelemetry, traceLLMCall } from '../telemetry.js';
import { DEFAULT_MAX_TOOL_ITERATIONS } from '../constants.js';

export type RefinementInput = {
  draft: string;
  topic: string;
};

/**
 * Anything that can turn a refinement input into an answer. The answer shape is
 * up to the integration; callers normalize it with `extractAgentText`.
 */
export interface AgentExecutor {
  invoke(input: RefinementInput): Promise<unknown>;
}

export type IntermediateStep = {
  tool: string;
  arguments: Record<string, unknown>;
  result?: unknown;
  error?: string;
  ms: number;
};

export type ToolCallingExecutorResult = {
  output: string;
  intermediateSteps: IntermediateStep[];
};

export interface ToolCallingExecutor extends AgentExecutor {
  invoke(input: RefinementInput): Promise<ToolCallingExecutorResult>;
}

export type ToolCallingExecutorConfig = ObservabilityOptions & {
  llm: LLMHandle;
  tools: AgentTool[];
  systemPrompt: string;
  buildUserContent: (input: RefinementInput) => string;
  temperature?: number;
  maxIterations?: number;
  agent?: AgentRole;
  onToolCall?: (toolName: string, args: Record<string, unknown>, result: unknown) => void;
};

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
const VALIDATOR_CACHE = new WeakMap<JSONSchema, ValidateFunction>();

/**
 * Check tool arguments against the tool's JSON schema.
 *
 * @returns a description of the failures, or `undefined` when the arguments are valid
 */
export function validateToolArgs(schema: JSONSchema, args: Record<string, unknown>): string | undefined {
  let validate = VALIDATOR_CACHE.get(schema);
  if (!validate) {
    validate = ajv.compile(schema);
    VALIDATOR_CACHE.set(schema, validate);
  }
  if (validate(args)) return undefined;
  return (validate.errors ?? []).map((e) => `${e.instancePath || e.schemaPath}: ${e.message ?? 'invalid'}`).join('; ');
}

function stringifyToolResult(result: unknown): string {
  if (typeof result === 'string') return result;
  return JSON.stringify(result) ?? String(result);
}

/**
 * The default tool-calling loop. Each round sends the prompt and the available
 * tools; tool calls are executed in order and their results appended to the
 * prompt for the next round. The loop ends on the first answer without tool
 * calls. A tool that fails is dropped for the rest of the run.
 */
export function createToolCallingExecutor(cfg: ToolCallingExecutorConfig): ToolCallingExecutor {
  const logger = cfg.logger ?? defaultLogger;
  const telemetry = cfg.telemetry ?? noopTelemetry;
  const parentSpan = cfg.parentSpan ?? null;
  const agent = cfg.agent ?? 'proactive';
  const maxIterations = cfg.maxIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
  const { llm } = cfg;

  const gen = (request: CompletionRequest) =>
    traceLLMCall(telemetry, parentSpan, llm, agent, request, () => llm.gen(request));
  const genWithTools = (request: CompletionRequest, active: Map<string, AgentTool>) =>
    traceLLMCall(telemetry, parentSpan, llm, agent, request, (): Promise<LLMToolResult> =>
      llm.genWithTools(request, [...active.values()].map((t) => t.definition)));

  async function runTool(tool: AgentTool, args: Record<string, unknown>): Promise<IntermediateStep> {
    const name = tool.definition.name;
    const span = telemetry.startToolSpan(parentSpan, name);
    const started = Date.now();
    try {
      const result = await tool.execute(args);
      const ms = Date.now() - started;
      telemetry.recordMetric('tool.call', 1, { tool: name, error: false });
      telemetry.recordMetric('tool.duration', ms, { tool: name });
      telemetry.endSpan(span);
      return { tool: name, arguments: args, result, ms };
    } catch (e) {
      telemetry.recordMetric('tool.call', 1, { tool: name, error: true });
      telemetry.recordMetric('error', 1, { type: 'tool', tool: name });
      telemetry.endSpan(span, e);
      return { tool: name, arguments: args, error: errorMessage(e), ms: Date.now() - started };
    }
  }

  return {
    async invoke(input: RefinementInput): Promise<ToolCallingExecutorResult> {
      const active = new Map(cfg.tools.map((t) => [t.definition.name, t]));
      const baseContent = cfg.buildUserContent(input);
      const steps: IntermediateStep[] = [];
      let toolResults = '';

      const requestFor = (): CompletionRequest => ({
        systemPrompt: cfg.systemPrompt,
        userContent: baseContent + toolResults,
        temperature: cfg.temperature,
      });

      for (let i = 0; i < maxIterations; i++) {
        if (active.size === 0) {
          return { output: await gen(requestFor()), intermediateSteps: steps };
        }

        const plan = await genWithTools(requestFor(), active);
        if (plan.toolCalls.length === 0) {
          logger.debug(`Agent finished after ${i + 1} round(s) and ${steps.length} tool call(s)`);
          return { output: plan.content ?? '', intermediateSteps: steps };
        }

        let append = toolResults ? '' : '\n\n[Tool results]\n';
        for (const call of plan.toolCalls) {
          const tool = active.get(call.name);
          if (!tool) {
            append += `- ${call.name} -> error: no such tool is available\n`;
            continue;
          }

          const invalid = validateToolArgs(tool.definition.parameters, call.arguments);
          if (invalid) {
            logger.debug(`Rejected arguments for ${call.name}: ${invalid}`);
            steps.push({ tool: call.name, arguments: call.arguments, error: invalid, ms: 0 });
            append += `- ${call.name} -> error: invalid arguments (${invalid})\n`;
            continue;
          }

          logger.debug(`Calling ${call.name} ${JSON.stringify(call.arguments)}`);
          const step = await runTool(tool, call.arguments);
          steps.push(step);

          if (step.error !== undefined) {
            logger.warn(`Tool ${call.name} failed, continuing without it: ${step.error}`);
            active.delete(call.name);
            append += `- ${call.name} -> error: ${step.error}. This tool is no longer available; answer without it.\n`;
            continue;
          }

          append += `- ${call.name}(${JSON.stringify(call.arguments)}) -> ${stringifyToolResult(step.result)}\n`;
          if (cfg.onToolCall) {
            try {
              cfg.onToolCall(call.name, call.arguments, step.result);
            } catch (err) {
              logger.error('onToolCall callback error:', err);
            }
          }
        }
        toolResults += append;
      }

      logger.debug(`Reached ${maxIterations} tool round(s); asking for a final answer without tools`);
      return { output: await gen(requestFor()), intermediateSteps: steps };
    },
  };
}
