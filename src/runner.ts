import type { Span } from '@opentelemetry/api';
import type { ObservabilityOptions, ProviderConfig, ProviderFactory, Result, SearchConfig } from './types.js';
import { fail, ok } from './types.js';
import type { AgentRole } from './errors.js';
import { DualAgentError, errorMessage, normalizeProviderError, redactSecrets } from './errors.js';
import { draft } from './agents/reactive.js';
import { refine, type ExecutorFactory } from './agents/proactive.js';
import type { SearchProviderFactory } from './tools/search-tool.js';
import { createWorkerPool } from './patterns.js';
import { defaultLogger } from './logger.js';
import { noopTelemetry } from './telemetry.js';
import { DUAL_RUNNER_POOL_SIZE } from './constants.js';

export type DualAgentOutcome = {
  draft: Result<string>;
  refined: Result<string>;
};

export type RunOptions = Omit<ObservabilityOptions, 'parentSpan'> & {
  search?: SearchConfig;
  providers?: { reactive?: ProviderFactory; proactive?: ProviderFactory };
  searchProvider?: SearchProviderFactory;
  executor?: ExecutorFactory;
  maxIterations?: number;
  // Health-check the reactive credentials before drafting (default true)
  validate?: boolean;
};

export type AgentLabel = 'Reactive' | 'Proactive';

const LABELS: Record<AgentRole, AgentLabel> = { reactive: 'Reactive', proactive: 'Proactive' };

/**
 * Convert anything thrown by an agent into a DualAgentError whose message
 * carries none of the given secrets.
 */
export function toDualAgentError(e: unknown, agent: AgentRole, secrets: Array<string | undefined>): DualAgentError {
  const error = e instanceof DualAgentError ? e : normalizeProviderError(e, { agent });
  error.message = redactSecrets(error.message || errorMessage(e), secrets);
  if (error.stack) error.stack = redactSecrets(error.stack, secrets);
  if (!error.meta.agent) error.meta.agent = agent;
  return error;
}

export function renderOutcome(label: AgentLabel, result: Result<string>): string {
  return result.ok ? result.value : `${label} Agent Error: ${result.error.message}`;
}

/**
 * Run the reactive draft, then the proactive refinement of that draft.
 *
 * Both tasks go through a two-worker pool, but the refinement needs the
 * draft, so they run one after the other. Failures come back as
 * `{ ok: false }` results; this function does not throw. A failed draft is
 * still refined, using its rendered error text as the draft.
 */
export async function runDualAgents(
  topic: string,
  reactive: ProviderConfig,
  proactive: ProviderConfig,
  opts: RunOptions = {}
): Promise<DualAgentOutcome> {
  const logger = opts.logger ?? defaultLogger;
  const telemetry = opts.telemetry ?? noopTelemetry;
  const search: SearchConfig = opts.search ?? { enabled: false };
  const secrets = [reactive.apiKey, proactive.apiKey, search.apiKey];
  const pool = createWorkerPool(DUAL_RUNNER_POOL_SIZE);
  const runSpan = telemetry.startRunSpan(topic);

  const guarded = (agent: AgentRole, model: string, task: (parentSpan: Span | null) => Promise<string>) =>
    pool.submit(async (): Promise<Result<string>> => {
      const span = telemetry.startAgentSpan(runSpan, agent, model);
      const started = Date.now();
      try {
        const value = await task(span);
        telemetry.endSpan(span);
        return ok(value);
      } catch (e) {
        const error = toDualAgentError(e, agent, secrets);
        logger.warn(`${LABELS[agent]} agent failed: ${error.message}`);
        telemetry.recordMetric('error', 1, { type: error.name, agent });
        telemetry.endSpan(span, error);
        return fail(error);
      } finally {
        telemetry.recordMetric('agent.duration', Date.now() - started, { agent });
      }
    });

  logger.debug(`Running dual agents: reactive=${reactive.model} proactive=${proactive.model} search=${search.enabled ? 'on' : 'off'}`);

  const draftResult = await guarded('reactive', reactive.model, (parentSpan) =>
    draft(topic, reactive, {
      provider: opts.providers?.reactive,
      validate: opts.validate,
      logger,
      telemetry,
      parentSpan,
    }));

  const draftText = renderOutcome('Reactive', draftResult);

  const refinedResult = await guarded('proactive', proactive.model, (parentSpan) =>
    refine(draftText, topic, proactive, search, {
      provider: opts.providers?.proactive,
      searchProvider: opts.searchProvider,
      executor: opts.executor,
      maxIterations: opts.maxIterations,
      logger,
      telemetry,
      parentSpan,
    }));

  const failure = !draftResult.ok ? draftResult.error : !refinedResult.ok ? refinedResult.error : undefined;
  telemetry.endSpan(runSpan, failure);

  return { draft: draftResult, refined: refinedResult };
}

/**
 * Same as `runDualAgents`, with each result rendered for display: failures
 * become `"Reactive Agent Error: ..."` / `"Proactive Agent Error: ..."`.
 */
export async function runDualAgentsText(
  topic: string,
  reactive: ProviderConfig,
  proactive: ProviderConfig,
  opts: RunOptions = {}
): Promise<[string, string]> {
  const outcome = await runDualAgents(topic, reactive, proactive, opts);
  return [renderOutcome('Reactive', outcome.draft), renderOutcome('Proactive', outcome.refined)];
}
