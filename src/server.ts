import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import { RunRequestSchema, resolveRunRequest } from './config.js';
import { renderOutcome, runDualAgents, type RunOptions } from './runner.js';
import { defaultLogger } from './logger.js';
import { errorMessage } from './errors.js';
import { isRecord } from './llms/utils.js';
import {
  DEFAULT_PROACTIVE_TEMPERATURE,
  DEFAULT_REACTIVE_TEMPERATURE,
  DUAL_AGENT_VERSION,
  PROACTIVE_MODELS,
  REACTIVE_MODELS,
} from './constants.js';

export type AppOptions = RunOptions & {
  corsOrigin?: string | string[];
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to error middleware
function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function httpStatusOf(err: unknown): number {
  if (!isRecord(err)) return 500;
  const status = typeof err.status === 'number' ? err.status : err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

/**
 * Build the HTTP app. Keys come only from request bodies and are dropped once
 * the run finishes.
 */
export function createApp(opts: AppOptions = {}): express.Express {
  const logger = opts.logger ?? defaultLogger;
  const { corsOrigin, ...runOptions } = opts;

  const app = express();
  app.use(express.json({ limit: '100kb' }));
  app.use(cors({ origin: corsOrigin ?? '*' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: DUAL_AGENT_VERSION });
  });

  app.get('/api/models', (_req, res) => {
    res.json({
      reactive: { models: REACTIVE_MODELS, defaultTemperature: DEFAULT_REACTIVE_TEMPERATURE },
      proactive: { models: PROACTIVE_MODELS, defaultTemperature: DEFAULT_PROACTIVE_TEMPERATURE },
    });
  });

  app.post('/api/run', asyncRoute(async (req, res) => {
    const parsed = RunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
      return;
    }

    const resolved = resolveRunRequest(parsed.data);
    if (!resolved.ok) {
      res.status(400).json({ error: resolved.message });
      return;
    }

    const { topic, reactive, proactive, search } = resolved.value;
    logger.info(`Running agents for a ${topic.length}-character topic (search ${search.enabled ? 'on' : 'off'})`);
    const outcome = await runDualAgents(topic, reactive, proactive, { ...runOptions, logger, search });

    res.json({
      topic,
      reactive: {
        model: reactive.model,
        temperature: reactive.temperature,
        ok: outcome.draft.ok,
        text: renderOutcome('Reactive', outcome.draft),
      },
      proactive: {
        model: proactive.model,
        temperature: proactive.temperature,
        search: search.enabled ? 'Enabled' : 'Disabled',
        ok: outcome.refined.ok,
        text: renderOutcome('Proactive', outcome.refined),
      },
    });
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err);
    if (status >= 500) logger.error(`Request failed: ${errorMessage(err)}`);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(err) });
  });

  return app;
}
