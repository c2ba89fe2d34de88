#!/usr/bin/env node
import { loadServerConfig } from './config.js';
import { createApp } from './server.js';
import { createLogger } from './logger.js';
import { createDualAgentTelemetry } from './telemetry.js';

const config = loadServerConfig();
const logger = createLogger({ debug: config.debug });
const telemetry = createDualAgentTelemetry({ serviceName: config.serviceName });

const app = createApp({ logger, telemetry });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Content strategist listening on http://${config.host}:${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, closing server`);
  server.close((err) => {
    if (err) {
      logger.error('Error while closing server:', err);
      process.exitCode = 1;
    }
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
