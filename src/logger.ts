export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

export type LoggerOptions = {
  prefix?: string;
  // Defaults to DUAL_AGENT_DEBUG=true
  debug?: boolean;
};

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DUAL_AGENT_DEBUG === 'true' || env.DUAL_AGENT_DEBUG === '1';
}

/**
 * Console logger with a fixed prefix. Callers must never pass API keys in
 * `message` or `details`.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? '[DualAgent]';
  const debugOn = opts.debug ?? isDebugEnabled();
  return {
    debug: (message, ...details) => {
      if (debugOn) console.log(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const defaultLogger: Logger = createLogger();
