import { isRecord } from "./llms/utils.js";

export type AgentRole = 'reactive' | 'proactive';

export interface DualAgentErrorMeta {
  agent?: AgentRole;
  provider?: string;
  status?: number;
  retryable?: boolean;
}

export class DualAgentError extends Error {
  meta: DualAgentErrorMeta;
  constructor(message: string, meta: DualAgentErrorMeta = {}, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.meta = meta;
  }
}
export class CredentialError extends DualAgentError {}
export class ProviderCallError extends DualAgentError {}
export class ToolInitError extends DualAgentError {}
export class ToolExecutionError extends DualAgentError {}

export function isRetryableStatus(status?: number): boolean {
  if (status === undefined) return false;
  return status >= 500 || status === 429 || status === 408;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    return String(e);
  }
}

function ownFields(e: unknown): Record<string, unknown> {
  if (isRecord(e)) return e;
  return {};
}

function errorStatus(e: unknown): number | undefined {
  const fields = ownFields(e);
  if (typeof fields.status === 'number') return fields.status;
  const response = fields.response;
  if (isRecord(response) && typeof response.status === 'number') return response.status;
  return undefined;
}

function errorCode(e: unknown): string {
  const code = ownFields(e).code;
  return typeof code === 'string' ? code : '';
}

/**
 * Wrap any failure coming out of a provider call in a ProviderCallError.
 * HTTP status and connection error codes decide whether the call is worth retrying.
 */
export function normalizeProviderError(e: unknown, meta: DualAgentErrorMeta = {}): ProviderCallError {
  if (e instanceof ProviderCallError) {
    return new ProviderCallError(e.message, { ...e.meta, ...meta }, { cause: e.cause });
  }
  const status = errorStatus(e);
  const code = errorCode(e);
  const retryable = (status === undefined ? true : isRetryableStatus(status)) || code.includes('ECONN') || code.includes('ETIMEDOUT');
  return new ProviderCallError(errorMessage(e) || 'LLM error', { ...meta, status, retryable }, { cause: e });
}

/**
 * Replace every occurrence of the given secrets in a message with `***`.
 */
export function redactSecrets(message: string, secrets: Array<string | undefined>): string {
  let out = message;
  for (const secret of secrets) {
    if (!secret) continue;
    out = out.split(secret).join('***');
  }
  return out;
}
