// Reactive (drafting) agent defaults
export const DEFAULT_REACTIVE_MODEL = 'llama-3.1-8b-instant';
export const REACTIVE_MODELS = ['llama-3.1-8b-instant', 'llama-3.3-70b-versatile'] as const;
export const DEFAULT_REACTIVE_TEMPERATURE = 0.3;

// Proactive (refinement) agent defaults
export const DEFAULT_PROACTIVE_MODEL = 'gemini-2.5-flash';
export const PROACTIVE_MODELS = ['gemini-2.5-flash', 'gemini-2.5-pro'] as const;
export const DEFAULT_PROACTIVE_TEMPERATURE = 0.7;

// Provider endpoints
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

// Tooling
export const WEB_SEARCH_TOOL_NAME = 'web_search';
export const DEFAULT_SEARCH_MAX_RESULTS = 5;
export const SEARCH_TIMEOUT_MS = 15_000;
export const DEFAULT_MAX_TOOL_ITERATIONS = 8;

// Runner
export const DUAL_RUNNER_POOL_SIZE = 2;
export const EMPTY_OUTPUT_PLACEHOLDER = '(no output)';

// Server
export const DEFAULT_SERVER_PORT = 3000;
export const DEFAULT_SERVER_HOST = '127.0.0.1';

// Telemetry
export const DUAL_AGENT_VERSION = '0.1.0';
export const DEFAULT_TELEMETRY_SERVICE_NAME = 'dual-agent-strategist';
