/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the service requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return defaultValue;
  return raw === 'true' || raw === '1';
}

/** Read a comma-separated list of integers. */
function optionalIntList(key: string, defaultValue: number[]): number[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => parseInt(part, 10));
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

export type AgentFailurePolicy = 'fail' | 'replan';

function agentFailurePolicy(raw: string): AgentFailurePolicy | undefined {
  return raw === 'fail' || raw === 'replan' ? raw : undefined;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const rawFailurePolicy = optional('ORCHESTRATOR_AGENT_FAILURE_POLICY', 'replan');

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Planning oracle (LLM) settings */
  oracle: {
    model: optional('ORACLE_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    maxTokens: optionalInt('ORACLE_MAX_TOKENS', 2048),
    maxPlanSteps: optionalInt('ORACLE_MAX_PLAN_STEPS', 7),
  },

  /** Direct Line channel used to reach the crew's agents */
  directLine: {
    secret: required('DIRECT_LINE_SECRET'),
    baseUrl: optional('DIRECT_LINE_BASE_URL', 'https://directline.botframework.com/v3/directline'),
    pollIntervalMs: optionalInt('DIRECT_LINE_POLL_INTERVAL_MS', 1000),
    maxPolls: optionalInt('DIRECT_LINE_MAX_POLLS', 5),
  },

  /** Crew/task/telemetry storage */
  database: {
    sqlitePath: dbPath('DATABASE_PATH', '/app/data/crews.db', './data/crews.db'),
  },

  /** Plan/call loop limits */
  orchestrator: {
    maxIterations: optionalInt('ORCHESTRATOR_MAX_ITERATIONS', 10),
    agentFailurePolicy: agentFailurePolicy(rawFailurePolicy) ?? 'replan',
    rawAgentFailurePolicy: rawFailurePolicy,
    recordReasoning: optionalBool('ORCHESTRATOR_RECORD_REASONING', false),
  },

  /** Per-agent call behaviour */
  agents: {
    retryDelaysMs: optionalIntList('AGENT_RETRY_DELAYS_MS', [250, 750]),
    callTimeoutMs: optionalInt('AGENT_CALL_TIMEOUT_MS', 60_000),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Required secrets
  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }
  if (!config.directLine.secret) {
    errors.push('DIRECT_LINE_SECRET is required');
  }

  // Numeric bounds
  if (!(config.port >= 1 && config.port <= 65535)) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.orchestrator.maxIterations >= 1)) {
    errors.push(`ORCHESTRATOR_MAX_ITERATIONS must be >= 1, got ${config.orchestrator.maxIterations}`);
  }
  if (!agentFailurePolicy(config.orchestrator.rawAgentFailurePolicy)) {
    errors.push(
      `ORCHESTRATOR_AGENT_FAILURE_POLICY must be 'fail' or 'replan', got '${config.orchestrator.rawAgentFailurePolicy}'`
    );
  }
  if (!(config.oracle.maxTokens >= 256)) {
    errors.push(`ORACLE_MAX_TOKENS must be >= 256, got ${config.oracle.maxTokens}`);
  }
  if (!(config.oracle.maxPlanSteps >= 1 && config.oracle.maxPlanSteps <= 20)) {
    errors.push(`ORACLE_MAX_PLAN_STEPS must be 1-20, got ${config.oracle.maxPlanSteps}`);
  }
  if (config.agents.retryDelaysMs.some(ms => !(ms >= 0))) {
    errors.push(`AGENT_RETRY_DELAYS_MS must be a list of non-negative integers`);
  }
  if (!(config.agents.callTimeoutMs >= 1000)) {
    errors.push(`AGENT_CALL_TIMEOUT_MS must be >= 1000, got ${config.agents.callTimeoutMs}`);
  }
  if (!(config.directLine.maxPolls >= 1)) {
    errors.push(`DIRECT_LINE_MAX_POLLS must be >= 1, got ${config.directLine.maxPolls}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
