import { ConfigurationError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from '../gateway/gateway.js';
import { DEFAULT_RETRY_POLICY } from '../gateway/retry-policy.js';
import { generateRunId } from '../utils/id.js';

export interface EnvironmentConfig {
  apiKey: string;
  endpoint?: string;
  maxRetries: number;
  timeoutMs: number;
  runId: string;
}

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string, min: number): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed.length === 0 || !Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function parseRetryBudget(raw: string): number {
  return parseInteger('Retry budget', raw, 0);
}

export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const apiKey = env.LLM_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError(
      'LLM_API_KEY environment variable is required.\n' +
      'Set it in the environment or in a .env file.'
    );
  }

  const endpoint = env.LLM_ENDPOINT?.trim() || undefined;
  const maxRetries = env.LLM_MAX_RETRIES
    ? parseInteger('LLM_MAX_RETRIES', env.LLM_MAX_RETRIES, 0)
    : DEFAULT_RETRY_POLICY.maxRetries;
  const timeoutMs = env.LLM_TIMEOUT_MS
    ? parseInteger('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS, 1)
    : DEFAULT_TIMEOUT_MS;
  const runId = env.PIPELINE_RUN_ID?.trim() || env.GITHUB_RUN_ID?.trim() || generateRunId();

  return { apiKey, endpoint, maxRetries, timeoutMs, runId };
}
