import { buildModelRequest, type ModelRequest } from '../prompts/assembler.js';
import { backendLimiter, type ConcurrencyLimiter } from '../utils/limiter.js';
import { RetryPolicy, realSleep, type Sleeper } from './retry-policy.js';
import type {
  AttemptRecord,
  ModelResponse,
  PromptBundle,
  ResponseClass,
} from '../control-plane/types.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export interface TransportReply {
  status: number;
  body: string;
}

/**
 * Performs one backend call. Resolves with whatever status the backend
 * answered; rejects only when no answer arrived (connection failure, abort).
 */
export type ModelTransport = (request: ModelRequest, signal: AbortSignal) => Promise<TransportReply>;

export type GatewayFailureKind = 'ExhaustedRetries' | 'RejectedRequest';

export interface GatewayFailure {
  kind: GatewayFailureKind;
  message: string;
  httpStatus: number | null;
}

export type GatewayResult =
  | { ok: true; response: ModelResponse; retries: number; attempts: AttemptRecord[] }
  | { ok: false; failure: GatewayFailure; retries: number; attempts: AttemptRecord[] };

export interface ModelGatewayOptions {
  transport: ModelTransport;
  policy?: RetryPolicy;
  timeoutMs?: number;
  sleep?: Sleeper;
  limiter?: ConcurrencyLimiter;
  clock?: () => number;
}

export function classifyReply(status: number, body: string): ResponseClass {
  if (status >= 200 && status < 300) {
    return body.trim().length > 0 ? 'success' : 'transient-error';
  }
  if (status === 429 || status >= 500) return 'transient-error';
  return 'permanent-error';
}

class GatewayTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`timeout after ${timeoutMs}ms`);
    this.name = 'GatewayTimeoutError';
  }
}

export class ModelGateway {
  readonly policy: RetryPolicy;
  private readonly transport: ModelTransport;
  private readonly timeoutMs: number;
  private readonly sleep: Sleeper;
  private readonly limiter: ConcurrencyLimiter;
  private readonly clock: () => number;

  constructor(options: ModelGatewayOptions) {
    this.transport = options.transport;
    this.policy = options.policy ?? new RetryPolicy();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.sleep = options.sleep ?? realSleep;
    this.limiter = options.limiter ?? backendLimiter;
    this.clock = options.clock ?? Date.now;
  }

  async invoke(bundle: PromptBundle, model: string): Promise<GatewayResult> {
    const request = buildModelRequest(bundle, model);
    return this.limiter.run(() => this.invokeWithRetry(request));
  }

  private async invokeWithRetry(request: ModelRequest): Promise<GatewayResult> {
    const attempts: AttemptRecord[] = [];
    let retries = 0;

    for (;;) {
      const { response, error } = await this.tryOnce(request);
      const record: AttemptRecord = {
        httpStatus: response.httpStatus,
        classification: response.classification,
        latencyMs: response.latencyMs,
        backoffMs: 0,
        ...(error ? { error } : {}),
      };
      attempts.push(record);

      if (response.classification === 'success') {
        return { ok: true, response, retries, attempts };
      }

      const detail = error ?? `HTTP ${response.httpStatus}`;

      if (response.classification === 'permanent-error') {
        return {
          ok: false,
          failure: {
            kind: 'RejectedRequest',
            message: `Backend rejected request (${detail}): ${snippet(response.text)}`,
            httpStatus: response.httpStatus,
          },
          retries,
          attempts,
        };
      }

      if (!this.policy.canRetry(retries)) {
        return {
          ok: false,
          failure: {
            kind: 'ExhaustedRetries',
            message: `Gave up after ${attempts.length} attempt(s); last error: ${detail}`,
            httpStatus: response.httpStatus,
          },
          retries,
          attempts,
        };
      }

      const delay = this.policy.delayFor(retries);
      record.backoffMs = delay;
      retries++;
      console.warn(
        `    [gateway] ${detail}; retry ${retries}/${this.policy.maxRetries} in ${delay}ms`
      );
      await this.sleep(delay);
    }
  }

  private async tryOnce(request: ModelRequest): Promise<{ response: ModelResponse; error?: string }> {
    const ac = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        ac.abort();
        reject(new GatewayTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    const started = this.clock();
    try {
      const reply = await Promise.race([this.transport(request, ac.signal), timeout]);
      return {
        response: {
          text: reply.body,
          latencyMs: this.clock() - started,
          httpStatus: reply.status,
          classification: classifyReply(reply.status, reply.body),
        },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        response: {
          text: '',
          latencyMs: this.clock() - started,
          httpStatus: null,
          classification: 'transient-error',
        },
        error: err instanceof GatewayTimeoutError ? message : `network error: ${message}`,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

function snippet(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length === 0) return '(empty body)';
  return flat.length > 200 ? `${flat.slice(0, 197)}...` : flat;
}
