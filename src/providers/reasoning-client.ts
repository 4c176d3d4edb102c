/**
 * Reasoning Client - the one network-bound collaborator of a gate run.
 *
 * Stages talk to the ReasoningClient interface only; tests inject a scripted
 * fake. The production client wraps a PromptExecutor with a per-call timeout,
 * bounded exponential backoff and one strict re-ask when a reply is not JSON.
 */

import { Severity } from '../types.js';
import type { ReasoningErrorKind, Snippet } from '../types.js';
import { ReasoningServiceError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { parseReasoningOutput } from '../core/validation.js';
import type { ReasoningResponseFromLLM } from '../core/validation.js';
import type { PromptExecutor } from './executor.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface PromptTemplate {
  readonly id: string;
  render(request: { snippet: Snippet; context: string }): string;
  /** Appended when the first reply could not be parsed. */
  readonly strictSuffix: string;
}

export interface ReasoningRequest {
  snippet: Snippet;
  context: string;
  promptTemplate: PromptTemplate;
}

export interface ReasoningFinding {
  issue: string;
  category?: string;
  cweId?: string;
  severity: Severity;
  line?: number;
  lineEnd?: number;
  confidence: number;
  rationale: string;
  fix?: string;
}

export interface ReasoningResponse {
  findings: ReasoningFinding[];
}

export interface ReasoningClient {
  readonly name: string;
  request(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export interface RetryPolicy {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

// ─────────────────────────────────────────────────────────────
// Response normalization
// ─────────────────────────────────────────────────────────────

const CONFIDENCE_LEVELS: Record<string, number> = { high: 0.7, medium: 0.5, low: 0.3 };
const SEVERITY_CONFIDENCE: Record<Severity, number> = { critical: 0.8, high: 0.7, medium: 0.5, low: 0.3 };

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function normalizeConfidence(raw: number | string | undefined, severity: Severity): number {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return clamp01(raw);
  }
  if (typeof raw === 'string') {
    const level = CONFIDENCE_LEVELS[raw.trim().toLowerCase()];
    if (level !== undefined) return level;
    const numeric = Number.parseFloat(raw);
    if (Number.isFinite(numeric)) return clamp01(numeric);
  }
  return SEVERITY_CONFIDENCE[severity];
}

export function normalizeResponse(parsed: ReasoningResponseFromLLM): ReasoningResponse {
  return {
    findings: parsed.findings.map((raw) => {
      const severity = Severity.safeParse(raw.severity?.trim().toLowerCase());
      const level: Severity = severity.success ? severity.data : 'medium';
      const finding: ReasoningFinding = {
        issue: raw.issue ?? raw.title ?? 'Unnamed issue',
        severity: level,
        confidence: normalizeConfidence(raw.confidence, level),
        rationale: raw.rationale,
      };
      if (raw.category !== undefined) finding.category = raw.category;
      if (raw.cweId !== undefined) finding.cweId = raw.cweId;
      if (raw.line !== undefined && Number.isFinite(raw.line)) finding.line = Math.trunc(raw.line);
      if (raw.lineEnd !== undefined && Number.isFinite(raw.lineEnd)) finding.lineEnd = Math.trunc(raw.lineEnd);
      if (raw.fix !== undefined) finding.fix = raw.fix;
      return finding;
    }),
  };
}

// ─────────────────────────────────────────────────────────────
// Failure handling
// ─────────────────────────────────────────────────────────────

export function toReasoningError(error: unknown, backend: string): ReasoningServiceError {
  if (error instanceof ReasoningServiceError) return error;
  const message = errorMessage(error);
  const lower = message.toLowerCase();
  let kind: ReasoningErrorKind = 'unavailable';
  if (lower.includes('timed out') || lower.includes('timeout')) kind = 'timeout';
  else if (lower.includes('rate limit') || lower.includes('429')) kind = 'rate_limit';
  else if (lower.includes('401') || lower.includes('unauthorized') || lower.includes('authentication')) kind = 'auth';
  return new ReasoningServiceError(kind, `${backend}: ${message}`);
}

export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attempt);
}

/**
 * Retry transient reasoning failures with exponential backoff.
 * Authentication failures surface on the first attempt.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: Pick<RetryPolicy, 'retries' | 'baseDelayMs' | 'maxDelayMs'>,
  options: { backend: string; sleep?: Sleep; logger?: Logger }
): Promise<T> {
  const sleep = options.sleep ?? realSleep;
  const logger = options.logger ?? silentLogger;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const failure = toReasoningError(error, options.backend);
      if (!failure.retryable || attempt >= policy.retries) {
        throw failure;
      }
      const delay = backoffDelay(attempt, policy);
      logger.debug(`${options.backend} ${failure.kind}, retrying`, { attempt: attempt + 1, delayMs: delay });
      await sleep(delay);
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, backend: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ReasoningServiceError('timeout', `${backend}: no reply within ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ─────────────────────────────────────────────────────────────
// Executor-backed client
// ─────────────────────────────────────────────────────────────

export interface ExecutorClientOptions {
  policy: RetryPolicy;
  cwd?: string;
  logger?: Logger;
  sleep?: Sleep;
}

export class ExecutorReasoningClient implements ReasoningClient {
  readonly name: string;
  private readonly executor: PromptExecutor;
  private readonly options: ExecutorClientOptions;
  private readonly logger: Logger;

  constructor(executor: PromptExecutor, options: ExecutorClientOptions) {
    this.executor = executor;
    this.name = executor.name;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async request(request: ReasoningRequest): Promise<ReasoningResponse> {
    return withRetry(() => this.attempt(request), this.options.policy, {
      backend: this.name,
      sleep: this.options.sleep,
      logger: this.logger,
    });
  }

  private async attempt(request: ReasoningRequest): Promise<ReasoningResponse> {
    const prompt = request.promptTemplate.render(request);
    let parsed = parseReasoningOutput(await this.run(prompt));

    if (!parsed.success) {
      this.logger.debug(`${this.name} reply was not usable JSON, asking again`, {
        snippet: request.snippet.id,
        error: parsed.error,
      });
      parsed = parseReasoningOutput(await this.run(prompt + request.promptTemplate.strictSuffix));
    }

    if (!parsed.success) {
      throw new ReasoningServiceError('invalid_response', `${this.name}: ${parsed.error}`);
    }
    return normalizeResponse(parsed.data);
  }

  private async run(prompt: string): Promise<string> {
    const { timeoutMs } = this.options.policy;
    try {
      const result = await withTimeout(
        this.executor.runPrompt(prompt, { cwd: this.options.cwd ?? process.cwd(), timeout: timeoutMs }),
        timeoutMs,
        this.name
      );
      return result.output;
    } catch (error) {
      throw toReasoningError(error, this.name);
    }
  }
}
