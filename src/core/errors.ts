/**
 * Error taxonomy for a gate run.
 *
 * Fatal errors (config, model load, invariant violations) escape the
 * orchestrator before any report exists and map to a process exit code.
 * Everything else is recorded inside the report.
 */

import type { ReasoningErrorKind } from '../types.js';

export const EXIT_CODES = {
  pass: 0,
  unexpected: 1,
  configError: 2,
  modelLoadError: 3,
  stage1Block: 11,
  stage2Block: 12,
  stage3Block: 13,
  indeterminate: 14,
  invariantViolation: 70,
} as const;

export class StagegateError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.unexpected) {
    super(message);
    this.name = 'StagegateError';
    this.exitCode = exitCode;
  }
}

/** Raised by a language parser; the normalizer catches it and falls back to a lexical scan. */
export class ParseDegraded extends StagegateError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseDegraded';
  }
}

export class ModelLoadError extends StagegateError {
  readonly artifact: string;

  constructor(artifact: string, message: string) {
    super(`Failed to load ${artifact}: ${message}`, EXIT_CODES.modelLoadError);
    this.name = 'ModelLoadError';
    this.artifact = artifact;
  }
}

export class ConfigError extends StagegateError {
  constructor(message: string) {
    super(message, EXIT_CODES.configError);
    this.name = 'ConfigError';
  }
}

export class InternalInvariantViolation extends StagegateError {
  constructor(message: string) {
    super(message, EXIT_CODES.invariantViolation);
    this.name = 'InternalInvariantViolation';
  }
}

const RETRYABLE_KINDS: ReadonlySet<ReasoningErrorKind> = new Set([
  'timeout',
  'rate_limit',
  'unavailable',
  'invalid_response',
]);

export class ReasoningServiceError extends StagegateError {
  readonly kind: ReasoningErrorKind;

  constructor(kind: ReasoningErrorKind, message: string) {
    super(message);
    this.name = 'ReasoningServiceError';
    this.kind = kind;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export function isReasoningServiceError(error: unknown): error is ReasoningServiceError {
  return error instanceof ReasoningServiceError;
}

/** Best-effort message for anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
