/**
 * Groq Executor - OpenAI-compatible chat completions over HTTP.
 *
 * Works with any endpoint that speaks the chat completions API; point
 * `baseUrl` elsewhere to use one.
 */

import OpenAI from 'openai';
import { ReasoningServiceError, errorMessage } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import type { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
const DEFAULT_MODEL = 'llama-3.3-70b-versatile';
const GROQ_TIMEOUT = 120000;

export interface GroqExecutorOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  logger?: Logger;
}

/** Map SDK errors onto the reasoning error kinds. */
export function classifyOpenAiError(error: unknown): ReasoningServiceError {
  if (error instanceof ReasoningServiceError) return error;
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ReasoningServiceError('timeout', 'Groq request timed out');
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new ReasoningServiceError('auth', `Groq authentication failed: ${error.message}`);
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ReasoningServiceError('rate_limit', 'Groq rate limit reached');
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ReasoningServiceError('unavailable', `Groq unreachable: ${error.message}`);
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined && error.status >= 500) {
    return new ReasoningServiceError('unavailable', `Groq server error ${error.status}`);
  }
  return new ReasoningServiceError('invalid_response', `Groq request failed: ${errorMessage(error)}`);
}

export class GroqExecutor implements PromptExecutor {
  name = 'groq';
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: GroqExecutorOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? GROQ_BASE_URL;
    this.model = options.model ?? DEFAULT_MODEL;
    this.logger = options.logger ?? silentLogger;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.apiKey);
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    if (!this.apiKey) {
      throw new ReasoningServiceError('auth', 'No API key. Set GROQ_API_KEY or STAGEGATE_API_KEY.');
    }

    const client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: options.timeout || GROQ_TIMEOUT,
      maxRetries: 0, // the reasoning client owns retries
    });

    this.logger.debug('groq request', { model: this.model, promptLength: prompt.length });

    try {
      const completion = await client.chat.completions.create({
        model: this.model,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      });
      const output = completion.choices[0]?.message?.content ?? '';
      if (output.trim() === '') {
        throw new ReasoningServiceError('invalid_response', 'Groq returned an empty completion');
      }
      return { output };
    } catch (error) {
      throw classifyOpenAiError(error);
    }
  }
}
