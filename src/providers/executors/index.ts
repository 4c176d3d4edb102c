/**
 * Provider Executors
 *
 * All executors implement the PromptExecutor interface: run one prompt,
 * return the raw text.
 */

import type { Logger } from '../../core/logger.js';
import type { ProviderType } from '../../types.js';
import type { PromptExecutor } from '../executor.js';
import { ClaudeCodeExecutor } from './claude-code.js';
import { CodexExecutor } from './codex.js';
import { GroqExecutor } from './groq.js';
import { OllamaExecutor } from './ollama.js';

export interface ExecutorOptions {
  model?: string;
  apiKey?: string;
  logger?: Logger;
}

const executors: Record<ProviderType, (options: ExecutorOptions) => PromptExecutor> = {
  'claude-code': (options) => new ClaudeCodeExecutor(options),
  codex: (options) => new CodexExecutor(options),
  ollama: (options) => new OllamaExecutor(options.model),
  groq: (options) => new GroqExecutor(options),
};

/**
 * Get a prompt executor by provider name
 */
export function getExecutor(name: ProviderType, options: ExecutorOptions = {}): PromptExecutor {
  return executors[name](options);
}

export { ClaudeCodeExecutor } from './claude-code.js';
export { CodexExecutor } from './codex.js';
export { GroqExecutor } from './groq.js';
export { OllamaExecutor } from './ollama.js';
