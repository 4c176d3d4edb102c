import type { Logger } from '../core/logger.js';
import type { StagegateConfig } from '../types.js';
import { getExecutor } from './executors/index.js';
import { ExecutorReasoningClient } from './reasoning-client.js';
import type { ReasoningClient } from './reasoning-client.js';

export { getExecutor } from './executors/index.js';
export { detectProvider, isProviderAvailable, getProviderCommand } from './detect.js';
export type { PromptExecutor, PromptOptions, PromptResult } from './executor.js';
export type { ReasoningClient, ReasoningRequest, ReasoningResponse, ReasoningFinding, PromptTemplate } from './reasoning-client.js';
export { ExecutorReasoningClient } from './reasoning-client.js';

export interface ReasoningClientOptions {
  apiKey?: string;
  cwd?: string;
  logger?: Logger;
}

/**
 * Build the reasoning client a config asks for: the configured provider's
 * executor behind the retry and timeout policy.
 */
export function createReasoningClient(config: StagegateConfig, options: ReasoningClientOptions = {}): ReasoningClient {
  const executor = getExecutor(config.provider, {
    model: config.model,
    apiKey: options.apiKey,
    logger: options.logger,
  });
  return new ExecutorReasoningClient(executor, {
    policy: config.reasoning,
    cwd: options.cwd,
    logger: options.logger,
  });
}
