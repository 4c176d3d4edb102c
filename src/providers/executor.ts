/**
 * Prompt executors run one prompt against one reasoning backend and return
 * its raw text. Parsing, retries and timeouts live in the reasoning client.
 */

export interface PromptOptions {
  cwd: string;
  timeout?: number;
}

export interface PromptResult {
  output: string;
  error?: string;
}

export interface PromptExecutor {
  name: string;
  isAvailable(): Promise<boolean>;
  runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult>;
}
