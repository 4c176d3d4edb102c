/**
 * Ollama Executor - local models through the ollama CLI.
 * Requires: ollama installed and a model pulled (e.g., ollama pull codellama)
 */

import { execa } from 'execa';
import { ReasoningServiceError, errorMessage } from '../../core/errors.js';
import type { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';
import { isProviderAvailable, getProviderCommand } from '../detect.js';

const OLLAMA_TIMEOUT = 600000; // 10 minutes (local models can be slow)
const DEFAULT_MODEL = 'codellama';

export class OllamaExecutor implements PromptExecutor {
  name = 'ollama';
  private model: string;

  constructor(model: string = DEFAULT_MODEL) {
    this.model = model;
  }

  async isAvailable(): Promise<boolean> {
    return isProviderAvailable('ollama');
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    const ollamaCommand = getProviderCommand('ollama');

    try {
      const { stdout, stderr, timedOut, failed, exitCode } = await execa(ollamaCommand, ['run', this.model, prompt], {
        cwd: options.cwd,
        timeout: options.timeout || OLLAMA_TIMEOUT,
        env: {
          ...process.env,
          NO_COLOR: '1',
        },
        reject: false,
      });

      if (timedOut) {
        throw new ReasoningServiceError('timeout', `Ollama model '${this.model}' timed out`);
      }
      if (failed && exitCode === undefined) {
        throw new ReasoningServiceError('unavailable', `Ollama could not be started (${ollamaCommand})`);
      }

      if (stderr) {
        if (stderr.includes('connection refused') || stderr.includes('ECONNREFUSED')) {
          throw new ReasoningServiceError('unavailable', 'Ollama server not running. Start it with: ollama serve');
        }
        if (stderr.includes('model') && (stderr.includes('not found') || stderr.includes('does not exist'))) {
          throw new ReasoningServiceError('unavailable', `Ollama model '${this.model}' not found. Run: ollama pull ${this.model}`);
        }
        if (stderr.includes('out of memory') || stderr.includes('OOM')) {
          throw new ReasoningServiceError('unavailable', 'Ollama out of memory. Try a smaller model.');
        }
        if ((stderr.includes('Error') || stderr.includes('error')) && !stdout) {
          throw new ReasoningServiceError('unavailable', `Ollama error: ${stderr.substring(0, 200)}`);
        }
      }

      return {
        output: stdout || '',
        error: stderr || undefined,
      };
    } catch (error) {
      if (error instanceof ReasoningServiceError) throw error;
      if (errorMessage(error).includes('ENOENT')) {
        throw new ReasoningServiceError('unavailable', 'Ollama not found. Install from: https://ollama.ai');
      }
      throw new ReasoningServiceError('unavailable', `Ollama failed: ${errorMessage(error)}`);
    }
  }
}
