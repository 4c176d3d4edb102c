/**
 * Codex Executor - runs one prompt through the Codex CLI.
 *
 * Codex writes its last message to a file; stdout carries progress noise.
 */

import { execa } from 'execa';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ReasoningServiceError, errorMessage } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import type { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';
import { isProviderAvailable, getProviderCommand } from '../detect.js';

const CODEX_TIMEOUT = 300000; // 5 minutes

export interface CodexExecutorOptions {
  model?: string;
  logger?: Logger;
}

export class CodexExecutor implements PromptExecutor {
  name = 'codex';
  private readonly model?: string;
  private readonly logger: Logger;

  constructor(options: CodexExecutorOptions = {}) {
    this.model = options.model;
    this.logger = options.logger ?? silentLogger;
  }

  async isAvailable(): Promise<boolean> {
    return isProviderAvailable('codex');
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    const codexCommand = getProviderCommand('codex');
    const tempDir = mkdtempSync(join(tmpdir(), 'stagegate-codex-'));
    const outputFile = join(tempDir, 'output.txt');
    const args = ['exec', '--skip-git-repo-check', '-o', outputFile];
    if (this.model) {
      args.push('--model', this.model);
    }
    args.push('-'); // Read from stdin

    try {
      const { stdout, stderr, timedOut, failed, exitCode } = await execa(codexCommand, args, {
        cwd: options.cwd,
        input: prompt,
        timeout: options.timeout || CODEX_TIMEOUT,
        env: {
          ...process.env,
          NO_COLOR: '1',
        },
        reject: false,
      });

      if (timedOut) {
        throw new ReasoningServiceError('timeout', 'Codex timed out');
      }
      if (failed && exitCode === undefined) {
        throw new ReasoningServiceError('unavailable', `Codex could not be started (${codexCommand})`);
      }

      if (stderr) {
        if (stderr.includes('429') || stderr.includes('usage_limit') || stderr.includes('rate limit')) {
          throw new ReasoningServiceError('rate_limit', 'Codex API rate limit reached');
        }
        if (stderr.includes('401') || stderr.includes('unauthorized') || stderr.includes('authentication')) {
          throw new ReasoningServiceError('auth', 'Codex API authentication failed. Check your API key.');
        }
        if (stderr.includes('ERROR:') || stderr.includes('error=http')) {
          const errorMatch = stderr.match(/ERROR:\s*(.+?)(?:\n|$)/i) || stderr.match(/error=(.+?)(?:\n|$)/);
          const detail = errorMatch ? errorMatch[1].trim() : stderr.substring(0, 200);
          throw new ReasoningServiceError('unavailable', `Codex API error: ${detail}`);
        }
      }

      let output = stdout || '';
      if (existsSync(outputFile)) {
        output = readFileSync(outputFile, 'utf-8');
      } else {
        this.logger.debug('codex wrote no output file; using stdout', { stdoutLength: output.length });
      }

      return {
        output,
        error: stderr || undefined,
      };
    } catch (error) {
      if (error instanceof ReasoningServiceError) throw error;
      if (errorMessage(error).includes('ENOENT')) {
        throw new ReasoningServiceError('unavailable', 'Codex not found. Install: npm install -g @openai/codex');
      }
      throw new ReasoningServiceError('unavailable', `Codex failed: ${errorMessage(error)}`);
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  }
}
