/**
 * Claude Code Executor - runs one prompt through the Claude CLI.
 */

import { execa } from 'execa';
import { ReasoningServiceError, errorMessage } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import type { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';
import { isProviderAvailable, getProviderCommand } from '../detect.js';

const CLAUDE_TIMEOUT = 300000; // 5 minutes

export interface ClaudeCodeExecutorOptions {
  model?: string;
  logger?: Logger;
}

export class ClaudeCodeExecutor implements PromptExecutor {
  name = 'claude-code';
  private readonly model?: string;
  private readonly logger: Logger;

  constructor(options: ClaudeCodeExecutorOptions = {}) {
    this.model = options.model;
    this.logger = options.logger ?? silentLogger;
  }

  async isAvailable(): Promise<boolean> {
    return isProviderAvailable('claude-code');
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    const claudeCommand = getProviderCommand('claude-code');
    const args = ['-p', prompt, '--output-format', 'text'];
    if (this.model) {
      args.push('--model', this.model);
    }

    this.logger.debug('running claude-code', { command: claudeCommand, promptLength: prompt.length, cwd: options.cwd });

    try {
      const { stdout, stderr, timedOut, failed, exitCode } = await execa(claudeCommand, args, {
        cwd: options.cwd,
        timeout: options.timeout || CLAUDE_TIMEOUT,
        env: {
          ...process.env,
          NO_COLOR: '1',
        },
        reject: false,
        stdin: 'ignore', // Prevent waiting for stdin
      });

      if (timedOut) {
        throw new ReasoningServiceError('timeout', 'Claude Code timed out');
      }
      if (failed && exitCode === undefined) {
        throw new ReasoningServiceError('unavailable', `Claude Code could not be started (${claudeCommand})`);
      }

      // Check for API errors in stderr before returning
      if (stderr) {
        const lower = stderr.toLowerCase();
        if (lower.includes('429') || lower.includes('rate limit') || lower.includes('too many requests')) {
          throw new ReasoningServiceError('rate_limit', 'Claude API rate limit reached');
        }
        if (lower.includes('401') || lower.includes('unauthorized') || lower.includes('invalid api key')) {
          throw new ReasoningServiceError('auth', 'Claude API authentication failed. Check your API key.');
        }
        if (lower.includes('402') || lower.includes('insufficient') || lower.includes('billing')) {
          throw new ReasoningServiceError('auth', 'Claude API billing error. Check your account credits.');
        }
        if (stderr.includes('Error:') && !stdout) {
          throw new ReasoningServiceError('unavailable', `Claude Code error: ${stderr.substring(0, 200)}`);
        }
      }

      this.logger.debug('claude-code replied', { stdoutLength: stdout.length, stderr: stderr.substring(0, 300) });

      return {
        output: stdout || '',
        error: stderr || undefined,
      };
    } catch (error) {
      if (error instanceof ReasoningServiceError) throw error;
      if (errorMessage(error).includes('ENOENT')) {
        throw new ReasoningServiceError('unavailable', 'Claude Code not found. Install: npm install -g @anthropic-ai/claude-code');
      }
      throw new ReasoningServiceError('unavailable', `Claude Code failed: ${errorMessage(error)}`);
    }
  }
}
