import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

vi.mock('../../../src/providers/detect.js', () => ({
  isProviderAvailable: vi.fn(),
  getProviderCommand: vi.fn().mockReturnValue('claude'),
}));

import { execa } from 'execa';
import { ClaudeCodeExecutor } from '../../../src/providers/executors/claude-code.js';
import { isProviderAvailable, getProviderCommand } from '../../../src/providers/detect.js';
import { ReasoningServiceError } from '../../../src/core/errors.js';

function execaResult(overrides: Record<string, unknown> = {}) {
  return {
    stdout: '',
    stderr: '',
    timedOut: false,
    failed: false,
    exitCode: 0,
    ...overrides,
  } as any;
}

describe('providers/executors/claude-code', () => {
  let executor: ClaudeCodeExecutor;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(getProviderCommand).mockReturnValue('claude');
    executor = new ClaudeCodeExecutor();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should have name claude-code', () => {
      expect(executor.name).toBe('claude-code');
    });
  });

  describe('isAvailable', () => {
    it('should delegate to provider detection', async () => {
      vi.mocked(isProviderAvailable).mockResolvedValue(true);

      const result = await executor.isAvailable();

      expect(result).toBe(true);
      expect(isProviderAvailable).toHaveBeenCalledWith('claude-code');
    });

    it('should return false when the CLI is missing', async () => {
      vi.mocked(isProviderAvailable).mockResolvedValue(false);

      expect(await executor.isAvailable()).toBe(false);
    });
  });

  describe('runPrompt', () => {
    it('should run claude in print mode with text output', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stdout: '{"findings":[]}' }));

      const result = await executor.runPrompt('review this', { cwd: '/project' });

      expect(execa).toHaveBeenCalledWith(
        'claude',
        ['-p', 'review this', '--output-format', 'text'],
        expect.objectContaining({
          cwd: '/project',
          timeout: 300000,
          env: expect.objectContaining({ NO_COLOR: '1' }),
          reject: false,
          stdin: 'ignore',
        })
      );
      expect(result.output).toBe('{"findings":[]}');
      expect(result.error).toBeUndefined();
    });

    it('should pass the model and a custom timeout', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stdout: 'ok' }));
      const withModel = new ClaudeCodeExecutor({ model: 'sonnet' });

      await withModel.runPrompt('prompt', { cwd: '/project', timeout: 60000 });

      expect(execa).toHaveBeenCalledWith(
        'claude',
        ['-p', 'prompt', '--output-format', 'text', '--model', 'sonnet'],
        expect.objectContaining({ timeout: 60000 })
      );
    });

    it('should report a timeout', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ timedOut: true, failed: true }));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'timeout',
        message: 'Claude Code timed out',
      });
    });

    it('should report a process that never started as unavailable', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ failed: true, exitCode: undefined }));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Claude Code could not be started (claude)',
      });
    });

    it('should detect rate limit errors in stderr', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stderr: 'Error: 429 Too Many Requests' }));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'rate_limit',
        message: 'Claude API rate limit reached',
      });
    });

    it('should detect authentication errors in stderr', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stderr: 'Error: 401 Unauthorized' }));

      const error = await executor.runPrompt('prompt', { cwd: '/project' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ReasoningServiceError);
      expect(error).toMatchObject({ kind: 'auth' });
    });

    it('should detect billing errors in stderr', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stderr: 'insufficient credits on account' }));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'auth',
        message: 'Claude API billing error. Check your account credits.',
      });
    });

    it('should keep stdout when stderr only carries warnings', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stdout: 'reply', stderr: 'warning: slow network' }));

      const result = await executor.runPrompt('prompt', { cwd: '/project' });

      expect(result.output).toBe('reply');
      expect(result.error).toBe('warning: slow network');
    });

    it('should surface a generic error when stderr has one and stdout is empty', async () => {
      vi.mocked(execa).mockResolvedValue(execaResult({ stderr: 'Error: something broke', exitCode: 1, failed: true }));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Claude Code error: Error: something broke',
      });
    });

    it('should map ENOENT to an install hint', async () => {
      vi.mocked(execa).mockRejectedValue(new Error('spawn claude ENOENT'));

      await expect(executor.runPrompt('prompt', { cwd: '/project' })).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Claude Code not found. Install: npm install -g @anthropic-ai/claude-code',
      });
    });
  });
});
