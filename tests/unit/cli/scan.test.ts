import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveScanConfig } from '../../../src/cli/commands/scan.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('cli/commands/scan', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'stagegate-scan-'));
  });

  describe('resolveScanConfig', () => {
    it('should layer flags over environment over file', () => {
      writeFileSync(join(cwd, '.stagegate.yml'), 'provider: codex\nmode: stage2_only\n');

      const { config, apiKey } = resolveScanConfig(
        { stage1Only: true, provider: 'ollama', explain: true },
        cwd,
        { STAGEGATE_PROVIDER: 'groq', STAGEGATE_API_KEY: 'test-secret' }
      );

      expect(config.mode).toBe('stage1_only');
      expect(config.provider).toBe('ollama');
      expect(config.explain).toBe(true);
      expect(apiKey).toBe('test-secret');
    });

    it('should keep the file mode when no flag names one', () => {
      writeFileSync(join(cwd, '.stagegate.yml'), 'mode: stage3_only\n');

      expect(resolveScanConfig({}, cwd, {}).config.mode).toBe('stage3_only');
    });

    it('should parse the stage 3 threshold', () => {
      const { config } = resolveScanConfig({ stage3Threshold: '0.4' }, cwd, {});

      expect(config.stage3.blockThreshold).toBe(0.4);
    });

    it('should reject a stage 3 threshold that is not a number', () => {
      expect(() => resolveScanConfig({ stage3Threshold: 'high' }, cwd, {})).toThrow(
        new ConfigError('--stage3-threshold must be a number (got "high")')
      );
    });

    it('should reject a stage 3 threshold above 1', () => {
      expect(() => resolveScanConfig({ stage3Threshold: '1.5' }, cwd, {})).toThrow(/^Invalid command-line options: stage3\.blockThreshold/);
    });

    it('should turn off failing on indeterminate', () => {
      expect(resolveScanConfig({ failOnIndeterminate: false }, cwd, {}).config.failOnIndeterminate).toBe(false);
    });

    it('should require a history file for --append-history', () => {
      expect(() => resolveScanConfig({ appendHistory: true }, cwd, {})).toThrow(
        new ConfigError('--append-history needs --history <file>')
      );
    });

    it('should reject an unknown provider flag', () => {
      expect(() => resolveScanConfig({ provider: 'skynet' }, cwd, {})).toThrow(ConfigError);
    });
  });
});
