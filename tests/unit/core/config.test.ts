import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { applyEnvOverrides, defaultConfig, loadConfig, parseConfig, resolveMode } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { appendPoint, loadHistory, saveHistory, MAX_HISTORY_POINTS } from '../../../src/core/history.js';

describe('core/config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stagegate-config-'));
  });

  describe('defaults', () => {
    it('should fill every section', () => {
      const config = defaultConfig();

      expect(config.mode).toBe('full');
      expect(config.failOnIndeterminate).toBe(true);
      expect(config.stage1).toMatchObject({ keepThreshold: 0.6, blockThreshold: 0.8, mergePolicy: 'max', maxHitsPerRule: 3 });
      expect(config.stage2).toMatchObject({ blockThreshold: 0.6, scope: 'snippet', runWhenBlocked: false });
      expect(config.stage3.blockThreshold).toBeUndefined();
      expect(config.reasoning).toEqual({ timeoutMs: 120000, retries: 2, baseDelayMs: 500, maxDelayMs: 8000 });
    });

    it('should reject out-of-range thresholds', () => {
      expect(() => parseConfig({ stage1: { blockThreshold: 2 } })).toThrow(ConfigError);
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no file exists', () => {
      expect(loadConfig(dir)).toEqual(defaultConfig());
    });

    it('should read .stagegate.yml from the working directory', () => {
      writeFileSync(join(dir, '.stagegate.yml'), 'mode: stage1_only\nstage1:\n  blockThreshold: 0.7\n');

      const config = loadConfig(dir);

      expect(config.mode).toBe('stage1_only');
      expect(config.stage1.blockThreshold).toBe(0.7);
      expect(config.stage1.keepThreshold).toBe(0.6);
    });

    it('should name the failing field', () => {
      writeFileSync(join(dir, '.stagegate.yml'), 'stage2:\n  scope: repo\n');

      expect(() => loadConfig(dir)).toThrow(/stage2\.scope/);
    });

    it('should fail on an explicit path that does not exist', () => {
      expect(() => loadConfig(dir, 'missing.yml')).toThrow(new ConfigError(`Config file not found: ${join(dir, 'missing.yml')}`));
    });

    it('should fail on YAML that does not parse', () => {
      writeFileSync(join(dir, 'broken.yml'), 'mode: [full\n');

      expect(() => loadConfig(dir, 'broken.yml')).toThrow(/^Could not parse /);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should apply provider, model and API key', () => {
      const { config, apiKey } = applyEnvOverrides(defaultConfig(), {
        STAGEGATE_PROVIDER: 'groq',
        STAGEGATE_MODEL: 'llama-test',
        GROQ_API_KEY: 'test-secret',
      });

      expect(config.provider).toBe('groq');
      expect(config.model).toBe('llama-test');
      expect(apiKey).toBe('test-secret');
    });

    it('should prefer STAGEGATE_API_KEY', () => {
      const { apiKey } = applyEnvOverrides(defaultConfig(), { STAGEGATE_API_KEY: 'test-primary', GROQ_API_KEY: 'test-secret' });

      expect(apiKey).toBe('test-primary');
    });

    it('should reject an unknown provider', () => {
      expect(() => applyEnvOverrides(defaultConfig(), { STAGEGATE_PROVIDER: 'skynet' })).toThrow(ConfigError);
    });
  });

  describe('resolveMode', () => {
    it('should return undefined when nothing is set', () => {
      expect(resolveMode({})).toBeUndefined();
    });

    it('should accept dashed mode names', () => {
      expect(resolveMode({ mode: 'llm-only' })).toBe('llm_only');
    });

    it('should map a single flag to its mode', () => {
      expect(resolveMode({ stage3Only: true })).toBe('stage3_only');
    });

    it('should reject two stage flags', () => {
      expect(() => resolveMode({ stage1Only: true, stage2Only: true })).toThrow(
        new ConfigError('Conflicting mode flags: --stage1-only, --stage2-only')
      );
    });

    it('should reject a flag that contradicts --mode', () => {
      expect(() => resolveMode({ mode: 'full', stage3Only: true })).toThrow(
        new ConfigError('--stage3-only conflicts with --mode full')
      );
    });

    it('should allow a flag that agrees with --mode', () => {
      expect(resolveMode({ mode: 'stage1-only', stage1Only: true })).toBe('stage1_only');
    });

    it('should reject an unknown mode', () => {
      expect(() => resolveMode({ mode: 'fast' })).toThrow(ConfigError);
    });
  });
});

describe('core/history', () => {
  it('should treat a missing file as empty history', () => {
    expect(loadHistory(join(tmpdir(), 'stagegate-no-such-history.json'))).toEqual([]);
  });

  it('should round-trip points through a file', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'stagegate-history-')), 'history.json');
    const points = appendPoint([], { stage1Findings: 2 }, '2024-01-01T00:00:00.000Z');

    saveHistory(path, points);

    expect(loadHistory(path)).toEqual([{ timestamp: '2024-01-01T00:00:00.000Z', features: { stage1Findings: 2 } }]);
  });

  it('should accept a bare array of points', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'stagegate-history-')), 'history.json');
    writeFileSync(path, '[{"features":{"stage2Findings":1}}]');

    expect(loadHistory(path)).toEqual([{ features: { stage2Findings: 1 } }]);
  });

  it('should reject a malformed file', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'stagegate-history-')), 'history.json');
    writeFileSync(path, '{"points":[{"features":{"stage1Findings":"many"}}]}');

    expect(() => loadHistory(path)).toThrow(ConfigError);
  });

  it('should keep only the most recent points', () => {
    let history = appendPoint([], { n: 0 }, 't0');
    for (let i = 1; i <= MAX_HISTORY_POINTS; i++) {
      history = appendPoint(history, { n: i }, `t${i}`);
    }

    expect(history).toHaveLength(MAX_HISTORY_POINTS);
    expect(history[0].features.n).toBe(1);
  });
});
