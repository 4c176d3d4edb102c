import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import YAML from 'yaml';
import { GateMode, ProviderType, StagegateConfig } from '../types.js';
import type { StagegateConfigInput } from '../types.js';
import { ConfigError, errorMessage } from './errors.js';
import { formatZodError } from './validation.js';

export const CONFIG_FILE_NAMES = ['.stagegate.yml', '.stagegate.yaml'];

/**
 * Parse and validate a config object. Missing fields take their defaults.
 */
export function parseConfig(raw: unknown, source = 'config'): StagegateConfig {
  const result = StagegateConfig.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function defaultConfig(overrides: StagegateConfigInput = {}): StagegateConfig {
  return parseConfig(overrides);
}

/**
 * Load `.stagegate.yml` from `cwd`, or the file named explicitly.
 * No file means defaults; a named file that does not exist is an error.
 */
export function loadConfig(cwd: string, explicitPath?: string): StagegateConfig {
  let path: string | undefined;
  if (explicitPath !== undefined) {
    path = isAbsolute(explicitPath) ? explicitPath : resolve(cwd, explicitPath);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
  } else {
    path = CONFIG_FILE_NAMES.map((name) => join(cwd, name)).find((candidate) => existsSync(candidate));
  }

  if (path === undefined) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
  }
  return parseConfig(raw, path);
}

// ─────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────

export interface EnvOverrides {
  config: StagegateConfig;
  /** API key for HTTP backends; never stored in the config object. */
  apiKey?: string;
}

export function applyEnvOverrides(config: StagegateConfig, env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  let next = config;

  const provider = env.STAGEGATE_PROVIDER;
  if (provider !== undefined && provider !== '') {
    const parsed = ProviderType.safeParse(provider);
    if (!parsed.success) {
      throw new ConfigError(
        `STAGEGATE_PROVIDER must be one of ${ProviderType.options.join(', ')} (got "${provider}")`
      );
    }
    next = { ...next, provider: parsed.data };
  }

  const model = env.STAGEGATE_MODEL;
  if (model !== undefined && model !== '') {
    next = { ...next, model };
  }

  const apiKey = env.STAGEGATE_API_KEY || env.GROQ_API_KEY || undefined;
  return { config: next, apiKey };
}

// ─────────────────────────────────────────────────────────────
// Mode flags
// ─────────────────────────────────────────────────────────────

export interface ModeFlags {
  mode?: string;
  stage1Only?: boolean;
  stage2Only?: boolean;
  stage3Only?: boolean;
  llmOnly?: boolean;
}

const FLAG_MODES: Array<[keyof ModeFlags, GateMode, string]> = [
  ['stage1Only', 'stage1_only', '--stage1-only'],
  ['stage2Only', 'stage2_only', '--stage2-only'],
  ['stage3Only', 'stage3_only', '--stage3-only'],
  ['llmOnly', 'llm_only', '--llm-only'],
];

/**
 * Resolve the mode from CLI flags. Returns undefined when no flag names
 * one, so the config file's mode stands.
 */
export function resolveMode(flags: ModeFlags): GateMode | undefined {
  const selected = FLAG_MODES.filter(([key]) => flags[key] === true);
  if (selected.length > 1) {
    throw new ConfigError(`Conflicting mode flags: ${selected.map(([, , flag]) => flag).join(', ')}`);
  }

  let explicit: GateMode | undefined;
  if (flags.mode !== undefined) {
    const parsed = GateMode.safeParse(flags.mode.replace(/-/g, '_'));
    if (!parsed.success) {
      throw new ConfigError(`Unknown mode "${flags.mode}" (expected one of ${GateMode.options.join(', ')})`);
    }
    explicit = parsed.data;
  }

  if (selected.length === 1) {
    const [, mode, flag] = selected[0];
    if (explicit !== undefined && explicit !== mode) {
      throw new ConfigError(`${flag} conflicts with --mode ${flags.mode}`);
    }
    return mode;
  }
  return explicit;
}
