import { execa } from 'execa';
import type { ProviderType } from '../types.js';

type CliProvider = Exclude<ProviderType, 'groq'>;

const DEFAULT_COMMANDS: Record<CliProvider, string> = {
  'claude-code': 'claude',
  codex: 'codex',
  ollama: 'ollama',
};

// STAGEGATE_CLAUDE_CODE_PATH, STAGEGATE_CODEX_PATH, STAGEGATE_OLLAMA_PATH
function overrideVariable(provider: CliProvider): string {
  return `STAGEGATE_${provider.toUpperCase().replace(/-/g, '_')}_PATH`;
}

/**
 * Command that launches a CLI provider; an environment variable can point
 * at a binary outside PATH.
 */
export function getProviderCommand(provider: CliProvider, env: NodeJS.ProcessEnv = process.env): string {
  const override = env[overrideVariable(provider)];
  return override !== undefined && override !== '' ? override : DEFAULT_COMMANDS[provider];
}

export function hasApiKey(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.STAGEGATE_API_KEY || env.GROQ_API_KEY);
}

export async function isProviderAvailable(provider: ProviderType): Promise<boolean> {
  if (provider === 'groq') {
    return hasApiKey();
  }
  const result = await execa(getProviderCommand(provider), ['--version'], {
    reject: false,
    timeout: 10000,
    stdin: 'ignore',
  });
  return result.exitCode === 0;
}

/**
 * Providers usable on this machine, in preference order.
 */
export async function detectProvider(): Promise<ProviderType[]> {
  const candidates: ProviderType[] = ['claude-code', 'codex', 'ollama', 'groq'];
  const checks = await Promise.all(candidates.map((provider) => isProviderAvailable(provider)));
  return candidates.filter((_, index) => checks[index]);
}
