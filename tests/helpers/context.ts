import type { StagegateConfigInput } from '../../src/types.js';
import { defaultConfig } from '../../src/core/config.js';
import { loadModels } from '../../src/core/models.js';
import type { LoadedModels } from '../../src/core/models.js';
import { loadRuleIndex } from '../../src/core/rule-index.js';
import type { RuleIndex } from '../../src/core/rule-index.js';
import { RunContext } from '../../src/core/run-context.js';
import type { RunContextOptions } from '../../src/core/run-context.js';

let rules: RuleIndex | undefined;
let models: LoadedModels | undefined;

/** Built-in rules and bundled models, loaded once per test file. */
export function builtinArtifacts(): { rules: RuleIndex; models: LoadedModels } {
  rules ??= loadRuleIndex();
  models ??= loadModels(defaultConfig());
  return { rules, models };
}

export function makeContext(
  config: StagegateConfigInput = {},
  options: Omit<Partial<RunContextOptions>, 'config'> = {}
): RunContext {
  return new RunContext({
    artifacts: builtinArtifacts(),
    runId: 'run-test',
    ...options,
    config: defaultConfig(config),
  });
}

export function source(...lines: string[]): string {
  return lines.join('\n');
}
