import chalk from 'chalk';
import { resolve } from 'path';
import { loadConfig } from '../../core/config.js';
import { EXIT_CODES, StagegateError, errorMessage } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import { loadRuleIndexWithPacks } from '../../core/rule-index.js';
import type { RuleIndex } from '../../core/rule-index.js';

export interface RulesOptions {
  config?: string;
  json?: boolean;
}

export function formatRuleTable(index: RuleIndex): string {
  const header = ['ID', 'CATEGORY', 'CWE', 'SEVERITY', 'CONFIDENCE'];
  const rows = index.rules.map((rule) => [
    rule.id,
    rule.category,
    rule.cweId ?? '-',
    rule.severity,
    rule.confidence.toFixed(2),
  ]);
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map((row) => row[column].length)));
  const render = (cells: string[]) => cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();
  return [chalk.bold(render(header)), ...rows.map(render)].join('\n');
}

export async function rulesCommand(options: RulesOptions): Promise<void> {
  const cwd = process.cwd();
  try {
    const config = loadConfig(cwd, options.config);
    const index = loadRuleIndexWithPacks(config.rulePacks.map((pack) => resolve(cwd, pack)));

    if (options.json) {
      const rules = index.rules.map(({ regex: _regex, stage: _stage, ...definition }) => definition);
      console.log(JSON.stringify({ version: index.version, rules }, null, 2));
      return;
    }

    console.log(chalk.dim(`Rule index ${index.version}, ${index.rules.length} rules`));
    console.log();
    console.log(formatRuleTable(index));
  } catch (error) {
    createLogger().error(errorMessage(error));
    process.exitCode = error instanceof StagegateError ? error.exitCode : EXIT_CODES.unexpected;
  }
}
