#!/usr/bin/env node
import { Command } from 'commander';
import { scanCommand } from './commands/scan.js';
import { rulesCommand } from './commands/rules.js';
import { VERSION } from '../version.js';

const program = new Command();

program
  .name('stagegate')
  .description('Three-stage security gate for CI: known vulnerabilities, business logic, risk trend')
  .version(VERSION);

// ─────────────────────────────────────────────────────────────
// scan - Run the gate
// ─────────────────────────────────────────────────────────────
program
  .command('scan [paths...]')
  .description('Run the security gate over files or glob patterns (default: config include list)')
  .option('--mode <mode>', 'full, stage1_only, stage2_only, stage3_only or llm_only')
  .option('--stage1-only', 'Only check known vulnerabilities')
  .option('--stage2-only', 'Only check business logic')
  .option('--stage3-only', 'Only forecast the risk trend')
  .option('--llm-only', 'Route stage 1 through the reasoning backend too')
  .option('--explain', 'Attach rationales to stage 1 findings')
  .option('--json', 'Print the gate decision as JSON only')
  .option('--sarif', 'Print SARIF only')
  .option('--markdown <path>', 'Write the technical Markdown report to a file')
  .option('--out <path>', 'Write the gate decision JSON to a file')
  .option('--history <file>', 'Feature history for the stage 3 forecast')
  .option('--append-history', 'Append this run to the history file')
  .option('-p, --provider <provider>', 'Reasoning backend (claude-code, codex, ollama, groq)')
  .option('-c, --config <path>', 'Config file (default: .stagegate.yml)')
  .option('--stage3-threshold <n>', 'Block when the forecast score reaches this value')
  .option('--no-fail-on-indeterminate', 'Exit 0 when a stage could not reach a verdict')
  .action(scanCommand);

// ─────────────────────────────────────────────────────────────
// rules - List the rule index
// ─────────────────────────────────────────────────────────────
program
  .command('rules')
  .description('List the known-vulnerability rules (built-in plus configured packs)')
  .option('-c, --config <path>', 'Config file (default: .stagegate.yml)')
  .option('--json', 'Output as JSON')
  .action(rulesCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
