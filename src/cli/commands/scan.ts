import * as p from '@clack/prompts';
import chalk from 'chalk';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import fg from 'fast-glob';
import { ProviderType } from '../../types.js';
import type { GateDecision, StagegateConfig } from '../../types.js';
import { applyEnvOverrides, loadConfig, parseConfig, resolveMode } from '../../core/config.js';
import { ConfigError, EXIT_CODES, StagegateError, errorMessage } from '../../core/errors.js';
import { runGate } from '../../core/gate.js';
import type { GateInput } from '../../core/gate.js';
import { appendPoint, loadHistory, saveHistory } from '../../core/history.js';
import { createLogger } from '../../core/logger.js';
import type { Logger } from '../../core/logger.js';
import { loadModels } from '../../core/models.js';
import { loadRuleIndexWithPacks } from '../../core/rule-index.js';
import { createReasoningClient, isProviderAvailable } from '../../providers/index.js';
import type { ReasoningClient } from '../../providers/index.js';
import { outputSarif } from '../../output/sarif.js';
import { outputMarkdown } from '../../output/markdown.js';
import { outputHumanReadableMarkdown } from '../../output/human-readable.js';
import { renderGateCard } from '../components/card.js';

export interface ScanOptions {
  mode?: string;
  stage1Only?: boolean;
  stage2Only?: boolean;
  stage3Only?: boolean;
  llmOnly?: boolean;
  explain?: boolean;
  json?: boolean;
  sarif?: boolean;
  markdown?: string;
  out?: string;
  history?: string;
  appendHistory?: boolean;
  provider?: string;
  config?: string;
  stage3Threshold?: string;
  failOnIndeterminate?: boolean; // --no-fail-on-indeterminate sets false
}

const OUTPUT_DIR = 'stagegate-output';

/**
 * Merge config file, environment and command-line flags, in that order.
 */
export function resolveScanConfig(
  options: ScanOptions,
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): { config: StagegateConfig; apiKey?: string } {
  const { config: fromFile, apiKey } = applyEnvOverrides(loadConfig(cwd, options.config), env);
  const merged: StagegateConfig = { ...fromFile, stage3: { ...fromFile.stage3 } };

  const mode = resolveMode(options);
  if (mode !== undefined) merged.mode = mode;
  if (options.explain) merged.explain = true;
  if (options.failOnIndeterminate === false) merged.failOnIndeterminate = false;

  if (options.provider !== undefined) {
    const provider = ProviderType.safeParse(options.provider);
    if (!provider.success) {
      throw new ConfigError(`Unknown provider "${options.provider}" (expected one of ${ProviderType.options.join(', ')})`);
    }
    merged.provider = provider.data;
  }

  if (options.stage3Threshold !== undefined) {
    const threshold = Number(options.stage3Threshold);
    if (options.stage3Threshold.trim() === '' || !Number.isFinite(threshold)) {
      throw new ConfigError(`--stage3-threshold must be a number (got "${options.stage3Threshold}")`);
    }
    merged.stage3.blockThreshold = threshold;
  }

  if (options.appendHistory && options.history === undefined) {
    throw new ConfigError('--append-history needs --history <file>');
  }

  return { config: parseConfig(merged, 'command-line options'), apiKey };
}

async function collectInputs(paths: string[], config: StagegateConfig, cwd: string): Promise<GateInput[]> {
  const files = await fg(paths.length > 0 ? paths : config.include, {
    cwd,
    ignore: config.exclude,
    onlyFiles: true,
    absolute: false,
  });
  return files.sort().map((file) => ({ path: file, text: readFileSync(join(cwd, file), 'utf-8') }));
}

function needsReasoning(config: StagegateConfig): boolean {
  return config.mode !== 'stage1_only' && config.mode !== 'stage3_only';
}

export async function scanCommand(paths: string[], options: ScanOptions): Promise<void> {
  const cwd = process.cwd();
  const isQuiet = Boolean(options.json || options.sarif);
  const logger = createLogger();

  try {
    process.exitCode = await runScan(paths, options, cwd, isQuiet, logger);
  } catch (error) {
    // Fatal: no report, one error line, mapped exit code
    logger.error(errorMessage(error));
    process.exitCode = error instanceof StagegateError ? error.exitCode : EXIT_CODES.unexpected;
  }
}

async function runScan(
  paths: string[],
  options: ScanOptions,
  cwd: string,
  isQuiet: boolean,
  logger: Logger
): Promise<number> {
  const { config, apiKey } = resolveScanConfig(options, cwd);

  if (!isQuiet) {
    p.intro(chalk.bold('stagegate') + chalk.dim(` - ${config.mode.replace('_', '-')} gate`));
  }

  // ─────────────────────────────────────────────────────────────
  // Artifacts: fatal on failure, before any report exists
  // ─────────────────────────────────────────────────────────────
  const rules = loadRuleIndexWithPacks(config.rulePacks.map((pack) => resolve(cwd, pack)));
  const models = loadModels(config, cwd);
  const history = options.history !== undefined ? loadHistory(resolve(cwd, options.history)) : [];

  // ─────────────────────────────────────────────────────────────
  // Inputs
  // ─────────────────────────────────────────────────────────────
  const inputs = await collectInputs(paths, config, cwd);
  const linesOfCode = inputs.reduce((sum, input) => sum + input.text.split('\n').length, 0);
  if (!isQuiet) {
    p.log.info(`${inputs.length} file(s) to check`);
  }

  let reasoning: ReasoningClient | undefined;
  if (needsReasoning(config)) {
    reasoning = createReasoningClient(config, { apiKey, cwd, logger });
    if (!isQuiet && !(await isProviderAvailable(config.provider))) {
      p.log.warn(`Provider ${config.provider} is not available; reasoning stages will be indeterminate`);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Gate
  // ─────────────────────────────────────────────────────────────
  const started = Date.now();
  let decision: GateDecision;
  if (!isQuiet) {
    const spinner = p.spinner();
    spinner.start(`Running gate${reasoning ? ` with ${reasoning.name}` : ''}...`);
    try {
      decision = await runGate(inputs, { config, artifacts: { rules, models }, reasoning, logger, history });
    } finally {
      spinner.stop('Gate finished');
    }
  } else {
    decision = await runGate(inputs, { config, artifacts: { rules, models }, reasoning, logger, history });
  }
  const duration = Date.now() - started;

  if (options.appendHistory && options.history !== undefined && decision.stages.stage3.forecast) {
    const historyPath = resolve(cwd, options.history);
    saveHistory(historyPath, appendPoint(history, decision.stages.stage3.forecast.currentPoint, new Date().toISOString()));
    logger.debug('history appended', { path: historyPath, points: history.length + 1 });
  }

  // ─────────────────────────────────────────────────────────────
  // Reports
  // ─────────────────────────────────────────────────────────────
  if (options.out !== undefined) {
    writeFileSync(resolve(cwd, options.out), JSON.stringify(decision, null, 2) + '\n');
  }
  if (options.markdown !== undefined) {
    writeFileSync(resolve(cwd, options.markdown), outputMarkdown(decision));
  }

  if (options.json) {
    console.log(JSON.stringify(decision, null, 2));
  } else if (options.sarif) {
    console.log(JSON.stringify(outputSarif(decision), null, 2));
  } else {
    const outputDir = join(cwd, OUTPUT_DIR);
    mkdirSync(outputDir, { recursive: true });

    const mdPath = join(outputDir, 'gate.md');
    writeFileSync(mdPath, outputMarkdown(decision));
    const humanPath = join(outputDir, 'gate-human.md');
    writeFileSync(humanPath, outputHumanReadableMarkdown(decision));
    const sarifPath = join(outputDir, 'gate.sarif');
    writeFileSync(sarifPath, JSON.stringify(outputSarif(decision), null, 2));
    const jsonPath = join(outputDir, 'gate.json');
    writeFileSync(jsonPath, JSON.stringify(decision, null, 2));

    console.log();
    console.log(renderGateCard({
      meta: {
        repoName: basename(cwd),
        provider: reasoning?.name ?? 'none',
        duration,
        filesScanned: inputs.length,
        linesOfCode,
      },
      decision,
      reportPath: `./${OUTPUT_DIR}/gate.md`,
    }));
    console.log();

    p.log.success('Reports saved:');
    console.log(`  ${chalk.dim('├')} ${chalk.cyan(humanPath)} ${chalk.dim('(tester-friendly)')}`);
    console.log(`  ${chalk.dim('├')} ${chalk.cyan(mdPath)} ${chalk.dim('(technical)')}`);
    console.log(`  ${chalk.dim('├')} ${chalk.cyan(sarifPath)}`);
    console.log(`  ${chalk.dim('└')} ${chalk.cyan(jsonPath)}`);
    console.log();

    const outro = decision.overallVerdict === 'pass' ? chalk.green('Gate passed')
      : decision.overallVerdict === 'block' ? chalk.red('Gate blocked')
      : chalk.yellow('Gate indeterminate');
    p.outro(outro);
  }

  return decision.exitCode;
}
