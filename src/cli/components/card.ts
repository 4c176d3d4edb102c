/**
 * Terminal summary card for a gate run, printed after the scan.
 */

import chalk from 'chalk';
import type { GateDecision, Stage3Report, StageReport } from '../../types.js';

export interface GateMeta {
  repoName: string;
  provider: string;
  duration: number; // ms
  filesScanned: number;
  linesOfCode: number;
}

export interface CardData {
  meta: GateMeta;
  decision: GateDecision;
  reportPath?: string;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

const WIDTH = 63;
const LABEL_WIDTH = 12;

// eslint-disable-next-line no-control-regex
const ANSI = /\u001b\[\d+(;\d+)*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

function pad(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}

/** `── title ─────` filled to the card width. */
function heading(title: string): string {
  const lead = `── ${title} `;
  return chalk.dim(lead + '─'.repeat(Math.max(0, WIDTH - visibleLength(lead))));
}

function field(label: string, value: string): string {
  return `  ${chalk.dim(pad(label, LABEL_WIDTH))}${value}`;
}

function verdictLabel(verdict: StageReport['verdict'] | GateDecision['overallVerdict']): string {
  switch (verdict) {
    case 'pass':
      return chalk.green('PASS');
    case 'block':
      return chalk.red('BLOCK');
    case 'indeterminate':
      return chalk.yellow('INDETERMINATE');
    case 'skipped':
      return chalk.dim('skipped');
  }
}

function stageDetail(report: StageReport): string {
  if (report.verdict === 'skipped') return chalk.dim(report.notes[0] ?? '');
  const { critical, high, medium, low } = report.summary.bySeverity;
  const counts = `${report.summary.total} found (${critical}C ${high}H ${medium}M ${low}L)`;
  return report.errors.length > 0 ? `${counts}, ${report.errors.length} error(s)` : counts;
}

function forecastDetail(report: Stage3Report): string | undefined {
  const forecast = report.forecast;
  if (!forecast) return undefined;
  const timeline = forecast.timeline === 'unknown' ? '' : `, expected within ${forecast.timeline}`;
  return `${forecast.score.toFixed(2)} ${forecast.trend}${timeline}${forecast.lowConfidence ? ' (low confidence)' : ''}`;
}

/**
 * Render a gate result card
 *
 * ── SECURITY GATE: BLOCK ────────────────────────────────────────
 *   Repository  my-project
 *   Provider    claude-code
 *   Duration    1m 12s
 *   Files       16 files | 2,892 LoC
 * ── Stages ──────────────────────────────────────────────────────
 *   Stage 1     BLOCK          3 found (2C 1H 0M 0L)
 *   Stage 2     skipped        not reached: stage 1 blocked
 *   Stage 3     skipped        not reached: stage 1 blocked
 * ── Exit code 11 ────────────────────────────────────────────────
 */
export function renderGateCard(data: CardData): string {
  const { decision, meta } = data;
  const { stage1, stage2, stage3 } = decision.stages;

  const lines = [
    heading(`${chalk.bold('SECURITY GATE:')} ${verdictLabel(decision.overallVerdict)}`),
    field('Repository', meta.repoName),
    field('Provider', meta.provider),
    field('Duration', formatDuration(meta.duration)),
    field('Files', `${meta.filesScanned} files | ${meta.linesOfCode.toLocaleString()} LoC`),
    heading('Stages'),
    ...[stage1, stage2, stage3].map((report) =>
      field(`Stage ${report.stage}`, `${pad(verdictLabel(report.verdict), 15)}${stageDetail(report)}`)
    ),
  ];

  const forecast = forecastDetail(stage3);
  if (forecast) lines.push(field('Forecast', forecast));
  if (data.reportPath) lines.push(field('Reports', chalk.cyan(data.reportPath)));
  lines.push(heading(`Exit code ${decision.exitCode}`));

  return lines.join('\n');
}
