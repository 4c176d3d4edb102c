/**
 * Technical Markdown report of a gate decision: per-stage verdicts,
 * findings tables, errors and the stage 3 forecast.
 */

import type { Finding, GateDecision, Stage3Report, StageReport } from '../types.js';

const STAGE_TITLES: Record<1 | 2 | 3, string> = {
  1: 'Stage 1: Known Vulnerabilities',
  2: 'Stage 2: Business Logic',
  3: 'Stage 3: Risk Forecast',
};

const VERDICT_BADGE: Record<StageReport['verdict'], string> = {
  pass: '✅ pass',
  block: '⛔ block',
  indeterminate: '⚠️ indeterminate',
  skipped: '⏭️ skipped',
};

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

function findingRow(finding: Finding): string {
  const lines = finding.lineEnd > finding.lineStart ? `${finding.lineStart}-${finding.lineEnd}` : `${finding.lineStart}`;
  const cells = [
    finding.id,
    finding.severity,
    finding.category + (finding.cweId ? ` (${finding.cweId})` : ''),
    `\`${finding.file}:${lines}\``,
    finding.confidence.toFixed(2),
    finding.ruleId ?? finding.source,
    escapeCell(finding.rationale ?? ''),
  ];
  return `| ${cells.join(' | ')} |`;
}

function stageSection(report: StageReport | Stage3Report): string {
  const parts = [`## ${STAGE_TITLES[report.stage]} (${VERDICT_BADGE[report.verdict]})`];

  if (report.notes.length > 0) {
    parts.push(report.notes.map((note) => `- ${note}`).join('\n'));
  }

  if (report.findings.length > 0) {
    parts.push([
      '| ID | Severity | Category | Location | Confidence | Source | Rationale |',
      '|----|----------|----------|----------|------------|--------|-----------|',
      ...report.findings.map(findingRow),
    ].join('\n'));
  }

  if (report.errors.length > 0) {
    parts.push(`**Errors:**\n${report.errors.map((error) => `- \`${error.kind}\` ${error.snippetId ?? ''} ${error.message}`.replace(/ {2,}/g, ' ')).join('\n')}`);
  }

  if ('forecast' in report && report.forecast) {
    const forecast = report.forecast;
    parts.push([
      `- **Score:** ${forecast.score.toFixed(2)} (${forecast.basis}, confidence ${forecast.confidence.toFixed(2)}${forecast.lowConfidence ? ', low' : ''})`,
      `- **Trend:** ${forecast.trend} over ${forecast.horizon} run(s)`,
      `- **Risk index:** ${forecast.currentRiskIndex} now, ${forecast.projectedRiskIndex} projected`,
      `- **Timeline:** ${forecast.timeline}${forecast.timeline === 'unknown' ? '' : ` (confidence ${forecast.timelineConfidence.toFixed(2)})`}`,
      ...forecast.factors.map((factor) => `- ${factor}`),
    ].join('\n'));
  }

  if (report.explanations && report.explanations.length > 0) {
    parts.push(`**Explanations:**\n${report.explanations.map((line) => `- ${line}`).join('\n')}`);
  }

  return parts.join('\n\n');
}

export function outputMarkdown(decision: GateDecision): string {
  const { stage1, stage2, stage3 } = decision.stages;
  const header = `# Security Gate Report

| Run | Mode | Verdict | Exit code |
|-----|------|---------|-----------|
| ${decision.runId} | ${decision.mode} | **${decision.overallVerdict}** | ${decision.exitCode} |

Rules \`${decision.versions.rules}\`, classifier \`${decision.versions.classifier}\`, temporal model \`${decision.versions.temporal}\`${decision.versions.reasoning ? `, reasoning \`${decision.versions.reasoning}\`` : ''}.`;

  const degraded = decision.inputs.filter((input) => input.degraded);
  const inputs = degraded.length > 0
    ? `**Degraded inputs:**\n${degraded.map((input) => `- \`${input.path}\`: ${input.degradedReason ?? 'parse failed'}`).join('\n')}`
    : '';

  return [header, inputs, stageSection(stage1), stageSection(stage2), stageSection(stage3)]
    .filter((section) => section !== '')
    .join('\n\n') + '\n';
}
