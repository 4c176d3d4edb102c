/**
 * Stage 1 - known vulnerabilities.
 *
 * Rule matcher and classifier run over every snippet; their findings are
 * capped per rule, merged per (snippet, category) and gated on confidence.
 * In llm-only mode a reasoning strategy replaces both.
 */

import type { DraftFinding, Finding, SourceUnit, StageError, StageReport, Verdict } from '../types.js';
import { createKnownVulnerabilityTemplate } from '../providers/prompts/known-vulnerabilities.js';
import { explainStage1Findings } from './explain.js';
import { mergeFindings } from './finding-merger.js';
import { capRuleHits, createFinding, numberFindings } from './findings.js';
import { buildStageReport } from './report.js';
import type { RunContext } from './run-context.js';
import { runStrategies } from './stage-runner.js';
import { classifierStrategy, createReasoningStrategy, ruleStrategy } from './strategies.js';
import type { DetectionStrategy } from './strategies.js';

export function stage1Strategies(ctx: RunContext): DetectionStrategy[] {
  if (ctx.config.mode === 'llm_only') {
    return [createReasoningStrategy({ template: createKnownVulnerabilityTemplate(ctx.rules), stage: 1 })];
  }
  return [ruleStrategy, classifierStrategy];
}

export async function runStage1(units: readonly SourceUnit[], ctx: RunContext): Promise<StageReport> {
  const options = ctx.config.stage1;
  const targets = units.flatMap((unit) => unit.snippets.map((snippet) => ({ unit, snippet })));

  const { perSnippet, errors } = await runStrategies(targets, stage1Strategies(ctx), ctx, {
    concurrency: options.concurrency,
  });

  const allowed = new Set(capRuleHits(perSnippet.flatMap((entry) => entry.findings), options.maxHitsPerRule));
  const capped = perSnippet.map(({ snippetId, findings }) => ({
    snippetId,
    findings: findings.filter((finding) => allowed.has(finding)),
  }));

  let drafts: DraftFinding[] = mergeFindings(capped, { policy: options.mergePolicy, weight: options.mergeWeight });
  if (!ctx.config.explain) {
    drafts = drafts.map((draft) => createFinding({ ...draft, rationale: undefined }));
  }

  const findings = numberFindings(drafts, ctx.idsFor(1));
  const verdict = stage1Verdict(findings, errors, ctx);
  ctx.logger.debug('stage 1 complete', { snippets: targets.length, findings: findings.length, verdict });

  const report = buildStageReport(1, verdict, findings, errors, stage1Notes(units, ctx));
  if (ctx.config.explain) {
    const { explanations, notes } = await explainStage1Findings(findings, units, ctx);
    report.explanations = explanations;
    report.notes.push(...notes);
  }
  return report;
}

export function stage1Verdict(findings: readonly Finding[], errors: readonly StageError[], ctx: RunContext): Verdict {
  const { blockThreshold, blockingCategories } = ctx.config.stage1;
  const blocking = findings.some(
    (finding) => blockingCategories.includes(finding.category) && finding.confidence >= blockThreshold
  );
  if (blocking) return 'block';
  // A failed reasoning call means the stage did not look everywhere.
  if (errors.length > 0) return 'indeterminate';
  return 'pass';
}

function stage1Notes(units: readonly SourceUnit[], ctx: RunContext): string[] {
  const notes: string[] = [];
  if (ctx.config.mode === 'llm_only') {
    notes.push('rule matcher and classifier replaced by the reasoning backend (llm-only mode)');
  }
  for (const unit of units) {
    if (unit.degraded) {
      notes.push(`${unit.path}: analyzed as coarse blocks (${unit.degradedReason ?? 'parse failed'})`);
    }
  }
  return notes;
}
