/**
 * Finding construction, ordering and summaries.
 *
 * Every finding goes through createFinding, so a confidence outside [0, 1]
 * can never reach a report.
 */

import type { Category, DraftFinding, Finding, StageNumber, StageSummary } from '../types.js';
import { InternalInvariantViolation } from './errors.js';

const CONFIDENCE_DECIMALS = 4;

export function roundConfidence(value: number): number {
  const factor = 10 ** CONFIDENCE_DECIMALS;
  return Math.round(value * factor) / factor;
}

export function createFinding(draft: DraftFinding): DraftFinding {
  if (!Number.isFinite(draft.confidence) || draft.confidence < 0 || draft.confidence > 1) {
    throw new InternalInvariantViolation(
      `finding confidence ${draft.confidence} for ${draft.file}:${draft.lineStart} is outside [0, 1]`
    );
  }
  if (draft.lineEnd < draft.lineStart) {
    throw new InternalInvariantViolation(
      `finding range ${draft.lineStart}-${draft.lineEnd} in ${draft.file} is inverted`
    );
  }
  const finding: DraftFinding = { ...draft, confidence: roundConfidence(draft.confidence) };
  for (const key of ['cweId', 'ruleId', 'rationale', 'fix'] as const) {
    if (finding[key] === undefined) delete finding[key];
  }
  return Object.freeze(finding);
}

// ─────────────────────────────────────────────────────────────
// Ordering
// ─────────────────────────────────────────────────────────────

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order: file, lines, category, rule/source, then the remaining fields
 * so equal-looking findings still sort the same way on every run.
 */
export function compareFindings(a: DraftFinding, b: DraftFinding): number {
  return (
    compareText(a.file, b.file) ||
    a.lineStart - b.lineStart ||
    a.lineEnd - b.lineEnd ||
    compareText(a.category, b.category) ||
    compareText(a.ruleId ?? '', b.ruleId ?? '') ||
    compareText(a.source, b.source) ||
    b.confidence - a.confidence ||
    compareText(a.rationale ?? '', b.rationale ?? '')
  );
}

export function sortFindings<T extends DraftFinding>(findings: readonly T[]): T[] {
  return [...findings].sort(compareFindings);
}

export function formatFindingId(stage: StageNumber, sequence: number): string {
  return `S${stage}-${String(sequence).padStart(3, '0')}`;
}

/**
 * Sort a stage's findings, then number them in that order. Numbering after
 * the sort keeps ids stable however the workers finished.
 */
export function numberFindings(drafts: readonly DraftFinding[], nextId: () => string): Finding[] {
  return sortFindings(drafts).map((draft) => Object.freeze({ id: nextId(), ...draft }));
}

/**
 * Keep at most `limit` findings per (file, rule); later lines are dropped.
 */
export function capRuleHits(findings: readonly DraftFinding[], limit: number): DraftFinding[] {
  const counts = new Map<string, number>();
  return sortFindings(findings).filter((finding) => {
    if (finding.ruleId === undefined || finding.source !== 'rule') return true;
    const key = `${finding.file}\u0000${finding.ruleId}`;
    const seen = counts.get(key) ?? 0;
    counts.set(key, seen + 1);
    return seen < limit;
  });
}

// ─────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────

const TOP_CATEGORY_COUNT = 3;

export function summarizeFindings(findings: readonly Finding[]): StageSummary {
  const bySeverity = { critical: 0, high: 0, medium: 0, low: 0 };
  const byCategory = new Map<Category, number>();
  for (const finding of findings) {
    bySeverity[finding.severity]++;
    byCategory.set(finding.category, (byCategory.get(finding.category) ?? 0) + 1);
  }

  const topCategories = [...byCategory.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count || compareText(a.category, b.category))
    .slice(0, TOP_CATEGORY_COUNT);

  return { total: findings.length, bySeverity, topCategories };
}
