import type { Finding, StageError, StageNumber, StageReport, Verdict } from '../types.js';
import { summarizeFindings } from './findings.js';

export function buildStageReport(
  stage: StageNumber,
  verdict: Verdict,
  findings: Finding[],
  errors: StageError[] = [],
  notes: string[] = []
): StageReport {
  return { stage, verdict, findings, errors, notes, summary: summarizeFindings(findings) };
}

export function skippedReport(stage: StageNumber, reason: string): StageReport {
  return buildStageReport(stage, 'skipped', [], [], [reason]);
}
