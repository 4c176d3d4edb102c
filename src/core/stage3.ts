/**
 * Stage 3 - temporal risk forecast.
 *
 * Turns this run into a feature point, maps it and the caller's history
 * through the temporal model, and projects the risk index `horizon` runs
 * ahead. Report-only unless a block threshold is configured.
 */

import type {
  FeaturePoint,
  Forecast,
  SourceUnit,
  Stage3Report,
  StageReport,
  TimelineBucket,
  TrajectoryPoint,
  Trend,
} from '../types.js';
import { explainFutureRisk } from './explain.js';
import { extractFeatures } from './features.js';
import type { TemporalModel } from './models.js';
import { wholeFileSnippet } from './normalizer.js';
import { buildStageReport } from './report.js';
import type { RunContext } from './run-context.js';

const UNSAFE_CALL_FEATURES = ['unsafeCopyCalls', 'formatCalls', 'execCalls', 'evalCalls', 'deserializeCalls'] as const;
const FACTORS_SHOWN = 3;

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

// ─────────────────────────────────────────────────────────────
// Feature point
// ─────────────────────────────────────────────────────────────

/**
 * Features of the current run. Stage reports that were skipped or never
 * produced leave their counts out of the point.
 */
export function extractRunFeatures(
  units: readonly SourceUnit[],
  stage1?: StageReport,
  stage2?: StageReport
): FeaturePoint {
  const point: FeaturePoint = {};
  const ran = (report?: StageReport): report is StageReport => report !== undefined && report.verdict !== 'skipped';

  if (ran(stage1)) {
    point.stage1Findings = stage1.findings.length;
    point.stage1HighSeverity = stage1.findings
      .filter((finding) => finding.severity === 'critical' || finding.severity === 'high').length;
  }
  if (ran(stage2)) {
    point.stage2Findings = stage2.findings.length;
  }

  const scored = [stage1, stage2].filter(ran).flatMap((report) => report.findings);
  if (ran(stage1) || ran(stage2)) {
    point.meanConfidence = scored.length === 0
      ? 0
      : round(scored.reduce((sum, finding) => sum + finding.confidence, 0) / scored.length);
  }

  let codeLines = 0;
  let unsafeCalls = 0;
  for (const unit of units) {
    if (unit.snippets.length === 0) continue;
    codeLines += unit.text.split('\n').filter((line) => line.trim() !== '').length;
    const features = extractFeatures(wholeFileSnippet(unit));
    for (const name of UNSAFE_CALL_FEATURES) unsafeCalls += features[name];
  }

  point.unsafeCallDensity = codeLines === 0 ? 0 : round((unsafeCalls / codeLines) * 100);
  point.degradedShare = units.length === 0
    ? 0
    : round(units.filter((unit) => unit.degraded).length / units.length);
  point.linesOfCode = codeLines;

  return point;
}

// ─────────────────────────────────────────────────────────────
// Forecast
// ─────────────────────────────────────────────────────────────

export function trajectoryConfidence(points: number, window: number): number {
  return round(0.35 + 0.6 * Math.min(1, points / (2 * window)));
}

export function classifyTrend(current: number, projected: number, stableBand: number): Trend {
  const band = stableBand * Math.max(Math.abs(current), 1);
  const delta = projected - current;
  if (delta > band) return 'increasing';
  if (delta < -band) return 'decreasing';
  return 'stable';
}

/**
 * Near-term risk when the projected score reaches one half, later risk
 * below it. The confidence is the distance of the score from that split.
 */
export function timelineBucket(score: number): { timeline: TimelineBucket; timelineConfidence: number } {
  return {
    timeline: score >= 0.5 ? '3-6 months' : '6-12 months',
    timelineConfidence: round(Math.max(score, 1 - score)),
  };
}

function contributionFactors(point: FeaturePoint, model: TemporalModel): string[] {
  return Object.entries(model.featureWeights)
    .map(([feature, weight]) => ({ feature, value: point[feature] ?? 0, contribution: weight * (point[feature] ?? 0) }))
    .filter((entry) => entry.contribution > 0)
    .sort((a, b) => b.contribution - a.contribution || (a.feature < b.feature ? -1 : 1))
    .slice(0, FACTORS_SHOWN)
    .map((entry) => `${entry.feature}=${entry.value} contributes ${round(entry.contribution)}`);
}

export function forecast(
  point: FeaturePoint,
  history: readonly TrajectoryPoint[],
  model: TemporalModel,
  horizon: number = model.defaultHorizon
): Forecast {
  const currentRiskIndex = round(model.riskIndex(point));
  const factors = contributionFactors(point, model);

  if (history.length === 0) {
    return {
      score: round(model.normalize(currentRiskIndex)),
      trend: 'stable',
      horizon,
      confidence: model.singlePointConfidence,
      lowConfidence: true,
      basis: 'single-point',
      currentRiskIndex,
      projectedRiskIndex: currentRiskIndex,
      currentPoint: point,
      factors: [...factors, 'no history supplied; single-point estimate'],
      timeline: 'unknown',
      timelineConfidence: 0,
    };
  }

  const series = [...history.map((entry) => model.riskIndex(entry.features)), model.riskIndex(point)];
  const projectedRiskIndex = round(model.project(series, horizon));
  const confidence = trajectoryConfidence(series.length, model.window);
  const score = round(model.normalize(projectedRiskIndex));

  return {
    score,
    trend: classifyTrend(currentRiskIndex, projectedRiskIndex, model.stableBand),
    horizon,
    confidence,
    lowConfidence: confidence < 0.5,
    basis: 'trajectory',
    currentRiskIndex,
    projectedRiskIndex,
    currentPoint: point,
    factors: [...factors, `projected from ${history.length} prior run(s)`],
    ...timelineBucket(score),
  };
}

// ─────────────────────────────────────────────────────────────
// Stage
// ─────────────────────────────────────────────────────────────

export interface Stage3Input {
  units: readonly SourceUnit[];
  stage1?: StageReport;
  stage2?: StageReport;
  history?: readonly TrajectoryPoint[];
}

export async function runStage3(input: Stage3Input, ctx: RunContext): Promise<Stage3Report> {
  const { horizon, blockThreshold } = ctx.config.stage3;
  const point = extractRunFeatures(input.units, input.stage1, input.stage2);
  const result = forecast(point, input.history ?? [], ctx.temporal, horizon ?? ctx.temporal.defaultHorizon);

  const blocked = blockThreshold !== undefined && result.score >= blockThreshold;
  const notes = [
    `risk ${result.trend} over ${result.horizon} run(s); score ${result.score.toFixed(2)}`,
  ];
  if (result.timeline !== 'unknown') {
    notes.push(`expected within ${result.timeline} (confidence ${result.timelineConfidence.toFixed(2)})`);
  }
  if (result.lowConfidence) {
    notes.push('low-confidence forecast');
  }
  if (blockThreshold === undefined) {
    notes.push('report-only: no stage 3 block threshold configured');
  }

  const report: Stage3Report = { ...buildStageReport(3, blocked ? 'block' : 'pass', [], [], notes), forecast: result };
  if (ctx.config.explain) {
    const { explanations, notes: explainNotes } = await explainFutureRisk(input.units, result, ctx);
    report.explanations = explanations;
    report.notes.push(...explainNotes);
  }

  ctx.logger.debug('stage 3 complete', { score: result.score, trend: result.trend, basis: result.basis });
  return report;
}
