/**
 * Stage 2 - business-logic flaws through the reasoning backend.
 */

import type { Finding, SourceUnit, StageError, StageReport, Verdict } from '../types.js';
import { BUSINESS_LOGIC_TEMPLATE } from '../providers/prompts/business-logic.js';
import { numberFindings } from './findings.js';
import { wholeFileSnippet } from './normalizer.js';
import { buildStageReport } from './report.js';
import type { RunContext } from './run-context.js';
import { runStrategies } from './stage-runner.js';
import type { StageTarget } from './stage-runner.js';
import { createReasoningStrategy } from './strategies.js';

const businessLogicStrategy = createReasoningStrategy({
  template: BUSINESS_LOGIC_TEMPLATE,
  stage: 2,
  category: 'business-logic',
  excludeSignatureFlaws: true,
  useFocusHints: true,
});

/**
 * One request per snippet: every function, plus the module-level code
 * between them, so no line of code goes unseen.
 */
export function stage2Targets(units: readonly SourceUnit[], scope: 'snippet' | 'file'): StageTarget[] {
  if (scope === 'file') {
    return units
      .filter((unit) => unit.snippets.length > 0)
      .map((unit) => ({ unit, snippet: wholeFileSnippet(unit) }));
  }
  return units.flatMap((unit) => unit.snippets.map((snippet) => ({ unit, snippet })));
}

export async function runStage2(units: readonly SourceUnit[], ctx: RunContext): Promise<StageReport> {
  const options = ctx.config.stage2;
  const targets = stage2Targets(units, options.scope);

  if (targets.length === 0) {
    return buildStageReport(2, 'pass', [], [], ['no code to analyze']);
  }

  const { perSnippet, errors } = await runStrategies(targets, [businessLogicStrategy], ctx, {
    concurrency: options.concurrency,
    deadlineMs: options.deadlineMs,
  });

  const findings = numberFindings(perSnippet.flatMap((entry) => entry.findings), ctx.idsFor(2));
  const verdict = stage2Verdict(findings, errors, ctx);
  ctx.logger.debug('stage 2 complete', { requests: targets.length, findings: findings.length, verdict });

  const notes = [`${targets.length} ${options.scope === 'file' ? 'file' : 'snippet'} request(s) to ${ctx.reasoning?.name ?? 'no backend'}`];
  if (errors.length > 0) {
    notes.push(`${errors.length} request(s) failed; the stage cannot vouch for the code it did not see`);
  }
  return buildStageReport(2, verdict, findings, errors, notes);
}

export function stage2Verdict(findings: readonly Finding[], errors: readonly StageError[], ctx: RunContext): Verdict {
  if (findings.some((finding) => finding.confidence >= ctx.config.stage2.blockThreshold)) return 'block';
  if (errors.length > 0) return 'indeterminate';
  return 'pass';
}
