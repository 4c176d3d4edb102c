/**
 * Explanations for runs started with `explain`.
 *
 * Stage 1 asks the reasoning backend about its first few findings and falls
 * back to per-CWE advice when the backend is missing or fails. Stage 3 asks
 * for a short future-risk assessment and simply goes without one on failure.
 */

import type { Finding, Forecast, Snippet, SourceUnit } from '../types.js';
import { EXPLAIN_FINDING_TEMPLATE, FUTURE_RISK_TEMPLATE } from '../providers/prompts/explanations.js';
import { ReasoningServiceError } from './errors.js';
import { headSnippet } from './normalizer.js';
import type { RunContext } from './run-context.js';

export const MAX_EXPLAINED_FINDINGS = 3;
export const EXPLAIN_CONTEXT_LINES = 120;

const CWE_ADVICE: Record<string, string> = {
  'CWE-120': 'Potential buffer overflow. Avoid unsafe functions and add bounds checks.',
  'CWE-78': 'Command injection risk. Use safe APIs and validate inputs.',
  'CWE-89': 'SQL injection risk. Use parameterized queries and input validation.',
  'CWE-79': 'XSS risk. Encode output and avoid raw HTML injection.',
  'CWE-22': 'Path traversal risk. Normalize paths and enforce allowlists.',
  'CWE-502': 'Unsafe deserialization. Avoid deserializing untrusted data.',
};
const DEFAULT_ADVICE = 'Potential security issue. Review and apply secure coding practices.';

export interface ExplanationResult {
  explanations: string[];
  notes: string[];
}

/** `<CWE>: <advice>`, one line per distinct CWE (or category when there is none). */
export function fallbackExplanation(finding: Finding): string {
  const advice = finding.cweId !== undefined ? CWE_ADVICE[finding.cweId] : undefined;
  return `${finding.cweId ?? finding.category}: ${advice ?? DEFAULT_ADVICE}`;
}

function unique(lines: string[]): string[] {
  return [...new Set(lines)];
}

/** The snippet holding the finding, or the head of its file. */
function snippetFor(finding: Finding, units: readonly SourceUnit[]): Snippet | undefined {
  const unit = units.find((candidate) => candidate.path === finding.file);
  if (!unit) return undefined;
  const holding = unit.snippets.find(
    (snippet) => snippet.startLine <= finding.lineStart && finding.lineStart <= snippet.endLine
  );
  return holding ?? headSnippet(unit, EXPLAIN_CONTEXT_LINES);
}

function describeFinding(finding: Finding): string {
  const lines = [
    `${finding.id}: ${finding.category}${finding.cweId ? ` (${finding.cweId})` : ''}, severity ${finding.severity}`,
    `Location: ${finding.file}:${finding.lineStart}${finding.lineEnd !== finding.lineStart ? `-${finding.lineEnd}` : ''}`,
  ];
  if (finding.rationale) lines.push(`Detector note: ${finding.rationale}`);
  return lines.join('\n');
}

export async function explainStage1Findings(
  findings: readonly Finding[],
  units: readonly SourceUnit[],
  ctx: RunContext
): Promise<ExplanationResult> {
  const selected = findings.slice(0, MAX_EXPLAINED_FINDINGS);
  if (selected.length === 0) {
    return { explanations: [], notes: [] };
  }
  if (!ctx.reasoning) {
    return {
      explanations: unique(selected.map(fallbackExplanation)),
      notes: ['explanations from built-in CWE advice: no reasoning backend is configured'],
    };
  }

  const explanations: string[] = [];
  const notes: string[] = [];
  for (const finding of selected) {
    const snippet = snippetFor(finding, units);
    if (!snippet) {
      explanations.push(fallbackExplanation(finding));
      continue;
    }
    try {
      const response = await ctx.reasoning.request({
        snippet,
        context: describeFinding(finding),
        promptTemplate: EXPLAIN_FINDING_TEMPLATE,
      });
      const [reply] = response.findings;
      if (!reply || reply.rationale.trim() === '') {
        explanations.push(fallbackExplanation(finding));
        continue;
      }
      explanations.push(`${finding.id}: ${reply.rationale.trim()}${reply.fix ? ` Fix: ${reply.fix.trim()}` : ''}`);
    } catch (error) {
      if (!(error instanceof ReasoningServiceError)) throw error;
      ctx.logger.warn('explanation request failed', { finding: finding.id, kind: error.kind });
      explanations.push(fallbackExplanation(finding));
      notes.push(`${finding.id}: explanation from built-in CWE advice (${error.kind}: ${error.message})`);
    }
  }

  if (findings.length > selected.length) {
    notes.push(`explained the first ${selected.length} of ${findings.length} finding(s)`);
  }
  return { explanations: unique(explanations), notes };
}

function describeForecast(forecast: Forecast): string {
  return [
    `Risk score ${forecast.score.toFixed(2)}, trend ${forecast.trend}, confidence ${forecast.confidence.toFixed(2)} (${forecast.basis})`,
    `Timeline: ${forecast.timeline}`,
    ...forecast.factors.map((factor) => `- ${factor}`),
  ].join('\n');
}

export async function explainFutureRisk(
  units: readonly SourceUnit[],
  forecast: Forecast,
  ctx: RunContext
): Promise<ExplanationResult> {
  const unit = units.find((candidate) => candidate.snippets.length > 0);
  if (!unit) {
    return { explanations: [], notes: [] };
  }
  if (!ctx.reasoning) {
    return { explanations: [], notes: ['future-risk analysis skipped: no reasoning backend is configured'] };
  }

  try {
    const response = await ctx.reasoning.request({
      snippet: headSnippet(unit, EXPLAIN_CONTEXT_LINES),
      context: describeForecast(forecast),
      promptTemplate: FUTURE_RISK_TEMPLATE,
    });
    const [reply] = response.findings;
    if (!reply || reply.rationale.trim() === '') {
      return { explanations: [], notes: ['future-risk analysis returned nothing'] };
    }
    const level = reply.issue.trim().toLowerCase();
    const prevention = reply.fix ? ` Prevention: ${reply.fix.trim()}` : '';
    return { explanations: [`Future risk (${level}): ${reply.rationale.trim()}${prevention}`], notes: [] };
  } catch (error) {
    if (!(error instanceof ReasoningServiceError)) throw error;
    ctx.logger.warn('future-risk request failed', { kind: error.kind });
    return { explanations: [], notes: [`future-risk analysis unavailable (${error.kind}: ${error.message})`] };
  }
}
