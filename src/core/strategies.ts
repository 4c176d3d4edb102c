/**
 * Detection strategies. A stage is an ordered list of these; modes swap the
 * list rather than the stage.
 */

import { Category } from '../types.js';
import type { DraftFinding, Snippet, SourceUnit } from '../types.js';
import type { PromptTemplate, ReasoningFinding } from '../providers/reasoning-client.js';
import { ReasoningServiceError } from './errors.js';
import { extractFeatures } from './features.js';
import { createFinding } from './findings.js';
import { fallbackFinding, findFocusHints, hasAuthorizationCheck, mentionsAuthorization } from './focus-hints.js';
import type { FocusHint } from './focus-hints.js';
import { matchRule } from './rule-index.js';
import type { RunContext } from './run-context.js';

export interface DetectionStrategy {
  readonly name: string;
  analyze(snippet: Snippet, unit: SourceUnit, ctx: RunContext): Promise<DraftFinding[]>;
}

// ─────────────────────────────────────────────────────────────
// Rule matcher
// ─────────────────────────────────────────────────────────────

export const ruleStrategy: DetectionStrategy = {
  name: 'rules',
  async analyze(snippet, unit, ctx) {
    const findings: DraftFinding[] = [];
    for (const rule of ctx.rules.rulesFor(unit.language)) {
      for (const match of matchRule(rule, snippet)) {
        findings.push(createFinding({
          stage: 1,
          category: rule.category,
          cweId: rule.cweId,
          file: unit.path,
          lineStart: match.line,
          lineEnd: match.line,
          confidence: rule.confidence,
          severity: rule.severity,
          source: 'rule',
          ruleId: rule.id,
          rationale: `${rule.name}: ${rule.description}`,
          fix: rule.fix,
        }));
      }
    }
    return findings;
  },
};

// ─────────────────────────────────────────────────────────────
// Classifier
// ─────────────────────────────────────────────────────────────

const DRIVERS_SHOWN = 3;

export const classifierStrategy: DetectionStrategy = {
  name: 'classifier',
  async analyze(snippet, unit, ctx) {
    const features = extractFeatures(snippet);
    const keep = ctx.config.stage1.keepThreshold;

    return ctx.classifier.score(features)
      .filter((score) => score.probability >= keep)
      .map((score) => {
        const drivers = score.drivers
          .slice(0, DRIVERS_SHOWN)
          .map((driver) => `${driver.feature} (+${driver.contribution.toFixed(2)})`);
        const rationale = drivers.length > 0
          ? `Classifier scored ${score.probability.toFixed(2)} for ${score.category}; strongest signals: ${drivers.join(', ')}`
          : `Classifier scored ${score.probability.toFixed(2)} for ${score.category}`;
        return createFinding({
          stage: 1,
          category: score.category,
          cweId: score.cweId,
          file: unit.path,
          lineStart: snippet.startLine,
          lineEnd: snippet.endLine,
          confidence: score.probability,
          severity: score.severity,
          source: 'classifier',
          rationale,
          fix: ctx.rules.rules.find((rule) => rule.category === score.category)?.fix,
        });
      });
  },
};

// ─────────────────────────────────────────────────────────────
// Reasoning
// ─────────────────────────────────────────────────────────────

/** Classic signature classes; stage 2 leaves these to stage 1. */
const SIGNATURE_TERMS = /\b(?:sql|xss|injection|overflow|buffer|memory|uninitiali[sz]ed|leak|use[- ]after|format string|csrf|ssrf)/i;

const HEADER_LINES = 20;

export interface ReasoningStrategyOptions {
  template: PromptTemplate;
  stage: 1 | 2;
  /** Every finding gets this category; otherwise the reply's category is used. */
  category?: Category;
  excludeSignatureFlaws?: boolean;
  /**
   * Drop authorization findings on code that already checks authorization,
   * and report the fallback finding of a focus hint when the backend answers
   * with nothing for a snippet that has one.
   */
  useFocusHints?: boolean;
}

export function isSignatureFlaw(finding: Pick<ReasoningFinding, 'issue' | 'category'>): boolean {
  return SIGNATURE_TERMS.test(`${finding.issue} ${finding.category ?? ''}`);
}

const hintCache = new WeakMap<SourceUnit, FocusHint[]>();

function hintsFor(unit: SourceUnit): FocusHint[] {
  let hints = hintCache.get(unit);
  if (!hints) {
    hints = findFocusHints(unit);
    hintCache.set(unit, hints);
  }
  return hints;
}

function hintsWithin(unit: SourceUnit, snippet: Snippet): FocusHint[] {
  return hintsFor(unit).filter((hint) => hint.line >= snippet.startLine && hint.line <= snippet.endLine);
}

/**
 * What the backend sees besides the code: where it lives, what sits around
 * it, and any focus hints that fall inside it.
 */
export function buildSnippetContext(unit: SourceUnit, snippet: Snippet): string {
  const sections = [`File: ${unit.path} (${unit.language})`];

  const neighbours = unit.snippets
    .filter((other) => other.kind === 'function' && other.functionName && other.id !== snippet.id)
    .map((other) => other.functionName);
  if (neighbours.length > 0) {
    sections.push(`Other functions in this file: ${neighbours.join(', ')}`);
  }

  if (snippet.startLine > 1) {
    const header = unit.text.split('\n').slice(0, Math.min(HEADER_LINES, snippet.startLine - 1)).join('\n');
    if (header.trim() !== '') {
      sections.push(`File header:\n${header}`);
    }
  }

  const hints = hintsWithin(unit, snippet);
  if (hints.length > 0) {
    sections.push(`Focus:\n${hints.map((hint) => `- ${hint.message}`).join('\n')}`);
  }

  return sections.join('\n\n');
}

function categoryOf(finding: ReasoningFinding): Category {
  const parsed = Category.safeParse(finding.category?.trim().toLowerCase().replace(/[\s_]+/g, '-'));
  return parsed.success ? parsed.data : 'unclassified';
}

function clampLine(line: number, snippet: Snippet): number {
  return Math.min(snippet.endLine, Math.max(snippet.startLine, line));
}

export function createReasoningStrategy(options: ReasoningStrategyOptions): DetectionStrategy {
  return {
    name: `reasoning:${options.template.id}`,
    async analyze(snippet, unit, ctx) {
      if (!ctx.reasoning) {
        throw new ReasoningServiceError('unavailable', 'no reasoning backend is configured');
      }

      const response = await ctx.reasoning.request({
        snippet,
        context: buildSnippetContext(unit, snippet),
        promptTemplate: options.template,
      });

      const checked = options.useFocusHints === true && hasAuthorizationCheck(snippet.text);
      const findings: DraftFinding[] = [];
      for (const result of response.findings) {
        if (options.excludeSignatureFlaws && isSignatureFlaw(result)) {
          ctx.logger.debug('dropping signature-class reply', { snippet: snippet.id, issue: result.issue });
          continue;
        }
        if (checked && mentionsAuthorization(`${result.issue} ${result.rationale} ${result.fix ?? ''}`)) {
          ctx.logger.debug('dropping authorization reply on checked code', { snippet: snippet.id, issue: result.issue });
          continue;
        }

        const lineStart = result.line === undefined ? snippet.startLine : clampLine(result.line, snippet);
        const lineEnd = result.lineEnd !== undefined
          ? Math.max(lineStart, clampLine(result.lineEnd, snippet))
          : result.line === undefined ? snippet.endLine : lineStart;

        findings.push(createFinding({
          stage: options.stage,
          category: options.category ?? categoryOf(result),
          cweId: result.cweId,
          file: unit.path,
          lineStart,
          lineEnd,
          confidence: result.confidence,
          severity: result.severity,
          source: 'reasoning',
          rationale: result.rationale === '' ? result.issue : `${result.issue}: ${result.rationale}`,
          fix: result.fix,
        }));
      }

      if (options.useFocusHints && findings.length === 0) {
        for (const hint of hintsWithin(unit, snippet)) {
          const fallback = fallbackFinding(hint, unit.path);
          if (fallback) findings.push(fallback);
        }
      }
      return findings;
    },
  };
}
