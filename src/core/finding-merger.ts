/**
 * Finding Merger - reconcile rule and classifier findings
 *
 * Rule hits and classifier scores often describe the same weakness in the
 * same snippet. Findings are grouped by (snippet, category); when a group has
 * both kinds, the classifier finding is folded into the strongest rule finding
 * using the configured policy:
 *
 *   max       keep whichever of the two has the higher confidence
 *   weighted  replace both with one `merged` finding at the rule's location,
 *             confidence = w * rule + (1 - w) * classifier
 */

import type { DraftFinding, MergePolicy, Severity } from '../types.js';
import { createFinding, sortFindings } from './findings.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface MergeOptions {
  policy: MergePolicy;
  /** Rule weight for the `weighted` policy. */
  weight: number;
}

export interface SnippetFindings {
  snippetId: string;
  findings: readonly DraftFinding[];
}

interface MergeGroup {
  rules: DraftFinding[];
  classifier: DraftFinding[];
  other: DraftFinding[];
}

const SEVERITY_RANK: Record<Severity, number> = { critical: 4, high: 3, medium: 2, low: 1 };

// ─────────────────────────────────────────────────────────────
// Merging
// ─────────────────────────────────────────────────────────────

export function mergeFindings(snippets: readonly SnippetFindings[], options: MergeOptions): DraftFinding[] {
  const groups = new Map<string, MergeGroup>();

  for (const { snippetId, findings } of snippets) {
    for (const finding of findings) {
      const key = `${snippetId}\u0000${finding.category}`;
      let group = groups.get(key);
      if (!group) {
        group = { rules: [], classifier: [], other: [] };
        groups.set(key, group);
      }
      if (finding.source === 'rule') group.rules.push(finding);
      else if (finding.source === 'classifier') group.classifier.push(finding);
      else group.other.push(finding);
    }
  }

  const merged: DraftFinding[] = [];
  for (const group of groups.values()) {
    merged.push(...mergeGroup(group, options));
  }
  return sortFindings(merged);
}

function mergeGroup(group: MergeGroup, options: MergeOptions): DraftFinding[] {
  const [classifier, ...extraClassifier] = group.classifier;
  if (!classifier || group.rules.length === 0) {
    return [...group.rules, ...group.classifier, ...group.other];
  }

  const rules = sortFindings(group.rules);
  const strongest = rules.reduce((best, rule) => (rule.confidence > best.confidence ? rule : best));
  const remainingRules = rules.filter((rule) => rule !== strongest);
  const kept = [...remainingRules, ...extraClassifier, ...group.other];

  if (options.policy === 'max') {
    // Ties go to the rule: it carries the precise line.
    kept.push(classifier.confidence > strongest.confidence ? classifier : strongest);
    return kept;
  }

  kept.push(weightedMerge(strongest, classifier, options.weight));
  return kept;
}

function weightedMerge(rule: DraftFinding, classifier: DraftFinding, weight: number): DraftFinding {
  const rationale = [rule.rationale, classifier.rationale].filter((text) => text !== undefined).join(' ');
  return createFinding({
    ...rule,
    source: 'merged',
    confidence: weight * rule.confidence + (1 - weight) * classifier.confidence,
    severity: SEVERITY_RANK[classifier.severity] > SEVERITY_RANK[rule.severity] ? classifier.severity : rule.severity,
    rationale: rationale === '' ? undefined : rationale,
  });
}
