/**
 * Deterministic pointers for the business-logic prompt: functions whose
 * shape suggests a broken invariant or a missing authorization check.
 * Hints steer the reasoning backend. The two narrowest kinds also carry a
 * fallback finding, reported when the backend answers but finds nothing.
 */

import type { DraftFinding, Snippet, SourceUnit } from '../types.js';
import { createFinding } from './findings.js';

export type FocusKind =
  | 'state-invariant'
  | 'missing-authorization'
  | 'post-payment-discount'
  | 'unchecked-admin-flag';

export interface FocusHint {
  kind: FocusKind;
  snippetId: string;
  line: number;
  functionName?: string;
  message: string;
}

// `if (...) x = ...`, `if (...) { x -= ...`, `if cond:\n    x = ...`
const CONDITIONAL_ASSIGNMENT = /\bif\b(?:\s*\([^)\n]*\)\s*\{?|[^\n:{]*:)\s*([A-Za-z_][\w.]*)\s*[-+*/]?=(?!=)/g;

const SENSITIVE_NAME = /admin|delete|remove|refund|transfer|grant|withdraw|approve|payout|reset_?password|set_?role|promote/i;

const AUTHORIZATION_CHECK = new RegExp(
  [
    String.raw`\bif\b[^\n{]*\b(?:is_?admin|admin|auth\w*|role|permission\w*|authori[sz]ed|owner|logged_?in)\b`,
    String.raw`\b(?:authorize|authenticate|require_?(?:auth|login|admin|role)|check_?(?:auth|access|permission)\w*|assert_?(?:admin|owner)|has_?(?:role|permission))\w*\s*\(`,
    String.raw`@(?:login_required|requires?_?\w*|Authorize|PreAuthorize|RolesAllowed)\b`,
  ].join('|'),
  'i'
);

const PAID_CONDITION = /\bif\b[^\n{]*\b(?:is_?paid|paid|payment_(?:done|complete[d]?)|checked_?out|after_checkout)\b/i;

// `total -= 5`, `o->total = o->total - 100`
const TOTAL_REDUCTION = /\b((?:[A-Za-z_]\w*(?:\.|->))*(?:total|amount|price|balance))\s*(?:-=|=\s*\1\s*-)/i;

const ADMIN_FLAG = /\b(?:is_?admin|isAdmin)\b/;

const AUTHORIZATION_TERMS = /\b(?:auth\w*|unauthori[sz]ed)\b/i;

export const FALLBACK_CONFIDENCE = 0.7;

/** Whether the code already branches on an authorization check. */
export function hasAuthorizationCheck(text: string): boolean {
  return AUTHORIZATION_CHECK.test(text);
}

export function mentionsAuthorization(text: string): boolean {
  return AUTHORIZATION_TERMS.test(text);
}

export function conditionalReassignments(snippet: Snippet): Map<string, number> {
  const counts = new Map<string, number>();
  for (const match of snippet.text.matchAll(CONDITIONAL_ASSIGNMENT)) {
    counts.set(match[1], (counts.get(match[1]) ?? 0) + 1);
  }
  return counts;
}

export function findFocusHints(unit: SourceUnit): FocusHint[] {
  const hints: FocusHint[] = [];

  for (const snippet of unit.snippets) {
    if (snippet.kind !== 'function') continue;
    const label = snippet.functionName ?? snippet.id;

    for (const [variable, count] of conditionalReassignments(snippet)) {
      if (count < 2) continue;
      hints.push({
        kind: 'state-invariant',
        snippetId: snippet.id,
        line: snippet.startLine,
        functionName: snippet.functionName,
        message: `${label}: '${variable}' is reassigned in ${count} sequential conditionals; check whether the branches can combine into an invalid state`,
      });
    }

    const reduction = PAID_CONDITION.test(snippet.text) ? TOTAL_REDUCTION.exec(snippet.text) : null;
    if (reduction) {
      hints.push({
        kind: 'post-payment-discount',
        snippetId: snippet.id,
        line: snippet.startLine + lineIndexOf(snippet.text, reduction.index),
        functionName: snippet.functionName,
        message: `${label}: '${reduction[1]}' is reduced once the order is paid; check whether a discount can apply after payment`,
      });
    }

    if (hasAuthorizationCheck(snippet.text)) continue;

    if (ADMIN_FLAG.test(snippet.text)) {
      hints.push({
        kind: 'unchecked-admin-flag',
        snippetId: snippet.id,
        line: snippet.startLine,
        functionName: snippet.functionName,
        message: `${label}: receives an admin flag but never checks it`,
      });
    } else if (snippet.functionName && SENSITIVE_NAME.test(snippet.functionName)) {
      hints.push({
        kind: 'missing-authorization',
        snippetId: snippet.id,
        line: snippet.startLine,
        functionName: snippet.functionName,
        message: `${label}: sensitive operation with no visible authorization check`,
      });
    }
  }

  return hints;
}

function lineIndexOf(text: string, offset: number): number {
  let count = 0;
  for (let i = 0; i < offset; i++) {
    if (text[i] === '\n') count++;
  }
  return count;
}

// ─────────────────────────────────────────────────────────────
// Fallback findings
// ─────────────────────────────────────────────────────────────

const FALLBACKS: Partial<Record<FocusKind, { issue: string; fix: string; rationale: string; ruleId: string }>> = {
  'post-payment-discount': {
    ruleId: 'LOGIC-POST-PAYMENT-DISCOUNT',
    issue: 'Discount applied after payment',
    fix: 'Apply coupons before payment and cap totals at zero.',
    rationale: 'Post-payment discounts can create negative totals or free purchases.',
  },
  'unchecked-admin-flag': {
    ruleId: 'LOGIC-UNCHECKED-ADMIN-FLAG',
    issue: 'Missing authorization check',
    fix: 'Require an admin check before the privileged operation.',
    rationale: 'Without authorization, any user can reach admin functionality.',
  },
};

export function fallbackFinding(hint: FocusHint, file: string): DraftFinding | undefined {
  const fallback = FALLBACKS[hint.kind];
  if (!fallback) return undefined;
  return createFinding({
    stage: 2,
    category: 'business-logic',
    file,
    lineStart: hint.line,
    lineEnd: hint.line,
    confidence: FALLBACK_CONFIDENCE,
    severity: 'high',
    source: 'rule',
    ruleId: fallback.ruleId,
    rationale: `${fallback.issue}: ${fallback.rationale}`,
    fix: fallback.fix,
  });
}
