/**
 * Known Vulnerability Prompt - stage 1 when the gate runs in llm-only mode
 *
 * Replaces the rule matcher and classifier with a single question per
 * snippet. The categories offered are the ones the rule index knows.
 */

import type { RuleIndex } from '../../core/rule-index.js';
import type { PromptTemplate } from '../reasoning-client.js';
import { JSON_OUTPUT_INSTRUCTION, SEVERITY_DEFINITIONS_PROMPT, STRICT_JSON_SUFFIX, numberLines } from './constants.js';

export function createKnownVulnerabilityTemplate(rules: RuleIndex): PromptTemplate {
  const seen = new Set<string>();
  const catalogue: string[] = [];
  for (const rule of rules.rules) {
    const key = `${rule.category}:${rule.cweId ?? ''}`;
    if (seen.has(key)) continue;
    seen.add(key);
    catalogue.push(`- ${rule.category}${rule.cweId ? ` (${rule.cweId})` : ''}: ${rule.name.toLowerCase()}`);
  }

  return {
    id: 'known-vulnerabilities',
    strictSuffix: STRICT_JSON_SUFFIX,
    render: ({ snippet, context }) => `You are a security reviewer. Find KNOWN vulnerability classes in the code below.

CATEGORIES (use the category name exactly as written):
${catalogue.join('\n')}

Only report code that is actually vulnerable as written. A bounded copy, a parameterized query or a literal argument is not a finding.

${SEVERITY_DEFINITIONS_PROMPT}

${JSON_OUTPUT_INSTRUCTION}
Include "cweId" when you know it.

CONTEXT:
${context}

CODE (${snippet.id}):
\`\`\`
${numberLines(snippet)}
\`\`\``,
  };
}
