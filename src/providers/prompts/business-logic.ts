/**
 * Business Logic Prompt - stage 2
 *
 * Asks for flaws that no signature can catch: missing authorization,
 * invariants broken by conditional logic, unsafe ordering. Signature classes
 * are excluded up front and filtered again on the way back.
 */

import type { PromptTemplate } from '../reasoning-client.js';
import { JSON_OUTPUT_INSTRUCTION, SEVERITY_DEFINITIONS_PROMPT, STRICT_JSON_SUFFIX, numberLines } from './constants.js';

export const BUSINESS_LOGIC_TEMPLATE: PromptTemplate = {
  id: 'business-logic',
  strictSuffix: STRICT_JSON_SUFFIX,
  render: ({ snippet, context }) => `You are a security reviewer hunting BUSINESS-LOGIC flaws in the code below.

Signature bugs (SQL injection, XSS, buffer overflows, memory safety, format strings, CSRF, SSRF) are covered by another tool. Do NOT report them.

REPORT ONLY:
- Sensitive actions (admin views, refunds, deletes, transfers, role changes) reachable without an authorization check
- State or monetary invariants that sequential conditionals can break, for example two discounts that both apply
- Operations in an unsafe order, for example a check performed after the effect it guards

For each finding, name the concrete input or call sequence that breaks the rule the code is supposed to enforce.

${SEVERITY_DEFINITIONS_PROMPT}

${JSON_OUTPUT_INSTRUCTION}
Use "business-logic" as the category.

CONTEXT:
${context}

CODE (${snippet.id}):
\`\`\`
${numberLines(snippet)}
\`\`\``,
};
