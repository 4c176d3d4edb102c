/**
 * Explanation prompts - used only when a run asks for explanations.
 *
 * Both reuse the findings envelope so the same client, validation and strict
 * re-ask apply: one entry, with the explanation in `rationale`.
 */

import type { PromptTemplate } from '../reasoning-client.js';
import { STRICT_JSON_SUFFIX, numberLines } from './constants.js';

const SINGLE_ENTRY_INSTRUCTION = `Respond with ONLY a JSON object, no prose and no markdown:
{"findings":[{"issue":"short title","severity":"critical|high|medium|low","confidence":<number between 0 and 1>,"rationale":"the explanation","fix":"one concrete recommendation"}]}
Return exactly one entry.`;

export const EXPLAIN_FINDING_TEMPLATE: PromptTemplate = {
  id: 'explain-finding',
  strictSuffix: STRICT_JSON_SUFFIX,
  render: ({ snippet, context }) => `A static analyzer reported the finding below. Explain it to the developer who owns the code.

In "rationale", say in two sentences at most what an attacker can do and which line makes it possible. In "fix", give the smallest change that removes the problem. Keep the reported severity unless the code clearly shows otherwise.

${SINGLE_ENTRY_INSTRUCTION}

FINDING:
${context}

CODE (${snippet.id}):
\`\`\`
${numberLines(snippet)}
\`\`\``,
};

export const FUTURE_RISK_TEMPLATE: PromptTemplate = {
  id: 'future-risk',
  strictSuffix: STRICT_JSON_SUFFIX,
  render: ({ snippet, context }) => `Estimate how likely the code below is to gain a security vulnerability over the next 3-6 months of normal development.

Use "issue" for the risk level (low, medium or high), "rationale" for the reasoning in two sentences at most, and "fix" for one prevention recommendation.

${SINGLE_ENTRY_INSTRUCTION}

FORECAST SO FAR:
${context}

CODE (${snippet.id}):
\`\`\`
${numberLines(snippet)}
\`\`\``,
};
