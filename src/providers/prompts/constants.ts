/**
 * Shared prompt fragments
 */

import type { Snippet } from '../../types.js';

export const JSON_OUTPUT_INSTRUCTION = `Respond with ONLY a JSON object, no prose and no markdown:
{"findings":[{"issue":"short title","category":"category name","severity":"critical|high|medium|low","line":<first line>,"lineEnd":<last line>,"confidence":<number between 0 and 1>,"rationale":"why this is a real problem","fix":"how to fix it"}]}
Use the absolute line numbers shown in the code. Return {"findings":[]} when nothing qualifies.`;

export const STRICT_JSON_SUFFIX = `

Your previous reply could not be parsed. Reply again with a single JSON object of the form {"findings":[...]}. Start with { and end with }. Nothing else.`;

export const SEVERITY_DEFINITIONS_PROMPT = `SEVERITY:
- critical: exploitable by any caller, direct loss of money, data or control
- high: exploitable under realistic conditions
- medium: needs unusual conditions or an insider
- low: hardening issue with little direct impact`;

/**
 * Snippet text with absolute line numbers, so replies can point at lines.
 */
export function numberLines(snippet: Snippet): string {
  const rows = snippet.text.split('\n');
  const width = String(snippet.startLine + rows.length - 1).length;
  return rows
    .map((row, i) => `${String(snippet.startLine + i).padStart(width, ' ')} | ${row}`)
    .join('\n');
}
