/**
 * Validation utilities for safe JSON parsing with Zod schemas
 */

import { z, ZodError } from 'zod';
import { TrajectoryPoint } from '../types.js';

/**
 * Safe JSON parse with Zod validation
 */
export function safeParseJson<T>(
  json: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { success: true; data: T } | { success: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : 'Invalid JSON' };
  }
  const result = schema.safeParse(parsed);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error for logging
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

/**
 * Pull the outermost JSON object out of free-form model output.
 * Strips markdown fences and trailing commas, which models emit often.
 */
export function extractJsonObject(text: string): string | undefined {
  const unfenced = text.replace(/```(?:json|JSON)?/g, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }
  return unfenced.slice(start, end + 1).replace(/,\s*([}\]])/g, '$1');
}

// ─────────────────────────────────────────────────────────────
// Reasoning backend output
// ─────────────────────────────────────────────────────────────

/**
 * One finding as a reasoning backend reports it.
 * Lenient: backends vary in which fields they fill in.
 */
export const ReasoningFindingFromLLM = z.object({
  issue: z.string().optional(),
  title: z.string().optional(),
  category: z.string().optional(),
  cweId: z.string().optional(),
  severity: z.string().optional(),
  line: z.number().optional(),
  lineEnd: z.number().optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
  rationale: z.string().optional().default(''),
  fix: z.string().optional(),
});
export type ReasoningFindingFromLLM = z.infer<typeof ReasoningFindingFromLLM>;

export const ReasoningResponseFromLLM = z.object({
  findings: z.array(ReasoningFindingFromLLM).optional().default([]),
});
export type ReasoningResponseFromLLM = z.infer<typeof ReasoningResponseFromLLM>;

/**
 * Parse raw backend output into a response, or explain why it is unusable.
 */
export function parseReasoningOutput(
  output: string
): { success: true; data: ReasoningResponseFromLLM } | { success: false; error: string } {
  const json = extractJsonObject(output);
  if (json === undefined) {
    return { success: false, error: 'no JSON object in response' };
  }
  return safeParseJson(json, ReasoningResponseFromLLM);
}

// ─────────────────────────────────────────────────────────────
// Trajectory history
// ─────────────────────────────────────────────────────────────

/**
 * History files are either a bare array of points or `{ points: [...] }`.
 */
export const HistoryFile = z.union([
  z.array(TrajectoryPoint),
  z.object({ points: z.array(TrajectoryPoint) }).transform((file) => file.points),
]);
export type HistoryFile = z.infer<typeof HistoryFile>;
