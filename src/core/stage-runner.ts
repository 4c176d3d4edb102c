import type { DraftFinding, Snippet, SourceUnit, StageError } from '../types.js';
import { isReasoningServiceError } from './errors.js';
import type { SnippetFindings } from './finding-merger.js';
import { mapWithConcurrency } from './pool.js';
import type { RunContext } from './run-context.js';
import type { DetectionStrategy } from './strategies.js';

export interface StageTarget {
  unit: SourceUnit;
  snippet: Snippet;
}

export interface StageRunOptions {
  concurrency: number;
  /** Stop starting new analyses once this much time has passed. */
  deadlineMs?: number;
}

export interface StageRunResult {
  perSnippet: SnippetFindings[];
  errors: StageError[];
}

/**
 * Run every strategy over every target through a bounded pool.
 * Reasoning failures become stage errors; anything else is fatal.
 */
export async function runStrategies(
  targets: readonly StageTarget[],
  strategies: readonly DetectionStrategy[],
  ctx: RunContext,
  options: StageRunOptions
): Promise<StageRunResult> {
  const started = ctx.clock();
  const { deadlineMs } = options;

  const results = await mapWithConcurrency(targets, options.concurrency, async ({ unit, snippet }) => {
    const findings: DraftFinding[] = [];
    const errors: StageError[] = [];

    for (const strategy of strategies) {
      if (deadlineMs !== undefined && ctx.clock() - started >= deadlineMs) {
        errors.push({
          kind: 'timeout',
          message: `stage deadline of ${deadlineMs}ms passed before ${strategy.name} ran`,
          snippetId: snippet.id,
        });
        break;
      }
      try {
        findings.push(...(await strategy.analyze(snippet, unit, ctx)));
      } catch (error) {
        if (!isReasoningServiceError(error)) {
          throw error;
        }
        ctx.logger.warn(`${strategy.name} failed on ${snippet.id}`, { kind: error.kind, message: error.message });
        errors.push({ kind: error.kind, message: error.message, snippetId: snippet.id });
      }
    }

    return { snippetId: snippet.id, findings, errors };
  });

  return {
    perSnippet: results.map(({ snippetId, findings }) => ({ snippetId, findings })),
    errors: results.flatMap((result) => result.errors),
  };
}
