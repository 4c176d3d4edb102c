/**
 * Gate orchestrator: the state machine that sequences the three stages
 * per mode and folds their reports into one decision and exit code.
 *
 *   READY → STAGE1_RUNNING → (block → DONE) | STAGE2_RUNNING
 *         → (block → DONE) | STAGE3_RUNNING → DONE
 *
 * Modes truncate the chain; stages that do not run still get a report
 * with verdict `skipped`.
 */

import { GateDecision } from '../types.js';
import type {
  GateMode,
  GateState,
  Language,
  OverallVerdict,
  SourceUnit,
  Stage3Report,
  StageReport,
  TrajectoryPoint,
} from '../types.js';
import { EXIT_CODES, InternalInvariantViolation } from './errors.js';
import { detectLanguage } from './language.js';
import { normalize } from './normalizer.js';
import { skippedReport } from './report.js';
import { RunContext } from './run-context.js';
import type { RunContextOptions } from './run-context.js';
import { runStage1 } from './stage1.js';
import { runStage2 } from './stage2.js';
import { runStage3 } from './stage3.js';
import { formatZodError } from './validation.js';

export { EXIT_CODES };

export interface GateInput {
  path: string;
  /** Detected from the path and content when absent. */
  language?: Language;
  text: string;
}

export interface GateRunOptions extends RunContextOptions {
  /** Feature points of earlier runs, oldest first. */
  history?: readonly TrajectoryPoint[];
}

const TRANSITIONS: Record<GateState, readonly GateState[]> = {
  READY: ['STAGE1_RUNNING', 'STAGE2_RUNNING', 'STAGE3_RUNNING', 'DONE'],
  STAGE1_RUNNING: ['STAGE2_RUNNING', 'STAGE3_RUNNING', 'DONE'],
  STAGE2_RUNNING: ['STAGE3_RUNNING', 'DONE'],
  STAGE3_RUNNING: ['DONE'],
  DONE: [],
};

interface StagePlan {
  stage1: boolean;
  stage2: boolean;
  stage3: boolean;
}

function planFor(mode: GateMode): StagePlan {
  switch (mode) {
    case 'stage1_only':
      return { stage1: true, stage2: false, stage3: false };
    case 'stage2_only':
      return { stage1: false, stage2: true, stage3: false };
    case 'stage3_only':
      return { stage1: false, stage2: false, stage3: true };
    case 'full':
    case 'llm_only':
      return { stage1: true, stage2: true, stage3: true };
  }
}

const notSelected = (mode: GateMode) => `not selected in ${mode} mode`;

export function normalizeInputs(inputs: readonly GateInput[]): SourceUnit[] {
  return [...inputs]
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((input) => normalize(input.text, input.language ?? detectLanguage(input.path, input.text), input.path));
}

export class GateOrchestrator {
  private current: GateState = 'READY';
  private readonly visited: GateState[] = ['READY'];

  constructor(private readonly ctx: RunContext) {}

  get state(): GateState {
    return this.current;
  }

  get trace(): readonly GateState[] {
    return this.visited;
  }

  private transition(next: GateState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InternalInvariantViolation(`illegal gate transition ${this.current} -> ${next}`);
    }
    this.ctx.logger.debug(`gate ${this.current} -> ${next}`, { runId: this.ctx.runId });
    this.current = next;
    this.visited.push(next);
  }

  async run(inputs: readonly GateInput[], history: readonly TrajectoryPoint[] = []): Promise<GateDecision> {
    if (this.current !== 'READY') {
      throw new InternalInvariantViolation('a gate orchestrator runs once');
    }

    const { config } = this.ctx;
    const plan = planFor(config.mode);
    const units = normalizeInputs(inputs);

    let stage1: StageReport = skippedReport(1, notSelected(config.mode));
    let stage2: StageReport = skippedReport(2, notSelected(config.mode));
    let stage3: Stage3Report = skippedReport(3, notSelected(config.mode));

    if (plan.stage1) {
      this.transition('STAGE1_RUNNING');
      stage1 = await runStage1(units, this.ctx);
    }

    const stage1Blocked = stage1.verdict === 'block';
    if (plan.stage2) {
      if (stage1Blocked && !config.stage2.runWhenBlocked) {
        stage2 = skippedReport(2, 'not reached: stage 1 blocked');
      } else {
        this.transition('STAGE2_RUNNING');
        stage2 = await runStage2(units, this.ctx);
      }
    }

    if (plan.stage3) {
      if (stage1Blocked || stage2.verdict === 'block') {
        stage3 = skippedReport(3, `not reached: stage ${stage1Blocked ? 1 : 2} blocked`);
      } else {
        this.transition('STAGE3_RUNNING');
        stage3 = await runStage3({ units, stage1, stage2, history }, this.ctx);
      }
    }

    this.transition('DONE');
    return this.decide(units, stage1, stage2, stage3);
  }

  private decide(
    units: readonly SourceUnit[],
    stage1: StageReport,
    stage2: StageReport,
    stage3: Stage3Report
  ): GateDecision {
    const { config } = this.ctx;
    const verdicts = [stage1.verdict, stage2.verdict, stage3.verdict];
    const overallVerdict: OverallVerdict = verdicts.includes('block')
      ? 'block'
      : verdicts.includes('indeterminate') ? 'indeterminate' : 'pass';

    const decision = {
      runId: this.ctx.runId,
      mode: config.mode,
      explain: config.explain,
      stages: { stage1, stage2, stage3 },
      overallVerdict,
      exitCode: exitCodeFor(stage1, stage2, stage3, config.failOnIndeterminate),
      trace: [...this.visited],
      inputs: units.map((unit) => ({
        path: unit.path,
        language: unit.language,
        degraded: unit.degraded,
        ...(unit.degradedReason !== undefined ? { degradedReason: unit.degradedReason } : {}),
        snippets: unit.snippets.length,
      })),
      versions: {
        rules: this.ctx.rules.version,
        classifier: this.ctx.classifier.version,
        temporal: this.ctx.temporal.version,
        ...(this.ctx.reasoning ? { reasoning: this.ctx.reasoning.name } : {}),
      },
    };

    const checked = GateDecision.safeParse(decision);
    if (!checked.success) {
      throw new InternalInvariantViolation(`malformed gate decision: ${formatZodError(checked.error)}`);
    }
    return checked.data;
  }
}

export function exitCodeFor(
  stage1: StageReport,
  stage2: StageReport,
  stage3: StageReport,
  failOnIndeterminate: boolean
): number {
  if (stage1.verdict === 'block') return EXIT_CODES.stage1Block;
  if (stage2.verdict === 'block') return EXIT_CODES.stage2Block;
  if (stage3.verdict === 'block') return EXIT_CODES.stage3Block;
  const indeterminate = [stage1, stage2, stage3].some((report) => report.verdict === 'indeterminate');
  if (indeterminate && failOnIndeterminate) return EXIT_CODES.indeterminate;
  return EXIT_CODES.pass;
}

/**
 * Run one gate over `inputs`. Fatal errors (config, model load, invariant
 * violations) propagate; everything else ends up inside the decision.
 */
export async function runGate(inputs: readonly GateInput[], options: GateRunOptions): Promise<GateDecision> {
  const ctx = new RunContext(options);
  ctx.logger.debug('gate run starting', { runId: ctx.runId, mode: ctx.config.mode, files: inputs.length });
  const decision = await new GateOrchestrator(ctx).run(inputs, options.history ?? []);
  ctx.logger.debug('gate run finished', { runId: ctx.runId, verdict: decision.overallVerdict });
  return decision;
}
