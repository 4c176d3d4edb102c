import { randomUUID } from 'crypto';
import type { StageNumber, StagegateConfig } from '../types.js';
import type { ReasoningClient } from '../providers/reasoning-client.js';
import { formatFindingId } from './findings.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { ClassifierModel, LoadedModels, TemporalModel } from './models.js';
import type { RuleIndex } from './rule-index.js';

export interface RunArtifacts {
  rules: RuleIndex;
  models: LoadedModels;
}

export interface RunContextOptions {
  config: StagegateConfig;
  artifacts: RunArtifacts;
  reasoning?: ReasoningClient;
  logger?: Logger;
  /** Milliseconds; injectable so deadline tests need no real time. */
  clock?: () => number;
  runId?: string;
}

/**
 * Everything one gate run needs. Artifacts are shared read-only; the id
 * counters belong to this run alone.
 */
export class RunContext {
  readonly runId: string;
  readonly config: StagegateConfig;
  readonly rules: RuleIndex;
  readonly classifier: ClassifierModel;
  readonly temporal: TemporalModel;
  readonly reasoning?: ReasoningClient;
  readonly logger: Logger;
  readonly clock: () => number;
  private readonly counters = new Map<StageNumber, number>();

  constructor(options: RunContextOptions) {
    this.runId = options.runId ?? `run-${randomUUID()}`;
    this.config = options.config;
    this.rules = options.artifacts.rules;
    this.classifier = options.artifacts.models.classifier;
    this.temporal = options.artifacts.models.temporal;
    this.reasoning = options.reasoning;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  nextFindingId(stage: StageNumber): string {
    const sequence = (this.counters.get(stage) ?? 0) + 1;
    this.counters.set(stage, sequence);
    return formatFindingId(stage, sequence);
  }

  idsFor(stage: StageNumber): () => string {
    return () => this.nextFindingId(stage);
  }
}
