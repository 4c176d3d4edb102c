import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Source Types
// ─────────────────────────────────────────────────────────────

export const Language = z.enum([
  'c',
  'cpp',
  'java',
  'javascript',
  'typescript',
  'go',
  'csharp',
  'php',
  'rust',
  'python',
  'other',
]);
export type Language = z.infer<typeof Language>;

// function: a parsed function or method body
// module:   top-level code that sits outside any function
// block:    a coarse line window produced by the lexical fallback
export const SnippetKind = z.enum(['function', 'module', 'block']);
export type SnippetKind = z.infer<typeof SnippetKind>;

export const Snippet = z.object({
  id: z.string(),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(1),
  /** UTF-8 byte offsets into the unit text. */
  startOffset: z.number().int().min(0),
  endOffset: z.number().int().min(0),
  text: z.string(),
  functionName: z.string().optional(),
  kind: SnippetKind,
});
export type Snippet = z.infer<typeof Snippet>;

export const SourceUnit = z.object({
  path: z.string(),
  language: Language,
  text: z.string(),
  snippets: z.array(Snippet),
  degraded: z.boolean(),
  degradedReason: z.string().optional(),
});
export type SourceUnit = z.infer<typeof SourceUnit>;

// ─────────────────────────────────────────────────────────────
// Finding Types
// ─────────────────────────────────────────────────────────────

export const StageNumber = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export type StageNumber = z.infer<typeof StageNumber>;

export const Severity = z.enum(['critical', 'high', 'medium', 'low']);
export type Severity = z.infer<typeof Severity>;

export const Category = z.enum([
  'buffer-overflow',   // unbounded copies, untrusted lengths, format writes into fixed buffers
  'injection',         // SQL, markup, OS command
  'code-execution',    // eval/exec of dynamic strings
  'deserialization',   // unsafe loaders on untrusted data
  'path-traversal',
  'hardcoded-secret',
  'business-logic',    // authorization gaps, broken state invariants, unsafe ordering
  'unclassified',
]);
export type Category = z.infer<typeof Category>;

export const FindingSource = z.enum(['rule', 'classifier', 'merged', 'reasoning']);
export type FindingSource = z.infer<typeof FindingSource>;

export const Finding = z.object({
  id: z.string(),
  stage: StageNumber,
  category: Category,
  cweId: z.string().optional(),
  file: z.string(),
  lineStart: z.number().int().min(1),
  lineEnd: z.number().int().min(1),
  confidence: z.number().min(0).max(1),
  severity: Severity,
  source: FindingSource,
  ruleId: z.string().optional(),
  rationale: z.string().optional(),
  fix: z.string().optional(),
});
export type Finding = z.infer<typeof Finding>;

/** A finding before the run context has numbered it. */
export type DraftFinding = Omit<Finding, 'id'>;

// ─────────────────────────────────────────────────────────────
// Stage Report Types
// ─────────────────────────────────────────────────────────────

export const Verdict = z.enum(['pass', 'block', 'indeterminate', 'skipped']);
export type Verdict = z.infer<typeof Verdict>;

export const ReasoningErrorKind = z.enum([
  'timeout',
  'auth',
  'rate_limit',
  'unavailable',
  'invalid_response',
]);
export type ReasoningErrorKind = z.infer<typeof ReasoningErrorKind>;

export const StageError = z.object({
  kind: ReasoningErrorKind,
  message: z.string(),
  snippetId: z.string().optional(),
});
export type StageError = z.infer<typeof StageError>;

export const StageSummary = z.object({
  total: z.number().int(),
  bySeverity: z.object({
    critical: z.number().int(),
    high: z.number().int(),
    medium: z.number().int(),
    low: z.number().int(),
  }),
  topCategories: z.array(z.object({ category: Category, count: z.number().int() })),
});
export type StageSummary = z.infer<typeof StageSummary>;

export const StageReport = z.object({
  stage: StageNumber,
  verdict: Verdict,
  findings: z.array(Finding),
  errors: z.array(StageError),
  notes: z.array(z.string()),
  summary: StageSummary,
  /** Present only on runs started with `explain`. */
  explanations: z.array(z.string()).optional(),
});
export type StageReport = z.infer<typeof StageReport>;

// ─────────────────────────────────────────────────────────────
// Forecast Types
// ─────────────────────────────────────────────────────────────

export const Trend = z.enum(['increasing', 'stable', 'decreasing']);
export type Trend = z.infer<typeof Trend>;

export const FeaturePoint = z.record(z.string(), z.number());
export type FeaturePoint = z.infer<typeof FeaturePoint>;

export const TrajectoryPoint = z.object({
  timestamp: z.string().optional(),
  features: FeaturePoint,
});
export type TrajectoryPoint = z.infer<typeof TrajectoryPoint>;

export const TimelineBucket = z.enum(['3-6 months', '6-12 months', 'unknown']);
export type TimelineBucket = z.infer<typeof TimelineBucket>;

export const Forecast = z.object({
  score: z.number().min(0).max(1),
  trend: Trend,
  horizon: z.number().int().min(1),
  confidence: z.number().min(0).max(1),
  lowConfidence: z.boolean(),
  basis: z.enum(['trajectory', 'single-point']),
  currentRiskIndex: z.number(),
  projectedRiskIndex: z.number(),
  currentPoint: FeaturePoint,
  factors: z.array(z.string()),
  /** When the projected risk is expected to materialize, or 'unknown' without history. */
  timeline: TimelineBucket,
  timelineConfidence: z.number().min(0).max(1),
});
export type Forecast = z.infer<typeof Forecast>;

export const Stage3Report = StageReport.extend({
  forecast: Forecast.optional(),
});
export type Stage3Report = z.infer<typeof Stage3Report>;

// ─────────────────────────────────────────────────────────────
// Gate Types
// ─────────────────────────────────────────────────────────────

export const GateMode = z.enum(['full', 'stage1_only', 'stage2_only', 'stage3_only', 'llm_only']);
export type GateMode = z.infer<typeof GateMode>;

export const GateState = z.enum(['READY', 'STAGE1_RUNNING', 'STAGE2_RUNNING', 'STAGE3_RUNNING', 'DONE']);
export type GateState = z.infer<typeof GateState>;

export const OverallVerdict = z.enum(['pass', 'block', 'indeterminate']);
export type OverallVerdict = z.infer<typeof OverallVerdict>;

export const GateDecision = z.object({
  runId: z.string(),
  mode: GateMode,
  explain: z.boolean(),
  stages: z.object({
    stage1: StageReport,
    stage2: StageReport,
    stage3: Stage3Report,
  }),
  overallVerdict: OverallVerdict,
  exitCode: z.number().int(),
  trace: z.array(GateState),
  inputs: z.array(z.object({
    path: z.string(),
    language: Language,
    degraded: z.boolean(),
    degradedReason: z.string().optional(),
    snippets: z.number().int(),
  })),
  versions: z.object({
    rules: z.string(),
    classifier: z.string(),
    temporal: z.string(),
    reasoning: z.string().optional(),
  }),
});
export type GateDecision = z.infer<typeof GateDecision>;

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

export const ProviderType = z.enum(['claude-code', 'codex', 'ollama', 'groq']);
export type ProviderType = z.infer<typeof ProviderType>;

export const MergePolicy = z.enum(['max', 'weighted']);
export type MergePolicy = z.infer<typeof MergePolicy>;

const threshold = () => z.number().min(0).max(1);

export const StagegateConfig = z.object({
  version: z.string().default('1'),
  mode: GateMode.default('full'),
  explain: z.boolean().default(false),
  failOnIndeterminate: z.boolean().default(true),

  // Reasoning backend
  provider: ProviderType.default('claude-code'),
  model: z.string().optional(),

  // Input selection for the CLI
  include: z.array(z.string()).default([
    '**/*.{c,h,cc,cpp,hpp,java,js,jsx,mjs,ts,tsx,go,cs,php,rs,py}',
  ]),
  exclude: z.array(z.string()).default(['node_modules/**', 'dist/**', 'build/**', '.git/**']),

  // Extra rule packs (YAML or JSON) appended to the built-in index
  rulePacks: z.array(z.string()).default([]),

  // Trained artifacts (paths resolve against the working directory)
  models: z.object({
    classifier: z.string().optional(),
    temporal: z.string().optional(),
  }).default({}),

  stage1: z.object({
    keepThreshold: threshold().default(0.6),
    blockThreshold: threshold().default(0.8),
    blockingCategories: z.array(Category).default([
      'buffer-overflow',
      'injection',
      'code-execution',
      'deserialization',
    ]),
    mergePolicy: MergePolicy.default('max'),
    mergeWeight: threshold().default(0.5),
    maxHitsPerRule: z.number().int().min(1).default(3),
    concurrency: z.number().int().min(1).default(4),
  }).default({}),

  stage2: z.object({
    blockThreshold: threshold().default(0.6),
    runWhenBlocked: z.boolean().default(false),
    scope: z.enum(['snippet', 'file']).default('snippet'),
    deadlineMs: z.number().int().min(1).default(600000),
    concurrency: z.number().int().min(1).default(2),
  }).default({}),

  stage3: z.object({
    horizon: z.number().int().min(1).optional(),
    blockThreshold: threshold().optional(),
  }).default({}),

  reasoning: z.object({
    timeoutMs: z.number().int().min(1).default(120000),
    retries: z.number().int().min(0).max(10).default(2),
    baseDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(8000),
  }).default({}),
});
export type StagegateConfig = z.infer<typeof StagegateConfig>;
export type StagegateConfigInput = z.input<typeof StagegateConfig>;
