// stagegate - three-stage security gate for CI

export * from './types.js';
export { VERSION } from './version.js';
export { runGate, GateOrchestrator, exitCodeFor, normalizeInputs, EXIT_CODES } from './core/gate.js';
export type { GateInput, GateRunOptions } from './core/gate.js';
export { RunContext } from './core/run-context.js';
export type { RunArtifacts, RunContextOptions } from './core/run-context.js';
export { loadConfig, parseConfig, defaultConfig, applyEnvOverrides, resolveMode } from './core/config.js';
export {
  StagegateError,
  ParseDegraded,
  ModelLoadError,
  ConfigError,
  InternalInvariantViolation,
  ReasoningServiceError,
} from './core/errors.js';
export { createLogger, silentLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';
export { normalize, wholeFileSnippet, headSnippet } from './core/normalizer.js';
export { detectLanguage } from './core/language.js';
export { loadRuleIndex, loadRuleIndexWithPacks, readRulePack, matchRule } from './core/rule-index.js';
export type { RuleIndex, DetectionRule, RuleDefinition } from './core/rule-index.js';
export { extractFeatures, FEATURE_NAMES } from './core/features.js';
export { loadModels, loadClassifierModel, loadTemporalModel, parseClassifierArtifact, parseTemporalArtifact } from './core/models.js';
export type { ClassifierModel, TemporalModel, LoadedModels } from './core/models.js';
export { runStage1 } from './core/stage1.js';
export { runStage2 } from './core/stage2.js';
export { runStage3, forecast, extractRunFeatures, timelineBucket } from './core/stage3.js';
export { explainStage1Findings, explainFutureRisk, fallbackExplanation, MAX_EXPLAINED_FINDINGS } from './core/explain.js';
export type { ExplanationResult } from './core/explain.js';
export { loadHistory, appendPoint, saveHistory } from './core/history.js';
export { createReasoningClient, getExecutor, detectProvider, isProviderAvailable, ExecutorReasoningClient } from './providers/index.js';
export type {
  ReasoningClient,
  ReasoningRequest,
  ReasoningResponse,
  ReasoningFinding,
  PromptTemplate,
  PromptExecutor,
  PromptOptions,
  PromptResult,
} from './providers/index.js';
export { outputSarif } from './output/sarif.js';
export { outputMarkdown } from './output/markdown.js';
export { outputHumanReadableMarkdown } from './output/human-readable.js';
