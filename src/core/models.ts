/**
 * Trained model artifacts: the stage 1 classifier and the stage 3 temporal
 * model. Both are JSON files with a format version and a model version;
 * they are validated, frozen and shared read-only across runs.
 */

import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { Category, Severity } from '../types.js';
import type { FeaturePoint, StagegateConfig } from '../types.js';
import { FEATURE_NAMES, isFeatureName } from './features.js';
import type { FeatureName, FeatureVector } from './features.js';
import { ModelLoadError, errorMessage } from './errors.js';
import { formatZodError } from './validation.js';

export const SUPPORTED_FORMAT_VERSION = 1;

export const DEFAULT_CLASSIFIER_PATH = fileURLToPath(new URL('../../models/classifier.json', import.meta.url));
export const DEFAULT_TEMPORAL_PATH = fileURLToPath(new URL('../../models/temporal.json', import.meta.url));

// ─────────────────────────────────────────────────────────────
// Artifact schemas
// ─────────────────────────────────────────────────────────────

const ArtifactHeader = z.object({
  formatVersion: z.number().int(),
  version: z.string().min(1),
});

const CategoryModel = z.object({
  bias: z.number(),
  severity: Severity,
  cweId: z.string().optional(),
  weights: z.record(z.string(), z.number()),
});

export const ClassifierArtifact = ArtifactHeader.extend({
  kind: z.literal('classifier'),
  featureCap: z.number().positive(),
  categories: z.record(Category, CategoryModel),
});
export type ClassifierArtifact = z.infer<typeof ClassifierArtifact>;

export const TemporalArtifact = ArtifactHeader.extend({
  kind: z.literal('temporal'),
  featureWeights: z.record(z.string(), z.number()),
  window: z.number().int().min(1),
  coefficients: z.array(z.number()),
  intercept: z.number(),
  normalization: z.object({ min: z.number(), max: z.number() })
    .refine((range) => range.max > range.min, 'normalization.max must exceed normalization.min'),
  stableBand: z.number().min(0),
  singlePointConfidence: z.number().min(0).max(1),
  defaultHorizon: z.number().int().min(1),
}).refine((artifact) => artifact.coefficients.length === artifact.window, {
  message: 'coefficients must have one entry per window step',
  path: ['coefficients'],
});
export type TemporalArtifact = z.infer<typeof TemporalArtifact>;

// ─────────────────────────────────────────────────────────────
// Classifier
// ─────────────────────────────────────────────────────────────

export interface CategoryScore {
  category: Category;
  probability: number;
  severity: Severity;
  cweId?: string;
  /** Positive weighted feature contributions, strongest first. */
  drivers: Array<{ feature: FeatureName; contribution: number }>;
}

export interface ClassifierModel {
  readonly version: string;
  readonly featureCap: number;
  score(features: FeatureVector): CategoryScore[];
}

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function createClassifierModel(artifact: ClassifierArtifact): ClassifierModel {
  const categories = Object.entries(artifact.categories).flatMap(([name, model]) => {
    const category = Category.safeParse(name);
    return category.success && model ? [{ category: category.data, model }] : [];
  });
  categories.sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
  deepFreeze(artifact);

  const score = (features: FeatureVector): CategoryScore[] =>
    categories.map(({ category, model }) => {
      let z = model.bias;
      const drivers: CategoryScore['drivers'] = [];
      for (const feature of FEATURE_NAMES) {
        const weight = model.weights[feature];
        if (weight === undefined) continue;
        const contribution = weight * Math.min(features[feature], artifact.featureCap);
        z += contribution;
        if (contribution > 0) drivers.push({ feature, contribution });
      }
      drivers.sort((a, b) => b.contribution - a.contribution);
      const result: CategoryScore = { category, probability: sigmoid(z), severity: model.severity, drivers };
      if (model.cweId !== undefined) result.cweId = model.cweId;
      return result;
    });

  return Object.freeze({ version: artifact.version, featureCap: artifact.featureCap, score });
}

export function parseClassifierArtifact(raw: unknown, source = 'classifier artifact'): ClassifierModel {
  const artifact = parseArtifact(ClassifierArtifact, raw, source);
  for (const [category, model] of Object.entries(artifact.categories)) {
    const unknown = Object.keys(model?.weights ?? {}).filter((name) => !isFeatureName(name));
    if (unknown.length > 0) {
      throw new ModelLoadError(source, `category ${category} weights unknown features: ${unknown.join(', ')}`);
    }
  }
  return createClassifierModel(artifact);
}

// ─────────────────────────────────────────────────────────────
// Temporal model
// ─────────────────────────────────────────────────────────────

export interface TemporalModel {
  readonly version: string;
  readonly window: number;
  readonly defaultHorizon: number;
  readonly stableBand: number;
  readonly singlePointConfidence: number;
  readonly featureWeights: Readonly<Record<string, number>>;
  /** Weighted sum of a point's features; missing features count as zero. */
  riskIndex(point: FeaturePoint): number;
  /** Roll the autoregressive model forward; `series` is oldest first. */
  project(series: readonly number[], horizon: number): number;
  /** Map a risk index onto [0, 1]. */
  normalize(index: number): number;
}

export function createTemporalModel(artifact: TemporalArtifact): TemporalModel {
  deepFreeze(artifact);
  const { min, max } = artifact.normalization;

  const riskIndex = (point: FeaturePoint): number =>
    Object.entries(artifact.featureWeights)
      .reduce((sum, [feature, weight]) => sum + weight * (point[feature] ?? 0), 0);

  const project = (series: readonly number[], horizon: number): number => {
    if (series.length === 0) return artifact.intercept;
    const window = series.slice(-artifact.window);
    while (window.length < artifact.window) window.unshift(window[0]);
    let next = window[window.length - 1];
    for (let step = 0; step < horizon; step++) {
      next = Math.max(
        0,
        artifact.intercept + artifact.coefficients.reduce((sum, coefficient, i) => sum + coefficient * window[i], 0)
      );
      window.push(next);
      window.shift();
    }
    return next;
  };

  const normalize = (index: number): number => Math.min(1, Math.max(0, (index - min) / (max - min)));

  return Object.freeze({
    version: artifact.version,
    window: artifact.window,
    defaultHorizon: artifact.defaultHorizon,
    stableBand: artifact.stableBand,
    singlePointConfidence: artifact.singlePointConfidence,
    featureWeights: artifact.featureWeights,
    riskIndex,
    project,
    normalize,
  });
}

export function parseTemporalArtifact(raw: unknown, source = 'temporal artifact'): TemporalModel {
  return createTemporalModel(parseArtifact(TemporalArtifact, raw, source));
}

// ─────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────

export interface LoadedModels {
  classifier: ClassifierModel;
  temporal: TemporalModel;
}

export function loadClassifierModel(path: string = DEFAULT_CLASSIFIER_PATH): ClassifierModel {
  return parseClassifierArtifact(readArtifact(path), path);
}

export function loadTemporalModel(path: string = DEFAULT_TEMPORAL_PATH): TemporalModel {
  return parseTemporalArtifact(readArtifact(path), path);
}

/**
 * Load both artifacts named in config, falling back to the bundled ones.
 * Relative config paths resolve against `cwd`.
 */
export function loadModels(config: StagegateConfig, cwd: string = process.cwd()): LoadedModels {
  const at = (path: string | undefined, fallback: string) =>
    path === undefined ? fallback : isAbsolute(path) ? path : resolve(cwd, path);
  return {
    classifier: loadClassifierModel(at(config.models.classifier, DEFAULT_CLASSIFIER_PATH)),
    temporal: loadTemporalModel(at(config.models.temporal, DEFAULT_TEMPORAL_PATH)),
  };
}

function readArtifact(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ModelLoadError(path, errorMessage(error));
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ModelLoadError(path, `invalid JSON: ${errorMessage(error)}`);
  }
}

function parseArtifact<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, source: string): T {
  const header = ArtifactHeader.safeParse(raw);
  if (header.success && header.data.formatVersion !== SUPPORTED_FORMAT_VERSION) {
    throw new ModelLoadError(
      source,
      `format version ${header.data.formatVersion} is not supported (expected ${SUPPORTED_FORMAT_VERSION})`
    );
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ModelLoadError(source, formatZodError(result.error));
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
