/**
 * Trajectory history for the stage 3 forecast: one feature point per past
 * run, oldest first, kept in a JSON file the caller owns.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import type { FeaturePoint, TrajectoryPoint } from '../types.js';
import { ConfigError } from './errors.js';
import { HistoryFile, safeParseJson } from './validation.js';

/** Keep the file from growing without bound; the model only looks at a short window. */
export const MAX_HISTORY_POINTS = 50;

/**
 * Read a history file. A missing file is an empty history; a malformed one
 * is a configuration error.
 */
export function loadHistory(path: string): TrajectoryPoint[] {
  if (!existsSync(path)) {
    return [];
  }
  const parsed = safeParseJson(readFileSync(path, 'utf-8'), HistoryFile);
  if (!parsed.success) {
    throw new ConfigError(`Invalid history file ${path}: ${parsed.error}`);
  }
  return parsed.data;
}

export function appendPoint(
  history: readonly TrajectoryPoint[],
  features: FeaturePoint,
  timestamp: string
): TrajectoryPoint[] {
  return [...history, { timestamp, features }].slice(-MAX_HISTORY_POINTS);
}

export function saveHistory(path: string, points: readonly TrajectoryPoint[]): void {
  writeFileSync(path, JSON.stringify({ points }, null, 2) + '\n');
}
