/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types shared by every stage of the CSX to DIF pipeline
 */

/** Target engine family */
export type EngineVersion = 'mbg' | 'tge' | 'tgea' | 't3d';

export const ENGINE_VERSIONS: readonly EngineVersion[] = ['mbg', 'tge', 'tgea', 't3d'];

export function isEngineVersion(value: string): value is EngineVersion {
  return ENGINE_VERSIONS.some((engine) => engine === value);
}

/** BSP construction strategy */
export type BspStrategy = 'exhaustive' | 'sampling' | 'none';

export const BSP_STRATEGIES: readonly BspStrategy[] = ['exhaustive', 'sampling', 'none'];

export function isBspStrategy(value: string): value is BspStrategy {
  return BSP_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Post-hoc BSP quality metrics for one interior.
 * Returned alongside the output buffers, never written into them.
 */
export interface ConversionReport {
  /** e.g. "level.dif interior 0" */
  label: string;
  /** Surfaces reachable by a test ray */
  hit: number;
  total: number;
  /** Reachable surface area as a percentage of the total area */
  hitAreaPercentage: number;
  /** Mean (front height - back height) over internal nodes */
  balanceFactor: number;
}

/** A face dropped because no plane could be fitted through it */
export interface DroppedFace {
  brushId: number;
  /** Position of the face within its brush */
  faceIndex: number;
  reason: string;
}

/** Recoverable anomalies collected over one conversion */
export interface ConversionDiagnostics {
  droppedFaces: DroppedFace[];
  /** Entity ids of path nodes with no preceding elevator */
  unboundPathNodes: number[];
  /** Entity ids of triggers with no preceding elevator */
  unboundTriggers: number[];
}

export function emptyDiagnostics(): ConversionDiagnostics {
  return { droppedFaces: [], unboundPathNodes: [], unboundTriggers: [] };
}
