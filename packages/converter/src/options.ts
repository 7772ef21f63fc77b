/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion options and their validation
 */

import {
  isBspStrategy,
  isEngineVersion,
  type BspStrategy,
  type EngineVersion,
  type ProgressListener,
} from '@csxdif/data';
import { resolveLayout, type DifLayout } from '@csxdif/dif';
import type { PoolCounts } from '@csxdif/geometry';

export interface ConversionOptions {
  /** Target engine family (default: 'mbg') */
  engine?: EngineVersion;
  /** Interior format version, 0-13 (default: 0) */
  difVersion?: number;
  /** Size-reduced output for Marble Blast (default: true) */
  mbOptimize?: boolean;
  /** BSP construction strategy (default: 'exhaustive') */
  bsp?: BspStrategy;
  /** Per-axis distance under which two points are merged (default: 1e-6) */
  pointEpsilon?: number;
  /** Per-component distance under which two planes are merged (default: 1e-5) */
  planeEpsilon?: number;
  /** Units compiled at once (default: 4) */
  concurrency?: number;
  /** Pool limits tighter than the layout's own */
  capacityOverride?: Partial<PoolCounts>;
  onProgress?: ProgressListener;
  /** Checked between phases */
  signal?: AbortSignal;
}

export interface ResolvedConversionOptions {
  engine: EngineVersion;
  difVersion: number;
  mbOptimize: boolean;
  bsp: BspStrategy;
  pointEpsilon: number;
  planeEpsilon: number;
  concurrency: number;
  layout: DifLayout;
  /** Limits each unit is filled up to */
  limits: PoolCounts;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

export const DEFAULT_CONVERSION_OPTIONS = {
  engine: 'mbg',
  difVersion: 0,
  mbOptimize: true,
  bsp: 'exhaustive',
  pointEpsilon: 1e-6,
  planeEpsilon: 1e-5,
  concurrency: 4,
} as const;

const MAX_DIF_VERSION = 13;

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function requireInteger(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
}

/**
 * Fill in defaults and reject invalid values before any work starts
 */
export function resolveConversionOptions(options: ConversionOptions = {}): ResolvedConversionOptions {
  const {
    engine = DEFAULT_CONVERSION_OPTIONS.engine,
    difVersion = DEFAULT_CONVERSION_OPTIONS.difVersion,
    mbOptimize = DEFAULT_CONVERSION_OPTIONS.mbOptimize,
    bsp = DEFAULT_CONVERSION_OPTIONS.bsp,
    pointEpsilon = DEFAULT_CONVERSION_OPTIONS.pointEpsilon,
    planeEpsilon = DEFAULT_CONVERSION_OPTIONS.planeEpsilon,
    concurrency = DEFAULT_CONVERSION_OPTIONS.concurrency,
    capacityOverride = {},
    onProgress,
    signal,
  } = options;

  if (!isEngineVersion(engine)) {
    throw new RangeError(`Unknown engine "${engine}"`);
  }
  if (!isBspStrategy(bsp)) {
    throw new RangeError(`Unknown BSP strategy "${bsp}"`);
  }
  requireInteger('difVersion', difVersion, 0, MAX_DIF_VERSION);
  requirePositive('pointEpsilon', pointEpsilon);
  requirePositive('planeEpsilon', planeEpsilon);
  requireInteger('concurrency', concurrency, 1, Number.MAX_SAFE_INTEGER);

  const layout = resolveLayout(engine, difVersion);
  const limits = { ...layout.limits };
  for (const key of ['points', 'planes', 'surfaces'] as const) {
    const override = capacityOverride[key];
    if (override !== undefined) {
      limits[key] = Math.min(limits[key], requireInteger(`capacityOverride.${key}`, override, 1, Number.MAX_SAFE_INTEGER));
    }
  }

  return {
    engine,
    difVersion,
    mbOptimize,
    bsp,
    pointEpsilon,
    planeEpsilon,
    concurrency,
    layout,
    limits,
    onProgress,
    signal,
  };
}
