/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Interior compiler - BSP, raycast report and record encoding for one unit
 *
 * Runs on a pool worker thread; every input arrives by structured clone and
 * the result goes back the same way.
 */

import { createLogger, type BspStrategy, type ConversionReport } from '@csxdif/data';
import { encodeInterior, type DifInterior } from '@csxdif/dif';
import type { PooledGeometry, Vec3 } from '@csxdif/geometry';
import { buildBsp, computeBspReport } from '@csxdif/spatial';

const log = createLogger('Compiler');

export interface CompileJob {
  geometry: PooledGeometry;
  detailLevel: number;
  ambientColor: Vec3;
  alarmAmbientColor: Vec3;
  /** Names the interior in reports, e.g. "file 0 interior 1" */
  label: string;
}

export interface CompileSettings {
  bsp: BspStrategy;
  pointEpsilon: number;
  sizeReduction: boolean;
}

/** One pool request */
export interface CompileTask {
  job: CompileJob;
  settings: CompileSettings;
  /** Unit index, for logs */
  unit: number;
}

export interface CompiledInterior {
  interior: DifInterior;
  /** Absent when no BSP was built */
  report?: ConversionReport;
}

export function compileInterior(
  job: CompileJob,
  settings: CompileSettings,
  unit: number,
  onProgress?: (current: number, total: number) => void
): CompiledInterior {
  const { geometry, label } = job;
  const start = performance.now();

  const tree = buildBsp(geometry, {
    strategy: settings.bsp,
    pointEpsilon: settings.pointEpsilon,
    onProgress,
  });

  let report: ConversionReport | undefined;
  if (settings.bsp !== 'none') {
    report = { label, ...computeBspReport(tree, geometry) };
  }

  const interior = encodeInterior(
    {
      geometry,
      tree,
      detailLevel: job.detailLevel,
      ambientColor: job.ambientColor,
      alarmAmbientColor: job.alarmAmbientColor,
    },
    { sizeReduction: settings.sizeReduction }
  );

  log.info(`Compiled ${label} in ${(performance.now() - start).toFixed(1)}ms`, {
    operation: 'compileInterior',
    unit,
    data: { surfaces: geometry.surfaces.length, bspNodes: tree.nodes.length },
  });
  return { interior, report };
}
