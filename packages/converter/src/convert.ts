/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSX to DIF conversion entry point
 *
 * parse -> ingest -> bind -> split -> compile units in parallel -> assemble -> write.
 * Everything before compilation is single-threaded and fixes the unit order,
 * so the output does not depend on the pool size.
 */

import {
  createLogger,
  emptyDiagnostics,
  throwIfCancelled,
  ProgressChannel,
  type ConversionDiagnostics,
  type ConversionReport,
} from '@csxdif/data';
import { DifWriter, type DifFile, type DifTrigger } from '@csxdif/dif';
import { computeBounds, type PooledGeometry } from '@csxdif/geometry';
import {
  bindEntities,
  ingestBrushes,
  parseCsx,
  type BindingResult,
  type CsxEntity,
  type CsxInteriorMap,
  type CsxScene,
  type IngestedBrush,
} from '@csxdif/parser';
import { poolSingleUnit, splitByCapacity } from './capacity-splitter.js';
import { buildGameEntity, buildPathFollower, buildTrigger } from './entity-records.js';
import type { CompiledInterior, CompileJob, CompileTask } from './interior-compiler.js';
import { resolveConversionOptions, type ConversionOptions, type ResolvedConversionOptions } from './options.js';
import { WorkerPool, resolveWorkerEntry } from './worker-pool.js';

const log = createLogger('Converter');

export interface ConversionResult {
  /** Primary file first, then one file per overflow unit */
  buffers: Uint8Array[];
  /** One per compiled interior, in file order; empty when no BSP was built */
  reports: ConversionReport[];
  diagnostics: ConversionDiagnostics;
}

interface IngestedLevel {
  map: CsxInteriorMap;
  brushes: IngestedBrush[];
}

/** Where a compiled unit ends up */
type UnitSlot = { kind: 'interior'; file: number } | { kind: 'subObject'; elevatorId: number };

interface PlannedUnit {
  job: CompileJob;
  slot: UnitSlot;
}

interface UnitPlan {
  units: PlannedUnit[];
  /** Primary file plus one per overflow unit */
  fileCount: number;
}

function toScene(input: string | Uint8Array | CsxScene): CsxScene {
  return typeof input === 'string' || input instanceof Uint8Array ? parseCsx(input) : input;
}

function ingestLevels(scene: CsxScene, channel: ProgressChannel, diagnostics: ConversionDiagnostics): IngestedLevel[] {
  let nextFaceId = 0;
  return scene.detailLevels.map((map, i) => {
    channel.progress(i + 1, scene.detailLevels.length, 'Exporting detail level', 'Exported detail levels');
    const result = ingestBrushes(map.brushes, { brushScale: map.brushScale, firstFaceId: nextFaceId });
    nextFaceId = result.nextFaceId;
    diagnostics.droppedFaces.push(...result.droppedFaces);
    return { map, brushes: result.brushes };
  });
}

function compileJob(map: CsxInteriorMap, geometry: PooledGeometry, detailLevel: number, label: string): CompileJob {
  return {
    geometry,
    detailLevel,
    ambientColor: map.ambientColor,
    alarmAmbientColor: map.ambientColorEmerg,
    label,
  };
}

/**
 * Pool every unit in a fixed order: the first detail level's capacity units,
 * the remaining detail levels, then one sub-object per elevator.
 */
function planUnits(
  levels: readonly IngestedLevel[],
  elevators: readonly CsxEntity[],
  isWorld: (brush: IngestedBrush) => boolean,
  options: ResolvedConversionOptions
): UnitPlan {
  const { limits, pointEpsilon, planeEpsilon } = options;
  const dedup = { pointEpsilon, planeEpsilon };
  const units: PlannedUnit[] = [];
  const [first, ...rest] = levels;
  if (!first) {
    return { units, fileCount: 1 };
  }

  const split = splitByCapacity(first.brushes.filter(isWorld), limits, dedup);
  split.forEach((geometry, file) => {
    units.push({ job: compileJob(first.map, geometry, 0, `file ${file} interior 0`), slot: { kind: 'interior', file } });
  });

  rest.forEach((level, i) => {
    const detailLevel = i + 1;
    const label = `detail level ${detailLevel}`;
    const geometry = poolSingleUnit(level.brushes.filter(isWorld), limits, dedup, label);
    units.push({
      job: compileJob(level.map, geometry, detailLevel, `file 0 interior ${detailLevel}`),
      slot: { kind: 'interior', file: 0 },
    });
  });

  const owned = levels.flatMap((level) => level.brushes.map((brush) => ({ brush, map: level.map })));
  for (const elevator of elevators) {
    const brushes = owned.filter(({ brush }) => brush.owner === elevator.id);
    if (brushes.length === 0) {
      log.warn('Elevator owns no brushes; no sub-object written', { operation: 'planUnits', entityId: elevator.id });
      continue;
    }
    const label = `sub-object for elevator #${elevator.id}`;
    const geometry = poolSingleUnit(
      brushes.map(({ brush }) => brush),
      limits,
      dedup,
      label
    );
    units.push({ job: compileJob(brushes[0].map, geometry, 0, label), slot: { kind: 'subObject', elevatorId: elevator.id } });
  }

  return { units, fileCount: split.length };
}

/**
 * Triggers and path followers. Followers reference sub-objects and triggers by
 * index; elevators without a sub-object or path nodes write neither.
 */
function buildMovingRecords(
  binding: BindingResult,
  subObjects: ReadonlyMap<number, number>,
  brushes: readonly IngestedBrush[]
): Pick<DifFile, 'triggers' | 'pathFollowers'> {
  const triggers: DifTrigger[] = [];

  const addTrigger = (entity: CsxEntity): number[] => {
    const vertices = brushes.filter((brush) => brush.owner === entity.id).flatMap((brush) => brush.vertices);
    if (vertices.length === 0) {
      log.warn('Trigger owns no brushes; skipped', { operation: 'buildMovingRecords', entityId: entity.id });
      return [];
    }
    triggers.push(buildTrigger(entity, computeBounds(vertices)));
    return [triggers.length - 1];
  };

  const pathFollowers = binding.elevators.flatMap((elevatorBinding) => {
    const interiorResIndex = subObjects.get(elevatorBinding.elevator.id);
    if (interiorResIndex === undefined || elevatorBinding.pathNodes.length === 0) {
      return [];
    }
    const triggerIds = elevatorBinding.triggers.flatMap(addTrigger);
    return [buildPathFollower(elevatorBinding, interiorResIndex, triggerIds)];
  });

  return { triggers, pathFollowers };
}

function emptyFile(): DifFile {
  return { interiors: [], subObjects: [], triggers: [], pathFollowers: [], gameEntities: [] };
}

/**
 * Convert a CSX document (text, bytes or an already parsed scene) into DIF files
 */
export async function convertCsxToDif(
  input: string | Uint8Array | CsxScene,
  options: ConversionOptions = {}
): Promise<ConversionResult> {
  const resolved = resolveConversionOptions(options);
  const { signal } = resolved;
  const channel = new ProgressChannel(resolved.onProgress);
  const start = performance.now();

  try {
    throwIfCancelled(signal, 'parsing');
    const scene = toScene(input);
    const diagnostics = emptyDiagnostics();

    throwIfCancelled(signal, 'ingesting brushes');
    const levels = ingestLevels(scene, channel, diagnostics);
    const allBrushes = levels.flatMap((level) => level.brushes);

    throwIfCancelled(signal, 'binding entities');
    const binding = bindEntities(scene.detailLevels.flatMap((map) => map.entities));
    diagnostics.unboundPathNodes.push(...binding.unboundPathNodes.map((node) => node.id));
    diagnostics.unboundTriggers.push(...binding.unboundTriggers.map((trigger) => trigger.id));

    throwIfCancelled(signal, 'splitting units');
    const elevators = binding.elevators.map((b) => b.elevator);
    const ownerIds = new Set([
      ...elevators.map((e) => e.id),
      ...binding.unboundTriggers.map((t) => t.id),
      ...binding.elevators.flatMap((b) => b.triggers.map((t) => t.id)),
    ]);
    const plan = planUnits(levels, elevators, (brush) => !ownerIds.has(brush.owner), resolved);

    throwIfCancelled(signal, 'building BSP');
    const settings = { bsp: resolved.bsp, pointEpsilon: resolved.pointEpsilon, sizeReduction: resolved.mbOptimize };
    const pool = new WorkerPool<CompileTask, CompiledInterior>(
      resolveWorkerEntry('compile-worker'),
      resolved.concurrency,
      (unit, current, total) => channel.progress(current, total, 'Building BSP', 'Built BSP', unit)
    );
    const compiled = await pool.run(plan.units.map(({ job }, unit) => ({ job, settings, unit })));

    throwIfCancelled(signal, 'writing DIF');
    const files = Array.from({ length: plan.fileCount }, emptyFile);
    const [primary] = files;
    const subObjects = new Map<number, number>();
    plan.units.forEach(({ slot }, i) => {
      const { interior } = compiled[i];
      if (slot.kind === 'interior') {
        files[slot.file].interiors.push(interior);
      } else {
        subObjects.set(slot.elevatorId, primary.subObjects.length);
        primary.subObjects.push(interior);
      }
    });
    Object.assign(primary, buildMovingRecords(binding, subObjects, allBrushes));
    primary.gameEntities = binding.gameEntities.map(buildGameEntity);

    const writer = new DifWriter();
    const writeOptions = { engine: resolved.engine, version: resolved.difVersion, sizeReduction: resolved.mbOptimize };
    const buffers = files.map((file, i) => {
      channel.progress(i + 1, files.length, 'Writing DIF', 'Wrote DIF files');
      return writer.write(file, writeOptions);
    });

    const reports = compiled.flatMap(({ report }) => (report ? [report] : []));
    log.info(`Converted in ${(performance.now() - start).toFixed(1)}ms`, {
      operation: 'convertCsxToDif',
      data: { files: buffers.length, units: plan.units.length, droppedFaces: diagnostics.droppedFaces.length },
    });

    return { buffers, reports, diagnostics };
  } finally {
    await channel.close();
  }
}
