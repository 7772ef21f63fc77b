/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/converter - CSX to DIF conversion pipeline
 */

export { convertCsxToDif } from './convert.js';
export type { ConversionResult } from './convert.js';
export { resolveConversionOptions, DEFAULT_CONVERSION_OPTIONS } from './options.js';
export type { ConversionOptions, ResolvedConversionOptions } from './options.js';
export { splitByCapacity, poolSingleUnit } from './capacity-splitter.js';
export { WorkerPool, resolveWorkerEntry } from './worker-pool.js';
export type { WorkerEntry, TaskProgressListener } from './worker-pool.js';
export { serveTasks } from './worker-host.js';
export type { TaskHandler } from './worker-host.js';
export { serializeError, reviveError } from './worker-protocol.js';
export type { SerializedError, TaskRequest, TaskResponse } from './worker-protocol.js';
export { compileInterior } from './interior-compiler.js';
export type { CompileJob, CompileSettings, CompileTask, CompiledInterior } from './interior-compiler.js';
export {
  boxPolyhedron,
  buildTrigger,
  buildWaypoint,
  buildPathFollower,
  buildGameEntity,
  DEFAULT_TRIGGER_DATABLOCK,
  DEFAULT_PATH_DATABLOCK,
  PLACEHOLDER_NAME,
} from './entity-records.js';
