/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/parser - CSX scene reading, brush ingestion and entity binding
 */

export { parseCsx } from './csx-document.js';
export { serializeCsx } from './csx-writer.js';
export { brushMatrix, transformPoint, transformTexPlane, normalizeTexGen } from './csx-transform.js';
export { ingestBrushes } from './brush-ingestor.js';
export type { IngestOptions, IngestResult } from './brush-ingestor.js';
export {
  bindEntities,
  isLight,
  ELEVATOR_CLASS,
  PATH_NODE_CLASS,
  TRIGGER_CLASS,
  WORLDSPAWN_CLASS,
} from './entity-binder.js';
export type { BindingResult, ElevatorBinding } from './entity-binder.js';
export type {
  CsxScene,
  CsxInteriorMap,
  CsxEntity,
  CsxBrush,
  CsxFace,
  CsxTexGen,
  IngestedBrush,
  IngestedFace,
} from './types.js';
