/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/data - Logging, errors and progress reporting
 */

export { createLogger, setLogSink, forwardLogRecord } from './logger.js';
export type { Logger, LogLevel, LogContext, LogSink } from './logger.js';
export {
  ConversionError,
  DegenerateGeometryError,
  UnboundPathNodeError,
  CapacityExceededError,
  UnsupportedVersionCombinationError,
  MalformedInputError,
  ConversionCancelledError,
  throwIfCancelled,
  CONVERSION_ERROR_CODES,
  isConversionErrorCode,
} from './errors.js';
export type { ConversionErrorCode, ErrorContext } from './errors.js';
export { ProgressChannel, isPhaseFinished } from './progress.js';
export type { ProgressEvent, ProgressListener } from './progress.js';
export {
  ENGINE_VERSIONS,
  BSP_STRATEGIES,
  isEngineVersion,
  isBspStrategy,
  emptyDiagnostics,
} from './types.js';
export type {
  EngineVersion,
  BspStrategy,
  ConversionReport,
  DroppedFace,
  ConversionDiagnostics,
} from './types.js';
