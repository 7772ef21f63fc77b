/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Messages exchanged between the worker pool and its threads
 */

import {
  CapacityExceededError,
  ConversionError,
  DegenerateGeometryError,
  MalformedInputError,
  isConversionErrorCode,
  type ErrorContext,
  type LogLevel,
} from '@csxdif/data';

export interface TaskRequest<P> {
  task: number;
  payload: P;
}

/** Errors lose their class crossing threads; this is what survives */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  context?: ErrorContext;
}

export type TaskResponse<R> =
  | { kind: 'progress'; task: number; current: number; total: number }
  | { kind: 'log'; level: LogLevel; line: string; extra: unknown[] }
  | { kind: 'done'; task: number; result: R }
  | { kind: 'failed'; task: number; error: SerializedError };

export function serializeError(error: unknown): SerializedError {
  if (error instanceof ConversionError) {
    return { name: error.name, message: error.message, stack: error.stack, code: error.code, context: { ...error.context } };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Rebuild a thrown error on the receiving side. Conversion errors keep their
 * code and context; the subclasses callers test for are restored.
 */
export function reviveError(serialized: SerializedError): Error {
  const { name, message, code, context = {} } = serialized;
  let error: Error;
  switch (code) {
    case 'CapacityExceeded':
      error = new CapacityExceededError(message, context);
      break;
    case 'DegenerateGeometry':
      error = new DegenerateGeometryError(message, context);
      break;
    case 'MalformedInput':
      error = new MalformedInputError(message, undefined, context);
      break;
    default:
      error = isConversionErrorCode(code) ? new ConversionError(message, code, context) : new Error(message);
  }
  error.name = name;
  if (serialized.stack) {
    error.stack = serialized.stack;
  }
  return error;
}
