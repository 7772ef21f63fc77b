/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion error taxonomy
 *
 * Fatal conditions abort the whole job; DegenerateGeometry and UnboundPathNode
 * are recovered locally and only surface through ConversionDiagnostics.
 */

export const CONVERSION_ERROR_CODES = [
  'DegenerateGeometry',
  'UnboundPathNode',
  'CapacityExceeded',
  'UnsupportedVersionCombination',
  'MalformedInput',
  'Cancelled',
] as const;

export type ConversionErrorCode = (typeof CONVERSION_ERROR_CODES)[number];

export function isConversionErrorCode(value: unknown): value is ConversionErrorCode {
  return CONVERSION_ERROR_CODES.some((code) => code === value);
}

/** Identity of the offending input, whatever is known at the failure site */
export interface ErrorContext {
  brushId?: number;
  faceId?: number;
  entityId?: number;
  unit?: number;
  engine?: string;
  version?: number;
  [key: string]: string | number | undefined;
}

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ConversionErrorCode,
    public readonly context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'ConversionError';
  }

  /** Whether the job may continue after this error */
  get recoverable(): boolean {
    return this.code === 'DegenerateGeometry' || this.code === 'UnboundPathNode';
  }
}

export class DegenerateGeometryError extends ConversionError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'DegenerateGeometry', context);
    this.name = 'DegenerateGeometryError';
  }
}

export class UnboundPathNodeError extends ConversionError {
  constructor(entityId: number) {
    super(`path_node #${entityId} has no preceding Door_Elevator`, 'UnboundPathNode', { entityId });
    this.name = 'UnboundPathNodeError';
  }
}

export class CapacityExceededError extends ConversionError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CapacityExceeded', context);
    this.name = 'CapacityExceededError';
  }
}

export class UnsupportedVersionCombinationError extends ConversionError {
  constructor(engine: string, version: number, supported: readonly number[]) {
    super(
      `Engine "${engine}" has no DIF layout for interior version ${version} (supported: ${supported.join(', ') || 'none'})`,
      'UnsupportedVersionCombination',
      { engine, version }
    );
    this.name = 'UnsupportedVersionCombinationError';
  }
}

export class MalformedInputError extends ConversionError {
  constructor(
    message: string,
    public readonly details?: string,
    context: ErrorContext = {}
  ) {
    super(message, 'MalformedInput', context);
    this.name = 'MalformedInputError';
  }
}

export class ConversionCancelledError extends ConversionError {
  constructor(phase: string) {
    super(`Conversion cancelled before ${phase}`, 'Cancelled', { phase });
    this.name = 'ConversionCancelledError';
  }
}

/**
 * Throw ConversionCancelledError if the signal has fired.
 * Called between phases only; phases themselves run to completion.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, nextPhase: string): void {
  if (signal?.aborted) {
    throw new ConversionCancelledError(nextPhase);
  }
}
