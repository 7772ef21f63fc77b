/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  CapacityExceededError,
  ConversionCancelledError,
  ConversionError,
  DegenerateGeometryError,
  UnboundPathNodeError,
  UnsupportedVersionCombinationError,
  throwIfCancelled,
} from './errors.js';

describe('ConversionError', () => {
  it('should classify recoverable codes', () => {
    expect(new DegenerateGeometryError('collinear face', { brushId: 3 }).recoverable).toBe(true);
    expect(new UnboundPathNodeError(7).recoverable).toBe(true);
    expect(new CapacityExceededError('too many points').recoverable).toBe(false);
  });

  it('should carry locating context', () => {
    const error = new UnboundPathNodeError(7);
    expect(error).toBeInstanceOf(ConversionError);
    expect(error.code).toBe('UnboundPathNode');
    expect(error.context.entityId).toBe(7);
    expect(error.message).toBe('path_node #7 has no preceding Door_Elevator');
  });

  it('should list supported versions for an unsupported combination', () => {
    const error = new UnsupportedVersionCombinationError('mbg', 3, [0]);
    expect(error.name).toBe('UnsupportedVersionCombinationError');
    expect(error.message).toBe('Engine "mbg" has no DIF layout for interior version 3 (supported: 0)');
    expect(error.context).toEqual({ engine: 'mbg', version: 3 });
  });
});

describe('throwIfCancelled', () => {
  it('should do nothing without a signal or before abort', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(undefined, 'parsing')).not.toThrow();
    expect(() => throwIfCancelled(controller.signal, 'parsing')).not.toThrow();
  });

  it('should throw once the signal fires', () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal, 'BSP')).toThrow(ConversionCancelledError);
  });
});
