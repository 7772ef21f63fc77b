/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * File header and the fixed empty blocks around the records
 */

import { MalformedInputError } from '@csxdif/data';
import { DIF_FILE_VERSION } from '../types.js';
import { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

/**
 * Vehicle collision arrays, all written empty: convex hulls, emit string
 * characters, hull indices, hull planes, hull emit strings, hull surfaces,
 * poly-list planes, poly-list points, poly-list strings, null surfaces,
 * points, planes, windings, winding indices
 */
const VEHICLE_COLLISION_ARRAYS = 14;

export function writeHeader(writer: BufferWriter): void {
  writer.writeUint32(DIF_FILE_VERSION);
  // No preview bitmap
  writer.writeUint8(0);
}

export function readHeader(reader: BufferReader): void {
  const version = reader.readUint32();
  if (version !== DIF_FILE_VERSION) {
    throw new MalformedInputError(`Invalid DIF file version: expected ${DIF_FILE_VERSION}, got ${version}`);
  }
  if (reader.readUint8() !== 0) {
    throw new MalformedInputError('DIF preview bitmaps are not supported');
  }
}

export function writeVehicleCollision(writer: BufferWriter): void {
  // Block version
  writer.writeUint32(0);
  for (let i = 0; i < VEHICLE_COLLISION_ARRAYS; i++) {
    writer.writeUint32(0);
  }
}

export function readVehicleCollision(reader: BufferReader): void {
  reader.readUint32();
  for (let i = 0; i < VEHICLE_COLLISION_ARRAYS; i++) {
    if (reader.readUint32() !== 0) {
      throw new MalformedInputError('Vehicle collision geometry is not supported');
    }
  }
}
