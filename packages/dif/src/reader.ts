/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DifReader - reads files produced by DifWriter back into records
 */

import { MalformedInputError } from '@csxdif/data';
import { resolveLayout, type DifFile, type DifWriteOptions } from './types.js';
import { BufferReader } from './utils/buffer-utils.js';
import { readHeader, readVehicleCollision } from './sections/header.js';
import { readInterior } from './sections/interior.js';
import { readGameEntity, readPathFollower, readTrigger } from './sections/entities.js';

export class DifReader {
  /**
   * Read a DIF file written with the same options
   */
  read(bytes: Uint8Array, options: DifWriteOptions): DifFile {
    const { engine, version, sizeReduction } = options;
    const layout = resolveLayout(engine, version);
    const reader = new BufferReader(bytes);

    const resolve = (found: number) => {
      if (found !== version) {
        throw new MalformedInputError(`Interior version ${found} does not match the expected version ${version}`);
      }
      return layout;
    };

    readHeader(reader);
    const interiors = reader.readArray(() => readInterior(reader, resolve, sizeReduction));
    const subObjects = reader.readArray(() => readInterior(reader, resolve, sizeReduction));
    const triggers = reader.readArray(() => readTrigger(reader));
    const pathFollowers = reader.readArray(() => readPathFollower(reader));
    if (reader.readUint32() !== 0 || reader.readUint32() !== 0) {
      throw new MalformedInputError('Force fields and AI special nodes are not supported');
    }
    if (layout.vehicleCollision) {
      readVehicleCollision(reader);
    }
    const gameEntities = reader.readUint32() !== 0 ? reader.readArray(() => readGameEntity(reader)) : [];
    reader.readUint32();

    if (reader.remaining !== 0) {
      throw new MalformedInputError(`${reader.remaining} trailing bytes after DIF data`);
    }
    return { interiors, subObjects, triggers, pathFollowers, gameEntities };
  }
}
