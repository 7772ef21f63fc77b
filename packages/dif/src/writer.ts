/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DifWriter - writes .dif files for a chosen engine and interior version
 */

import { createLogger } from '@csxdif/data';
import { resolveLayout, type DifFile, type DifWriteOptions } from './types.js';
import { BufferWriter } from './utils/buffer-utils.js';
import { writeHeader, writeVehicleCollision } from './sections/header.js';
import { writeInterior } from './sections/interior.js';
import { writeGameEntity, writePathFollower, writeTrigger } from './sections/entities.js';

const log = createLogger('DifWriter');

export class DifWriter {
  /**
   * Write a complete DIF file
   * @returns the file contents
   */
  write(file: DifFile, options: DifWriteOptions): Uint8Array {
    const { engine, version, sizeReduction } = options;
    const layout = resolveLayout(engine, version);
    const writer = new BufferWriter();

    writeHeader(writer);
    writer.writeArray(file.interiors, (interior) => writeInterior(writer, interior, layout, sizeReduction));
    writer.writeArray(file.subObjects, (interior) => writeInterior(writer, interior, layout, sizeReduction));
    writer.writeArray(file.triggers, (trigger) => writeTrigger(writer, trigger));
    writer.writeArray(file.pathFollowers, (follower) => writePathFollower(writer, follower));
    // Force fields, AI special nodes
    writer.writeUint32(0);
    writer.writeUint32(0);
    if (layout.vehicleCollision) {
      writeVehicleCollision(writer);
    }
    writer.writeUint32(file.gameEntities.length > 0 ? 1 : 0);
    if (file.gameEntities.length > 0) {
      writer.writeArray(file.gameEntities, (entity) => writeGameEntity(writer, entity));
    }
    // Trailing dummy word
    writer.writeUint32(0);

    const bytes = writer.build();
    log.debug('Wrote DIF', {
      engine,
      version,
      sizeReduction,
      interiors: file.interiors.length,
      subObjects: file.subObjects.length,
      bytes: bytes.length,
    });
    return bytes;
  }
}
