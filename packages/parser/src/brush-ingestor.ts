/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Brush Ingestor - turns CSX brushes into world-space polygons with fitted planes
 *
 * Faces are exported as authored: no CSG, no repair. A face that cannot yield
 * a plane is dropped and reported; the rest of its brush is kept.
 */

import { DegenerateGeometryError, createLogger, type DroppedFace } from '@csxdif/data';
import { fitPlane } from '@csxdif/geometry';
import type { CsxBrush, IngestedBrush, IngestedFace } from './types.js';
import { brushMatrix, hasZeroTexFactor, normalizeTexGen, transformPoint } from './csx-transform.js';

const log = createLogger('Ingestor');

export interface IngestOptions {
  /** InteriorMap brushScale, folded into texture projections */
  brushScale?: number;
  /** First job-wide face id to assign */
  firstFaceId?: number;
}

export interface IngestResult {
  brushes: IngestedBrush[];
  droppedFaces: DroppedFace[];
  /** Next free face id, for ingesting further detail levels */
  nextFaceId: number;
}

export function ingestBrushes(brushes: readonly CsxBrush[], options: IngestOptions = {}): IngestResult {
  const { brushScale = 32, firstFaceId = 0 } = options;

  const ingested: IngestedBrush[] = [];
  const droppedFaces: DroppedFace[] = [];
  let faceId = firstFaceId;

  for (const brush of brushes) {
    const matrix = brushMatrix(brush.transform);
    const vertices = brush.vertices.map((v) => transformPoint(v, matrix));
    const faces: IngestedFace[] = [];

    brush.faces.forEach((face, faceIndex) => {
      const id = faceId++;
      const points = face.indices.map((i) => vertices[i]);
      if (hasZeroTexFactor(face.texGen, face.texDiv)) {
        log.warn(`Face ${faceIndex} has a zero texture scale or divisor; using 1`, {
          operation: 'ingestBrushes',
          brushId: brush.id,
        });
      }
      try {
        faces.push({
          points,
          plane: fitPlane(points),
          brushId: brush.id,
          faceId: id,
          sourceId: face.id,
          material: face.material,
          texGen: normalizeTexGen(face.texGen, face.texDiv, brushScale, matrix),
        });
      } catch (error) {
        if (!(error instanceof DegenerateGeometryError)) throw error;
        droppedFaces.push({ brushId: brush.id, faceIndex, reason: error.message });
        log.warn(`Dropped face ${faceIndex}: ${error.message}`, { operation: 'ingestBrushes', brushId: brush.id });
      }
    });

    ingested.push({
      id: brush.id,
      owner: brush.owner,
      type: brush.type,
      vertices,
      faces,
    });
  }

  log.debug('Ingested brushes', { brushes: ingested.length, dropped: droppedFaces.length });

  return { brushes: ingested, droppedFaces, nextFaceId: faceId };
}
