/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSX scene model, as read from the editor document
 */

import type { FacetedBrush, Plane, Polygon, Vec3 } from '@csxdif/geometry';

/** Authored texture projection before normalisation */
export interface CsxTexGen {
  planeX: Plane;
  planeY: Plane;
  /** Rotation in degrees about planeX × planeY */
  rot: number;
  scale: [number, number];
}

export interface CsxFace {
  id: number;
  material: string;
  texGen: CsxTexGen;
  texDiv: [number, number];
  /** Indices into the brush's vertex list, in authored order */
  indices: number[];
}

export interface CsxBrush {
  id: number;
  /** Owning entity id, 0 for world geometry */
  owner: number;
  type: number;
  /** 4x4 matrix, row-major */
  transform: number[];
  vertices: Vec3[];
  faces: CsxFace[];
}

export interface CsxEntity {
  id: number;
  classname: string;
  gametype: string;
  origin?: Vec3;
  /** Property bag in document order */
  properties: Map<string, string>;
  /** Position in the job-wide entity stream */
  order: number;
}

export interface CsxInteriorMap {
  brushScale: number;
  lightScale: number;
  ambientColor: Vec3;
  ambientColorEmerg: Vec3;
  entities: CsxEntity[];
  brushes: CsxBrush[];
}

export interface CsxScene {
  version: number;
  creator: string;
  /** One interior map per detail level, highest detail first */
  detailLevels: CsxInteriorMap[];
}

/** Face after transform and plane fitting */
export interface IngestedFace extends Polygon {
  /** Face id as authored in the document */
  sourceId: number;
}

/** Brush ready for pooling */
export interface IngestedBrush extends FacetedBrush {
  owner: number;
  type: number;
  /** World-space vertices */
  vertices: Vec3[];
  faces: IngestedFace[];
}
