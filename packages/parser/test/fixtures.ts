/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene builders shared by the parser tests
 */

import type { Vec3 } from '@csxdif/geometry';
import type { CsxBrush, CsxEntity, CsxFace, CsxScene } from '../src/types.js';

export const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

// Vertex i sits at corner (i & 1, i & 2, i & 4); loops wind outwards
const BOX_LOOPS = [
  [0, 4, 6, 2],
  [1, 3, 7, 5],
  [0, 1, 5, 4],
  [2, 6, 7, 3],
  [0, 2, 3, 1],
  [4, 5, 7, 6],
];

export function createFace(id: number, indices: number[], overrides: Partial<CsxFace> = {}): CsxFace {
  return {
    id,
    material: 'grid_warm',
    texGen: {
      planeX: { normal: { x: 1, y: 0, z: 0 }, distance: 0 },
      planeY: { normal: { x: 0, y: 1, z: 0 }, distance: 0 },
      rot: 0,
      scale: [1, 1],
    },
    texDiv: [32, 32],
    indices,
    ...overrides,
  };
}

export function createBox(
  id: number,
  min: Vec3,
  max: Vec3,
  overrides: Partial<CsxBrush> = {}
): CsxBrush {
  const vertices: Vec3[] = [];
  for (let i = 0; i < 8; i++) {
    vertices.push({
      x: i & 1 ? max.x : min.x,
      y: i & 2 ? max.y : min.y,
      z: i & 4 ? max.z : min.z,
    });
  }
  return {
    id,
    owner: 0,
    type: 0,
    transform: IDENTITY.slice(),
    vertices,
    faces: BOX_LOOPS.map((loop, i) => createFace(i, loop)),
    ...overrides,
  };
}

export function createEntity(
  id: number,
  classname: string,
  properties: Record<string, string> = {},
  origin?: Vec3
): CsxEntity {
  return {
    id,
    classname,
    gametype: 'Marble Blast',
    origin,
    properties: new Map(Object.entries(properties)),
    order: id,
  };
}

export function createScene(brushes: CsxBrush[], entities: CsxEntity[] = []): CsxScene {
  return {
    version: 4,
    creator: 'Level Editor',
    detailLevels: [
      {
        brushScale: 32,
        lightScale: 8,
        ambientColor: { x: 0, y: 0, z: 0 },
        ambientColorEmerg: { x: 0, y: 0, z: 0 },
        entities,
        brushes,
      },
    ],
  };
}
