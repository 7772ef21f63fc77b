/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { CapacityExceededError } from '@csxdif/data';
import { vec3, type Vec3 } from '@csxdif/geometry';
import { buildEmitString, buildPolyList, resolveNormal, type HullPoly } from './hull-strings.js';

describe('buildEmitString', () => {
  // Tetrahedron over points 0..3
  const tetrahedron: HullPoly[] = [
    { points: [0, 1, 2], planeRef: 0 },
    { points: [0, 3, 1], planeRef: 1 },
    { points: [1, 3, 2], planeRef: 2 },
    { points: [0, 2, 3], planeRef: 3 },
  ];

  it('should list points, edges and polys around a vertex', () => {
    expect(buildEmitString(tetrahedron, 0, 1)).toEqual([
      4, 0, 1, 2, 3,
      6, 0, 1, 1, 2, 0, 2, 0, 3, 1, 3, 2, 3,
      3, 3, 0, 0, 1, 2, 3, 1, 0, 3, 1, 3, 3, 0, 2, 3,
    ]);
  });

  it('should pull in polys sharing a plane with an emitted poly', () => {
    const polys: HullPoly[] = [
      { points: [0, 1, 2], planeRef: 5 },
      { points: [2, 3, 4], planeRef: 5 },
      { points: [4, 5, 6], planeRef: 7 },
    ];
    expect(buildEmitString(polys, 0, 1)).toEqual([
      5, 0, 1, 2, 3, 4,
      6, 0, 1, 1, 2, 0, 2, 2, 3, 3, 4, 2, 4,
      2, 3, 0, 0, 1, 2, 3, 1, 2, 3, 4,
    ]);
  });

  it('should reject hulls too large for byte entries', () => {
    const polys: HullPoly[] = [{ points: [0, 1, 300], planeRef: 0 }];
    expect(() => buildEmitString(polys, 0, 42)).toThrow(CapacityExceededError);
  });
});

describe('buildPolyList', () => {
  const up = () => vec3(0, 0, 1);

  it('should encode masks and hull-local offsets', () => {
    const list = buildPolyList(
      [
        { planeRef: 0, points: [10, 11, 12] },
        { planeRef: 0x8001, points: [12, 11, 13] },
      ],
      up,
      1
    );

    expect(list.planes).toEqual([0, 0x8001]);
    expect(list.points).toEqual([10, 11, 12, 13]);
    expect(list.string).toEqual([
      2, 1, 2,
      0, 4, 1, 3, 3, 2,
      2,
      3, 1, 0, 0, 0, 0, 1, 0, 2,
      3, 2, 1, 0, 2, 0, 1, 0, 3,
    ]);
  });

  it('should merge the most opposed planes until eight groups remain', () => {
    const normals: Vec3[] = [
      vec3(1, 0, 0),
      vec3(-1, 0, 0),
      vec3(0, 1, 0),
      vec3(0, -1, 0),
      vec3(0, 0, 1),
      vec3(0, 0, -1),
      vec3(0.6, 0.8, 0),
      vec3(0, 0.6, 0.8),
      vec3(0.8, 0, 0.6),
    ];
    const list = buildPolyList(
      normals.map((_, i) => ({ planeRef: i, points: [i, i + 1, i + 2] })),
      (ref) => resolveNormal(ref, normals),
      1
    );

    expect(list.string.slice(0, 10)).toEqual([9, 1, 1, 2, 4, 8, 16, 32, 64, 128]);
  });

  it('should negate flipped plane normals', () => {
    expect(resolveNormal(0x8000, [vec3(0, 0, 1)])).toEqual(vec3(-0, -0, -1));
  });
});
