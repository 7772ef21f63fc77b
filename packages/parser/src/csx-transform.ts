/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Brush transforms - moves authored vertices and texture projections into world space
 */

import { glMatrix, mat4, quat, vec3, type ReadonlyMat4, type ReadonlyVec3 } from 'gl-matrix';
import type { Plane, TexGen, Vec3 } from '@csxdif/geometry';
import type { CsxTexGen } from './types.js';

// Doubles: point epsilons go down to 1e-6, below float32 resolution at level scale
glMatrix.setMatrixArrayType(Array);

const scratchVec3 = vec3.create();

function toGl(v: Vec3): vec3 {
  return vec3.fromValues(v.x, v.y, v.z);
}

function fromGl(v: ReadonlyVec3): Vec3 {
  return { x: v[0], y: v[1], z: v[2] };
}

/**
 * Build a matrix from the document's row-major 16 numbers
 */
export function brushMatrix(transform: readonly number[]): mat4 {
  const m = mat4.create();
  // mat4.set takes column-major order, so the row-major input arrives transposed
  mat4.set(
    m,
    transform[0], transform[1], transform[2], transform[3],
    transform[4], transform[5], transform[6], transform[7],
    transform[8], transform[9], transform[10], transform[11],
    transform[12], transform[13], transform[14], transform[15]
  );
  return mat4.transpose(m, m);
}

export function transformPoint(point: Vec3, m: ReadonlyMat4): Vec3 {
  vec3.transformMat4(scratchVec3, toGl(point), m);
  return fromGl(scratchVec3);
}

/**
 * Carry a texture projection plane through the brush matrix.
 * The normal is rescaled by each basis column's squared length, so a scaled
 * brush keeps its texel density.
 */
export function transformTexPlane(plane: Plane, m: ReadonlyMat4): Plane {
  const r = vec3.create();
  const components = [plane.normal.x, plane.normal.y, plane.normal.z];
  for (let column = 0; column < 3; column++) {
    const basis = vec3.fromValues(m[column * 4], m[column * 4 + 1], m[column * 4 + 2]);
    const lengthSq = vec3.squaredLength(basis);
    if (lengthSq === 0) continue;
    vec3.scaleAndAdd(r, r, basis, components[column] / lengthSq);
  }
  const translation = vec3.fromValues(m[12], m[13], m[14]);
  return {
    normal: fromGl(r),
    distance: plane.distance - vec3.dot(r, translation),
  };
}

/** Zero texture scales and divisors count as 1 */
function nonZero(value: number): number {
  return value === 0 ? 1 : value;
}

/**
 * Whether normalizeTexGen will substitute 1 for a zero scale or divisor
 */
export function hasZeroTexFactor(texGen: CsxTexGen, texDiv: readonly [number, number]): boolean {
  return [...texGen.scale, ...texDiv].some((value) => value === 0);
}

/**
 * Normalise an authored texgen: apply its rotation, fold scale, brush scale
 * and texture divisor into the planes, then transform with the brush.
 */
export function normalizeTexGen(
  texGen: CsxTexGen,
  texDiv: readonly [number, number],
  brushScale: number,
  m: ReadonlyMat4
): TexGen {
  const axisU = toGl(texGen.planeX.normal);
  const axisV = toGl(texGen.planeY.normal);

  const turns = ((texGen.rot % 360) + 360) % 360;
  if (turns !== 0) {
    const up = vec3.cross(vec3.create(), axisU, axisV);
    if (vec3.squaredLength(up) > 0) {
      vec3.normalize(up, up);
      const rotation = quat.setAxisAngle(quat.create(), up, glMatrix.toRadian(texGen.rot));
      vec3.transformQuat(axisU, axisU, rotation);
      vec3.transformQuat(axisV, axisV, rotation);
    }
  }

  const [scaleX, scaleY] = texGen.scale.map(nonZero);
  const [divX, divY] = texDiv.map(nonZero);
  const scaleU = (1 / scaleX) * (brushScale / divX);
  const scaleV = (1 / scaleY) * (brushScale / divY);

  const planeX: Plane = {
    normal: fromGl(vec3.scale(axisU, axisU, scaleU)),
    distance: texGen.planeX.distance / divX,
  };
  const planeY: Plane = {
    normal: fromGl(vec3.scale(axisV, axisV, scaleV)),
    distance: texGen.planeY.distance / divY,
  };

  return {
    planeX: transformTexPlane(planeX, m),
    planeY: transformTexPlane(planeY, m),
  };
}
