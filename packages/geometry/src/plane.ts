/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Plane fitting and comparison
 */

import { DegenerateGeometryError } from '@csxdif/data';
import type { Plane, Vec3 } from './types.js';
import { crossVec3, dotVec3, lengthVec3, scaleVec3, subtractVec3 } from './vec3.js';

/** Minimum sine of the angle between two edges for them to count as non-collinear */
const COLLINEAR_SINE = 1e-9;

/**
 * Fit a plane through the first three non-collinear points, in authored order.
 * The normal follows the right-hand rule over that triple.
 *
 * @throws DegenerateGeometryError when every triple is collinear
 */
export function fitPlane(points: readonly Vec3[]): Plane {
  const n = points.length;
  for (let i = 0; i < n - 2; i++) {
    for (let j = i + 1; j < n - 1; j++) {
      const a = subtractVec3(points[j], points[i]);
      const lenA = lengthVec3(a);
      if (lenA === 0) continue;
      for (let k = j + 1; k < n; k++) {
        const b = subtractVec3(points[k], points[i]);
        const lenB = lengthVec3(b);
        if (lenB === 0) continue;
        const cross = crossVec3(a, b);
        const lenC = lengthVec3(cross);
        if (lenC > COLLINEAR_SINE * lenA * lenB) {
          const normal = scaleVec3(cross, 1 / lenC);
          return { normal, distance: -dotVec3(normal, points[i]) };
        }
      }
    }
  }
  throw new DegenerateGeometryError(
    n < 3 ? `face has ${n} points` : `no three non-collinear points among ${n}`
  );
}

/** Signed distance of a point from the plane, positive on the normal side */
export function signedDistance(plane: Plane, point: Vec3): number {
  return dotVec3(plane.normal, point) + plane.distance;
}

export function negatePlane(plane: Plane): Plane {
  return {
    normal: { x: -plane.normal.x, y: -plane.normal.y, z: -plane.normal.z },
    distance: -plane.distance,
  };
}

/**
 * Component-wise approximate equality on normal and distance
 */
export function planesEqual(a: Plane, b: Plane, epsilon: number): boolean {
  return (
    Math.abs(a.normal.x - b.normal.x) <= epsilon &&
    Math.abs(a.normal.y - b.normal.y) <= epsilon &&
    Math.abs(a.normal.z - b.normal.z) <= epsilon &&
    Math.abs(a.distance - b.distance) <= epsilon
  );
}
