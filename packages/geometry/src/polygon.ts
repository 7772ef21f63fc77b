/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Polygon classification, clipping and measurement
 */

import type { AABB, Plane, PolygonSide, Sphere, Vec3 } from './types.js';
import { signedDistance } from './plane.js';
import { addVec3, crossVec3, lengthVec3, lerpVec3, scaleVec3, subtractVec3 } from './vec3.js';

export interface SplitResult {
  front: Vec3[];
  back: Vec3[];
}

/**
 * Classify a polygon against a plane. Points within `epsilon` of the plane
 * count as on it.
 */
export function classifyPolygon(points: readonly Vec3[], plane: Plane, epsilon: number): PolygonSide {
  let front = false;
  let back = false;
  for (const point of points) {
    const d = signedDistance(plane, point);
    if (d > epsilon) front = true;
    else if (d < -epsilon) back = true;
    if (front && back) return 'straddle';
  }
  if (front) return 'front';
  if (back) return 'back';
  return 'coplanar';
}

/**
 * Sutherland-Hodgman clip of a polygon into its front and back parts.
 * On-plane points go to both sides. A side with fewer than three points is
 * returned empty.
 */
export function splitPolygon(points: readonly Vec3[], plane: Plane, epsilon: number): SplitResult {
  const front: Vec3[] = [];
  const back: Vec3[] = [];
  const n = points.length;
  if (n === 0) return { front, back };

  const distances = points.map((p) => signedDistance(plane, p));
  for (let i = 0; i < n; i++) {
    const a = points[i];
    const b = points[(i + 1) % n];
    const da = distances[i];
    const db = distances[(i + 1) % n];

    if (da >= -epsilon) front.push(a);
    if (da <= epsilon) back.push(a);

    if ((da > epsilon && db < -epsilon) || (da < -epsilon && db > epsilon)) {
      const intersection = lerpVec3(a, b, da / (da - db));
      front.push(intersection);
      back.push(intersection);
    }
  }

  return {
    front: front.length >= 3 ? front : [],
    back: back.length >= 3 ? back : [],
  };
}

/** Area of a planar polygon */
export function polygonArea(points: readonly Vec3[]): number {
  if (points.length < 3) return 0;
  const origin = points[0];
  let sum: Vec3 = { x: 0, y: 0, z: 0 };
  for (let i = 1; i < points.length - 1; i++) {
    const a = subtractVec3(points[i], origin);
    const b = subtractVec3(points[i + 1], origin);
    sum = addVec3(sum, crossVec3(a, b));
  }
  return lengthVec3(sum) / 2;
}

/** Vertex mean */
export function polygonCentroid(points: readonly Vec3[]): Vec3 {
  if (points.length === 0) return { x: 0, y: 0, z: 0 };
  let sum: Vec3 = { x: 0, y: 0, z: 0 };
  for (const point of points) {
    sum = addVec3(sum, point);
  }
  return scaleVec3(sum, 1 / points.length);
}

export function computeBounds(points: Iterable<Vec3>): AABB {
  const min = { x: Infinity, y: Infinity, z: Infinity };
  const max = { x: -Infinity, y: -Infinity, z: -Infinity };
  let any = false;
  for (const p of points) {
    any = true;
    min.x = Math.min(min.x, p.x);
    min.y = Math.min(min.y, p.y);
    min.z = Math.min(min.z, p.z);
    max.x = Math.max(max.x, p.x);
    max.y = Math.max(max.y, p.y);
    max.z = Math.max(max.z, p.z);
  }
  if (!any) {
    return { min: { x: 0, y: 0, z: 0 }, max: { x: 0, y: 0, z: 0 } };
  }
  return { min, max };
}

/**
 * Sphere centred on the bounding box that encloses every point
 */
export function boundingSphere(points: readonly Vec3[]): Sphere {
  const bounds = computeBounds(points);
  const center = scaleVec3(addVec3(bounds.min, bounds.max), 0.5);
  let radius = 0;
  for (const p of points) {
    radius = Math.max(radius, lengthVec3(subtractVec3(p, center)));
  }
  return { center, radius };
}
