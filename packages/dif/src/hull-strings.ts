/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Convex hull byte strings used by the engine's collision code
 *
 * Emit strings describe, per hull vertex, the polys that vertex supports.
 * Poly-list strings describe a hull's polys against at most eight plane
 * groups so the engine can cull them with a bit mask.
 */

import { CapacityExceededError } from '@csxdif/data';
import { dotVec3, scaleVec3, type Vec3 } from '@csxdif/geometry';
import { PLANE_FLIP } from './types.js';

/** A hull face in hull-local terms */
export interface HullPoly {
  /** Hull-local point indices */
  points: number[];
  /** Plane reference, flip bit included */
  planeRef: number;
}

/** Every emit-string entry is a single byte */
const BYTE_LIMIT = 0x100;

const MAX_PLANE_GROUPS = 8;

function pushUnique<T>(list: T[], value: T): void {
  if (!list.includes(value)) list.push(value);
}

function requireByte(value: number, what: string, brushId: number): number {
  if (value >= BYTE_LIMIT) {
    throw new CapacityExceededError(`Hull ${what} ${value} does not fit an emit string`, { brushId });
  }
  return value;
}

/**
 * Emit string for one hull vertex:
 * points, edges, then each emitted poly as (pointCount, polyIndex, local points)
 */
export function buildEmitString(polys: readonly HullPoly[], vertex: number, brushId: number): number[] {
  const emitPolys: number[] = [];
  polys.forEach((poly, i) => {
    if (poly.points.includes(vertex)) emitPolys.push(i);
  });
  // Polys on the plane of an emitted poly come along even without the vertex
  const supporting = emitPolys.slice();
  polys.forEach((poly, i) => {
    if (emitPolys.includes(i)) return;
    if (supporting.some((j) => polys[j].planeRef === poly.planeRef)) emitPolys.push(i);
  });

  const emitPoints: number[] = [];
  const edgeKeys: string[] = [];
  const edges: Array<[number, number]> = [];
  for (const polyIndex of emitPolys) {
    const points = polys[polyIndex].points;
    points.forEach((point, k) => {
      pushUnique(emitPoints, point);
      const next = points[(k + 1) % points.length];
      const edge: [number, number] = [Math.min(point, next), Math.max(point, next)];
      const key = `${edge[0]}:${edge[1]}`;
      if (!edgeKeys.includes(key)) {
        edgeKeys.push(key);
        edges.push(edge);
      }
    });
  }

  const out: number[] = [requireByte(emitPoints.length, 'point count', brushId)];
  for (const point of emitPoints) {
    out.push(requireByte(point, 'point', brushId));
  }
  out.push(requireByte(edges.length, 'edge count', brushId));
  for (const [first, last] of edges) {
    out.push(requireByte(first, 'point', brushId), requireByte(last, 'point', brushId));
  }
  out.push(requireByte(emitPolys.length, 'poly count', brushId));
  for (const polyIndex of emitPolys) {
    const poly = polys[polyIndex];
    out.push(requireByte(poly.points.length, 'poly size', brushId), requireByte(polyIndex, 'poly', brushId));
    for (const point of poly.points) {
      out.push(emitPoints.indexOf(point));
    }
  }
  return out;
}

export interface PolyList {
  /** Plane references, first-seen order */
  planes: number[];
  /** Interior point indices, first-seen order */
  points: number[];
  string: number[];
}

/** A hull surface by interior point indices, in winding order */
export interface PolyListSurface {
  planeRef: number;
  points: number[];
}

/**
 * Build the poly list of one hull. `normalOf` resolves a plane reference to
 * its normal, flip applied.
 */
export function buildPolyList(
  surfaces: readonly PolyListSurface[],
  normalOf: (planeRef: number) => Vec3,
  brushId: number
): PolyList {
  const planes: number[] = [];
  const points: number[] = [];
  for (const surface of surfaces) {
    pushUnique(planes, surface.planeRef);
    for (const point of surface.points) pushUnique(points, point);
  }

  if (planes.length >= 256 || surfaces.length >= 256 || points.length >= 0x10000) {
    throw new CapacityExceededError(
      `Hull has ${planes.length} planes, ${surfaces.length} surfaces and ${points.length} points; ` +
        'poly lists allow fewer than 256, 256 and 65536',
      { brushId }
    );
  }

  const groups = groupPlanes(planes, normalOf);
  const maskOf = (planeRef: number): number => {
    const group = groups.findIndex((g) => g.includes(planeRef));
    return group >= 0 ? 1 << group : 0;
  };

  const planeMasks = planes.map(maskOf);
  const pointMasks = points.map((point) =>
    surfaces.reduce((mask, surface) => (surface.points.includes(point) ? mask | maskOf(surface.planeRef) : mask), 0)
  );

  const string: number[] = [planes.length, ...planeMasks];
  string.push((points.length >> 8) & 0xff, points.length & 0xff, ...pointMasks);
  string.push(surfaces.length);
  for (const surface of surfaces) {
    string.push(surface.points.length, maskOf(surface.planeRef), planes.indexOf(surface.planeRef));
    for (const point of surface.points) {
      const local = points.indexOf(point);
      string.push((local >> 8) & 0xff, local & 0xff);
    }
  }

  return { planes, points, string };
}

/**
 * Merge plane groups until at most eight remain, always joining the pair
 * whose closest normals are furthest apart
 */
function groupPlanes(planes: readonly number[], normalOf: (planeRef: number) => Vec3): number[][] {
  const groups = planes.map((plane) => [plane]);
  while (groups.length > MAX_PLANE_GROUPS) {
    let best = 2;
    let first = 0;
    let second = 1;
    for (let j = 0; j < groups.length; j++) {
      for (let k = j + 1; k < groups.length; k++) {
        let max = -2;
        for (const a of groups[j]) {
          for (const b of groups[k]) {
            max = Math.max(max, dotVec3(normalOf(a), normalOf(b)));
          }
        }
        if (max < best) {
          best = max;
          first = j;
          second = k;
        }
      }
    }
    groups[first].push(...groups[second].reverse());
    groups.splice(second, 1);
  }
  return groups;
}

/** Normal of a plane reference, negated when flipped */
export function resolveNormal(planeRef: number, planeNormals: readonly Vec3[]): Vec3 {
  const normal = planeNormals[planeRef & ~PLANE_FLIP];
  return planeRef & PLANE_FLIP ? scaleVec3(normal, -1) : normal;
}
