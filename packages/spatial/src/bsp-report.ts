/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Raycast coverage - casts a ray at every surface through the tree and measures
 * how much of the unit a raycast can actually reach
 */

import {
  lerpVec3,
  polygonArea,
  polygonCentroid,
  scaleVec3,
  addVec3,
  signedDistance,
  type Vec3,
} from '@csxdif/geometry';
import { balanceFactor } from './bsp-builder.js';
import type { BspInput, BspReport, BspTree } from './types.js';

/** Distance of each ray endpoint from the surface it targets */
export const RAY_DISTANCE = 0.1;

interface Segment {
  node: number;
  start: Vec3;
  end: Vec3;
}

/**
 * Whether a segment through the tree reaches `surface`, either in a leaf or
 * in the coplanar set of a node it touches
 */
export function raycastHits(tree: BspTree, input: BspInput, surface: number, start: Vec3, end: Vec3): boolean {
  const stack: Segment[] = [{ node: 0, start, end }];
  while (stack.length > 0) {
    const segment = stack.pop();
    if (!segment) break;
    const node = tree.nodes[segment.node];

    if (node.kind === 'leaf') {
      if (node.surfaces.includes(surface)) return true;
      continue;
    }

    const plane = input.planes[node.planeIndex];
    const ds = signedDistance(plane, segment.start);
    const de = signedDistance(plane, segment.end);

    if (ds * de <= 0 && node.coplanar.includes(surface)) {
      return true;
    }

    if (ds === 0 && de === 0) {
      stack.push({ ...segment, node: node.back });
      stack.push({ ...segment, node: node.front });
    } else if (ds >= 0 && de >= 0) {
      stack.push({ ...segment, node: node.front });
    } else if (ds <= 0 && de <= 0) {
      stack.push({ ...segment, node: node.back });
    } else {
      const mid = lerpVec3(segment.start, segment.end, ds / (ds - de));
      const startSide = ds > 0 ? node.front : node.back;
      const endSide = ds > 0 ? node.back : node.front;
      stack.push({ node: endSide, start: mid, end: segment.end });
      stack.push({ node: startSide, start: segment.start, end: mid });
    }
  }
  return false;
}

/**
 * Cast a segment at each surface through its centroid along its normal
 */
export function computeBspReport(
  tree: BspTree,
  input: BspInput,
  rayDistance: number = RAY_DISTANCE
): BspReport {
  let hit = 0;
  let hitArea = 0;
  let totalArea = 0;

  input.surfaces.forEach((surface, index) => {
    const points = surface.pointIndices.map((p) => input.points[p]);
    const area = polygonArea(points);
    totalArea += area;

    const centroid = polygonCentroid(points);
    const offset = scaleVec3(input.planes[surface.planeIndex].normal, rayDistance);
    const start = addVec3(centroid, offset);
    const end = addVec3(centroid, scaleVec3(offset, -1));

    if (raycastHits(tree, input, index, start, end)) {
      hit++;
      hitArea += area;
    }
  });

  return {
    hit,
    total: input.surfaces.length,
    hitAreaPercentage: totalArea === 0 ? 100 : (hitArea / totalArea) * 100,
    balanceFactor: balanceFactor(tree),
  };
}
