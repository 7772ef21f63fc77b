/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/geometry - Points, planes, polygons and epsilon pools
 */

export * from './vec3.js';
export { fitPlane, signedDistance, negatePlane, planesEqual } from './plane.js';
export {
  classifyPolygon,
  splitPolygon,
  polygonArea,
  polygonCentroid,
  computeBounds,
  boundingSphere,
} from './polygon.js';
export type { SplitResult } from './polygon.js';
export { PointPool, PlanePool } from './pools.js';
export { Deduplicator, deduplicatePoints, deduplicatePlanes } from './deduplicator.js';
export type { DeduplicatorMark, DedupResult } from './deduplicator.js';
export type {
  Vec3,
  Plane,
  TexGen,
  AABB,
  Sphere,
  PolygonSide,
  SurfaceAttributes,
  Polygon,
  FacetedBrush,
  Surface,
  BrushRange,
  PoolCounts,
  PooledGeometry,
  EpsilonOptions,
} from './types.js';
