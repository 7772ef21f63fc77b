/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry types for brush faces, pooled surfaces and their planes
 */

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Plane satisfying `normal · p + distance = 0`, normal of unit length */
export interface Plane {
  normal: Vec3;
  distance: number;
}

/** Texture projection: u = planeX(p), v = planeY(p) */
export interface TexGen {
  planeX: Plane;
  planeY: Plane;
}

export interface AABB {
  min: Vec3;
  max: Vec3;
}

export interface Sphere {
  center: Vec3;
  radius: number;
}

/** Where a polygon lies relative to a plane */
export type PolygonSide = 'front' | 'back' | 'coplanar' | 'straddle';

/**
 * Attributes carried opaquely from the authored face to the output surface
 */
export interface SurfaceAttributes {
  brushId: number;
  /** Job-wide sequential face id */
  faceId: number;
  material: string;
  texGen: TexGen;
}

/** A face in authored vertex order, with its fitted plane */
export interface Polygon extends SurfaceAttributes {
  points: Vec3[];
  plane: Plane;
}

/** The faces of one brush, the unit the pools grow by */
export interface FacetedBrush {
  id: number;
  faces: Polygon[];
}

/** A face after snapping into the point and plane pools */
export interface Surface extends SurfaceAttributes {
  pointIndices: number[];
  planeIndex: number;
}

/** Contiguous run of surfaces contributed by one brush */
export interface BrushRange {
  brushId: number;
  firstSurface: number;
  surfaceCount: number;
}

/** Sizes used for capacity checks */
export interface PoolCounts {
  points: number;
  planes: number;
  surfaces: number;
}

/**
 * Deduplicated geometry of one output unit
 */
export interface PooledGeometry {
  points: Vec3[];
  planes: Plane[];
  /** inverses[i] = index of the negation of plane i, or -1 */
  inverses: number[];
  surfaces: Surface[];
  brushes: BrushRange[];
}

export interface EpsilonOptions {
  pointEpsilon: number;
  planeEpsilon: number;
}
