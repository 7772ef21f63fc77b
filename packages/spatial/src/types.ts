/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * BSP arena types
 */

import type { BspStrategy } from '@csxdif/data';
import type { Plane, Surface, Vec3 } from '@csxdif/geometry';

export interface BspInternalNode {
  kind: 'node';
  /** Splitting plane, an index into the unit's plane pool */
  planeIndex: number;
  /** Arena index of the child on the normal side */
  front: number;
  back: number;
  /** Surfaces lying on the splitting plane, in either orientation */
  coplanar: number[];
}

export interface BspLeaf {
  kind: 'leaf';
  /** Surfaces with a fragment inside this cell */
  surfaces: number[];
}

export type BspNode = BspInternalNode | BspLeaf;

/** Nodes addressed by index; the root is node 0 */
export interface BspTree {
  nodes: BspNode[];
}

/** Geometry the builder partitions; one unit's pools */
export interface BspInput {
  points: readonly Vec3[];
  planes: readonly Plane[];
  inverses: readonly number[];
  surfaces: readonly Surface[];
}

export interface BspOptions {
  strategy?: BspStrategy;
  /** Sets smaller than this become leaves */
  minLeafSize?: number;
  maxDepth?: number;
  /** Distance within which a point counts as on a splitting plane */
  splitEpsilon?: number;
  /** Snapping distance for clip intersection points */
  pointEpsilon?: number;
  /** Candidates drawn per node by the sampling strategy */
  sampleSize?: number;
  /** Cost of one straddling surface relative to one unit of imbalance */
  splitWeight?: number;
  seed?: string;
  /** Planes consumed so far against the plane pool size */
  onProgress?: (current: number, total: number) => void;
}

/** Raycast quality metrics for one tree */
export interface BspReport {
  hit: number;
  total: number;
  hitAreaPercentage: number;
  balanceFactor: number;
}
