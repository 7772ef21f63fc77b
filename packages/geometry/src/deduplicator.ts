/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Deduplicator - snaps brush faces into shared point and plane pools
 *
 * Pools grow brush by brush in input order. `mark()` / `rollback()` let a caller
 * try a brush and undo it, which is how units are filled up to capacity.
 */

import type {
  BrushRange,
  EpsilonOptions,
  FacetedBrush,
  Plane,
  PoolCounts,
  PooledGeometry,
  Surface,
  Vec3,
} from './types.js';
import { PlanePool, PointPool } from './pools.js';

export interface DeduplicatorMark {
  points: number;
  planes: number;
  surfaces: number;
  brushes: number;
}

export class Deduplicator {
  private pointPool: PointPool;
  private planePool: PlanePool;
  private surfaces: Surface[] = [];
  private brushes: BrushRange[] = [];

  constructor({ pointEpsilon, planeEpsilon }: EpsilonOptions) {
    this.pointPool = new PointPool(pointEpsilon);
    this.planePool = new PlanePool(planeEpsilon);
  }

  /**
   * Pool every face of the brush, returning the surface indices it produced
   */
  addBrush(brush: FacetedBrush): number[] {
    const firstSurface = this.surfaces.length;
    const added: number[] = [];
    for (const face of brush.faces) {
      const pointIndices = face.points.map((p) => this.pointPool.insert(p));
      const planeIndex = this.planePool.insert(face.plane);
      added.push(this.surfaces.length);
      this.surfaces.push({
        pointIndices,
        planeIndex,
        brushId: face.brushId,
        faceId: face.faceId,
        material: face.material,
        texGen: face.texGen,
      });
    }
    this.brushes.push({ brushId: brush.id, firstSurface, surfaceCount: added.length });
    return added;
  }

  mark(): DeduplicatorMark {
    return {
      points: this.pointPool.size,
      planes: this.planePool.size,
      surfaces: this.surfaces.length,
      brushes: this.brushes.length,
    };
  }

  /** Undo everything added since `mark` was taken */
  rollback(mark: DeduplicatorMark): void {
    this.pointPool.truncate(mark.points);
    this.planePool.truncate(mark.planes);
    this.surfaces.length = Math.min(this.surfaces.length, mark.surfaces);
    this.brushes.length = Math.min(this.brushes.length, mark.brushes);
  }

  counts(): PoolCounts {
    return {
      points: this.pointPool.size,
      planes: this.planePool.size,
      surfaces: this.surfaces.length,
    };
  }

  get isEmpty(): boolean {
    return this.brushes.length === 0;
  }

  finish(): PooledGeometry {
    return {
      points: this.pointPool.points.slice(),
      planes: this.planePool.planes.slice(),
      inverses: this.planePool.inverses.slice(),
      surfaces: this.surfaces.slice(),
      brushes: this.brushes.slice(),
    };
  }
}

export interface DedupResult<T> {
  pool: T[];
  /** indices[i] = pool index of input item i */
  indices: number[];
}

export function deduplicatePoints(points: readonly Vec3[], epsilon: number): DedupResult<Vec3> {
  const pool = new PointPool(epsilon);
  const indices = points.map((p) => pool.insert(p));
  return { pool: pool.points.slice(), indices };
}

export function deduplicatePlanes(
  planes: readonly Plane[],
  epsilon: number
): DedupResult<Plane> & { inverses: number[] } {
  const pool = new PlanePool(epsilon);
  const indices = planes.map((p) => pool.insert(p));
  return { pool: pool.planes.slice(), indices, inverses: pool.inverses.slice() };
}
