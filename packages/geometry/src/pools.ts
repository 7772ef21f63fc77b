/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Epsilon pools - first-seen ordered stores of points and planes
 *
 * Entries are bucketed on a grid whose cell size is the epsilon, so every
 * candidate within epsilon on each axis lies in the same or an adjacent cell.
 * Lookup returns the nearest candidate, lowest index on a tie.
 */

import type { Plane, Vec3 } from './types.js';
import { pointsEqual } from './vec3.js';
import { negatePlane, planesEqual } from './plane.js';

const POINT_NEIGHBOURS = neighbourOffsets(3);
const PLANE_NEIGHBOURS = neighbourOffsets(4);

function neighbourOffsets(dimensions: number): number[][] {
  let offsets: number[][] = [[]];
  for (let d = 0; d < dimensions; d++) {
    const next: number[][] = [];
    for (const offset of offsets) {
      for (const step of [-1, 0, 1]) {
        next.push([...offset, step]);
      }
    }
    offsets = next;
  }
  return offsets;
}

/**
 * Grid of entry indices keyed by integer cell coordinates
 */
class EpsilonGrid {
  private cells = new Map<string, number[]>();

  constructor(
    private readonly cellSize: number,
    private readonly neighbours: number[][]
  ) {}

  cellOf(coords: readonly number[]): number[] {
    return coords.map((c) => Math.floor(c / this.cellSize));
  }

  insert(coords: readonly number[], index: number): void {
    const key = this.cellOf(coords).join(',');
    const bucket = this.cells.get(key);
    if (bucket) {
      bucket.push(index);
    } else {
      this.cells.set(key, [index]);
    }
  }

  /** Remove an index; it must be the last one inserted into its cell */
  removeLast(coords: readonly number[], index: number): void {
    const key = this.cellOf(coords).join(',');
    const bucket = this.cells.get(key);
    if (!bucket || bucket[bucket.length - 1] !== index) return;
    bucket.pop();
    if (bucket.length === 0) this.cells.delete(key);
  }

  *candidates(coords: readonly number[]): Generator<number> {
    const cell = this.cellOf(coords);
    for (const offset of this.neighbours) {
      const key = cell.map((c, i) => c + offset[i]).join(',');
      const bucket = this.cells.get(key);
      if (bucket) yield* bucket;
    }
  }
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

function pointCoords(p: Vec3): number[] {
  return [p.x, p.y, p.z];
}

function planeCoords(p: Plane): number[] {
  return [p.normal.x, p.normal.y, p.normal.z, p.distance];
}

/**
 * Pool of unique points
 */
export class PointPool {
  readonly points: Vec3[] = [];
  private grid: EpsilonGrid;

  constructor(private readonly epsilon: number) {
    this.grid = new EpsilonGrid(epsilon, POINT_NEIGHBOURS);
  }

  get size(): number {
    return this.points.length;
  }

  /** Index of the nearest pooled point within epsilon, or -1 */
  find(point: Vec3): number {
    const coords = pointCoords(point);
    let best = -1;
    let bestDistance = Infinity;
    for (const index of this.grid.candidates(coords)) {
      const candidate = this.points[index];
      if (!pointsEqual(candidate, point, this.epsilon)) continue;
      const distance = squaredDistance(pointCoords(candidate), coords);
      if (distance < bestDistance || (distance === bestDistance && index < best)) {
        best = index;
        bestDistance = distance;
      }
    }
    return best;
  }

  /** Pool index for the point, appending it when nothing matches */
  insert(point: Vec3): number {
    const existing = this.find(point);
    if (existing >= 0) return existing;
    const index = this.points.length;
    this.points.push({ x: point.x, y: point.y, z: point.z });
    this.grid.insert(pointCoords(point), index);
    return index;
  }

  /** Drop every entry at or after `size` */
  truncate(size: number): void {
    for (let index = this.points.length - 1; index >= size; index--) {
      this.grid.removeLast(pointCoords(this.points[index]), index);
    }
    this.points.length = Math.min(this.points.length, size);
  }
}

/**
 * Pool of unique planes. A plane and its negation are separate entries,
 * linked through `inverses`.
 */
export class PlanePool {
  readonly planes: Plane[] = [];
  readonly inverses: number[] = [];
  private grid: EpsilonGrid;

  constructor(private readonly epsilon: number) {
    this.grid = new EpsilonGrid(epsilon, PLANE_NEIGHBOURS);
  }

  get size(): number {
    return this.planes.length;
  }

  find(plane: Plane): number {
    const coords = planeCoords(plane);
    let best = -1;
    let bestDistance = Infinity;
    for (const index of this.grid.candidates(coords)) {
      const candidate = this.planes[index];
      if (!planesEqual(candidate, plane, this.epsilon)) continue;
      const distance = squaredDistance(planeCoords(candidate), coords);
      if (distance < bestDistance || (distance === bestDistance && index < best)) {
        best = index;
        bestDistance = distance;
      }
    }
    return best;
  }

  insert(plane: Plane): number {
    const existing = this.find(plane);
    if (existing >= 0) return existing;

    const index = this.planes.length;
    this.planes.push({ normal: { ...plane.normal }, distance: plane.distance });
    this.grid.insert(planeCoords(plane), index);

    const inverse = this.find(negatePlane(plane));
    this.inverses.push(inverse);
    if (inverse >= 0 && this.inverses[inverse] < 0) {
      this.inverses[inverse] = index;
    }
    return index;
  }

  truncate(size: number): void {
    for (let index = this.planes.length - 1; index >= size; index--) {
      this.grid.removeLast(planeCoords(this.planes[index]), index);
    }
    this.planes.length = Math.min(this.planes.length, size);
    this.inverses.length = this.planes.length;
    for (let i = 0; i < this.inverses.length; i++) {
      if (this.inverses[i] >= size) this.inverses[i] = -1;
    }
  }
}
