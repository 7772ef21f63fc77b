/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * BSP Builder - partitions a unit's surfaces into a binary tree of half-spaces
 *
 * The tree lives in an arena and is built from an explicit work stack, so
 * adversarial input cannot exhaust the call stack. Strategies differ only in
 * which planes are scored at each node.
 */

import { createLogger } from '@csxdif/data';
import { PointPool, classifyPolygon, splitPolygon, type Plane, type Vec3 } from '@csxdif/geometry';
import { makeRng, type RNG } from './rng.js';
import type { BspInput, BspLeaf, BspNode, BspOptions, BspTree } from './types.js';

const log = createLogger('BSP');

/** A surface, or a clipped piece of one */
interface Fragment {
  surface: number;
  planeIndex: number;
  points: Vec3[];
}

interface WorkItem {
  nodeIndex: number;
  fragments: Fragment[];
  depth: number;
}

interface Candidate {
  planeIndex: number;
  score: number;
}

export const DEFAULT_BSP_OPTIONS = {
  strategy: 'exhaustive',
  minLeafSize: 2,
  maxDepth: 64,
  splitEpsilon: 1e-4,
  pointEpsilon: 1e-6,
  sampleSize: 32,
  splitWeight: 5,
  seed: 'csxdif-bsp',
} as const;

function leafOf(fragments: readonly Fragment[]): BspLeaf {
  const surfaces: number[] = [];
  const seen = new Set<number>();
  for (const fragment of fragments) {
    if (!seen.has(fragment.surface)) {
      seen.add(fragment.surface);
      surfaces.push(fragment.surface);
    }
  }
  return { kind: 'leaf', surfaces };
}

export class BspBuilder {
  private readonly nodes: BspNode[] = [];
  private readonly scratch: PointPool;
  private readonly rng: RNG;
  private readonly usedPlanes = new Set<number>();

  private readonly strategy: BspOptions['strategy'];
  private readonly minLeafSize: number;
  private readonly maxDepth: number;
  private readonly splitEpsilon: number;
  private readonly sampleSize: number;
  private readonly splitWeight: number;
  private readonly onProgress?: (current: number, total: number) => void;

  constructor(
    private readonly input: BspInput,
    options: BspOptions = {}
  ) {
    const {
      strategy = DEFAULT_BSP_OPTIONS.strategy,
      minLeafSize = DEFAULT_BSP_OPTIONS.minLeafSize,
      maxDepth = DEFAULT_BSP_OPTIONS.maxDepth,
      splitEpsilon = DEFAULT_BSP_OPTIONS.splitEpsilon,
      pointEpsilon = DEFAULT_BSP_OPTIONS.pointEpsilon,
      sampleSize = DEFAULT_BSP_OPTIONS.sampleSize,
      splitWeight = DEFAULT_BSP_OPTIONS.splitWeight,
      seed = DEFAULT_BSP_OPTIONS.seed,
      onProgress,
    } = options;
    this.strategy = strategy;
    this.minLeafSize = minLeafSize;
    this.maxDepth = maxDepth;
    this.splitEpsilon = splitEpsilon;
    this.sampleSize = sampleSize;
    this.splitWeight = splitWeight;
    this.onProgress = onProgress;
    this.scratch = new PointPool(pointEpsilon);
    for (const point of input.points) {
      this.scratch.insert(point);
    }
    this.rng = makeRng(seed);
  }

  build(): BspTree {
    const fragments: Fragment[] = this.input.surfaces.map((surface, i) => ({
      surface: i,
      planeIndex: surface.planeIndex,
      points: surface.pointIndices.map((p) => this.input.points[p]),
    }));

    this.nodes.push(leafOf(fragments));
    if (this.strategy === 'none') {
      return { nodes: this.nodes };
    }

    const stack: WorkItem[] = [{ nodeIndex: 0, fragments, depth: 0 }];
    while (stack.length > 0) {
      const item = stack.pop();
      if (item) this.process(item, stack);
    }

    const total = this.input.planes.length;
    this.onProgress?.(total, total);

    log.debug('Built BSP', {
      nodes: this.nodes.length,
      planesUsed: this.usedPlanes.size,
      strategy: this.strategy,
    });
    return { nodes: this.nodes };
  }

  private process({ nodeIndex, fragments, depth }: WorkItem, stack: WorkItem[]): void {
    if (fragments.length < this.minLeafSize || depth >= this.maxDepth) {
      this.nodes[nodeIndex] = leafOf(fragments);
      return;
    }

    const splitter = this.selectSplitter(fragments);
    if (!splitter) {
      this.nodes[nodeIndex] = leafOf(fragments);
      return;
    }

    const plane = this.input.planes[splitter.planeIndex];
    const front: Fragment[] = [];
    const back: Fragment[] = [];
    const coplanar: number[] = [];
    const coplanarSeen = new Set<number>();

    for (const fragment of fragments) {
      switch (classifyPolygon(fragment.points, plane, this.splitEpsilon)) {
        case 'front':
          front.push(fragment);
          break;
        case 'back':
          back.push(fragment);
          break;
        case 'coplanar':
          if (!coplanarSeen.has(fragment.surface)) {
            coplanarSeen.add(fragment.surface);
            coplanar.push(fragment.surface);
          }
          break;
        case 'straddle': {
          const pieces = splitPolygon(fragment.points, plane, this.splitEpsilon);
          if (pieces.front.length > 0) {
            front.push({ ...fragment, points: pieces.front.map((p) => this.snap(p)) });
          }
          if (pieces.back.length > 0) {
            back.push({ ...fragment, points: pieces.back.map((p) => this.snap(p)) });
          }
          break;
        }
      }
    }

    const frontIndex = this.nodes.length;
    this.nodes.push(leafOf([]));
    const backIndex = this.nodes.length;
    this.nodes.push(leafOf([]));
    this.nodes[nodeIndex] = {
      kind: 'node',
      planeIndex: splitter.planeIndex,
      front: frontIndex,
      back: backIndex,
      coplanar,
    };

    this.markUsed(splitter.planeIndex);

    // Back is pushed first so the front subtree is built first
    stack.push({ nodeIndex: backIndex, fragments: back, depth: depth + 1 });
    stack.push({ nodeIndex: frontIndex, fragments: front, depth: depth + 1 });
  }

  /** Pool key shared by a plane and its inverse */
  private planeKey(planeIndex: number): number {
    const inverse = this.input.inverses[planeIndex] ?? -1;
    return inverse >= 0 ? Math.min(planeIndex, inverse) : planeIndex;
  }

  private candidatePlanes(fragments: readonly Fragment[]): number[] {
    const seen = new Set<number>();
    const planes: number[] = [];
    for (const fragment of fragments) {
      const key = this.planeKey(fragment.planeIndex);
      if (!seen.has(key)) {
        seen.add(key);
        planes.push(fragment.planeIndex);
      }
    }
    if (this.strategy === 'sampling') {
      return this.rng.sample(planes, this.sampleSize);
    }
    return planes;
  }

  /**
   * Lowest-cost plane that shrinks the worst-case scan, first seen on ties
   */
  private selectSplitter(fragments: readonly Fragment[]): Candidate | undefined {
    let best: Candidate | undefined;
    for (const planeIndex of this.candidatePlanes(fragments)) {
      const candidate = this.score(planeIndex, fragments);
      if (candidate && (!best || candidate.score < best.score)) {
        best = candidate;
      }
    }
    return best;
  }

  private score(planeIndex: number, fragments: readonly Fragment[]): Candidate | undefined {
    const plane: Plane = this.input.planes[planeIndex];
    let front = 0;
    let back = 0;
    let coplanar = 0;
    let straddle = 0;
    for (const fragment of fragments) {
      switch (classifyPolygon(fragment.points, plane, this.splitEpsilon)) {
        case 'front':
          front++;
          break;
        case 'back':
          back++;
          break;
        case 'coplanar':
          coplanar++;
          break;
        case 'straddle':
          straddle++;
          break;
      }
    }
    const frontSize = front + straddle;
    const backSize = back + straddle;
    if (coplanar + Math.max(frontSize, backSize) >= fragments.length) {
      return undefined;
    }
    return {
      planeIndex,
      score: this.splitWeight * straddle + Math.abs(frontSize - backSize),
    };
  }

  private snap(point: Vec3): Vec3 {
    return this.scratch.points[this.scratch.insert(point)];
  }

  private markUsed(planeIndex: number): void {
    const key = this.planeKey(planeIndex);
    if (this.usedPlanes.has(key)) return;
    this.usedPlanes.add(key);
    this.onProgress?.(this.usedPlanes.size, this.input.planes.length);
  }
}

/**
 * Build a BSP tree over the unit's surfaces
 */
export function buildBsp(input: BspInput, options: BspOptions = {}): BspTree {
  return new BspBuilder(input, options).build();
}

/**
 * Height of every node; leaves are 1
 */
export function nodeHeights(tree: BspTree): number[] {
  const heights = new Array<number>(tree.nodes.length).fill(1);
  // Children always follow their parent in the arena
  for (let i = tree.nodes.length - 1; i >= 0; i--) {
    const node = tree.nodes[i];
    if (node.kind === 'node') {
      heights[i] = 1 + Math.max(heights[node.front], heights[node.back]);
    }
  }
  return heights;
}

/**
 * Mean of (front height - back height) over internal nodes, 0 without any
 */
export function balanceFactor(tree: BspTree): number {
  const heights = nodeHeights(tree);
  let sum = 0;
  let internal = 0;
  for (const node of tree.nodes) {
    if (node.kind === 'node') {
      sum += heights[node.front] - heights[node.back];
      internal++;
    }
  }
  return internal === 0 ? 0 : sum / internal;
}
