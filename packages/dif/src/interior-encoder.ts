/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Interior encoder - turns one unit's pools and BSP tree into the tables of
 * a DIF interior record
 *
 * The output is the same for every engine/version; widths, flags and field
 * presence are decided by the writer.
 */

import { createLogger } from '@csxdif/data';
import {
  boundingSphere,
  classifyPolygon,
  computeBounds,
  dotVec3,
  type AABB,
  type PooledGeometry,
  type TexGen,
  type Vec3,
} from '@csxdif/geometry';
import { DEFAULT_BSP_OPTIONS, type BspTree } from '@csxdif/spatial';
import { buildEmitString, buildPolyList, resolveNormal, type HullPoly } from './hull-strings.js';
import {
  COORD_BIN_GRID,
  NO_LIGHTMAP,
  PLANE_FLIP,
  SURFACE_MAP_SIZE,
  SURFACE_OUTSIDE_VISIBLE,
  type ColorI,
  type DifBspChild,
  type DifBspNode,
  type DifConvexHull,
  type DifCoordBin,
  type DifInterior,
  type DifPlane,
  type DifSolidLeaf,
  type DifSurface,
} from './types.js';

const log = createLogger('Encoder');

/** Detail-level visibility threshold the engine expects by default */
export const DEFAULT_MIN_PIXELS = 250;

const BLACK: Vec3 = { x: 0, y: 0, z: 0 };

export interface InteriorSource {
  geometry: PooledGeometry;
  tree: BspTree;
  detailLevel?: number;
  minPixels?: number;
  /** 0-255 per channel */
  ambientColor?: Vec3;
  alarmAmbientColor?: Vec3;
}

export interface EncodeInteriorOptions {
  /** Leave out collision helper tables the engine rebuilds or ignores */
  sizeReduction?: boolean;
}

/**
 * Winding order the engine renders as a triangle strip: 0, 1, n-1, 2, n-2, ...
 */
export function stripOrder(indices: readonly number[]): number[] {
  const n = indices.length;
  const out: number[] = [];
  for (let i = 0; i < n; i++) {
    if (i < 2) {
      out.push(indices[i]);
    } else if (i % 2 === 0) {
      out.push(indices[n - 1 - (i - 2) / 2]);
    } else {
      out.push(indices[(i + 1) / 2]);
    }
  }
  return out;
}

/** Bit per winding point, all set */
export function fanMask(pointCount: number): number {
  return pointCount >= 32 ? 0xffffffff : 2 ** pointCount - 1;
}

function toColor(color: Vec3): ColorI {
  const channel = (v: number) => Math.min(255, Math.max(0, Math.trunc(v)));
  return { r: channel(color.x), g: channel(color.y), b: channel(color.z), a: 255 };
}

function texGenKey(texGen: TexGen): string {
  const { planeX, planeY } = texGen;
  return [planeX.normal.x, planeX.normal.y, planeX.normal.z, planeX.distance, planeY.normal.x, planeY.normal.y, planeY.normal.z, planeY.distance].join(
    ','
  );
}

interface PendingChild {
  treeIndex: number;
  /** Coplanar surfaces of ancestors that touch this subtree */
  inherited: number[];
  attach: (child: DifBspChild) => void;
}

class InteriorEncoder {
  private readonly normals: Vec3[] = [];
  private readonly planes: DifPlane[] = [];
  private planeRefs: number[] = [];
  private readonly texGens: TexGen[] = [];
  private readonly texGenIndex = new Map<string, number>();
  private readonly materials: string[] = [];
  private readonly windings: number[] = [];
  private readonly surfaces: DifSurface[] = [];
  private readonly convexHulls: DifConvexHull[] = [];
  private readonly hullIndices: number[] = [];
  private readonly hullPlaneIndices: number[] = [];
  private readonly hullSurfaceIndices: number[] = [];
  private readonly hullEmitStringIndices: number[] = [];
  private readonly emitStrings: number[] = [];
  private readonly emitStringIndex = new Map<string, number>();
  private readonly polyListPlanes: number[] = [];
  private readonly polyListPoints: number[] = [];
  private readonly polyListStrings: number[] = [];
  private readonly bspNodes: DifBspNode[] = [];
  private readonly bspSolidLeaves: DifSolidLeaf[] = [];
  private readonly solidLeafSurfaces: number[] = [];

  constructor(
    private readonly source: InteriorSource,
    private readonly sizeReduction: boolean
  ) {}

  encode(): DifInterior {
    const { geometry } = this.source;
    const boundingBox = computeBounds(geometry.points);

    this.encodePlanes();
    this.encodeSurfaces();
    this.encodeHulls();
    this.encodeBsp();

    if (this.sizeReduction) {
      this.polyListPlanes.push(0);
      this.polyListPoints.push(0);
      this.polyListStrings.push(0);
      this.hullPlaneIndices.push(0);
      this.hullEmitStringIndices.push(0);
      this.emitStrings.push(0);
    }

    const surfaceCount = this.surfaces.length;
    const interior: DifInterior = {
      detailLevel: this.source.detailLevel ?? 0,
      minPixels: this.source.minPixels ?? DEFAULT_MIN_PIXELS,
      boundingBox,
      boundingSphere: boundingSphere(geometry.points),
      normals: this.normals,
      planes: this.planes,
      points: geometry.points.map((p) => ({ ...p })),
      pointVisibilities: this.sizeReduction ? [] : geometry.points.map(() => 0xff),
      texGens: this.texGens,
      bspNodes: this.bspNodes,
      bspSolidLeaves: this.bspSolidLeaves,
      materials: this.materials,
      windings: this.windings,
      zones: [
        {
          portalStart: 0,
          portalCount: 0,
          surfaceStart: 0,
          surfaceCount,
          staticMeshStart: 0,
          staticMeshCount: 0,
          flags: 0,
        },
      ],
      zoneSurfaces: this.surfaces.map((_, i) => i),
      surfaces: this.surfaces,
      normalLMapIndices: new Array<number>(surfaceCount).fill(0),
      alarmLMapIndices: new Array<number>(surfaceCount).fill(NO_LIGHTMAP),
      solidLeafSurfaces: this.solidLeafSurfaces,
      convexHulls: this.convexHulls,
      convexHullEmitStrings: this.emitStrings,
      hullIndices: this.hullIndices,
      hullPlaneIndices: this.hullPlaneIndices,
      hullEmitStringIndices: this.hullEmitStringIndices,
      hullSurfaceIndices: this.hullSurfaceIndices,
      polyListPlanes: this.polyListPlanes,
      polyListPoints: this.polyListPoints,
      polyListStrings: this.polyListStrings,
      ...this.encodeCoordBins(boundingBox),
      baseAmbientColor: toColor(this.source.ambientColor ?? BLACK),
      alarmAmbientColor: toColor(this.source.alarmAmbientColor ?? BLACK),
      normal2s: this.sizeReduction ? [] : this.normals.map((n) => ({ ...n })),
    };

    log.debug('Encoded interior', {
      planes: this.planes.length,
      surfaces: surfaceCount,
      hulls: this.convexHulls.length,
      bspNodes: this.bspNodes.length,
      solidLeaves: this.bspSolidLeaves.length,
    });
    return interior;
  }

  /**
   * One DIF plane per pool plane, except that a plane whose negation is
   * already written becomes a flipped reference to it
   */
  private encodePlanes(): void {
    const { planes, inverses } = this.source.geometry;
    const normalIndex = new Map<string, number>();
    const refs: number[] = [];

    planes.forEach((plane, i) => {
      const inverse = inverses[i] ?? -1;
      if (inverse >= 0 && inverse < i) {
        refs.push(refs[inverse] ^ PLANE_FLIP);
        return;
      }
      const key = `${plane.normal.x},${plane.normal.y},${plane.normal.z}`;
      let normal = normalIndex.get(key);
      if (normal === undefined) {
        normal = this.normals.length;
        normalIndex.set(key, normal);
        this.normals.push({ ...plane.normal });
      }
      refs.push(this.planes.length);
      this.planes.push({ normalIndex: normal, distance: plane.distance });
    });

    this.planeRefs = refs;
  }

  private texGen(texGen: TexGen): number {
    const key = texGenKey(texGen);
    const existing = this.texGenIndex.get(key);
    if (existing !== undefined) return existing;
    const index = this.texGens.length;
    this.texGens.push(texGen);
    this.texGenIndex.set(key, index);
    return index;
  }

  private material(name: string): number {
    const existing = this.materials.indexOf(name);
    if (existing >= 0) return existing;
    this.materials.push(name);
    return this.materials.length - 1;
  }

  private encodeSurfaces(): void {
    for (const surface of this.source.geometry.surfaces) {
      const windingStart = this.windings.length;
      this.windings.push(...stripOrder(surface.pointIndices));
      this.surfaces.push({
        windingStart,
        windingCount: surface.pointIndices.length,
        planeIndex: this.planeRefs[surface.planeIndex],
        textureIndex: this.material(surface.material),
        texGenIndex: this.texGen(surface.texGen),
        flags: SURFACE_OUTSIDE_VISIBLE,
        fanMask: fanMask(surface.pointIndices.length),
        lightCount: 0,
        lightStateInfoStart: 0,
        mapOffsetX: 0,
        mapOffsetY: 0,
        mapSizeX: SURFACE_MAP_SIZE,
        mapSizeY: SURFACE_MAP_SIZE,
        brushId: surface.brushId,
      });
    }
  }

  /** One convex hull per brush */
  private encodeHulls(): void {
    const { geometry } = this.source;
    const planeNormals = this.planes.map((plane) => this.normals[plane.normalIndex]);

    for (const brush of geometry.brushes) {
      const surfaceIndices = Array.from({ length: brush.surfaceCount }, (_, i) => brush.firstSurface + i);
      const hullPoints: number[] = [];
      for (const s of surfaceIndices) {
        for (const p of geometry.surfaces[s].pointIndices) {
          if (!hullPoints.includes(p)) hullPoints.push(p);
        }
      }

      const hull: DifConvexHull = {
        hullStart: this.hullIndices.length,
        hullCount: hullPoints.length,
        bounds: computeBounds(hullPoints.map((p) => geometry.points[p])),
        surfaceStart: this.hullSurfaceIndices.length,
        surfaceCount: surfaceIndices.length,
        planeStart: this.hullPlaneIndices.length,
        polyListPlaneStart: 0,
        polyListPointStart: 0,
        polyListStringStart: 0,
        staticMesh: 0,
      };
      this.hullIndices.push(...hullPoints);
      this.hullSurfaceIndices.push(...surfaceIndices);

      if (!this.sizeReduction) {
        const polys: HullPoly[] = surfaceIndices.map((s) => ({
          points: geometry.surfaces[s].pointIndices.map((p) => hullPoints.indexOf(p)),
          planeRef: this.planeRefs[geometry.surfaces[s].planeIndex],
        }));
        this.hullPlaneIndices.push(...polys.map((poly) => poly.planeRef));
        hullPoints.forEach((_, vertex) => {
          this.hullEmitStringIndices.push(this.emitString(buildEmitString(polys, vertex, brush.brushId)));
        });

        const polyList = buildPolyList(
          surfaceIndices.map((s) => ({
            planeRef: this.planeRefs[geometry.surfaces[s].planeIndex],
            points: stripOrder(geometry.surfaces[s].pointIndices),
          })),
          (planeRef) => resolveNormal(planeRef, planeNormals),
          brush.brushId
        );
        hull.polyListPlaneStart = this.polyListPlanes.length;
        hull.polyListPointStart = this.polyListPoints.length;
        hull.polyListStringStart = this.polyListStrings.length;
        this.polyListPlanes.push(...polyList.planes);
        this.polyListPoints.push(...polyList.points);
        this.polyListStrings.push(...polyList.string);
      }

      this.convexHulls.push(hull);
    }
  }

  private emitString(chars: number[]): number {
    const key = chars.join(',');
    const existing = this.emitStringIndex.get(key);
    if (existing !== undefined) return existing;
    const index = this.emitStrings.length;
    this.emitStrings.push(...chars);
    this.emitStringIndex.set(key, index);
    return index;
  }

  /**
   * 16x16 grid over the XY extent; each bin lists the hulls overlapping it
   */
  private encodeCoordBins(box: AABB): { coordBins: DifCoordBin[]; coordBinIndices: number[] } {
    const coordBins: DifCoordBin[] = [];
    const coordBinIndices: number[] = [];
    const extentX = box.max.x - box.min.x;
    const extentY = box.max.y - box.min.y;

    for (let i = 0; i < COORD_BIN_GRID; i++) {
      const minX = box.min.x + (i * extentX) / COORD_BIN_GRID;
      const maxX = box.min.x + ((i + 1) * extentX) / COORD_BIN_GRID;
      for (let j = 0; j < COORD_BIN_GRID; j++) {
        const minY = box.min.y + (j * extentY) / COORD_BIN_GRID;
        const maxY = box.min.y + ((j + 1) * extentY) / COORD_BIN_GRID;
        const binStart = coordBinIndices.length;
        this.convexHulls.forEach((hull, k) => {
          const { min, max } = hull.bounds;
          if (!(minX > max.x || maxX < min.x || minY > max.y || maxY < min.y)) {
            coordBinIndices.push(k);
          }
        });
        coordBins.push({ binStart, binCount: coordBinIndices.length - binStart });
      }
    }
    return { coordBins, coordBinIndices };
  }

  /**
   * Flatten the arena tree, front subtrees first. Surfaces stored on a node
   * move down the side behind them, only into the children their polygon
   * touches, and end in the solid leaves they reach.
   */
  private encodeBsp(): void {
    const { tree, geometry } = this.source;
    const root = tree.nodes[0];

    if (!root || root.kind === 'leaf') {
      // The engine needs a root node; both sides lead to the one leaf
      const leaf = this.solidLeaf(root ? root.surfaces : []);
      this.bspNodes.push({ planeIndex: 0, front: leaf, back: leaf });
      return;
    }

    const stack: PendingChild[] = [{ treeIndex: 0, inherited: [], attach: () => undefined }];
    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;
      const node = tree.nodes[item.treeIndex];

      if (node.kind === 'leaf') {
        item.attach(this.solidLeaf([...node.surfaces, ...item.inherited]));
        continue;
      }

      const index = this.bspNodes.length;
      const ref = this.planeRefs[node.planeIndex];
      const flipped = (ref & PLANE_FLIP) !== 0;
      const placeholder: DifBspChild = { kind: 'leaf', solid: false, index: 0 };
      const encoded: DifBspNode = { planeIndex: ref & ~PLANE_FLIP, front: placeholder, back: placeholder };
      this.bspNodes.push(encoded);
      item.attach({ kind: 'node', index });

      const behind: number[] = [];
      const inFront: number[] = [];
      for (const s of item.inherited) {
        const side = this.sideOf(s, node.planeIndex);
        if (side !== 'back') inFront.push(s);
        if (side !== 'front') behind.push(s);
      }
      for (const s of node.coplanar) {
        (this.sideOf(s, node.planeIndex) === 'front' ? inFront : behind).push(s);
      }

      // A flipped plane swaps which child the engine treats as front
      const setFront = (child: DifBspChild) => {
        if (flipped) encoded.back = child;
        else encoded.front = child;
      };
      const setBack = (child: DifBspChild) => {
        if (flipped) encoded.front = child;
        else encoded.back = child;
      };

      stack.push({ treeIndex: node.back, inherited: behind, attach: setBack });
      stack.push({ treeIndex: node.front, inherited: inFront, attach: setFront });
    }
  }

  /**
   * Which children of a node on `planeIndex` surface `s` touches. A surface
   * lying in the plane goes behind when it faces the same way, in front when
   * it faces away.
   */
  private sideOf(s: number, planeIndex: number): 'front' | 'back' | 'both' {
    const { planes, points, surfaces } = this.source.geometry;
    const surface = surfaces[s];
    const plane = planes[planeIndex];
    const polygon = surface.pointIndices.map((i) => points[i]);
    switch (classifyPolygon(polygon, plane, DEFAULT_BSP_OPTIONS.splitEpsilon)) {
      case 'front':
        return 'front';
      case 'back':
        return 'back';
      case 'straddle':
        return 'both';
      case 'coplanar':
        return dotVec3(planes[surface.planeIndex].normal, plane.normal) >= 0 ? 'back' : 'front';
    }
  }

  private solidLeaf(surfaces: readonly number[]): DifBspChild {
    const unique = [...new Set(surfaces)];
    if (unique.length === 0) {
      return { kind: 'leaf', solid: false, index: 0 };
    }
    const index = this.bspSolidLeaves.length;
    this.bspSolidLeaves.push({ surfaceStart: this.solidLeafSurfaces.length, surfaceCount: unique.length });
    this.solidLeafSurfaces.push(...unique);
    return { kind: 'leaf', solid: true, index };
  }
}

/**
 * Encode one unit into an interior record
 */
export function encodeInterior(source: InteriorSource, options: EncodeInteriorOptions = {}): DifInterior {
  const { sizeReduction = false } = options;
  return new InteriorEncoder(source, sizeReduction).encode();
}
