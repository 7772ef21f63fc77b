/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DIF format types and the engine/version table
 */

import { UnsupportedVersionCombinationError, type EngineVersion } from '@csxdif/data';
import type { AABB, Plane, PoolCounts, Sphere, TexGen, Vec3 } from '@csxdif/geometry';

/** Leading u32 of every DIF file */
export const DIF_FILE_VERSION = 44;

/** Interior format versions each engine can load */
export const DIF_VERSION_TABLE: Readonly<Record<EngineVersion, readonly number[]>> = {
  mbg: [0],
  tge: [0, 1, 2, 3],
  tgea: [0, 4, 5, 6, 7, 8, 9, 10, 11],
  t3d: [0, 12, 13],
};

/** Version from which point and BSP child indices are 32 bits wide */
export const WIDE_INDEX_VERSION = 4;

/** Version from which non-mbg engines store ambient colours */
export const AMBIENT_COLOR_VERSION = 2;

/** Pool sizes addressable by a layout */
export type DifLimits = PoolCounts;

export const LEGACY_LIMITS: DifLimits = {
  points: 0xffff,
  // Bit 15 of a plane index marks a flipped plane
  planes: 0x7fff,
  surfaces: 0x3fff,
};

export const WIDE_LIMITS: DifLimits = {
  points: 0x7fffffff,
  planes: 0x7fff,
  surfaces: 0xffff,
};

/** Flip bit on a plane reference */
export const PLANE_FLIP = 0x8000;

/** Surface flag telling the engine the face is visible from outside */
export const SURFACE_OUTSIDE_VISIBLE = 0x10;

export const COORD_BIN_GRID = 16;
export const COORD_BIN_COUNT = COORD_BIN_GRID * COORD_BIN_GRID;

/** Lightmap size written for every surface; lighting is not baked */
export const SURFACE_MAP_SIZE = 32;

/** Alarm lightmap reference meaning "none" */
export const NO_LIGHTMAP = 0xffffffff;

/**
 * Field presence and width for one engine/version pair
 */
export interface DifLayout {
  engine: EngineVersion;
  version: number;
  /** 32-bit point and BSP child indices */
  wideIndices: boolean;
  /** BSP child flag marking a leaf */
  leafFlag: number;
  /** BSP child flag marking a solid leaf */
  solidFlag: number;
  ambientColors: boolean;
  /** Hulls carry a static mesh flag */
  staticMeshes: boolean;
  /** Surfaces carry their source brush id */
  surfaceBrushIds: boolean;
  /** File carries an (empty) vehicle collision block */
  vehicleCollision: boolean;
  limits: DifLimits;
}

export function supportedVersions(engine: EngineVersion): readonly number[] {
  return DIF_VERSION_TABLE[engine];
}

/**
 * Select the layout for an engine/version pair
 */
export function resolveLayout(engine: EngineVersion, version: number): DifLayout {
  const versions = supportedVersions(engine);
  if (!versions.includes(version)) {
    throw new UnsupportedVersionCombinationError(engine, version, versions);
  }
  const wideIndices = version >= WIDE_INDEX_VERSION;
  return {
    engine,
    version,
    wideIndices,
    leafFlag: wideIndices ? 0x80000 : 0x8000,
    solidFlag: wideIndices ? 0x40000 : 0x4000,
    ambientColors: version >= AMBIENT_COLOR_VERSION && engine !== 'mbg',
    staticMeshes: engine === 'tgea' || engine === 't3d',
    surfaceBrushIds: engine === 't3d',
    vehicleCollision: engine === 'mbg' || engine === 'tge',
    limits: wideIndices ? WIDE_LIMITS : LEGACY_LIMITS,
  };
}

export interface DifWriteOptions {
  engine: EngineVersion;
  version: number;
  /** Omit fields the engine does not need at run time */
  sizeReduction: boolean;
}

export interface ColorI {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface DifPlane {
  normalIndex: number;
  distance: number;
}

export interface DifSurface {
  windingStart: number;
  windingCount: number;
  /** Plane reference, bit 15 set when the surface faces away from the plane */
  planeIndex: number;
  textureIndex: number;
  texGenIndex: number;
  flags: number;
  fanMask: number;
  lightCount: number;
  lightStateInfoStart: number;
  mapOffsetX: number;
  mapOffsetY: number;
  mapSizeX: number;
  mapSizeY: number;
  brushId: number;
}

/** Reference from a BSP node to its child; flags are applied on write */
export type DifBspChild =
  | { kind: 'node'; index: number }
  | { kind: 'leaf'; solid: boolean; index: number };

export interface DifBspNode {
  planeIndex: number;
  front: DifBspChild;
  back: DifBspChild;
}

export interface DifSolidLeaf {
  surfaceStart: number;
  surfaceCount: number;
}

export interface DifZone {
  portalStart: number;
  portalCount: number;
  surfaceStart: number;
  surfaceCount: number;
  staticMeshStart: number;
  staticMeshCount: number;
  flags: number;
}

export interface DifConvexHull {
  hullStart: number;
  hullCount: number;
  bounds: AABB;
  surfaceStart: number;
  surfaceCount: number;
  planeStart: number;
  polyListPlaneStart: number;
  polyListPointStart: number;
  polyListStringStart: number;
  staticMesh: number;
}

export interface DifCoordBin {
  binStart: number;
  binCount: number;
}

/**
 * One interior record, independent of the layout it is written with
 */
export interface DifInterior {
  detailLevel: number;
  minPixels: number;
  boundingBox: AABB;
  boundingSphere: Sphere;
  normals: Vec3[];
  planes: DifPlane[];
  points: Vec3[];
  pointVisibilities: number[];
  texGens: TexGen[];
  bspNodes: DifBspNode[];
  bspSolidLeaves: DifSolidLeaf[];
  materials: string[];
  windings: number[];
  zones: DifZone[];
  zoneSurfaces: number[];
  surfaces: DifSurface[];
  normalLMapIndices: number[];
  alarmLMapIndices: number[];
  solidLeafSurfaces: number[];
  convexHulls: DifConvexHull[];
  convexHullEmitStrings: number[];
  hullIndices: number[];
  hullPlaneIndices: number[];
  hullEmitStringIndices: number[];
  hullSurfaceIndices: number[];
  polyListPlanes: number[];
  polyListPoints: number[];
  polyListStrings: number[];
  coordBins: DifCoordBin[];
  coordBinIndices: number[];
  baseAmbientColor: ColorI;
  alarmAmbientColor: ColorI;
  normal2s: Vec3[];
}

export interface DifPolyhedronEdge {
  faces: [number, number];
  vertices: [number, number];
}

export interface DifPolyhedron {
  points: Vec3[];
  planes: Plane[];
  edges: DifPolyhedronEdge[];
}

export interface DifTrigger {
  name: string;
  datablock: string;
  properties: Map<string, string>;
  polyhedron: DifPolyhedron;
  offset: Vec3;
}

export interface DifWaypoint {
  position: Vec3;
  /** Quaternion x, y, z, w */
  rotation: [number, number, number, number];
  msToNext: number;
  smoothingType: number;
}

export interface DifPathFollower {
  name: string;
  datablock: string;
  /** Sub-object index of the interior this follower moves */
  interiorResIndex: number;
  offset: Vec3;
  properties: Map<string, string>;
  triggerIds: number[];
  waypoints: DifWaypoint[];
  totalMS: number;
}

export interface DifGameEntity {
  datablock: string;
  gameClass: string;
  position: Vec3;
  properties: Map<string, string>;
}

/**
 * Everything stored in one .dif file
 */
export interface DifFile {
  interiors: DifInterior[];
  subObjects: DifInterior[];
  triggers: DifTrigger[];
  pathFollowers: DifPathFollower[];
  gameEntities: DifGameEntity[];
}
