/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Entity records - triggers, path followers and game entities for the primary file
 */

import { vec3, type AABB, type Vec3 } from '@csxdif/geometry';
import type { CsxEntity, ElevatorBinding } from '@csxdif/parser';
import type {
  DifGameEntity,
  DifPathFollower,
  DifPolyhedron,
  DifPolyhedronEdge,
  DifTrigger,
  DifWaypoint,
} from '@csxdif/dif';

export const DEFAULT_TRIGGER_DATABLOCK = 'DefaultTrigger';
export const DEFAULT_PATH_DATABLOCK = 'PathedDefault';
/** Object name the engine expects mission scripts to replace */
export const PLACEHOLDER_NAME = 'MustChange';

const ORIGIN: Vec3 = { x: 0, y: 0, z: 0 };
const IDENTITY_ROTATION: DifWaypoint['rotation'] = [0, 0, 0, 1];

// Vertices 0-3 are the top face, 4-7 the bottom; planes are -x, +y, +x, -y, +z, -z
const BOX_EDGES: ReadonlyArray<[number, number, number, number]> = [
  [0, 4, 0, 1],
  [5, 0, 4, 5],
  [3, 0, 0, 4],
  [1, 4, 1, 2],
  [5, 1, 5, 6],
  [0, 1, 1, 5],
  [2, 4, 2, 3],
  [5, 2, 6, 7],
  [1, 2, 2, 6],
  [3, 4, 3, 0],
  [5, 3, 7, 4],
  [2, 3, 3, 7],
];

function withoutKeys(properties: Map<string, string>, keys: readonly string[]): Map<string, string> {
  return new Map([...properties].filter(([key]) => !keys.includes(key)));
}

/** Unsigned integer property, 0 when absent or not a plain integer */
function uintProperty(entity: CsxEntity, key: string): number {
  const value = entity.properties.get(key)?.trim();
  if (value === undefined || !/^\d+$/.test(value)) return 0;
  const parsed = Number(value);
  return parsed > 0xffffffff ? 0 : parsed;
}

/**
 * Closed box polyhedron for a trigger volume
 */
export function boxPolyhedron(bounds: AABB): DifPolyhedron {
  const { min, max } = bounds;
  const edges: DifPolyhedronEdge[] = BOX_EDGES.map(([f0, f1, v0, v1]) => ({ faces: [f0, f1], vertices: [v0, v1] }));
  return {
    points: [
      vec3(min.x, min.y, max.z),
      vec3(min.x, max.y, max.z),
      vec3(max.x, max.y, max.z),
      vec3(max.x, min.y, max.z),
      vec3(min.x, min.y, min.z),
      vec3(min.x, max.y, min.z),
      vec3(max.x, max.y, min.z),
      vec3(max.x, min.y, min.z),
    ],
    planes: [
      { normal: vec3(-1, 0, 0), distance: min.x },
      { normal: vec3(0, 1, 0), distance: -max.y },
      { normal: vec3(1, 0, 0), distance: -max.x },
      { normal: vec3(0, -1, 0), distance: min.y },
      { normal: vec3(0, 0, 1), distance: -max.z },
      { normal: vec3(0, 0, -1), distance: min.z },
    ],
    edges,
  };
}

export function buildTrigger(entity: CsxEntity, bounds: AABB): DifTrigger {
  return {
    name: PLACEHOLDER_NAME,
    datablock: entity.properties.get('datablock') ?? DEFAULT_TRIGGER_DATABLOCK,
    properties: withoutKeys(entity.properties, ['datablock']),
    polyhedron: boxPolyhedron(bounds),
    offset: { ...ORIGIN },
  };
}

export function buildWaypoint(node: CsxEntity): DifWaypoint {
  return {
    position: node.origin ? { ...node.origin } : { ...ORIGIN },
    rotation: [...IDENTITY_ROTATION],
    msToNext: uintProperty(node, 'next_time'),
    smoothingType: uintProperty(node, 'smoothing'),
  };
}

/**
 * Path follower moving sub-object `interiorResIndex` along the elevator's path nodes
 */
export function buildPathFollower(
  binding: ElevatorBinding,
  interiorResIndex: number,
  triggerIds: number[]
): DifPathFollower {
  const { elevator, pathNodes } = binding;
  const waypoints = pathNodes.map(buildWaypoint);
  return {
    name: PLACEHOLDER_NAME,
    datablock: elevator.properties.get('datablock') ?? DEFAULT_PATH_DATABLOCK,
    interiorResIndex,
    offset: { ...ORIGIN },
    properties: withoutKeys(elevator.properties, ['datablock']),
    triggerIds,
    waypoints,
    totalMS: waypoints.reduce((sum, waypoint) => sum + waypoint.msToNext, 0),
  };
}

export function buildGameEntity(entity: CsxEntity): DifGameEntity {
  return {
    datablock: entity.properties.get('datablock') ?? entity.classname,
    gameClass: entity.properties.get('game_class') ?? '',
    position: entity.origin ? { ...entity.origin } : { ...ORIGIN },
    properties: withoutKeys(entity.properties, ['datablock', 'game_class']),
  };
}
