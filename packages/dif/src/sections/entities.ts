/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Trigger, path follower and game entity serialization
 */

import type { Plane } from '@csxdif/geometry';
import type { DifGameEntity, DifPathFollower, DifPolyhedronEdge, DifTrigger, DifWaypoint } from '../types.js';
import { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

function writeProperties(writer: BufferWriter, properties: Map<string, string>): void {
  writer.writeUint32(properties.size);
  for (const [key, value] of properties) {
    writer.writeString(key);
    writer.writeString(value);
  }
}

function readProperties(reader: BufferReader): Map<string, string> {
  const properties = new Map<string, string>();
  for (const [key, value] of reader.readArray((): [string, string] => [reader.readString(), reader.readString()])) {
    properties.set(key, value);
  }
  return properties;
}

function writePlane(writer: BufferWriter, plane: Plane): void {
  writer.writePoint(plane.normal);
  writer.writeFloat32(plane.distance);
}

export function writeTrigger(writer: BufferWriter, trigger: DifTrigger): void {
  writer.writeString(trigger.name);
  writer.writeString(trigger.datablock);
  writeProperties(writer, trigger.properties);

  const { points, planes, edges } = trigger.polyhedron;
  writer.writeArray(points, (p) => writer.writePoint(p));
  writer.writeArray(planes, (p) => writePlane(writer, p));
  writer.writeArray(edges, (edge) => {
    writer.writeUint32(edge.faces[0]);
    writer.writeUint32(edge.faces[1]);
    writer.writeUint32(edge.vertices[0]);
    writer.writeUint32(edge.vertices[1]);
  });

  writer.writePoint(trigger.offset);
}

export function readTrigger(reader: BufferReader): DifTrigger {
  const name = reader.readString();
  const datablock = reader.readString();
  const properties = readProperties(reader);
  const points = reader.readArray(() => reader.readPoint());
  const planes = reader.readArray((): Plane => {
    const normal = reader.readPoint();
    const distance = reader.readFloat32();
    return { normal, distance };
  });
  const edges = reader.readArray((): DifPolyhedronEdge => {
    const f0 = reader.readUint32();
    const f1 = reader.readUint32();
    const v0 = reader.readUint32();
    const v1 = reader.readUint32();
    return { faces: [f0, f1], vertices: [v0, v1] };
  });
  const offset = reader.readPoint();
  return { name, datablock, properties, polyhedron: { points, planes, edges }, offset };
}

export function writePathFollower(writer: BufferWriter, follower: DifPathFollower): void {
  writer.writeString(follower.name);
  writer.writeString(follower.datablock);
  writer.writeUint32(follower.interiorResIndex);
  writer.writePoint(follower.offset);
  writeProperties(writer, follower.properties);
  writer.writeArray(follower.triggerIds, (id) => writer.writeUint32(id));
  writer.writeArray(follower.waypoints, (waypoint) => {
    writer.writePoint(waypoint.position);
    for (const component of waypoint.rotation) {
      writer.writeFloat32(component);
    }
    writer.writeUint32(waypoint.msToNext);
    writer.writeUint32(waypoint.smoothingType);
  });
  writer.writeUint32(follower.totalMS);
}

export function readPathFollower(reader: BufferReader): DifPathFollower {
  const name = reader.readString();
  const datablock = reader.readString();
  const interiorResIndex = reader.readUint32();
  const offset = reader.readPoint();
  const properties = readProperties(reader);
  const triggerIds = reader.readArray(() => reader.readUint32());
  const waypoints = reader.readArray((): DifWaypoint => {
    const position = reader.readPoint();
    const x = reader.readFloat32();
    const y = reader.readFloat32();
    const z = reader.readFloat32();
    const w = reader.readFloat32();
    const msToNext = reader.readUint32();
    const smoothingType = reader.readUint32();
    return { position, rotation: [x, y, z, w], msToNext, smoothingType };
  });
  const totalMS = reader.readUint32();
  return { name, datablock, interiorResIndex, offset, properties, triggerIds, waypoints, totalMS };
}

export function writeGameEntity(writer: BufferWriter, entity: DifGameEntity): void {
  writer.writeString(entity.datablock);
  writer.writeString(entity.gameClass);
  writer.writePoint(entity.position);
  writeProperties(writer, entity.properties);
}

export function readGameEntity(reader: BufferReader): DifGameEntity {
  const datablock = reader.readString();
  const gameClass = reader.readString();
  const position = reader.readPoint();
  const properties = readProperties(reader);
  return { datablock, gameClass, position, properties };
}
