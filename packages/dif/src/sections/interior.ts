/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Interior record serialization
 */

import { CapacityExceededError, MalformedInputError } from '@csxdif/data';
import type { AABB, Plane, TexGen } from '@csxdif/geometry';
import {
  COORD_BIN_COUNT,
  type ColorI,
  type DifBspChild,
  type DifConvexHull,
  type DifInterior,
  type DifLayout,
  type DifSurface,
  type DifZone,
} from '../types.js';
import { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

/** Version of the embedded material list block */
const MATERIAL_LIST_VERSION = 1;

const U8_MAX = 0xff;
const U16_MAX = 0xffff;

function checked(value: number, max: number, field: string): number {
  if (value > max) {
    throw new CapacityExceededError(`${field} ${value} exceeds the layout maximum of ${max}`);
  }
  return value;
}

/**
 * Field writers bound to one layout
 */
class InteriorFieldWriter {
  constructor(
    readonly out: BufferWriter,
    readonly layout: DifLayout
  ) {}

  u16(value: number, field: string): void {
    this.out.writeUint16(checked(value, U16_MAX, field));
  }

  /** Point and winding index, 16 or 32 bits */
  index(value: number, field: string): void {
    if (this.layout.wideIndices) this.out.writeUint32(value);
    else this.u16(value, field);
  }

  /** Small count, 8 or 32 bits */
  count(value: number, field: string): void {
    if (this.layout.wideIndices) this.out.writeUint32(value);
    else this.out.writeUint8(checked(value, U8_MAX, field));
  }

  /** Lightmap geometry, 8 or 16 bits */
  mapCoord(value: number, field: string): void {
    if (this.layout.wideIndices) this.u16(value, field);
    else this.out.writeUint8(checked(value, U8_MAX, field));
  }

  bspChild(child: DifBspChild): void {
    const { leafFlag, solidFlag } = this.layout;
    // Indices must stay clear of the flag bits
    checked(child.index, solidFlag - 1, 'BSP child index');
    const value = child.kind === 'node' ? child.index : leafFlag | (child.solid ? solidFlag : 0) | child.index;
    if (this.layout.wideIndices) this.out.writeUint32(value);
    else this.out.writeUint16(value);
  }

  box(box: AABB): void {
    this.out.writePoint(box.min);
    this.out.writePoint(box.max);
  }

  plane(plane: Plane): void {
    this.out.writePoint(plane.normal);
    this.out.writeFloat32(plane.distance);
  }

  color(color: ColorI): void {
    this.out.writeUint8(color.r);
    this.out.writeUint8(color.g);
    this.out.writeUint8(color.b);
    this.out.writeUint8(color.a);
  }
}

function checkLimits(interior: DifInterior, layout: DifLayout): void {
  const { limits } = layout;
  const counts = {
    points: interior.points.length,
    planes: interior.planes.length,
    surfaces: interior.surfaces.length,
  };
  for (const key of ['points', 'planes', 'surfaces'] as const) {
    if (counts[key] > limits[key]) {
      throw new CapacityExceededError(
        `Interior has ${counts[key]} ${key}; ${layout.engine} v${layout.version} allows ${limits[key]}`,
        { engine: layout.engine, version: layout.version }
      );
    }
  }
}

/**
 * Write one interior record
 */
export function writeInterior(
  out: BufferWriter,
  interior: DifInterior,
  layout: DifLayout,
  sizeReduction: boolean
): void {
  checkLimits(interior, layout);
  const w = new InteriorFieldWriter(out, layout);

  out.writeUint32(layout.version);
  out.writeUint32(interior.detailLevel);
  out.writeUint32(interior.minPixels);
  w.box(interior.boundingBox);
  out.writePoint(interior.boundingSphere.center);
  out.writeFloat32(interior.boundingSphere.radius);
  // No alarm state, no light state entries
  out.writeUint8(0);
  out.writeUint32(0);

  out.writeArray(interior.normals, (n) => out.writePoint(n));
  out.writeArray(interior.planes, (p) => {
    w.u16(p.normalIndex, 'normal index');
    out.writeFloat32(p.distance);
  });
  out.writeArray(interior.points, (p) => out.writePoint(p));
  out.writeArray(interior.pointVisibilities, (v) => out.writeUint8(v));
  out.writeArray(interior.texGens, (t) => {
    w.plane(t.planeX);
    w.plane(t.planeY);
  });
  out.writeArray(interior.bspNodes, (node) => {
    w.u16(node.planeIndex, 'BSP plane index');
    w.bspChild(node.front);
    w.bspChild(node.back);
  });
  out.writeArray(interior.bspSolidLeaves, (leaf) => {
    out.writeUint32(leaf.surfaceStart);
    w.u16(leaf.surfaceCount, 'solid leaf surface count');
  });

  out.writeUint8(MATERIAL_LIST_VERSION);
  out.writeArray(interior.materials, (m) => out.writeString(m));

  out.writeArray(interior.windings, (i) => w.index(i, 'winding index'));
  out.writeArray(interior.zones, (zone) => writeZone(w, zone));
  out.writeArray(interior.zoneSurfaces, (s) => w.u16(s, 'zone surface'));
  // Zone portal list, portals
  out.writeUint32(0);
  out.writeUint32(0);

  out.writeArray(interior.surfaces, (s) => writeSurface(w, s));
  out.writeArray(interior.normalLMapIndices, (i) => out.writeUint32(i));
  out.writeArray(interior.alarmLMapIndices, (i) => out.writeUint32(i));
  // Null surfaces, lightmaps
  out.writeUint32(0);
  out.writeUint32(0);
  out.writeArray(interior.solidLeafSurfaces, (s) => out.writeUint32(s));
  // Animated lights, light states, state data, state data buffer, its flags
  for (let i = 0; i < 5; i++) out.writeUint32(0);
  // Name buffer, sub-objects
  out.writeUint32(0);
  out.writeUint32(0);

  out.writeArray(interior.convexHulls, (hull) => writeHull(w, hull));
  out.writeArray(interior.convexHullEmitStrings, (c) => out.writeUint8(c));
  out.writeArray(interior.hullIndices, (i) => w.index(i, 'hull point'));
  out.writeArray(interior.hullPlaneIndices, (i) => w.u16(i, 'hull plane'));
  out.writeArray(interior.hullEmitStringIndices, (i) => out.writeUint32(i));
  out.writeArray(interior.hullSurfaceIndices, (i) => out.writeUint32(i));
  out.writeArray(interior.polyListPlanes, (i) => w.u16(i, 'poly list plane'));
  out.writeArray(interior.polyListPoints, (i) => w.index(i, 'poly list point'));
  out.writeArray(interior.polyListStrings, (c) => out.writeUint8(c));

  if (interior.coordBins.length !== COORD_BIN_COUNT) {
    throw new MalformedInputError(`Interior has ${interior.coordBins.length} coord bins, expected ${COORD_BIN_COUNT}`);
  }
  for (const bin of interior.coordBins) {
    out.writeUint32(bin.binStart);
    out.writeUint32(bin.binCount);
  }
  out.writeArray(interior.coordBinIndices, (i) => w.u16(i, 'coord bin hull'));
  // Coord bin mode
  out.writeUint32(0);

  if (layout.ambientColors && !sizeReduction) {
    w.color(interior.baseAmbientColor);
    w.color(interior.alarmAmbientColor);
  }
  if (layout.staticMeshes) {
    out.writeUint32(0);
  }
  out.writeArray(interior.normal2s, (n) => out.writePoint(n));
  // Extended lightmap data
  out.writeUint32(0);
}

function writeZone(w: InteriorFieldWriter, zone: DifZone): void {
  w.u16(zone.portalStart, 'zone portal start');
  w.u16(zone.portalCount, 'zone portal count');
  w.out.writeUint32(zone.surfaceStart);
  w.out.writeUint32(zone.surfaceCount);
  if (w.layout.staticMeshes) {
    w.out.writeUint32(zone.staticMeshStart);
    w.out.writeUint32(zone.staticMeshCount);
  }
  w.u16(zone.flags, 'zone flags');
}

function writeSurface(w: InteriorFieldWriter, s: DifSurface): void {
  const { out } = w;
  out.writeUint32(s.windingStart);
  w.count(s.windingCount, 'winding length');
  w.u16(s.planeIndex, 'surface plane');
  w.u16(s.textureIndex, 'texture index');
  out.writeUint32(s.texGenIndex);
  out.writeUint8(s.flags);
  out.writeUint32(s.fanMask);
  // Lightmap texgen: final word and two distances
  out.writeUint16(0);
  out.writeFloat32(0);
  out.writeFloat32(0);
  w.u16(s.lightCount, 'light count');
  out.writeUint32(s.lightStateInfoStart);
  w.mapCoord(s.mapOffsetX, 'map offset');
  w.mapCoord(s.mapOffsetY, 'map offset');
  w.mapCoord(s.mapSizeX, 'map size');
  w.mapCoord(s.mapSizeY, 'map size');
  if (w.layout.surfaceBrushIds) {
    out.writeUint32(s.brushId);
  }
}

function writeHull(w: InteriorFieldWriter, hull: DifConvexHull): void {
  const { out } = w;
  out.writeUint32(hull.hullStart);
  w.u16(hull.hullCount, 'hull point count');
  w.box(hull.bounds);
  out.writeUint32(hull.surfaceStart);
  w.u16(hull.surfaceCount, 'hull surface count');
  out.writeUint32(hull.planeStart);
  out.writeUint32(hull.polyListPlaneStart);
  out.writeUint32(hull.polyListPointStart);
  out.writeUint32(hull.polyListStringStart);
  if (w.layout.staticMeshes) {
    out.writeUint8(hull.staticMesh);
  }
}

/**
 * Field readers bound to one layout
 */
class InteriorFieldReader {
  constructor(
    readonly input: BufferReader,
    readonly layout: DifLayout
  ) {}

  index(): number {
    return this.layout.wideIndices ? this.input.readUint32() : this.input.readUint16();
  }

  count(): number {
    return this.layout.wideIndices ? this.input.readUint32() : this.input.readUint8();
  }

  mapCoord(): number {
    return this.layout.wideIndices ? this.input.readUint16() : this.input.readUint8();
  }

  bspChild(): DifBspChild {
    const { leafFlag, solidFlag } = this.layout;
    const value = this.index();
    if ((value & leafFlag) === 0) {
      return { kind: 'node', index: value };
    }
    return { kind: 'leaf', solid: (value & solidFlag) !== 0, index: value & (solidFlag - 1) };
  }

  box(): AABB {
    const min = this.input.readPoint();
    const max = this.input.readPoint();
    return { min, max };
  }

  plane(): Plane {
    const normal = this.input.readPoint();
    const distance = this.input.readFloat32();
    return { normal, distance };
  }

  color(): ColorI {
    const r = this.input.readUint8();
    const g = this.input.readUint8();
    const b = this.input.readUint8();
    const a = this.input.readUint8();
    return { r, g, b, a };
  }

  /** Consume a u32 that this writer always leaves zero */
  zero(field: string): void {
    const value = this.input.readUint32();
    if (value !== 0) {
      throw new MalformedInputError(`Unsupported DIF content: ${field} = ${value}`);
    }
  }
}

const BLACK: ColorI = { r: 0, g: 0, b: 0, a: 255 };

/**
 * Read one interior record written by writeInterior
 */
export function readInterior(
  input: BufferReader,
  resolve: (version: number) => DifLayout,
  sizeReduction: boolean
): DifInterior {
  const layout = resolve(input.readUint32());
  const r = new InteriorFieldReader(input, layout);

  const detailLevel = input.readUint32();
  const minPixels = input.readUint32();
  const boundingBox = r.box();
  const center = input.readPoint();
  const radius = input.readFloat32();
  input.readUint8();
  r.zero('light state entries');

  const normals = input.readArray(() => input.readPoint());
  const planes = input.readArray(() => {
    const normalIndex = input.readUint16();
    const distance = input.readFloat32();
    return { normalIndex, distance };
  });
  const points = input.readArray(() => input.readPoint());
  const pointVisibilities = input.readArray(() => input.readUint8());
  const texGens = input.readArray((): TexGen => {
    const planeX = r.plane();
    const planeY = r.plane();
    return { planeX, planeY };
  });
  const bspNodes = input.readArray(() => {
    const planeIndex = input.readUint16();
    const front = r.bspChild();
    const back = r.bspChild();
    return { planeIndex, front, back };
  });
  const bspSolidLeaves = input.readArray(() => {
    const surfaceStart = input.readUint32();
    const surfaceCount = input.readUint16();
    return { surfaceStart, surfaceCount };
  });

  input.readUint8();
  const materials = input.readArray(() => input.readString());
  const windings = input.readArray(() => r.index());
  const zones = input.readArray((): DifZone => {
    const portalStart = input.readUint16();
    const portalCount = input.readUint16();
    const surfaceStart = input.readUint32();
    const surfaceCount = input.readUint32();
    const staticMeshStart = layout.staticMeshes ? input.readUint32() : 0;
    const staticMeshCount = layout.staticMeshes ? input.readUint32() : 0;
    const flags = input.readUint16();
    return { portalStart, portalCount, surfaceStart, surfaceCount, staticMeshStart, staticMeshCount, flags };
  });
  const zoneSurfaces = input.readArray(() => input.readUint16());
  r.zero('zone portal list');
  r.zero('portals');

  const surfaces = input.readArray((): DifSurface => {
    const windingStart = input.readUint32();
    const windingCount = r.count();
    const planeIndex = input.readUint16();
    const textureIndex = input.readUint16();
    const texGenIndex = input.readUint32();
    const flags = input.readUint8();
    const fanMask = input.readUint32();
    input.readUint16();
    input.readFloat32();
    input.readFloat32();
    const lightCount = input.readUint16();
    const lightStateInfoStart = input.readUint32();
    const mapOffsetX = r.mapCoord();
    const mapOffsetY = r.mapCoord();
    const mapSizeX = r.mapCoord();
    const mapSizeY = r.mapCoord();
    const brushId = layout.surfaceBrushIds ? input.readUint32() : 0;
    return {
      windingStart,
      windingCount,
      planeIndex,
      textureIndex,
      texGenIndex,
      flags,
      fanMask,
      lightCount,
      lightStateInfoStart,
      mapOffsetX,
      mapOffsetY,
      mapSizeX,
      mapSizeY,
      brushId,
    };
  });
  const normalLMapIndices = input.readArray(() => input.readUint32());
  const alarmLMapIndices = input.readArray(() => input.readUint32());
  r.zero('null surfaces');
  r.zero('lightmaps');
  const solidLeafSurfaces = input.readArray(() => input.readUint32());
  for (const field of ['animated lights', 'light states', 'state data', 'state data buffer', 'state data flags']) {
    r.zero(field);
  }
  r.zero('name buffer');
  r.zero('sub-objects');

  const convexHulls = input.readArray((): DifConvexHull => {
    const hullStart = input.readUint32();
    const hullCount = input.readUint16();
    const bounds = r.box();
    const surfaceStart = input.readUint32();
    const surfaceCount = input.readUint16();
    const planeStart = input.readUint32();
    const polyListPlaneStart = input.readUint32();
    const polyListPointStart = input.readUint32();
    const polyListStringStart = input.readUint32();
    const staticMesh = layout.staticMeshes ? input.readUint8() : 0;
    return {
      hullStart,
      hullCount,
      bounds,
      surfaceStart,
      surfaceCount,
      planeStart,
      polyListPlaneStart,
      polyListPointStart,
      polyListStringStart,
      staticMesh,
    };
  });
  const convexHullEmitStrings = input.readArray(() => input.readUint8());
  const hullIndices = input.readArray(() => r.index());
  const hullPlaneIndices = input.readArray(() => input.readUint16());
  const hullEmitStringIndices = input.readArray(() => input.readUint32());
  const hullSurfaceIndices = input.readArray(() => input.readUint32());
  const polyListPlanes = input.readArray(() => input.readUint16());
  const polyListPoints = input.readArray(() => r.index());
  const polyListStrings = input.readArray(() => input.readUint8());

  const coordBins = Array.from({ length: COORD_BIN_COUNT }, () => {
    const binStart = input.readUint32();
    const binCount = input.readUint32();
    return { binStart, binCount };
  });
  const coordBinIndices = input.readArray(() => input.readUint16());
  r.zero('coord bin mode');

  const hasAmbient = layout.ambientColors && !sizeReduction;
  const baseAmbientColor = hasAmbient ? r.color() : BLACK;
  const alarmAmbientColor = hasAmbient ? r.color() : BLACK;
  if (layout.staticMeshes) {
    r.zero('static meshes');
  }
  const normal2s = input.readArray(() => input.readPoint());
  r.zero('extended lightmap data');

  return {
    detailLevel,
    minPixels,
    boundingBox,
    boundingSphere: { center, radius },
    normals,
    planes,
    points,
    pointVisibilities,
    texGens,
    bspNodes,
    bspSolidLeaves,
    materials,
    windings,
    zones,
    zoneSurfaces,
    surfaces,
    normalLMapIndices,
    alarmLMapIndices,
    solidLeafSurfaces,
    convexHulls,
    convexHullEmitStrings,
    hullIndices,
    hullPlaneIndices,
    hullEmitStringIndices,
    hullSurfaceIndices,
    polyListPlanes,
    polyListPoints,
    polyListStrings,
    coordBins,
    coordBinIndices,
    baseAmbientColor,
    alarmAmbientColor,
    normal2s,
  };
}
