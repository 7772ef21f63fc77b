/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { CapacityExceededError, MalformedInputError, UnsupportedVersionCombinationError } from '@csxdif/data';
import { Deduplicator, fitPlane, vec3, type FacetedBrush, type PooledGeometry, type Vec3 } from '@csxdif/geometry';
import { buildBsp, type BspTree } from '@csxdif/spatial';

import { encodeInterior, fanMask, stripOrder } from './interior-encoder.js';
import { DifReader } from './reader.js';
import { DifWriter } from './writer.js';
import { resolveLayout, type DifFile, type DifInterior, type DifWriteOptions } from './types.js';

function createBox(id: number, min: Vec3, max: Vec3): FacetedBrush {
  const { x: x0, y: y0, z: z0 } = min;
  const { x: x1, y: y1, z: z1 } = max;
  const loops: Vec3[][] = [
    [vec3(x0, y0, z0), vec3(x0, y0, z1), vec3(x0, y1, z1), vec3(x0, y1, z0)],
    [vec3(x1, y0, z0), vec3(x1, y1, z0), vec3(x1, y1, z1), vec3(x1, y0, z1)],
    [vec3(x0, y0, z0), vec3(x1, y0, z0), vec3(x1, y0, z1), vec3(x0, y0, z1)],
    [vec3(x0, y1, z0), vec3(x0, y1, z1), vec3(x1, y1, z1), vec3(x1, y1, z0)],
    [vec3(x0, y0, z0), vec3(x0, y1, z0), vec3(x1, y1, z0), vec3(x1, y0, z0)],
    [vec3(x0, y0, z1), vec3(x1, y0, z1), vec3(x1, y1, z1), vec3(x0, y1, z1)],
  ];
  return {
    id,
    faces: loops.map((points, i) => ({
      points,
      plane: fitPlane(points),
      brushId: id,
      faceId: id * 6 + i,
      material: i === 5 ? 'grass' : 'stone',
      texGen: {
        planeX: { normal: vec3(1, 0, 0), distance: 0 },
        planeY: { normal: vec3(0, 1, 0), distance: 0 },
      },
    })),
  };
}

function pool(brushes: FacetedBrush[]): PooledGeometry {
  const dedup = new Deduplicator({ pointEpsilon: 1e-6, planeEpsilon: 1e-5 });
  brushes.forEach((brush) => dedup.addBrush(brush));
  return dedup.finish();
}

const cube = () => pool([createBox(3, vec3(0, 0, 0), vec3(1, 1, 1))]);
const touching = () => pool([createBox(0, vec3(0, 0, 0), vec3(1, 1, 1)), createBox(1, vec3(1, 0, 0), vec3(2, 1, 1))]);

function encodeCube(sizeReduction: boolean): DifInterior {
  const geometry = cube();
  return encodeInterior({ geometry, tree: buildBsp(geometry), ambientColor: vec3(10, 20, 300) }, { sizeReduction });
}

function fileOf(interior: DifInterior): DifFile {
  return { interiors: [interior], subObjects: [], triggers: [], pathFollowers: [], gameEntities: [] };
}

describe('resolveLayout', () => {
  it('should use legacy widths for mbg', () => {
    expect(resolveLayout('mbg', 0)).toMatchObject({
      wideIndices: false,
      leafFlag: 0x8000,
      solidFlag: 0x4000,
      ambientColors: false,
      staticMeshes: false,
      vehicleCollision: true,
      limits: { points: 65535, planes: 32767, surfaces: 16383 },
    });
  });

  it('should widen indices from version 4', () => {
    expect(resolveLayout('tgea', 4)).toMatchObject({
      wideIndices: true,
      leafFlag: 0x80000,
      solidFlag: 0x40000,
      ambientColors: true,
      staticMeshes: true,
      surfaceBrushIds: false,
      vehicleCollision: false,
      limits: { points: 0x7fffffff, planes: 32767, surfaces: 65535 },
    });
  });

  it('should store ambient colours from tge version 2', () => {
    expect(resolveLayout('tge', 1).ambientColors).toBe(false);
    expect(resolveLayout('tge', 2).ambientColors).toBe(true);
    expect(resolveLayout('t3d', 0).ambientColors).toBe(false);
  });

  it('should carry surface brush ids only for t3d', () => {
    expect(resolveLayout('t3d', 13).surfaceBrushIds).toBe(true);
    expect(resolveLayout('tgea', 11).surfaceBrushIds).toBe(false);
  });

  it('should reject versions an engine cannot load', () => {
    expect(() => resolveLayout('mbg', 3)).toThrow(UnsupportedVersionCombinationError);
    expect(() => resolveLayout('mbg', 3)).toThrow('Engine "mbg" has no DIF layout for interior version 3 (supported: 0)');
    expect(() => resolveLayout('tgea', 2)).toThrow(UnsupportedVersionCombinationError);
    expect(() => resolveLayout('t3d', 11)).toThrow(UnsupportedVersionCombinationError);
  });
});

describe('encodeInterior', () => {
  it('should order windings as a triangle strip', () => {
    expect(stripOrder([10, 11, 12, 13])).toEqual([10, 11, 13, 12]);
    expect(stripOrder([0, 1, 2, 3, 4])).toEqual([0, 1, 4, 2, 3]);
  });

  it('should set one fan mask bit per point', () => {
    expect(fanMask(4)).toBe(0b1111);
    expect(fanMask(31)).toBe(0x7fffffff);
    expect(fanMask(32)).toBe(0xffffffff);
  });

  it('should encode a cube as one hull and one solid leaf', () => {
    const interior = encodeCube(true);

    expect(interior.points).toHaveLength(8);
    expect(interior.planes).toHaveLength(6);
    expect(interior.normals).toHaveLength(6);
    expect(interior.surfaces).toHaveLength(6);
    expect(interior.windings).toHaveLength(24);
    expect(interior.materials).toEqual(['stone', 'grass']);
    expect(interior.texGens).toHaveLength(1);
    expect(interior.surfaces.map((s) => s.textureIndex)).toEqual([0, 0, 0, 0, 0, 1]);
    expect(interior.surfaces.map((s) => s.planeIndex)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(interior.surfaces[0]).toMatchObject({ windingStart: 0, windingCount: 4, fanMask: 15, mapSizeX: 32, brushId: 3 });

    expect(interior.bspNodes).toEqual([
      {
        planeIndex: 0,
        front: { kind: 'leaf', solid: true, index: 0 },
        back: { kind: 'leaf', solid: true, index: 0 },
      },
    ]);
    expect(interior.bspSolidLeaves).toEqual([{ surfaceStart: 0, surfaceCount: 6 }]);
    expect(interior.solidLeafSurfaces).toEqual([0, 1, 2, 3, 4, 5]);

    expect(interior.convexHulls).toHaveLength(1);
    expect(interior.convexHulls[0]).toMatchObject({ hullStart: 0, hullCount: 8, surfaceStart: 0, surfaceCount: 6 });
    expect(interior.zones).toEqual([
      { portalStart: 0, portalCount: 0, surfaceStart: 0, surfaceCount: 6, staticMeshStart: 0, staticMeshCount: 0, flags: 0 },
    ]);
    expect(interior.alarmLMapIndices).toEqual(new Array(6).fill(0xffffffff));
    expect(interior.baseAmbientColor).toEqual({ r: 10, g: 20, b: 255, a: 255 });
  });

  it('should list the single hull in every coord bin', () => {
    const interior = encodeCube(true);
    expect(interior.coordBins).toHaveLength(256);
    expect(interior.coordBins[0]).toEqual({ binStart: 0, binCount: 1 });
    expect(interior.coordBins[255]).toEqual({ binStart: 255, binCount: 1 });
    expect(interior.coordBinIndices).toEqual(new Array(256).fill(0));
  });

  it('should keep placeholder collision tables under size reduction', () => {
    const interior = encodeCube(true);
    expect(interior.hullPlaneIndices).toEqual([0]);
    expect(interior.hullEmitStringIndices).toEqual([0]);
    expect(interior.convexHullEmitStrings).toEqual([0]);
    expect(interior.polyListPlanes).toEqual([0]);
    expect(interior.polyListPoints).toEqual([0]);
    expect(interior.polyListStrings).toEqual([0]);
    expect(interior.pointVisibilities).toEqual([]);
    expect(interior.normal2s).toEqual([]);
  });

  it('should build full collision tables without size reduction', () => {
    const interior = encodeCube(false);
    expect(interior.hullPlaneIndices).toEqual([0, 1, 2, 3, 4, 5]);
    expect(interior.hullEmitStringIndices).toHaveLength(8);
    expect(interior.polyListPlanes).toEqual([0, 1, 2, 3, 4, 5]);
    expect(interior.polyListPoints).toHaveLength(8);
    expect(interior.pointVisibilities).toEqual(new Array(8).fill(0xff));
    expect(interior.normal2s).toEqual(interior.normals);
  });

  it('should write a negated plane as a flipped reference', () => {
    const geometry = touching();
    expect(geometry.inverses[6]).toBe(1);

    const interior = encodeInterior({ geometry, tree: buildBsp(geometry, { strategy: 'none' }) });
    expect(interior.planes).toHaveLength(7);
    expect(interior.surfaces[6].planeIndex).toBe(0x8001);
    expect(interior.convexHulls).toHaveLength(2);
  });

  it('should swap children under a flipped plane', () => {
    const geometry = touching();
    const tree: BspTree = {
      nodes: [
        { kind: 'node', planeIndex: 6, front: 1, back: 2, coplanar: [] },
        { kind: 'leaf', surfaces: [0] },
        { kind: 'leaf', surfaces: [6] },
      ],
    };
    const interior = encodeInterior({ geometry, tree });

    expect(interior.bspNodes).toEqual([
      {
        planeIndex: 1,
        front: { kind: 'leaf', solid: true, index: 1 },
        back: { kind: 'leaf', solid: true, index: 0 },
      },
    ]);
    expect(interior.solidLeafSurfaces).toEqual([0, 6]);
  });

  it('should move node surfaces into the leaves behind them', () => {
    const geometry = touching();
    const tree: BspTree = {
      nodes: [
        { kind: 'node', planeIndex: 1, front: 1, back: 2, coplanar: [1, 6] },
        { kind: 'leaf', surfaces: [7] },
        { kind: 'leaf', surfaces: [0] },
      ],
    };
    const interior = encodeInterior({ geometry, tree });

    expect(interior.bspNodes[0]).toEqual({
      planeIndex: 1,
      front: { kind: 'leaf', solid: true, index: 0 },
      back: { kind: 'leaf', solid: true, index: 1 },
    });
    expect(interior.bspSolidLeaves).toEqual([
      { surfaceStart: 0, surfaceCount: 2 },
      { surfaceStart: 2, surfaceCount: 2 },
    ]);
    expect(interior.solidLeafSurfaces).toEqual([7, 6, 0, 1]);
  });

  it('should keep node surfaces out of leaves they do not touch', () => {
    const geometry = touching();
    // Below the shared x = 1 wall, split again on the y = 0 floor plane; the
    // wall lies entirely on one side of it
    const tree: BspTree = {
      nodes: [
        { kind: 'node', planeIndex: geometry.surfaces[1].planeIndex, front: 1, back: 4, coplanar: [1, 6] },
        { kind: 'node', planeIndex: geometry.surfaces[8].planeIndex, front: 2, back: 3, coplanar: [] },
        { kind: 'leaf', surfaces: [] },
        { kind: 'leaf', surfaces: [] },
        { kind: 'leaf', surfaces: [0] },
      ],
    };
    const interior = encodeInterior({ geometry, tree });

    expect(interior.bspSolidLeaves).toEqual([
      { surfaceStart: 0, surfaceCount: 1 },
      { surfaceStart: 1, surfaceCount: 2 },
    ]);
    expect(interior.solidLeafSurfaces).toEqual([6, 0, 1]);
  });
});

describe('DifWriter and DifReader', () => {
  const writer = new DifWriter();
  const reader = new DifReader();

  function roundTrip(interior: DifInterior, options: DifWriteOptions): DifInterior {
    const bytes = writer.write(fileOf(interior), options);
    return reader.read(bytes, options).interiors[0];
  }

  it('should start with the file version and no preview', () => {
    const bytes = writer.write(fileOf(encodeCube(true)), { engine: 'mbg', version: 0, sizeReduction: true });
    expect(Array.from(bytes.subarray(0, 5))).toEqual([44, 0, 0, 0, 0]);
  });

  it('should read back a size-reduced mbg interior', () => {
    const interior = encodeCube(true);
    const decoded = roundTrip(interior, { engine: 'mbg', version: 0, sizeReduction: true });

    // mbg stores neither ambient colours nor surface brush ids
    expect(decoded).toEqual({
      ...interior,
      boundingSphere: decoded.boundingSphere,
      surfaces: interior.surfaces.map((s) => ({ ...s, brushId: 0 })),
      baseAmbientColor: { r: 0, g: 0, b: 0, a: 255 },
    });
    expect(decoded.boundingSphere.center).toEqual(interior.boundingSphere.center);
    expect(decoded.boundingSphere.radius).toBeCloseTo(interior.boundingSphere.radius, 6);
  });

  it('should read back a full t3d interior with ambient colours and brush ids', () => {
    const interior = encodeCube(false);
    const decoded = roundTrip(interior, { engine: 't3d', version: 13, sizeReduction: false });

    expect(decoded.baseAmbientColor).toEqual({ r: 10, g: 20, b: 255, a: 255 });
    expect(decoded.surfaces).toEqual(interior.surfaces);
    expect(decoded.bspNodes).toEqual(interior.bspNodes);
    expect(decoded.polyListStrings).toEqual(interior.polyListStrings);
    expect(decoded.convexHullEmitStrings).toEqual(interior.convexHullEmitStrings);
    expect(decoded.pointVisibilities).toEqual(interior.pointVisibilities);
  });

  it('should write wider files for 32-bit index layouts', () => {
    const interior = encodeCube(true);
    const legacy = writer.write(fileOf(interior), { engine: 'tge', version: 0, sizeReduction: true });
    const wide = writer.write(fileOf(interior), { engine: 'tgea', version: 4, sizeReduction: true });
    expect(wide.length).not.toBe(legacy.length);
    expect(reader.read(wide, { engine: 'tgea', version: 4, sizeReduction: true }).interiors[0].windings).toEqual(
      interior.windings
    );
  });

  it('should round-trip entity records', () => {
    const file: DifFile = {
      interiors: [encodeCube(true)],
      subObjects: [encodeCube(true)],
      triggers: [
        {
          name: 'MustChange',
          datablock: 'DefaultTrigger',
          properties: new Map([['text', 'hello']]),
          polyhedron: {
            points: [vec3(0, 0, 1), vec3(0, 1, 1)],
            planes: [{ normal: vec3(-1, 0, 0), distance: 0 }],
            edges: [{ faces: [0, 4], vertices: [0, 1] }],
          },
          offset: vec3(0, 0, 0),
        },
      ],
      pathFollowers: [
        {
          name: 'MustChange',
          datablock: 'PathedDefault',
          interiorResIndex: 0,
          offset: vec3(0, 0, 0),
          properties: new Map([['initialPosition', '0']]),
          triggerIds: [0],
          waypoints: [
            { position: vec3(1, 2, 3), rotation: [0, 0, 0, 1], msToNext: 500, smoothingType: 0 },
            { position: vec3(1, 2, 8), rotation: [0, 0, 0, 1], msToNext: 1500, smoothingType: 1 },
          ],
          totalMS: 2000,
        },
      ],
      gameEntities: [
        { datablock: 'GemItem', gameClass: 'Item', position: vec3(4, 5, 6), properties: new Map([['skin', 'red']]) },
      ],
    };
    const options: DifWriteOptions = { engine: 'mbg', version: 0, sizeReduction: true };
    const decoded = reader.read(writer.write(file, options), options);

    expect(decoded.subObjects).toHaveLength(1);
    expect(decoded.triggers).toEqual(file.triggers);
    expect(decoded.pathFollowers).toEqual(file.pathFollowers);
    expect(decoded.gameEntities).toEqual(file.gameEntities);
  });

  it('should reject an unsupported engine/version pair', () => {
    expect(() => writer.write(fileOf(encodeCube(true)), { engine: 'mbg', version: 12, sizeReduction: true })).toThrow(
      UnsupportedVersionCombinationError
    );
  });

  it('should reject BSP child indices that collide with the leaf flags', () => {
    const interior: DifInterior = {
      ...encodeCube(true),
      bspNodes: [{ planeIndex: 0, front: { kind: 'node', index: 0x4000 }, back: { kind: 'leaf', solid: false, index: 0 } }],
    };
    expect(() => writer.write(fileOf(interior), { engine: 'mbg', version: 0, sizeReduction: true })).toThrow(
      CapacityExceededError
    );
    expect(() => writer.write(fileOf(interior), { engine: 'tgea', version: 4, sizeReduction: true })).not.toThrow();
  });

  it('should reject pools beyond the layout limits', () => {
    const interior: DifInterior = {
      ...encodeCube(true),
      points: new Array<Vec3>(65536).fill(vec3(0, 0, 0)),
    };
    expect(() => writer.write(fileOf(interior), { engine: 'mbg', version: 0, sizeReduction: true })).toThrow(
      'Interior has 65536 points; mbg v0 allows 65535'
    );
  });

  it('should reject strings longer than 255 bytes', () => {
    const file: DifFile = {
      ...fileOf(encodeCube(true)),
      gameEntities: [{ datablock: 'x'.repeat(256), gameClass: 'Item', position: vec3(0, 0, 0), properties: new Map() }],
    };
    expect(() => writer.write(file, { engine: 'mbg', version: 0, sizeReduction: true })).toThrow(CapacityExceededError);
  });

  it('should reject a file read with the wrong version', () => {
    const bytes = writer.write(fileOf(encodeCube(true)), { engine: 'tge', version: 1, sizeReduction: true });
    expect(() => reader.read(bytes, { engine: 'tge', version: 2, sizeReduction: true })).toThrow(MalformedInputError);
  });

  it('should reject truncated data', () => {
    const bytes = writer.write(fileOf(encodeCube(true)), { engine: 'mbg', version: 0, sizeReduction: true });
    expect(() => reader.read(bytes.subarray(0, 40), { engine: 'mbg', version: 0, sizeReduction: true })).toThrow(
      'Unexpected end of DIF data'
    );
  });
});
