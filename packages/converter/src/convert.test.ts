/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * End-to-end conversion tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConversionCancelledError, UnsupportedVersionCombinationError } from '@csxdif/data';
import { DifReader, type DifFile, type DifWriteOptions } from '@csxdif/dif';
import { vec3, type Vec3 } from '@csxdif/geometry';
import { serializeCsx, type CsxBrush, type CsxEntity, type CsxFace, type CsxInteriorMap, type CsxScene } from '@csxdif/parser';
import { convertCsxToDif } from './convert.js';

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
const MBG: DifWriteOptions = { engine: 'mbg', version: 0, sizeReduction: true };

// Vertex i sits at corner (i & 1, i & 2, i & 4)
const BOX_LOOPS = [
  [0, 4, 6, 2],
  [1, 3, 7, 5],
  [0, 1, 5, 4],
  [2, 6, 7, 3],
  [0, 2, 3, 1],
  [4, 5, 7, 6],
];

function face(id: number, indices: number[]): CsxFace {
  return {
    id,
    material: 'grid_cool',
    texGen: {
      planeX: { normal: vec3(1, 0, 0), distance: 0 },
      planeY: { normal: vec3(0, 1, 0), distance: 0 },
      rot: 0,
      scale: [1, 1],
    },
    texDiv: [32, 32],
    indices,
  };
}

function box(id: number, min: Vec3, max: Vec3, owner = 0): CsxBrush {
  const vertices = Array.from({ length: 8 }, (_, i) =>
    vec3(i & 1 ? max.x : min.x, i & 2 ? max.y : min.y, i & 4 ? max.z : min.z)
  );
  return {
    id,
    owner,
    type: 0,
    transform: IDENTITY.slice(),
    vertices,
    faces: BOX_LOOPS.map((loop, i) => face(i, loop)),
  };
}

function entity(id: number, classname: string, properties: Record<string, string> = {}, origin?: Vec3): CsxEntity {
  return { id, classname, gametype: 'Marble Blast', origin, properties: new Map(Object.entries(properties)), order: id };
}

function level(brushes: CsxBrush[], entities: CsxEntity[] = [], overrides: Partial<CsxInteriorMap> = {}): CsxInteriorMap {
  return {
    brushScale: 32,
    lightScale: 8,
    ambientColor: vec3(0, 0, 0),
    ambientColorEmerg: vec3(0, 0, 0),
    entities,
    brushes,
    ...overrides,
  };
}

function scene(...detailLevels: CsxInteriorMap[]): CsxScene {
  return { version: 4, creator: 'Level Editor', detailLevels };
}

const cubeScene = () => scene(level([box(1, vec3(0, 0, 0), vec3(1, 1, 1))]));

// Unit boxes along x with a gap of 2 between them
const rowScene = (count: number) =>
  scene(level(Array.from({ length: count }, (_, i) => box(i, vec3(3 * i, 0, 0), vec3(3 * i + 1, 1, 1)))));

const read = (bytes: Uint8Array, options: DifWriteOptions = MBG): DifFile => new DifReader().read(bytes, options);

describe('convertCsxToDif', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should convert a single cube', async () => {
    const { buffers, reports, diagnostics } = await convertCsxToDif(cubeScene());

    expect(buffers).toHaveLength(1);
    const file = read(buffers[0]);
    expect(file.interiors).toHaveLength(1);
    expect(file.subObjects).toEqual([]);
    const [interior] = file.interiors;
    expect(interior.points).toHaveLength(8);
    expect(interior.planes).toHaveLength(6);
    expect(interior.surfaces).toHaveLength(6);
    expect(interior.materials).toEqual(['grid_cool']);

    expect(reports).toEqual([{ label: 'file 0 interior 0', hit: 6, total: 6, hitAreaPercentage: 100, balanceFactor: 0 }]);
    expect(diagnostics).toEqual({ droppedFaces: [], unboundPathNodes: [], unboundTriggers: [] });
  });

  it('should give the same bytes for document text and a parsed scene', async () => {
    const fromScene = await convertCsxToDif(cubeScene());
    const fromText = await convertCsxToDif(serializeCsx(cubeScene()));
    expect(fromText.buffers).toEqual(fromScene.buffers);
  });

  it('should give the same bytes for any worker count', async () => {
    const options = { capacityOverride: { surfaces: 12 }, bsp: 'sampling', mbOptimize: false } as const;
    const single = await convertCsxToDif(rowScene(5), { ...options, concurrency: 1 });
    const parallel = await convertCsxToDif(rowScene(5), { ...options, concurrency: 4 });

    expect(parallel.buffers).toEqual(single.buffers);
    expect(parallel.reports).toEqual(single.reports);
  });

  it('should split into extra files when a unit is full', async () => {
    const { buffers, reports } = await convertCsxToDif(rowScene(5), { capacityOverride: { surfaces: 12 } });

    expect(buffers).toHaveLength(3);
    expect(buffers.map((b) => read(b).interiors[0].surfaces.length)).toEqual([12, 12, 6]);
    expect(reports.map((r) => r.label)).toEqual(['file 0 interior 0', 'file 1 interior 0', 'file 2 interior 0']);
  });

  it('should write every detail level into the primary file', async () => {
    const { buffers, reports } = await convertCsxToDif(
      scene(level([box(1, vec3(0, 0, 0), vec3(1, 1, 1))]), level([box(2, vec3(0, 0, 0), vec3(2, 2, 2))]))
    );

    expect(buffers).toHaveLength(1);
    const { interiors } = read(buffers[0]);
    expect(interiors.map((i) => i.detailLevel)).toEqual([0, 1]);
    expect(interiors[1].boundingBox.max).toEqual(vec3(2, 2, 2));
    expect(reports.map((r) => r.label)).toEqual(['file 0 interior 0', 'file 0 interior 1']);
  });

  it('should write elevators, path nodes, triggers and game entities', async () => {
    const { buffers, reports } = await convertCsxToDif(
      scene(
        level(
          [
            box(1, vec3(0, 0, 0), vec3(1, 1, 1)),
            box(2, vec3(0, 0, 4), vec3(1, 1, 5), 10),
            box(3, vec3(5, 0, 0), vec3(6, 1, 1), 13),
          ],
          [
            entity(0, 'worldspawn'),
            entity(10, 'Door_Elevator', { datablock: 'PathedCustom', initialPosition: '0' }),
            entity(11, 'path_node', { next_time: '1000' }, vec3(0, 0, 5)),
            entity(12, 'path_node', { next_time: '500', smoothing: '1' }, vec3(0, 0, 10)),
            entity(13, 'trigger', { datablock: 'HelpTrigger', text: 'Hi' }),
            entity(20, 'GemItem', { game_class: 'Item', datablock: 'GemItemRed' }, vec3(1, 2, 3)),
          ]
        )
      )
    );

    expect(buffers).toHaveLength(1);
    const file = read(buffers[0]);
    expect(file.interiors[0].surfaces).toHaveLength(6);
    expect(file.subObjects).toHaveLength(1);
    expect(file.subObjects[0].boundingBox).toEqual({ min: vec3(0, 0, 4), max: vec3(1, 1, 5) });

    expect(file.pathFollowers).toEqual([
      {
        name: 'MustChange',
        datablock: 'PathedCustom',
        interiorResIndex: 0,
        offset: vec3(0, 0, 0),
        properties: new Map([['initialPosition', '0']]),
        triggerIds: [0],
        waypoints: [
          { position: vec3(0, 0, 5), rotation: [0, 0, 0, 1], msToNext: 1000, smoothingType: 0 },
          { position: vec3(0, 0, 10), rotation: [0, 0, 0, 1], msToNext: 500, smoothingType: 1 },
        ],
        totalMS: 1500,
      },
    ]);

    expect(file.triggers).toHaveLength(1);
    expect(file.triggers[0]).toMatchObject({ name: 'MustChange', datablock: 'HelpTrigger' });
    expect([...file.triggers[0].properties]).toEqual([['text', 'Hi']]);
    expect(file.triggers[0].polyhedron.points[0]).toEqual(vec3(5, 0, 1));
    expect(file.triggers[0].polyhedron.points[6]).toEqual(vec3(6, 1, 0));

    expect(file.gameEntities).toEqual([
      { datablock: 'GemItemRed', gameClass: 'Item', position: vec3(1, 2, 3), properties: new Map() },
    ]);
    expect(reports.map((r) => r.label)).toEqual(['file 0 interior 0', 'sub-object for elevator #10']);
  });

  it('should drop path nodes with no preceding elevator', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { buffers, diagnostics } = await convertCsxToDif(
      scene(level([box(1, vec3(0, 0, 0), vec3(1, 1, 1))], [entity(5, 'path_node', {}, vec3(0, 0, 2))]))
    );

    expect(diagnostics.unboundPathNodes).toEqual([5]);
    expect(read(buffers[0]).pathFollowers).toEqual([]);
    expect(warnSpy).toHaveBeenCalled();
  });

  it('should drop triggers with no preceding elevator', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { buffers, diagnostics } = await convertCsxToDif(
      scene(
        level(
          [box(1, vec3(0, 0, 0), vec3(1, 1, 1)), box(2, vec3(5, 0, 0), vec3(6, 1, 1), 7)],
          [entity(7, 'trigger', { datablock: 'HelpTrigger', text: 'Hi' })]
        )
      )
    );

    expect(diagnostics.unboundTriggers).toEqual([7]);
    const file = read(buffers[0]);
    expect(file.triggers).toEqual([]);
    expect(file.interiors[0].surfaces).toHaveLength(6);
    expect(warnSpy).toHaveBeenCalledWith('[Binder] bindEntities entity #7 trigger #7 has no preceding Door_Elevator');
  });

  it('should report degenerate faces and keep the rest of the brush', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const brush = box(1, vec3(0, 0, 0), vec3(1, 1, 1));
    brush.faces.push(face(6, [0, 1, 1]));

    const { buffers, diagnostics } = await convertCsxToDif(scene(level([brush])));

    expect(diagnostics.droppedFaces).toEqual([{ brushId: 1, faceIndex: 6, reason: expect.any(String) }]);
    expect(read(buffers[0]).interiors[0].surfaces).toHaveLength(6);
  });

  it('should store ambient colours where the layout has them', async () => {
    const options: DifWriteOptions = { engine: 'tge', version: 2, sizeReduction: false };
    const { buffers } = await convertCsxToDif(
      scene(level([box(1, vec3(0, 0, 0), vec3(1, 1, 1))], [], { ambientColor: vec3(10, 20, 30) })),
      { engine: 'tge', difVersion: 2, mbOptimize: false }
    );

    expect(read(buffers[0], options).interiors[0].baseAmbientColor).toEqual({ r: 10, g: 20, b: 30, a: 255 });
  });

  it('should skip reports without a BSP', async () => {
    const { buffers, reports } = await convertCsxToDif(cubeScene(), { bsp: 'none' });
    expect(buffers).toHaveLength(1);
    expect(reports).toEqual([]);
  });

  it('should cover at least as much with exhaustive search as with sampling', async () => {
    const exhaustive = await convertCsxToDif(rowScene(6), { bsp: 'exhaustive' });
    const sampled = await convertCsxToDif(rowScene(6), { bsp: 'sampling' });

    expect(exhaustive.reports[0].hitAreaPercentage).toBeGreaterThanOrEqual(sampled.reports[0].hitAreaPercentage);
  });

  it('should reject an unsupported engine/version pair before any work', async () => {
    const onProgress = vi.fn();
    await expect(convertCsxToDif(cubeScene(), { engine: 'mbg', difVersion: 4, onProgress })).rejects.toThrow(
      UnsupportedVersionCombinationError
    );
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('should stop when cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(convertCsxToDif(cubeScene(), { signal: controller.signal })).rejects.toThrow(
      'Conversion cancelled before parsing'
    );
  });

  it('should stop at the next phase boundary when cancelled mid-way', async () => {
    const controller = new AbortController();
    const run = convertCsxToDif(cubeScene(), { signal: controller.signal, onProgress: () => controller.abort() });

    await expect(run).rejects.toThrow(ConversionCancelledError);
    await expect(run).rejects.toThrow('Conversion cancelled before writing DIF');
  });

  it('should report progress for each phase', async () => {
    const phases = new Set<string>();
    await convertCsxToDif(cubeScene(), { onProgress: (event) => phases.add(event.phase) });

    expect([...phases]).toEqual(['Exporting detail level', 'Building BSP', 'Writing DIF']);
  });
});
