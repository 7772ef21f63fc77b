/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { serializeCsx, type CsxScene } from '@csxdif/parser';
import { runCli, VERSION, type CliIO } from './program.js';

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
const LOOPS = [
  [0, 4, 6, 2],
  [1, 3, 7, 5],
  [0, 1, 5, 4],
  [2, 6, 7, 3],
  [0, 2, 3, 1],
  [4, 5, 7, 6],
];

function cubeScene(): CsxScene {
  return {
    version: 4,
    creator: 'Level Editor',
    detailLevels: [
      {
        brushScale: 32,
        lightScale: 8,
        ambientColor: { x: 0, y: 0, z: 0 },
        ambientColorEmerg: { x: 0, y: 0, z: 0 },
        entities: [],
        brushes: [
          {
            id: 1,
            owner: 0,
            type: 0,
            transform: IDENTITY,
            vertices: Array.from({ length: 8 }, (_, i) => ({ x: i & 1 ? 1 : 0, y: i & 2 ? 1 : 0, z: i & 4 ? 1 : 0 })),
            faces: LOOPS.map((indices, id) => ({
              id,
              material: 'grid_warm',
              texGen: {
                planeX: { normal: { x: 1, y: 0, z: 0 }, distance: 0 },
                planeY: { normal: { x: 0, y: 1, z: 0 }, distance: 0 },
                rot: 0,
                scale: [1, 1],
              },
              texDiv: [32, 32],
              indices,
            })),
          },
        ],
      },
    ],
  };
}

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (line) => out.push(line), stderr: (line) => err.push(line) };
}

describe('runCli', () => {
  let dir: string;
  let csxPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'csxdif-'));
    csxPath = join(dir, 'level.csx');
    await writeFile(csxPath, serializeCsx(cubeScene()));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the DIF next to the input and print the report', async () => {
    const io = captureIO();

    const code = await runCli([csxPath, '--silent'], io);

    expect(code).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out).toEqual([
      `Converting ${csxPath}`,
      `Wrote ${join(dir, 'level.dif')}`,
      'BSP Report 1 (file 0 interior 0)',
      'Raycast Coverage: 6/6 (100% of surface area)',
      'Balance Factor: 0',
    ]);
    const bytes = await readFile(join(dir, 'level.dif'));
    expect(Array.from(bytes.subarray(0, 5))).toEqual([44, 0, 0, 0, 0]);
  });

  it('should print finished phases unless silent', async () => {
    const io = captureIO();

    await runCli([csxPath], io);

    expect(io.out).toContain('Exported detail levels');
    expect(io.out).toContain('Built BSP (unit 0)');
    expect(io.out).toContain('Wrote DIF files');
  });

  it('should pass engine and version through', async () => {
    const io = captureIO();

    const code = await runCli([csxPath, '-s', '--engine-version', 't3d', '--dif-version', '13', '--mb', 'false'], io);

    expect(code).toBe(0);
    const bytes = await readFile(join(dir, 'level.dif'));
    // File version, no preview, one interior of version 13
    expect(Array.from(bytes.subarray(0, 13))).toEqual([44, 0, 0, 0, 0, 1, 0, 0, 0, 13, 0, 0, 0]);
  });

  it('should fail on a version the engine cannot load', async () => {
    const io = captureIO();

    const code = await runCli([csxPath, '-s', '--dif-version', '4'], io);

    expect(code).toBe(1);
    expect(io.err).toEqual(['Error: Engine "mbg" has no DIF layout for interior version 4 (supported: 0)']);
  });

  it('should reject unknown choices and malformed numbers', async () => {
    const engine = captureIO();
    expect(await runCli([csxPath, '--engine-version', 'quake'], engine)).toBe(1);
    expect(engine.err).toHaveLength(1);

    const epsilon = captureIO();
    expect(await runCli([csxPath, '--epsilon-point', '0'], epsilon)).toBe(1);

    const mb = captureIO();
    expect(await runCli([csxPath, '--mb', 'yes'], mb)).toBe(1);
  });

  it('should fail when the input cannot be read', async () => {
    const io = captureIO();

    const code = await runCli([join(dir, 'missing.csx')], io);

    expect(code).toBe(1);
    expect(io.err[0]).toMatch(/^Error: ENOENT/);
  });

  it('should print the version', async () => {
    const io = captureIO();
    expect(await runCli(['--version'], io)).toBe(0);
    expect(io.out).toEqual([VERSION]);
  });
});
