/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * csxdif command line
 */

import { readFile, writeFile } from 'node:fs/promises';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { convertCsxToDif, DEFAULT_CONVERSION_OPTIONS } from '@csxdif/converter';
import { BSP_STRATEGIES, ENGINE_VERSIONS, isBspStrategy, isEngineVersion, setLogSink } from '@csxdif/data';
import { outputPaths } from './output-paths.js';
import { createProgressPrinter, formatReport } from './progress-printer.js';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

interface CliOptions {
  silent: boolean;
  difVersion: number;
  engineVersion: string;
  mb: boolean;
  bsp: string;
  epsilonPoint: number;
  epsilonPlane: number;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return parsed;
}

function parseBoolean(value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new InvalidArgumentError('Expected true or false.');
}

async function convertFile(file: string, options: CliOptions, io: CliIO): Promise<void> {
  const { engineVersion, bsp } = options;
  // Both are restricted by .choices(); the guards narrow the type
  if (!isEngineVersion(engineVersion) || !isBspStrategy(bsp)) {
    throw new InvalidArgumentError(`Unsupported engine "${engineVersion}" or BSP strategy "${bsp}"`);
  }

  io.stdout(`Converting ${file}`);
  const input = await readFile(file);
  const { buffers, reports } = await convertCsxToDif(input, {
    engine: engineVersion,
    difVersion: options.difVersion,
    mbOptimize: options.mb,
    bsp,
    pointEpsilon: options.epsilonPoint,
    planeEpsilon: options.epsilonPlane,
    onProgress: options.silent ? undefined : createProgressPrinter(io.stdout),
  });

  const paths = outputPaths(file, buffers.length);
  await Promise.all(buffers.map((buffer, i) => writeFile(paths[i], buffer)));
  for (const path of paths) {
    io.stdout(`Wrote ${path}`);
  }
  reports.forEach((report, i) => {
    for (const line of formatReport(report, i)) io.stdout(line);
  });
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('csxdif')
    .description('Convert Torque Constructor CSX scenes to DIF interiors')
    .version(VERSION)
    .configureOutput({
      writeOut: (str) => io.stdout(str.trimEnd()),
      writeErr: (str) => io.stderr(str.trimEnd()),
    })
    .exitOverride()
    .argument('<file>', 'CSX file to convert')
    .option('-s, --silent', "Don't print progress", false)
    .option('-d, --dif-version <n>', 'DIF interior version to export', parseInteger, DEFAULT_CONVERSION_OPTIONS.difVersion)
    .addOption(
      new Option('-e, --engine-version <engine>', 'Engine to export for')
        .choices(ENGINE_VERSIONS)
        .default(DEFAULT_CONVERSION_OPTIONS.engine)
    )
    .option('--mb <bool>', 'Size-reduce output for Marble Blast', parseBoolean, DEFAULT_CONVERSION_OPTIONS.mbOptimize)
    .addOption(
      new Option('--bsp <algorithm>', 'BSP algorithm').choices(BSP_STRATEGIES).default(DEFAULT_CONVERSION_OPTIONS.bsp)
    )
    .option(
      '--epsilon-point <x>',
      'Distance under which points are merged',
      parsePositive,
      DEFAULT_CONVERSION_OPTIONS.pointEpsilon
    )
    .option(
      '--epsilon-plane <x>',
      'Distance under which planes are merged',
      parsePositive,
      DEFAULT_CONVERSION_OPTIONS.planeEpsilon
    )
    .action((file: string, options: CliOptions) => convertFile(file, options, io));

  return program;
}

/**
 * Run the command line
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  // Library diagnostics share stderr with usage errors
  const previousSink = setLogSink((_level, line, extra) => io.stderr([line, ...extra.map(String)].join(' ')));
  try {
    await createProgram(io).parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors have already been printed
      return error.exitCode;
    }
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    setLogSink(previousSink);
  }
}
