/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { basename, dirname, extname, join } from 'node:path';

/**
 * `dir/name.csx` -> `dir/name.dif`, `dir/name-1.dif`, ...
 */
export function outputPaths(inputPath: string, count: number): string[] {
  const stem = join(dirname(inputPath), basename(inputPath, extname(inputPath)));
  return Array.from({ length: count }, (_, i) => (i === 0 ? `${stem}.dif` : `${stem}-${i}.dif`));
}
