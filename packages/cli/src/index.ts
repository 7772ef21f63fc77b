/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/cli - command line front end
 */

export { createProgram, runCli, VERSION } from './program.js';
export type { CliIO } from './program.js';
export { outputPaths } from './output-paths.js';
export { createProgressPrinter, formatProgress, formatReport } from './progress-printer.js';
