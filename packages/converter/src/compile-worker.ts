/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Worker thread entry: compiles one unit per request
 */

import { compileInterior, type CompileTask } from './interior-compiler.js';
import { serveTasks } from './worker-host.js';

serveTasks(({ job, settings, unit }: CompileTask, reportProgress) =>
  compileInterior(job, settings, unit, reportProgress)
);
