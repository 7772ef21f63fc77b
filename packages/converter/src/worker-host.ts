/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Worker-side half of the pool: runs one task per request message and relays
 * progress and log records to the parent thread
 */

import { parentPort } from 'node:worker_threads';
import { setLogSink } from '@csxdif/data';
import { serializeError, type TaskRequest, type TaskResponse } from './worker-protocol.js';

export type TaskHandler<P, R> = (payload: P, reportProgress: (current: number, total: number) => void) => R;

export function serveTasks<P, R>(handler: TaskHandler<P, R>): void {
  const port = parentPort;
  if (!port) {
    throw new Error('serveTasks must run inside a worker thread');
  }
  const post = (message: TaskResponse<R>) => port.postMessage(message);

  setLogSink((level, line, extra) => post({ kind: 'log', level, line, extra: [...extra] }));

  port.on('message', ({ task, payload }: TaskRequest<P>) => {
    let response: TaskResponse<R>;
    try {
      const result = handler(payload, (current, total) => post({ kind: 'progress', task, current, total }));
      response = { kind: 'done', task, result };
    } catch (error) {
      response = { kind: 'failed', task, error: serializeError(error) };
    }
    post(response);
  });
}
