/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * WorkerPool - runs tasks on a fixed number of worker threads
 *
 * Each thread takes the next task index as soon as it is free. Results are
 * stored by task index, so the output never depends on which thread finished
 * first. Every task settles before the lowest-index failure is rethrown.
 */

import { Worker } from 'node:worker_threads';
import { createLogger, forwardLogRecord } from '@csxdif/data';
import { reviveError, type TaskRequest, type TaskResponse } from './worker-protocol.js';

const log = createLogger('WorkerPool');

export interface WorkerEntry {
  url: URL;
  /** TypeScript sources need a loader in the thread */
  isTs: boolean;
}

export type TaskProgressListener = (task: number, current: number, total: number) => void;

type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

// Source runs resolve workspace packages to their src/ through the "source" export condition
const TS_EXEC_ARGV = ['--import', 'tsx', '--conditions=source'];

/**
 * Script `name` beside `base`: the .ts source when running from sources,
 * the built .js otherwise
 */
export function resolveWorkerEntry(name: string, base: string = import.meta.url): WorkerEntry {
  const isTs = base.endsWith('.ts');
  return { url: new URL(`./${name}.${isTs ? 'ts' : 'js'}`, base), isTs };
}

export class WorkerPool<P, R> {
  private peak = 0;

  constructor(
    private readonly entry: WorkerEntry,
    readonly concurrency: number,
    private readonly onProgress?: TaskProgressListener
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Most tasks running at once during the last run */
  get peakInFlight(): number {
    return this.peak;
  }

  async run(payloads: readonly P[]): Promise<R[]> {
    this.peak = 0;
    if (payloads.length === 0) {
      return [];
    }

    const settled: Array<Settled<R> | undefined> = new Array(payloads.length);
    const workers: Worker[] = [];
    let next = 0;
    let inFlight = 0;

    const lane = async (laneId: number) => {
      let worker = this.spawn();
      workers.push(worker);
      while (next < payloads.length) {
        const task = next++;
        inFlight++;
        this.peak = Math.max(this.peak, inFlight);
        const { outcome, alive } = await this.dispatch(worker, task, payloads[task]);
        inFlight--;
        if (!outcome.ok) {
          log.caught(`Task ${task} failed`, outcome.error, { operation: 'run', data: { lane: laneId } });
        }
        settled[task] = outcome;
        if (!alive && next < payloads.length) {
          worker = this.spawn();
          workers.push(worker);
        }
      }
    };

    const lanes = Math.min(this.concurrency, payloads.length);
    try {
      await Promise.all(Array.from({ length: lanes }, (_, i) => lane(i)));
    } finally {
      await Promise.all(workers.map((worker) => worker.terminate()));
    }

    const results: R[] = [];
    for (const outcome of settled) {
      if (!outcome) {
        throw new Error('Worker pool finished with an unsettled task');
      }
      if (!outcome.ok) {
        throw outcome.error;
      }
      results.push(outcome.value);
    }
    return results;
  }

  private spawn(): Worker {
    const worker = new Worker(this.entry.url, { execArgv: this.entry.isTs ? TS_EXEC_ARGV : [] });
    // Idle threads have no dispatch() listener
    worker.on('error', (error) => log.caught('Worker thread failed', error, { operation: 'spawn' }));
    worker.on('message', (message: TaskResponse<R>) => {
      if (message.kind === 'log') {
        forwardLogRecord(message.level, message.line, message.extra);
      } else if (message.kind === 'progress') {
        this.onProgress?.(message.task, message.current, message.total);
      }
    });
    return worker;
  }

  /**
   * Send one task and wait for its outcome. `alive` is false when the thread
   * died and must be replaced.
   */
  private dispatch(worker: Worker, task: number, payload: P): Promise<{ outcome: Settled<R>; alive: boolean }> {
    return new Promise((resolve) => {
      const finish = (outcome: Settled<R>, alive: boolean) => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
        resolve({ outcome, alive });
      };
      const onMessage = (message: TaskResponse<R>) => {
        if (message.kind === 'done' && message.task === task) {
          finish({ ok: true, value: message.result }, true);
        } else if (message.kind === 'failed' && message.task === task) {
          finish({ ok: false, error: reviveError(message.error) }, true);
        }
      };
      const onError = (error: Error) => finish({ ok: false, error }, false);
      const onExit = (code: number) =>
        finish({ ok: false, error: new Error(`Worker exited with code ${code} while running task ${task}`) }, false);

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      const request: TaskRequest<P> = { task, payload };
      worker.postMessage(request);
    });
  }
}
