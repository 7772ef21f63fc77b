/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Progress channel - one-way notifications from conversion workers to the caller
 *
 * Producers post events and return immediately; a single consumer drains the
 * queue on a later microtask, so listener cadence never depends on how the
 * workers are scheduled.
 */

import { createLogger } from './logger.js';

const log = createLogger('Progress');

export interface ProgressEvent {
  /** Phase name, e.g. "Building BSP" */
  phase: string;
  /** Message shown once the phase completes, e.g. "Built BSP" */
  finishMessage: string;
  current: number;
  /** 0 marks an ignorable tick */
  total: number;
  /** Output unit the event belongs to, when the phase runs per unit */
  unit?: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

/** Whether an event completes its phase */
export function isPhaseFinished(event: ProgressEvent): boolean {
  return event.total > 0 && event.current >= event.total;
}

export class ProgressChannel {
  private queue: ProgressEvent[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  /** Highest `current` seen per phase key, so a phase never moves backwards */
  private high = new Map<string, number>();

  constructor(private readonly listener?: ProgressListener) {}

  /**
   * Queue an event. Never blocks and never throws.
   */
  post(event: ProgressEvent): void {
    if (this.closed || !this.listener) return;
    this.queue.push(event);
    this.scheduleDrain();
  }

  /**
   * Convenience wrapper for `post`
   */
  progress(current: number, total: number, phase: string, finishMessage: string, unit?: number): void {
    this.post({ phase, finishMessage, current, total, unit });
  }

  /**
   * Deliver everything still queued, then stop accepting events.
   */
  async close(): Promise<void> {
    await this.flush();
    this.closed = true;
  }

  /**
   * Resolve once the queue is empty.
   */
  flush(): Promise<void> {
    if (this.queue.length === 0 && !this.draining) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const event = this.queue.shift();
      if (event) {
        this.deliver(event);
      }
    }
    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private deliver(event: ProgressEvent): void {
    if (!this.listener) return;
    if (event.total > 0) {
      const key = event.unit === undefined ? event.phase : `${event.phase}#${event.unit}`;
      const previous = this.high.get(key) ?? 0;
      if (event.current < previous) {
        return;
      }
      this.high.set(key, event.current);
    }
    try {
      this.listener(event);
    } catch (error) {
      log.error('Progress listener threw', error, { operation: 'deliver', data: { phase: event.phase } });
    }
  }
}
