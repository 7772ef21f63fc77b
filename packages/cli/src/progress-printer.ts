/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Turns progress events into console lines: one per finished phase, plus
 * every status tick
 */

import { isPhaseFinished, type ConversionReport, type ProgressEvent, type ProgressListener } from '@csxdif/data';

export function formatProgress(event: ProgressEvent): string | undefined {
  if (event.total === 0) {
    return event.phase;
  }
  if (!isPhaseFinished(event)) {
    return undefined;
  }
  return event.unit === undefined ? event.finishMessage : `${event.finishMessage} (unit ${event.unit})`;
}

export function createProgressPrinter(print: (line: string) => void): ProgressListener {
  return (event) => {
    const line = formatProgress(event);
    if (line !== undefined) print(line);
  };
}

export function formatReport(report: ConversionReport, index: number): string[] {
  return [
    `BSP Report ${index + 1} (${report.label})`,
    `Raycast Coverage: ${report.hit}/${report.total} (${report.hitAreaPercentage}% of surface area)`,
    `Balance Factor: ${report.balanceFactor}`,
  ];
}
