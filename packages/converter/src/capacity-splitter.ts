/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Capacity Splitter - fills output units brush by brush up to the layout limits
 *
 * Brushes are never split across units. A brush that does not fit the current
 * unit is rolled back and starts the next one.
 */

import { CapacityExceededError, createLogger } from '@csxdif/data';
import {
  Deduplicator,
  type EpsilonOptions,
  type FacetedBrush,
  type PoolCounts,
  type PooledGeometry,
} from '@csxdif/geometry';

const log = createLogger('Splitter');

function overflows(counts: PoolCounts, limits: PoolCounts): boolean {
  return counts.points > limits.points || counts.planes > limits.planes || counts.surfaces > limits.surfaces;
}

function overflowError(brush: FacetedBrush, counts: PoolCounts, limits: PoolCounts, unit: string): CapacityExceededError {
  return new CapacityExceededError(
    `Brush #${brush.id} brings ${unit} to ${counts.points} points, ${counts.planes} planes and ` +
      `${counts.surfaces} surfaces; limits are ${limits.points}/${limits.planes}/${limits.surfaces}`,
    {
      brushId: brush.id,
      points: counts.points,
      planes: counts.planes,
      surfaces: counts.surfaces,
    }
  );
}

/**
 * Partition brushes into as few units as the limits allow, keeping input order
 */
export function splitByCapacity(
  brushes: readonly FacetedBrush[],
  limits: PoolCounts,
  dedupOptions: EpsilonOptions
): PooledGeometry[] {
  const units: PooledGeometry[] = [];
  let current = new Deduplicator(dedupOptions);

  for (const brush of brushes) {
    const mark = current.mark();
    current.addBrush(brush);
    if (!overflows(current.counts(), limits)) continue;

    current.rollback(mark);
    if (current.isEmpty) {
      current.addBrush(brush);
      throw overflowError(brush, current.counts(), limits, 'an empty unit');
    }

    units.push(current.finish());
    log.debug('Unit full', { unit: units.length - 1, brushId: brush.id, counts: current.counts() });

    current = new Deduplicator(dedupOptions);
    current.addBrush(brush);
    if (overflows(current.counts(), limits)) {
      throw overflowError(brush, current.counts(), limits, 'an empty unit');
    }
  }

  if (!current.isEmpty || units.length === 0) {
    units.push(current.finish());
  }

  log.info(`Split ${brushes.length} brushes into ${units.length} unit(s)`, { operation: 'splitByCapacity' });
  return units;
}

/**
 * Pool brushes that must stay together in one unit
 * @param label names the unit in the error raised when it does not fit
 */
export function poolSingleUnit(
  brushes: readonly FacetedBrush[],
  limits: PoolCounts,
  dedupOptions: EpsilonOptions,
  label: string
): PooledGeometry {
  const dedup = new Deduplicator(dedupOptions);
  for (const brush of brushes) {
    dedup.addBrush(brush);
    const counts = dedup.counts();
    if (overflows(counts, limits)) {
      throw overflowError(brush, counts, limits, label);
    }
  }
  return dedup.finish();
}
