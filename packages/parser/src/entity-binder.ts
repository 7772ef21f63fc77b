/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Entity & Path Binder
 *
 * A single fold over the entity stream in input order. The accumulator holds
 * the most recent elevator; path nodes and triggers are appended to it. Path
 * nodes and triggers met before the first elevator have nothing to move with
 * and are dropped.
 */

import { UnboundPathNodeError, createLogger } from '@csxdif/data';
import type { CsxEntity } from './types.js';

const log = createLogger('Binder');

export const ELEVATOR_CLASS = 'Door_Elevator';
export const PATH_NODE_CLASS = 'path_node';
export const TRIGGER_CLASS = 'trigger';
export const WORLDSPAWN_CLASS = 'worldspawn';

export interface ElevatorBinding {
  elevator: CsxEntity;
  /** Waypoints in encounter order */
  pathNodes: CsxEntity[];
  triggers: CsxEntity[];
}

export interface BindingResult {
  elevators: ElevatorBinding[];
  /** Triggers seen before any elevator; dropped from the output */
  unboundTriggers: CsxEntity[];
  /** Path nodes seen before any elevator; dropped from the output */
  unboundPathNodes: CsxEntity[];
  /** Entities carrying a game_class, exported as game entities */
  gameEntities: CsxEntity[];
  /** Everything else, passed through untouched */
  others: CsxEntity[];
}

export function isLight(entity: CsxEntity): boolean {
  return entity.classname.startsWith('light_');
}

function isGameEntity(entity: CsxEntity): boolean {
  return entity.properties.has('game_class') && entity.classname !== WORLDSPAWN_CLASS && !isLight(entity);
}

interface BinderState {
  current: ElevatorBinding | undefined;
  result: BindingResult;
}

function step(state: BinderState, entity: CsxEntity): BinderState {
  const { current, result } = state;
  switch (entity.classname) {
    case ELEVATOR_CLASS: {
      const binding: ElevatorBinding = { elevator: entity, pathNodes: [], triggers: [] };
      result.elevators.push(binding);
      return { current: binding, result };
    }
    case PATH_NODE_CLASS:
      if (current) {
        current.pathNodes.push(entity);
      } else {
        result.unboundPathNodes.push(entity);
        log.warn(new UnboundPathNodeError(entity.id).message, { operation: 'bindEntities', entityId: entity.id });
      }
      return state;
    case TRIGGER_CLASS:
      if (current) {
        current.triggers.push(entity);
      } else {
        result.unboundTriggers.push(entity);
        log.warn(`trigger #${entity.id} has no preceding ${ELEVATOR_CLASS}`, {
          operation: 'bindEntities',
          entityId: entity.id,
        });
      }
      return state;
    default:
      if (isGameEntity(entity)) {
        result.gameEntities.push(entity);
      } else {
        result.others.push(entity);
      }
      return state;
  }
}

/**
 * Bind path nodes and triggers to the nearest preceding elevator
 */
export function bindEntities(entities: readonly CsxEntity[]): BindingResult {
  const ordered = [...entities].sort((a, b) => a.order - b.order);
  const initial: BinderState = {
    current: undefined,
    result: { elevators: [], unboundTriggers: [], unboundPathNodes: [], gameEntities: [], others: [] },
  };
  return ordered.reduce(step, initial).result;
}
