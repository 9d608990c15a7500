/**
 * eventBus.ts
 *
 * Synchronous, re-entrant implementation of the EventBus contract.
 *
 * Two guards turn runaway re-triggering into a detectable fault:
 * - a handler that is already handling an event kind may not be entered
 *   again for the same kind;
 * - nested publication deeper than the configured limit throws.
 * Handler exceptions are never swallowed.
 */

import { engineConfig } from './config';
import { EventRecursionError } from './core/errors';
import {
  GameEventType,
  type EventBus,
  type GameEventHandler,
  type GameEventPayloads,
} from './core/events';
import { debug } from './utils/debug';

type HandlerTable = { [K in GameEventType]: Array<GameEventHandler<K>> };

function createHandlerTable(): HandlerTable {
  return {
    [GameEventType.TURN_START]: [],
    [GameEventType.TURN_END]: [],
    [GameEventType.PHASE_START]: [],
    [GameEventType.PHASE_END]: [],
    [GameEventType.BEFORE_DAMAGE]: [],
    [GameEventType.DAMAGE_CREATED]: [],
    [GameEventType.DAMAGE_APPLIED]: [],
    [GameEventType.DAMAGE_RESOLVED]: [],
    [GameEventType.DYING_START]: [],
    [GameEventType.PLAYER_DIED]: [],
    [GameEventType.BEFORE_CARD_MOVE]: [],
    [GameEventType.AFTER_CARD_MOVE]: [],
    [GameEventType.CARD_PLAYED]: [],
    [GameEventType.JUDGEMENT_STARTED]: [],
    [GameEventType.JUDGEMENT_COMPLETED]: [],
    [GameEventType.RESPONSE_WINDOW_OPENED]: [],
    [GameEventType.RESPONSE_WINDOW_CLOSED]: [],
  };
}

export class GameEventBus implements EventBus {
  private handlers: HandlerTable = createHandlerTable();
  private activeHandlers: Map<GameEventType, Set<unknown>> = new Map();
  private depth = 0;

  constructor(private readonly maxDepth: number = engineConfig.maxEventDepth) {}

  subscribe<K extends GameEventType>(type: K, handler: GameEventHandler<K>): void {
    this.handlers[type].push(handler);
  }

  unsubscribe<K extends GameEventType>(type: K, handler: GameEventHandler<K>): void {
    const list = this.handlers[type];
    const index = list.indexOf(handler);
    if (index >= 0) {
      list.splice(index, 1);
    }
  }

  publish<K extends GameEventType>(type: K, payload: GameEventPayloads[K]): void {
    const list = this.handlers[type];
    if (list.length === 0) return;

    if (this.depth >= this.maxDepth) {
      throw new EventRecursionError(
        `Event publication exceeded depth ${this.maxDepth} while publishing ${type}`,
        type,
        this.depth
      );
    }

    let active = this.activeHandlers.get(type);
    if (!active) {
      active = new Set();
      this.activeHandlers.set(type, active);
    }

    debug(2, `[eventBus] publish ${type} to ${list.length} handler(s) at depth ${this.depth}`);

    // Handlers added during publication wait for the next publish
    const snapshot = [...list];
    this.depth++;
    try {
      for (const handler of snapshot) {
        if (active.has(handler)) {
          throw new EventRecursionError(
            `Handler re-entered while already handling ${type}`,
            type,
            this.depth
          );
        }
        active.add(handler);
        try {
          handler(payload);
        } finally {
          active.delete(handler);
        }
      }
    } finally {
      this.depth--;
    }
  }

  subscriberCount(type: GameEventType): number {
    return this.handlers[type].length;
  }
}
