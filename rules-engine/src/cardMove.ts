/**
 * cardMove.ts
 *
 * Card move service: the only path by which the engine changes zone
 * contents. Moves are all-or-nothing; every invariant is checked before
 * any zone is touched and violations are raised as faults.
 */

import type { Card, CardId, Game, Player, Zone } from '../../shared/src';
import { InvariantViolationError } from './core/errors';
import { GameEventType, type EventBus } from './core/events';
import { debug } from './utils/debug';

export enum CardMoveReason {
  DRAW = 'draw',
  DISCARD = 'discard',
  PLAY = 'play',
  JUDGEMENT = 'judgement',
  EQUIP = 'equip',
  OBTAIN = 'obtain',
  OTHER = 'other',
}

export enum CardMoveOrdering {
  /** Moved block goes to index 0, keeping its relative order */
  TO_TOP = 'toTop',
  TO_BOTTOM = 'toBottom',
  PRESERVE_RELATIVE_ORDER = 'preserveRelativeOrder',
}

export interface CardMoveDescriptor {
  readonly game: Game;
  readonly source: Zone;
  readonly target: Zone;
  readonly cards: readonly Card[];
  readonly reason: CardMoveReason;
  readonly ordering: CardMoveOrdering;
}

/**
 * Immutable record of a move, used for events and results
 */
export interface CardMoveSnapshot {
  readonly sourceZoneId: string;
  readonly targetZoneId: string;
  readonly cardIds: readonly CardId[];
  readonly reason: CardMoveReason;
  readonly ordering: CardMoveOrdering;
}

export interface CardMoveResult {
  readonly move: CardMoveSnapshot;
  readonly movedCards: readonly Card[];
}

export interface CardMoveService {
  moveSingle(descriptor: CardMoveDescriptor): CardMoveResult;
  moveMany(descriptor: CardMoveDescriptor): CardMoveResult;
  drawCards(game: Game, player: Player, count: number): Card[];
  discardFromHand(game: Game, player: Player, cards: readonly Card[]): CardMoveResult;
}

function containsCard(zone: Zone, id: CardId): boolean {
  return zone.cards.some(c => c.id === id);
}

export class BasicCardMoveService implements CardMoveService {
  constructor(private readonly eventBus?: EventBus) {}

  moveSingle(descriptor: CardMoveDescriptor): CardMoveResult {
    if (descriptor.cards.length !== 1) {
      throw new InvariantViolationError(
        `moveSingle expects exactly one card, got ${descriptor.cards.length}`
      );
    }
    return this.moveMany(descriptor);
  }

  moveMany(descriptor: CardMoveDescriptor): CardMoveResult {
    const { game, source, target, cards, reason, ordering } = descriptor;

    this.validate(descriptor);

    const snapshot: CardMoveSnapshot = {
      sourceZoneId: source.id,
      targetZoneId: target.id,
      cardIds: cards.map(c => c.id),
      reason,
      ordering,
    };

    this.eventBus?.publish(GameEventType.BEFORE_CARD_MOVE, { game, move: snapshot });

    // Re-resolve against the source so the moved objects are the zone's own
    const ids = new Set(snapshot.cardIds);
    const moved = snapshot.cardIds.map(id => {
      const found = source.cards.find(c => c.id === id);
      if (!found) {
        throw new InvariantViolationError(`Card ${id} left zone ${source.id} during a move`);
      }
      return found;
    });

    source.cards = source.cards.filter(c => !ids.has(c.id));
    if (ordering === CardMoveOrdering.TO_TOP) {
      target.cards = [...moved, ...target.cards];
    } else {
      target.cards = [...target.cards, ...moved];
    }

    debug(2, `[cardMove] ${snapshot.cardIds.join(',')} ${source.id} -> ${target.id} (${reason})`);

    this.eventBus?.publish(GameEventType.AFTER_CARD_MOVE, { game, move: snapshot });

    return { move: snapshot, movedCards: moved };
  }

  drawCards(game: Game, player: Player, count: number): Card[] {
    if (count < 0) {
      throw new InvariantViolationError(`Cannot draw a negative number of cards (${count})`);
    }
    if (count === 0) return [];
    if (game.drawPile.cards.length < count) {
      throw new InvariantViolationError(
        `Draw pile has ${game.drawPile.cards.length} card(s), ${count} requested`
      );
    }

    const drawn = game.drawPile.cards.slice(0, count);
    this.moveMany({
      game,
      source: game.drawPile,
      target: player.hand,
      cards: drawn,
      reason: CardMoveReason.DRAW,
      ordering: CardMoveOrdering.TO_BOTTOM,
    });
    return drawn;
  }

  discardFromHand(game: Game, player: Player, cards: readonly Card[]): CardMoveResult {
    return this.moveMany({
      game,
      source: player.hand,
      target: game.discardPile,
      cards,
      reason: CardMoveReason.DISCARD,
      ordering: CardMoveOrdering.TO_TOP,
    });
  }

  private validate(descriptor: CardMoveDescriptor): void {
    const { source, target, cards } = descriptor;

    if (cards.length === 0) {
      throw new InvariantViolationError('A card move needs at least one card');
    }
    if (source === target || source.id === target.id) {
      throw new InvariantViolationError(`Source and target are the same zone (${source.id})`);
    }

    const seen = new Set<CardId>();
    for (const card of cards) {
      if (seen.has(card.id)) {
        throw new InvariantViolationError(`Card ${card.id} appears more than once in the move`);
      }
      seen.add(card.id);

      if (!containsCard(source, card.id)) {
        throw new InvariantViolationError(`Card ${card.id} is not in source zone ${source.id}`);
      }
      if (containsCard(target, card.id)) {
        throw new InvariantViolationError(`Card ${card.id} is already in target zone ${target.id}`);
      }
    }
  }
}
