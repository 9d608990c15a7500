/**
 * judgement.ts
 *
 * Judgement: reveal the top card of the draw pile into the owner's
 * judgement zone and test it against a rule. Completing the judgement
 * puts the card on the discard pile unless something already took it.
 */

import { v4 as uuidv4 } from 'uuid';
import { isBlackSuit, isRedSuit, type Card, type Game, type Player, type Seat, type Suit } from '../../shared/src';
import { CardMoveOrdering, CardMoveReason, type CardMoveService } from './cardMove';
import { InvariantViolationError } from './core/errors';
import { GameEventType, type EventBus } from './core/events';
import { debug } from './utils/debug';

export enum JudgementReason {
  DELAYED_TRICK = 'delayedTrick',
  ABILITY = 'ability',
  ARMOR = 'armor',
  WEAPON = 'weapon',
  OTHER = 'other',
}

export interface JudgementRule {
  readonly description: string;
  evaluate(card: Card): boolean;
}

export const RED_JUDGEMENT: JudgementRule = {
  description: 'red succeeds',
  evaluate: card => isRedSuit(card.suit),
};

export const BLACK_JUDGEMENT: JudgementRule = {
  description: 'black succeeds',
  evaluate: card => isBlackSuit(card.suit),
};

export function suitJudgement(suit: Suit): JudgementRule {
  return {
    description: `${suit} succeeds`,
    evaluate: card => card.suit === suit,
  };
}

export interface JudgementRequest {
  readonly judgementId: string;
  readonly ownerSeat: Seat;
  readonly reason: JudgementReason;
  /** Id of the ability or card that asked for the judgement */
  readonly sourceId: string;
  readonly rule: JudgementRule;
}

export interface JudgementResult {
  readonly judgementId: string;
  readonly ownerSeat: Seat;
  readonly card: Card;
  readonly isSuccess: boolean;
  readonly ruleDescription: string;
}

export interface JudgementService {
  executeJudgement(game: Game, owner: Player, request: JudgementRequest, moves: CardMoveService): JudgementResult;
  completeJudgement(game: Game, owner: Player, card: Card, moves: CardMoveService): void;
}

export function createJudgementRequest(
  ownerSeat: Seat,
  reason: JudgementReason,
  sourceId: string,
  rule: JudgementRule
): JudgementRequest {
  return { judgementId: uuidv4(), ownerSeat, reason, sourceId, rule };
}

export class BasicJudgementService implements JudgementService {
  constructor(private readonly eventBus?: EventBus) {}

  executeJudgement(game: Game, owner: Player, request: JudgementRequest, moves: CardMoveService): JudgementResult {
    const card = game.drawPile.cards[0];
    if (!card) {
      throw new InvariantViolationError('Draw pile is empty, cannot execute judgement');
    }

    this.eventBus?.publish(GameEventType.JUDGEMENT_STARTED, {
      game,
      judgementId: request.judgementId,
      ownerSeat: owner.seat,
      reason: request.reason,
    });

    moves.moveSingle({
      game,
      source: game.drawPile,
      target: owner.judgement,
      cards: [card],
      reason: CardMoveReason.JUDGEMENT,
      ordering: CardMoveOrdering.TO_TOP,
    });

    const result: JudgementResult = {
      judgementId: request.judgementId,
      ownerSeat: owner.seat,
      card,
      isSuccess: request.rule.evaluate(card),
      ruleDescription: request.rule.description,
    };

    debug(1, `[judgement] ${request.sourceId} for seat ${owner.seat}: ${card.suit} ${card.rank} -> ${result.isSuccess ? 'success' : 'failure'}`);

    this.eventBus?.publish(GameEventType.JUDGEMENT_COMPLETED, {
      game,
      judgementId: request.judgementId,
      result,
    });

    return result;
  }

  completeJudgement(game: Game, owner: Player, card: Card, moves: CardMoveService): void {
    // Another effect may already have taken the card
    if (!owner.judgement.cards.some(c => c.id === card.id)) return;

    moves.moveSingle({
      game,
      source: owner.judgement,
      target: game.discardPile,
      cards: [card],
      reason: CardMoveReason.DISCARD,
      ordering: CardMoveOrdering.TO_TOP,
    });
  }
}
