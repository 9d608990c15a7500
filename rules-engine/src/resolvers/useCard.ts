/**
 * resolvers/useCard.ts
 *
 * Entry point of a "use a card" action: validates it against the rules,
 * takes the card out of hand, and pushes the resolver for its effect.
 */

import { CardSubType, CardType } from '../../../shared/src';
import { CardMoveOrdering, CardMoveReason } from '../cardMove';
import { GameEventType } from '../core/events';
import { failure, ResolutionErrorCode, SUCCESS, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import type { ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';
import { recordCardUse } from '../rules/limitRules';
import { AreaEffectResolver } from './areaEffect';
import { AttackResolver } from './attack';
import { EquipResolver, HealResolver } from './cardEffects';
import { DuelResolver } from './duel';

export class UseCardResolver implements Resolver {
  readonly kind: string = ResolverKind.USE_CARD;

  resolve(context: ResolutionContext): ResolutionResult {
    const { game, action } = context;
    const player = context.sourcePlayer;

    if (!action || action.kind !== 'useCard') {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.useCard.noAction');
    }
    const cardId = action.cardIds?.[0];
    if (cardId === undefined) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.useCard.noCard');
    }
    const card = player.hand.cards.find(c => c.id === cardId);
    if (!card) {
      return failure(ResolutionErrorCode.CARD_NOT_FOUND, 'resolution.useCard.cardNotInHand', { cardId });
    }

    const validation = context.ruleService.validateActionBeforeResolve(game, player, action);
    if (!validation.allowed) {
      return failure(ResolutionErrorCode.RULE_VALIDATION_FAILED, validation.reason, { cardId });
    }

    logTo(context.logSink, {
      eventType: 'useCard',
      level: 'info',
      message: `Seat ${player.seat} uses ${card.name}`,
      data: { cardId: card.id, targetSeats: action.targetSeats },
    });

    if (card.type === CardType.EQUIPMENT) {
      context.stack.push(new EquipResolver(card), context);
      return SUCCESS;
    }

    context.cardMoveService.moveSingle({
      game,
      source: player.hand,
      target: game.discardPile,
      cards: [card],
      reason: CardMoveReason.PLAY,
      ordering: CardMoveOrdering.TO_TOP,
    });
    recordCardUse(player, card.subType);
    context.eventBus?.publish(GameEventType.CARD_PLAYED, { game, seat: player.seat, card });

    switch (card.subType) {
      case CardSubType.ATTACK:
        context.stack.push(new AttackResolver(card), context);
        break;
      case CardSubType.HEAL:
        context.stack.push(new HealResolver(), context);
        break;
      case CardSubType.BARBARIAN_INVASION:
      case CardSubType.ARROW_BARRAGE:
        context.stack.push(new AreaEffectResolver(card), context);
        break;
      case CardSubType.DUEL:
        context.stack.push(new DuelResolver(card), context);
        break;
      default:
        return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.useCard.unsupportedCard', { cardId });
    }
    return SUCCESS;
  }
}
