/**
 * resolvers/cardEffects.ts
 *
 * Effects of non-attack cards used from hand.
 */

import type { Card } from '../../../shared/src';
import { CardMoveOrdering, CardMoveReason } from '../cardMove';
import { failure, ResolutionErrorCode, SUCCESS, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import type { ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';

/**
 * Restores one health to the user, never above maximum
 */
export class HealResolver implements Resolver {
  readonly kind: string = ResolverKind.HEAL;

  resolve(context: ResolutionContext): ResolutionResult {
    const player = context.sourcePlayer;
    if (!player.isAlive) {
      return failure(ResolutionErrorCode.TARGET_NOT_ALIVE, 'resolution.heal.playerNotAlive');
    }

    const before = player.currentHealth;
    player.currentHealth = Math.min(player.maxHealth, player.currentHealth + 1);
    logTo(context.logSink, {
      eventType: 'heal',
      level: 'info',
      message: `Seat ${player.seat} healed (${before} -> ${player.currentHealth})`,
    });
    return SUCCESS;
  }
}

/**
 * Puts an equipment card into the user's equipment zone, discarding any
 * card of the same slot, and swaps the granted abilities.
 */
export class EquipResolver implements Resolver {
  readonly kind: string = ResolverKind.EQUIP;

  constructor(private readonly card: Card) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const { game, cardMoveService, equipmentHost } = context;
    const player = context.sourcePlayer;

    if (!player.hand.cards.some(c => c.id === this.card.id)) {
      return failure(ResolutionErrorCode.CARD_NOT_FOUND, 'resolution.equip.cardNotInHand');
    }

    const replaced = player.equipment.cards.find(c => c.subType === this.card.subType);
    if (replaced) {
      equipmentHost?.removeEquipmentAbility(game, player, replaced);
      cardMoveService.moveSingle({
        game,
        source: player.equipment,
        target: game.discardPile,
        cards: [replaced],
        reason: CardMoveReason.DISCARD,
        ordering: CardMoveOrdering.TO_TOP,
      });
    }

    cardMoveService.moveSingle({
      game,
      source: player.hand,
      target: player.equipment,
      cards: [this.card],
      reason: CardMoveReason.EQUIP,
      ordering: CardMoveOrdering.TO_BOTTOM,
    });
    equipmentHost?.addEquipmentAbility(game, player, this.card);

    logTo(context.logSink, {
      eventType: 'equip',
      level: 'info',
      message: `Seat ${player.seat} equipped ${this.card.name}`,
      data: { cardId: this.card.id, replacedCardId: replaced?.id },
    });
    return SUCCESS;
  }
}
