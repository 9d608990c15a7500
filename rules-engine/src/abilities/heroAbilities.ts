/**
 * abilities/heroAbilities.ts
 *
 * Hero abilities shipped with the engine.
 */

import type { Game, Player } from '../../../shared/src';
import { CardMoveOrdering, CardMoveReason } from '../cardMove';
import { EngineFault } from '../core/errors';
import { GameEventType, type DamageResolvedEvent, type EventBus } from '../core/events';
import { createDamage } from '../core/types';
import type { ResponseProvider } from '../providerChain';
import { deriveContext } from '../resolutionContext';
import { DamageResolver } from '../resolvers/damage';
import { AssistanceProvider } from '../responseAssistance';
import { ResponseType } from '../responseWindow';
import type { RuleModifierHooks } from '../rules/ruleModifiers';
import { debugWarn } from '../utils/debug';
import { AbilityType, BaseAbility } from './ability';

/**
 * Draw extra cards in the draw phase. Bonuses from several abilities add up.
 */
export class DrawBonusAbility extends BaseAbility {
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    drawCount: () => this.bonus,
  };

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly bonus: number = 1
  ) {
    super();
  }
}

const MIGHT_RESPONSE_TYPES: readonly ResponseType[] = [
  ResponseType.EVADE_AGAINST_ATTACK,
  ResponseType.ATTACK_AGAINST_DUEL,
];

/**
 * Anyone answering the owner's attack or duel must play two cards instead of one
 */
export class UnmatchedMightAbility extends BaseAbility {
  readonly id = 'unmatched_might';
  readonly name = 'Unmatched Might';
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    requiredResponseCount: (_current, query, owner) =>
      query.attacker.seat === owner.seat && MIGHT_RESPONSE_TYPES.includes(query.responseType) ? 2 : undefined,
  };
}

/**
 * Lord only: allies of the same camp may evade on the owner's behalf
 */
export class RoyalGuardAbility extends BaseAbility {
  readonly id = 'royal_guard';
  readonly name = 'Royal Guard';
  readonly type = AbilityType.ACTIVE;

  createResponseProviders(_game: Game, owner: Player): ResponseProvider[] {
    return [new AssistanceProvider(this.id, owner)];
  }
}

export const RETALIATION_REASON = 'retaliation';

/**
 * After taking damage from another player, deal 1 damage back. Damage
 * dealt by a retaliation never triggers another retaliation, so two
 * owners cannot trade blows forever.
 */
export class RetaliationAbility extends BaseAbility {
  readonly id = 'retaliation';
  readonly name = 'Retaliation';
  readonly type = AbilityType.TRIGGER;

  protected onAttach(_game: Game, _owner: Player, eventBus: EventBus): void {
    this.listen(eventBus, GameEventType.DAMAGE_RESOLVED, this.onDamageResolved);
  }

  private onDamageResolved = (event: DamageResolvedEvent): void => {
    const owner = this.owner;
    const { damage, context } = event;
    if (!owner || !context || !this.isActive(event.game, owner)) return;
    if (damage.targetSeat !== owner.seat || damage.reason === RETALIATION_REASON) return;
    if (damage.sourceSeat === undefined || damage.sourceSeat === owner.seat) return;
    if (owner.currentHealth <= 0) return;

    const source = event.game.players.find(p => p.seat === damage.sourceSeat);
    if (!source?.isAlive) return;

    context.stack.push(
      new DamageResolver(),
      deriveContext(context, {
        sourcePlayer: owner,
        pendingDamage: createDamage({
          sourceSeat: owner.seat,
          targetSeat: source.seat,
          amount: 1,
          reason: RETALIATION_REASON,
        }),
      })
    );
  };
}

/**
 * After taking damage, take the card that caused it from the discard pile
 */
export class CardSalvageAbility extends BaseAbility {
  readonly id = 'card_salvage';
  readonly name = 'Card Salvage';
  readonly type = AbilityType.TRIGGER;

  protected onAttach(_game: Game, _owner: Player, eventBus: EventBus): void {
    this.listen(eventBus, GameEventType.DAMAGE_RESOLVED, this.onDamageResolved);
  }

  private onDamageResolved = (event: DamageResolvedEvent): void => {
    const owner = this.owner;
    const { game, damage, context } = event;
    const card = damage.causingCard;
    if (!owner || !context || !card || damage.targetSeat !== owner.seat) return;
    if (!this.isActive(game, owner)) return;
    if (!game.discardPile.cards.some(c => c.id === card.id)) return;

    try {
      context.cardMoveService.moveSingle({
        game,
        source: game.discardPile,
        target: owner.hand,
        cards: [card],
        reason: CardMoveReason.OBTAIN,
        ordering: CardMoveOrdering.TO_BOTTOM,
      });
    } catch (err) {
      // The card moved elsewhere first; the ability simply does not activate
      if (!(err instanceof EngineFault)) throw err;
      debugWarn(1, `[abilities] ${this.id} could not take card ${card.id}:`, err.message);
    }
  };
}
