/**
 * abilities/equipmentAbilities.ts
 *
 * Abilities granted by weapons, armor and mounts while equipped.
 */

import { CardSubType, isBlackSuit, type Card, type Game, type Player } from '../../../shared/src';
import { CardMoveOrdering, CardMoveReason } from '../cardMove';
import { askConfirm, createChoiceRequest, pickAllowedCards } from '../choice';
import { EngineFault } from '../core/errors';
import { GameEventType, type BeforeDamageEvent, type EventBus } from '../core/events';
import { ChoiceType } from '../core/types';
import { createJudgementRequest, JudgementReason, RED_JUDGEMENT } from '../judgement';
import {
  markResolved,
  PROVIDER_PRIORITY,
  ProviderOutcome,
  type ResponseProvider,
  type ResponseRequestContext,
} from '../providerChain';
import type { ResolutionContext } from '../resolutionContext';
import { ResponseType } from '../responseWindow';
import type { RuleModifierHooks } from '../rules/ruleModifiers';
import { debug, debugWarn } from '../utils/debug';
import { AbilityType, armorIgnoredBy, BaseAbility } from './ability';

/**
 * Weapon that sets the owner's attack distance
 */
export class RangedWeaponAbility extends BaseAbility {
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    attackDistance: (_current, query, owner) => (query.attacker.seat === owner.seat ? this.range : undefined),
  };

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly range: number
  ) {
    super();
  }
}

/**
 * No limit on attacks per turn
 */
export class RepeatingCrossbowAbility extends BaseAbility {
  readonly id = 'repeating_crossbow';
  readonly name = 'Repeating Crossbow';
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    maxUsesPerTurn: (_current, query, owner) =>
      query.player.seat === owner.seat && query.subType === CardSubType.ATTACK
        ? Number.POSITIVE_INFINITY
        : undefined,
  };
}

/**
 * Others are one seat further from the owner
 */
export class DefensiveMountAbility extends BaseAbility {
  readonly id = 'defensive_mount';
  readonly name = 'Defensive Mount';
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    seatDistance: (_current, query, owner) =>
      query.to.seat === owner.seat && query.from.seat !== owner.seat ? 1 : undefined,
  };
}

/**
 * The owner is one seat closer to everyone else
 */
export class OffensiveMountAbility extends BaseAbility {
  readonly id = 'offensive_mount';
  readonly name = 'Offensive Mount';
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    seatDistance: (_current, query, owner) =>
      query.from.seat === owner.seat && query.to.seat !== owner.seat ? -1 : undefined,
  };
}

/**
 * Armor: black attacks have no effect on the owner
 */
export class BlackShieldAbility extends BaseAbility {
  readonly id = 'black_shield';
  readonly name = 'Black Shield';
  readonly type = AbilityType.LOCKED;

  vetoesCardEffect(_game: Game, _owner: Player, card: Card): boolean {
    return card.subType === CardSubType.ATTACK && isBlackSuit(card.suit);
  }
}

/**
 * Weapon: the owner's attacks ignore armor; attack distance 2
 */
export class ArmorPiercerAbility extends BaseAbility {
  readonly id = 'armor_piercer';
  readonly name = 'Armor Piercer';
  readonly type = AbilityType.LOCKED;
  readonly modifiers: RuleModifierHooks = {
    attackDistance: (_current, query, owner) => (query.attacker.seat === owner.seat ? 2 : undefined),
  };

  ignoresArmor(): boolean {
    return true;
  }
}

/**
 * Armor: when an evade is needed, the owner may judge instead; a red
 * card counts as an evade.
 */
export class TrigramArmorAbility extends BaseAbility {
  readonly id = 'trigram_armor';
  readonly name = 'Trigram Armor';
  readonly type = AbilityType.LOCKED;

  createResponseProviders(_game: Game, owner: Player): ResponseProvider[] {
    return [new JudgementEvadeProvider(this.id, owner)];
  }
}

export class JudgementEvadeProvider implements ResponseProvider {
  readonly priority = PROVIDER_PRIORITY.EQUIPMENT;

  constructor(
    readonly id: string,
    private readonly owner: Player
  ) {}

  canProvide(request: ResponseRequestContext, context: ResolutionContext): boolean {
    return (
      request.defender.seat === this.owner.seat &&
      request.responseType === ResponseType.EVADE_AGAINST_ATTACK &&
      context.judgementService !== undefined &&
      context.getPlayerChoice !== undefined &&
      context.game.drawPile.cards.length > 0 &&
      !armorIgnoredBy(context, request.attacker)
    );
  }

  provide(request: ResponseRequestContext, context: ResolutionContext): ProviderOutcome {
    const { game, judgementService, getPlayerChoice } = context;
    if (!judgementService || !getPlayerChoice || !askConfirm(getPlayerChoice, this.owner.seat)) {
      return ProviderOutcome.DECLINED;
    }

    const result = judgementService.executeJudgement(
      game,
      this.owner,
      createJudgementRequest(this.owner.seat, JudgementReason.ARMOR, this.id, RED_JUDGEMENT),
      context.cardMoveService
    );
    judgementService.completeJudgement(game, this.owner, result.card, context.cardMoveService);

    if (!result.isSuccess) return ProviderOutcome.DECLINED;

    markResolved(request, this.owner);
    return ProviderOutcome.RESOLVED;
  }
}

/**
 * Weapon: instead of dealing attack damage, the owner may discard up to
 * two of the target's cards.
 */
export class FrostBladeAbility extends BaseAbility {
  readonly id = 'frost_blade';
  readonly name = 'Frost Blade';
  readonly type = AbilityType.TRIGGER;
  readonly modifiers: RuleModifierHooks = {
    attackDistance: (_current, query, owner) => (query.attacker.seat === owner.seat ? 2 : undefined),
  };

  protected onAttach(_game: Game, _owner: Player, eventBus: EventBus): void {
    this.listen(eventBus, GameEventType.BEFORE_DAMAGE, this.onBeforeDamage);
  }

  private onBeforeDamage = (event: BeforeDamageEvent): void => {
    const owner = this.owner;
    const { game, damage, context } = event;
    if (!owner || !context?.getPlayerChoice || event.prevented) return;
    if (damage.sourceSeat !== owner.seat || damage.reason !== 'attack') return;
    if (!this.isActive(game, owner)) return;

    const target = game.players.find(p => p.seat === damage.targetSeat);
    if (!target?.isAlive) return;

    const available = [...target.equipment.cards, ...target.hand.cards];
    if (available.length === 0) return;
    if (!askConfirm(context.getPlayerChoice, owner.seat)) return;

    const choice = context.getPlayerChoice(
      createChoiceRequest({
        playerSeat: owner.seat,
        choiceType: ChoiceType.SELECT_CARDS,
        allowedCards: available,
        canPass: false,
      })
    );
    const picked = pickAllowedCards(choice, available).cards.slice(0, 2);
    const toDiscard = picked.length > 0 ? picked : available.slice(0, 1);

    try {
      for (const card of toDiscard) {
        const fromEquipment = target.equipment.cards.some(c => c.id === card.id);
        if (fromEquipment) {
          context.equipmentHost?.removeEquipmentAbility(game, target, card);
        }
        context.cardMoveService.moveSingle({
          game,
          source: fromEquipment ? target.equipment : target.hand,
          target: game.discardPile,
          cards: [card],
          reason: CardMoveReason.DISCARD,
          ordering: CardMoveOrdering.TO_TOP,
        });
      }
    } catch (err) {
      // Cost could not be paid; the damage goes ahead
      if (!(err instanceof EngineFault)) throw err;
      debugWarn(1, `[abilities] ${this.id} failed to discard:`, err.message);
      return;
    }

    event.prevented = true;
    event.preventedBy = this.id;
    debug(1, `[abilities] ${this.id} discarded ${toDiscard.map(c => c.id).join(',')} from seat ${target.seat}`);
  };
}
