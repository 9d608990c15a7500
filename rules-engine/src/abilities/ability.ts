/**
 * abilities/ability.ts
 *
 * Abilities are hero- or equipment-granted capabilities. An ability
 * takes part in the engine through optional hooks only: rule modifiers
 * for the aggregator, response providers for provider chains, card
 * effect vetoes, and event subscriptions made in `attach`.
 */

import type { Card, Game, Player } from '../../../shared/src';
import type { EventBus, GameEventHandler, GameEventType } from '../core/events';
import type { ResponseProvider } from '../providerChain';
import type { ResolutionContext } from '../resolutionContext';
import type { RuleModifierHooks } from '../rules/ruleModifiers';

export enum AbilityType {
  /** Used deliberately by its owner */
  ACTIVE = 'active',
  /** Reacts to events */
  TRIGGER = 'trigger',
  /** Always on */
  LOCKED = 'locked',
}

export interface Ability {
  readonly id: string;
  readonly name: string;
  readonly type: AbilityType;
  readonly modifiers?: RuleModifierHooks;

  isActive(game: Game, owner: Player): boolean;

  /**
   * Subscribe to the events this ability reacts to. Called once per
   * ability instance.
   */
  attach(game: Game, owner: Player, eventBus: EventBus): void;

  /**
   * Undo `attach`. Safe without a prior attach and safe to repeat.
   */
  detach(game: Game, owner: Player, eventBus: EventBus): void;

  /** Alternative ways for the owner to satisfy a response requirement */
  createResponseProviders?(game: Game, owner: Player): ResponseProvider[];

  /** True when the card's effect on the owner is cancelled outright */
  vetoesCardEffect?(game: Game, owner: Player, card: Card, source: Player): boolean;

  /** True when the owner's attacks ignore the target's armor */
  ignoresArmor?(game: Game, owner: Player): boolean;
}

/**
 * The ability-query service: abilities currently eligible for a player,
 * in registration order.
 */
export interface AbilityQueryService {
  activeAbilitiesFor(game: Game, player: Player): readonly Ability[];
}

export interface EquipmentAbilityHost {
  addEquipmentAbility(game: Game, player: Player, card: Card): Ability | undefined;
  removeEquipmentAbility(game: Game, player: Player, card: Card): void;
}

/**
 * Bookkeeping shared by the built-in abilities. Subclasses subscribe
 * through `listen` inside `onAttach`; detach removes exactly those
 * subscriptions.
 */
export abstract class BaseAbility implements Ability {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly type: AbilityType;
  readonly modifiers?: RuleModifierHooks;

  protected game?: Game;
  protected owner?: Player;
  private unsubscribers: Array<() => void> = [];

  isActive(_game: Game, owner: Player): boolean {
    return owner.isAlive;
  }

  attach(game: Game, owner: Player, eventBus: EventBus): void {
    if (this.owner) return;
    this.game = game;
    this.owner = owner;
    this.onAttach(game, owner, eventBus);
  }

  detach(_game: Game, _owner: Player, _eventBus: EventBus): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.game = undefined;
    this.owner = undefined;
  }

  isAttached(): boolean {
    return this.owner !== undefined;
  }

  protected onAttach(_game: Game, _owner: Player, _eventBus: EventBus): void {}

  protected listen<K extends GameEventType>(eventBus: EventBus, type: K, handler: GameEventHandler<K>): void {
    eventBus.subscribe(type, handler);
    this.unsubscribers.push(() => eventBus.unsubscribe(type, handler));
  }
}

/**
 * Whether any active ability of the attacker ignores armor
 */
export function armorIgnoredBy(context: ResolutionContext, attacker: Player | undefined): boolean {
  if (!attacker || !context.abilityQuery) return false;
  return context.abilityQuery
    .activeAbilitiesFor(context.game, attacker)
    .some(a => a.ignoresArmor?.(context.game, attacker) === true);
}
