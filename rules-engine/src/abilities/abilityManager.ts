/**
 * abilities/abilityManager.ts
 *
 * Owns the ability instances of every seat: creates them from the
 * registry, attaches them to the event bus, and answers the live
 * "active abilities for player" query used by the rule aggregator.
 */

import { Role, type Card, type CardId, type Game, type Player, type Seat } from '../../../shared/src';
import type { EventBus } from '../core/events';
import { debug } from '../utils/debug';
import type { Ability, AbilityQueryService, EquipmentAbilityHost } from './ability';
import type { AbilityRegistry } from './abilityRegistry';

interface EquipmentBinding {
  readonly seat: Seat;
  readonly ability: Ability;
}

export class AbilityManager implements AbilityQueryService, EquipmentAbilityHost {
  private abilitiesBySeat: Map<Seat, Ability[]> = new Map();
  private equipmentByCard: Map<CardId, EquipmentBinding> = new Map();

  constructor(
    private readonly registry: AbilityRegistry,
    private readonly eventBus: EventBus
  ) {}

  /**
   * Grant hero abilities and abilities of already equipped cards.
   * Lord-only abilities are skipped for players without the lord role.
   */
  loadAbilitiesForAllPlayers(game: Game): void {
    for (const player of game.players) {
      this.loadAbilitiesForPlayer(game, player);
    }
  }

  loadAbilitiesForPlayer(game: Game, player: Player): void {
    if (player.heroId) {
      for (const id of this.registry.getHeroAbilityIds(player.heroId)) {
        if (this.registry.isLordOnly(id) && player.role !== Role.LORD) {
          debug(2, `[abilities] skip lord ability ${id} for seat ${player.seat}`);
          continue;
        }
        this.addAbility(game, player, this.registry.createAbility(id));
      }
    }
    for (const card of player.equipment.cards) {
      this.addEquipmentAbility(game, player, card);
    }
  }

  addAbility(game: Game, player: Player, ability: Ability): void {
    const list = this.abilitiesBySeat.get(player.seat) ?? [];
    if (list.some(a => a.id === ability.id)) {
      throw new Error(`Seat ${player.seat} already has ability ${ability.id}`);
    }
    ability.attach(game, player, this.eventBus);
    list.push(ability);
    this.abilitiesBySeat.set(player.seat, list);
    debug(2, `[abilities] seat ${player.seat} gained ${ability.id}`);
  }

  removeAbility(game: Game, player: Player, abilityId: string): boolean {
    const list = this.abilitiesBySeat.get(player.seat);
    if (!list) return false;
    const index = list.findIndex(a => a.id === abilityId);
    if (index < 0) return false;

    const [ability] = list.splice(index, 1);
    ability.detach(game, player, this.eventBus);
    debug(2, `[abilities] seat ${player.seat} lost ${abilityId}`);
    return true;
  }

  activeAbilitiesFor(game: Game, player: Player): readonly Ability[] {
    return this.allAbilitiesFor(player).filter(a => a.isActive(game, player));
  }

  allAbilitiesFor(player: Player): readonly Ability[] {
    return [...(this.abilitiesBySeat.get(player.seat) ?? [])];
  }

  addEquipmentAbility(game: Game, player: Player, card: Card): Ability | undefined {
    const abilityId = this.registry.getEquipmentAbilityId(card.definitionId);
    if (!abilityId) return undefined;

    const ability = this.registry.createAbility(abilityId);
    this.addAbility(game, player, ability);
    this.equipmentByCard.set(card.id, { seat: player.seat, ability });
    return ability;
  }

  removeEquipmentAbility(game: Game, player: Player, card: Card): void {
    const binding = this.equipmentByCard.get(card.id);
    if (!binding || binding.seat !== player.seat) return;
    this.equipmentByCard.delete(card.id);
    this.removeAbility(game, player, binding.ability.id);
  }

  detachAll(game: Game): void {
    for (const player of game.players) {
      for (const ability of this.abilitiesBySeat.get(player.seat) ?? []) {
        ability.detach(game, player, this.eventBus);
      }
    }
    this.abilitiesBySeat.clear();
    this.equipmentByCard.clear();
  }
}
