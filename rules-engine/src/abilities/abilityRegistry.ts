/**
 * abilities/abilityRegistry.ts
 *
 * Factories for abilities keyed by id, plus the tables that say which
 * hero and which equipment grants which abilities.
 */

import type { Ability } from './ability';

export type AbilityFactory = () => Ability;

export interface AbilityRegistration {
  readonly factory: AbilityFactory;
  /** Granted only when the owner holds the lord role */
  readonly lordOnly: boolean;
}

export class AbilityRegistry {
  private abilities: Map<string, AbilityRegistration> = new Map();
  private heroAbilities: Map<string, string[]> = new Map();
  private equipmentAbilities: Map<string, string> = new Map();

  registerAbility(id: string, factory: AbilityFactory, options: { lordOnly?: boolean } = {}): void {
    if (this.abilities.has(id)) {
      throw new Error(`Ability ${id} is already registered`);
    }
    this.abilities.set(id, { factory, lordOnly: options.lordOnly ?? false });
  }

  registerHeroAbilities(heroId: string, abilityIds: readonly string[]): void {
    for (const id of abilityIds) {
      this.assertKnown(id);
    }
    this.heroAbilities.set(heroId, [...abilityIds]);
  }

  registerEquipmentAbility(definitionId: string, abilityId: string): void {
    this.assertKnown(abilityId);
    this.equipmentAbilities.set(definitionId, abilityId);
  }

  hasAbility(id: string): boolean {
    return this.abilities.has(id);
  }

  createAbility(id: string): Ability {
    const registration = this.abilities.get(id);
    if (!registration) {
      throw new Error(`Unknown ability ${id}`);
    }
    return registration.factory();
  }

  isLordOnly(id: string): boolean {
    return this.abilities.get(id)?.lordOnly ?? false;
  }

  getHeroAbilityIds(heroId: string): readonly string[] {
    return this.heroAbilities.get(heroId) ?? [];
  }

  getEquipmentAbilityId(definitionId: string): string | undefined {
    return this.equipmentAbilities.get(definitionId);
  }

  private assertKnown(id: string): void {
    if (!this.abilities.has(id)) {
      throw new Error(`Unknown ability ${id}`);
    }
  }
}
