/**
 * abilities/defaultAbilities.ts
 *
 * Registry pre-loaded with the built-in abilities and the hero and
 * equipment tables that grant them.
 */

import { AbilityRegistry } from './abilityRegistry';
import {
  ArmorPiercerAbility,
  BlackShieldAbility,
  DefensiveMountAbility,
  FrostBladeAbility,
  OffensiveMountAbility,
  RangedWeaponAbility,
  RepeatingCrossbowAbility,
  TrigramArmorAbility,
} from './equipmentAbilities';
import {
  CardSalvageAbility,
  DrawBonusAbility,
  RetaliationAbility,
  RoyalGuardAbility,
  UnmatchedMightAbility,
} from './heroAbilities';

export const HERO_ABILITIES: Readonly<Record<string, readonly string[]>> = {
  hero_warlord: ['card_salvage', 'royal_guard'],
  hero_tactician: ['retaliation'],
  hero_scout: ['quick_study'],
  hero_scholar: ['quick_study', 'keen_insight'],
  hero_brute: ['unmatched_might'],
};

/**
 * Equipment definition id -> ability id
 */
export const EQUIPMENT_ABILITIES: Readonly<Record<string, string>> = {
  equip_long_bow: 'long_bow',
  equip_spear: 'spear',
  equip_repeating_crossbow: 'repeating_crossbow',
  equip_armor_piercer: 'armor_piercer',
  equip_frost_blade: 'frost_blade',
  equip_black_shield: 'black_shield',
  equip_trigram_armor: 'trigram_armor',
  equip_defensive_mount: 'defensive_mount',
  equip_offensive_mount: 'offensive_mount',
};

export function createDefaultAbilityRegistry(): AbilityRegistry {
  const registry = new AbilityRegistry();

  registry.registerAbility('quick_study', () => new DrawBonusAbility('quick_study', 'Quick Study'));
  registry.registerAbility('keen_insight', () => new DrawBonusAbility('keen_insight', 'Keen Insight'));
  registry.registerAbility('unmatched_might', () => new UnmatchedMightAbility());
  registry.registerAbility('royal_guard', () => new RoyalGuardAbility(), { lordOnly: true });
  registry.registerAbility('retaliation', () => new RetaliationAbility());
  registry.registerAbility('card_salvage', () => new CardSalvageAbility());

  registry.registerAbility('long_bow', () => new RangedWeaponAbility('long_bow', 'Long Bow', 5));
  registry.registerAbility('spear', () => new RangedWeaponAbility('spear', 'Spear', 3));
  registry.registerAbility('repeating_crossbow', () => new RepeatingCrossbowAbility());
  registry.registerAbility('armor_piercer', () => new ArmorPiercerAbility());
  registry.registerAbility('frost_blade', () => new FrostBladeAbility());
  registry.registerAbility('black_shield', () => new BlackShieldAbility());
  registry.registerAbility('trigram_armor', () => new TrigramArmorAbility());
  registry.registerAbility('defensive_mount', () => new DefensiveMountAbility());
  registry.registerAbility('offensive_mount', () => new OffensiveMountAbility());

  for (const [heroId, abilityIds] of Object.entries(HERO_ABILITIES)) {
    registry.registerHeroAbilities(heroId, abilityIds);
  }
  for (const [definitionId, abilityId] of Object.entries(EQUIPMENT_ABILITIES)) {
    registry.registerEquipmentAbility(definitionId, abilityId);
  }

  return registry;
}
