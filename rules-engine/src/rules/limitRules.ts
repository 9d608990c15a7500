/**
 * rules/limitRules.ts
 *
 * Per-turn usage limits.
 */

import { CardSubType, type Game, type Player } from '../../../shared/src';
import { engineConfig } from '../config';
import type { RuleModifierAggregator } from './ruleModifiers';

export class LimitRuleService {
  constructor(
    private readonly modifiers: RuleModifierAggregator,
    private readonly defaultMaxAttacks: number = engineConfig.maxAttacksPerTurn
  ) {}

  maxAttacksPerTurn(game: Game, player: Player): number {
    return this.maxUsesPerTurn(game, player, CardSubType.ATTACK);
  }

  /**
   * Only attacks are limited by default; other sub-types are unlimited
   * unless an ability says otherwise.
   */
  maxUsesPerTurn(game: Game, player: Player, subType: CardSubType): number {
    const base = subType === CardSubType.ATTACK ? this.defaultMaxAttacks : Number.POSITIVE_INFINITY;
    return this.modifiers.maxUsesPerTurn(base, { game, player, subType });
  }

  usesThisTurn(player: Player, subType: CardSubType): number {
    return player.turnUsage[subType] ?? 0;
  }

  hasUsesRemaining(game: Game, player: Player, subType: CardSubType): boolean {
    return this.usesThisTurn(player, subType) < this.maxUsesPerTurn(game, player, subType);
  }
}

/**
 * Clear per-turn counters, called by the host when a turn starts
 */
export function resetTurnUsage(player: Player): void {
  player.turnUsage = {};
}

export function recordCardUse(player: Player, subType: CardSubType): void {
  player.turnUsage[subType] = (player.turnUsage[subType] ?? 0) + 1;
}
