/**
 * rules/rangeRules.ts
 *
 * Seat distance and attack range.
 *
 * Seat distance is the shorter way round the table, counting living
 * players only, and is at least 1 between two different players.
 * Abilities adjust it additively: the defender's modifiers first, then
 * the attacker's. Attack distance starts from the configured base and is
 * overridden by the attacker's modifiers (e.g. a long-range weapon).
 */

import type { Game, Player } from '../../../shared/src';
import { engineConfig } from '../config';
import { InvariantViolationError } from '../core/errors';
import type { RuleModifierAggregator } from './ruleModifiers';

export class RangeRuleService {
  constructor(
    private readonly modifiers: RuleModifierAggregator,
    private readonly baseAttackDistance: number = engineConfig.baseAttackDistance
  ) {}

  /**
   * Table distance before any ability applies
   */
  baseSeatDistance(game: Game, from: Player, to: Player): number {
    if (from.seat === to.seat) return 0;

    const ring = game.players.filter(p => p.isAlive || p.seat === from.seat || p.seat === to.seat);
    const i = ring.findIndex(p => p.seat === from.seat);
    const j = ring.findIndex(p => p.seat === to.seat);
    if (i < 0 || j < 0) {
      throw new InvariantViolationError(`Seats ${from.seat} and ${to.seat} must both be in game ${game.id}`);
    }

    const n = ring.length;
    const clockwise = (j - i + n) % n;
    const counterClockwise = (i - j + n) % n;
    return Math.max(1, Math.min(clockwise, counterClockwise));
  }

  seatDistance(game: Game, from: Player, to: Player): number {
    if (from.seat === to.seat) return 0;
    const adjusted = this.modifiers.seatDistance(this.baseSeatDistance(game, from, to), { game, from, to });
    return Math.max(1, adjusted);
  }

  attackDistance(game: Game, attacker: Player): number {
    return this.modifiers.attackDistance(this.baseAttackDistance, { game, attacker });
  }

  isWithinAttackRange(game: Game, attacker: Player, defender: Player): boolean {
    if (attacker.seat === defender.seat) return false;
    return this.seatDistance(game, attacker, defender) <= this.attackDistance(game, attacker);
  }
}
