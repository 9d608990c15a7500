/**
 * rules/responseRequirement.ts
 *
 * How many response cards a window needs before it counts as answered.
 * One by default; an attacker's ability may demand more.
 */

import type { Game, Player } from '../../../shared/src';
import type { ResponseType } from '../responseWindow';
import type { RuleModifierAggregator } from './ruleModifiers';

export const DEFAULT_REQUIRED_RESPONSES = 1;

export class ResponseRequirementCalculator {
  constructor(private readonly modifiers: RuleModifierAggregator) {}

  requiredCount(game: Game, attacker: Player, defender: Player, responseType: ResponseType): number {
    const count = this.modifiers.requiredResponseCount(DEFAULT_REQUIRED_RESPONSES, {
      game,
      attacker,
      defender,
      responseType,
    });
    return Math.max(DEFAULT_REQUIRED_RESPONSES, count);
  }
}
