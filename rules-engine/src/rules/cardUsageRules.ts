/**
 * rules/cardUsageRules.ts
 *
 * Whether a hand card can be actively used right now, and on whom.
 */

import { CardSubType, CardType, type Card, type Game, type Player } from '../../../shared/src';
import type { LimitRuleService } from './limitRules';
import type { PhaseRuleService } from './phaseRules';
import type { RangeRuleService } from './rangeRules';
import { ALLOWED, disallowed, type RuleModifierAggregator, type RuleResult } from './ruleModifiers';

export interface CardUsageContext {
  readonly game: Game;
  readonly player: Player;
  readonly card: Card;
}

export class CardUsageRuleService {
  constructor(
    private readonly phase: PhaseRuleService,
    private readonly range: RangeRuleService,
    private readonly limits: LimitRuleService,
    private readonly modifiers: RuleModifierAggregator
  ) {}

  canUseCard(ctx: CardUsageContext): RuleResult {
    return this.modifiers.canUseCard(this.baseCanUseCard(ctx), ctx);
  }

  /**
   * Seats the card may target. Cards that act on their user return [].
   */
  legalTargets(ctx: CardUsageContext): Player[] {
    const others = ctx.game.players.filter(p => p.isAlive && p.seat !== ctx.player.seat);
    switch (ctx.card.subType) {
      case CardSubType.ATTACK:
        return others.filter(p => this.range.isWithinAttackRange(ctx.game, ctx.player, p));
      case CardSubType.DUEL:
        return others;
      default:
        return [];
    }
  }

  requiresTargets(card: Card): boolean {
    return card.subType === CardSubType.ATTACK || card.subType === CardSubType.DUEL;
  }

  private baseCanUseCard(ctx: CardUsageContext): RuleResult {
    const { game, player, card } = ctx;

    if (!player.isAlive) return disallowed('rule.cardUsage.playerNotAlive');
    if (!this.phase.isCardUsagePhase(game, player)) return disallowed('rule.cardUsage.wrongPhase');
    if (!player.hand.cards.some(c => c.id === card.id)) return disallowed('rule.cardUsage.notInHand');

    if (card.type === CardType.EQUIPMENT) return ALLOWED;

    switch (card.subType) {
      case CardSubType.ATTACK:
        if (!this.limits.hasUsesRemaining(game, player, CardSubType.ATTACK)) {
          return disallowed('rule.cardUsage.attackLimitReached');
        }
        if (this.legalTargets(ctx).length === 0) {
          return disallowed('rule.cardUsage.noLegalTarget');
        }
        return ALLOWED;
      case CardSubType.HEAL:
        return player.currentHealth < player.maxHealth ? ALLOWED : disallowed('rule.cardUsage.fullHealth');
      case CardSubType.DUEL:
        return this.legalTargets(ctx).length > 0 ? ALLOWED : disallowed('rule.cardUsage.noLegalTarget');
      case CardSubType.BARBARIAN_INVASION:
      case CardSubType.ARROW_BARRAGE:
        return game.players.some(p => p.isAlive && p.seat !== player.seat)
          ? ALLOWED
          : disallowed('rule.cardUsage.noLegalTarget');
      case CardSubType.EVADE:
      case CardSubType.NULLIFICATION:
        return disallowed('rule.cardUsage.responseOnly');
      default:
        return disallowed('rule.cardUsage.unsupported');
    }
  }
}
