/**
 * rules/ruleService.ts
 *
 * The rule service resolvers talk to. It composes the phase, range,
 * limit, card usage and response rules; the modifier aggregator is an
 * internal stage of each of them rather than something callers reach
 * directly.
 */

import type { Card, Game, Player } from '../../../shared/src';
import type { AbilityQueryService } from '../abilities/ability';
import { engineConfig } from '../config';
import type { ActionDescriptor } from '../core/types';
import type { ResponseType } from '../responseWindow';
import { ActionQueryService } from './actionQuery';
import { CardUsageRuleService, type CardUsageContext } from './cardUsageRules';
import { LimitRuleService } from './limitRules';
import { PhaseRuleService } from './phaseRules';
import { RangeRuleService } from './rangeRules';
import { ResponseRequirementCalculator } from './responseRequirement';
import { ResponseRuleService, type ResponseRuleContext } from './responseRules';
import { ALLOWED, disallowed, RuleModifierAggregator, type RuleResult } from './ruleModifiers';

export interface RuleService {
  availableActions(game: Game, player: Player): ActionDescriptor[];
  validateActionBeforeResolve(game: Game, player: Player, action: ActionDescriptor): RuleResult;
  canUseCard(ctx: CardUsageContext): RuleResult;
  legalTargets(ctx: CardUsageContext): Player[];
  legalResponseCards(ctx: ResponseRuleContext): Card[];
  canRespondWithCard(ctx: ResponseRuleContext, card: Card): RuleResult;
  seatDistance(game: Game, from: Player, to: Player): number;
  attackDistance(game: Game, attacker: Player): number;
  isWithinAttackRange(game: Game, attacker: Player, defender: Player): boolean;
  maxAttacksPerTurn(game: Game, player: Player): number;
  drawCount(game: Game, player: Player): number;
  requiredResponseCount(game: Game, attacker: Player, defender: Player, responseType: ResponseType): number;
}

export interface RuleServiceOptions {
  readonly baseDrawCount?: number;
  readonly baseAttackDistance?: number;
  readonly maxAttacksPerTurn?: number;
}

export class BasicRuleService implements RuleService {
  readonly phase: PhaseRuleService;
  readonly range: RangeRuleService;
  readonly limits: LimitRuleService;
  readonly cardUsage: CardUsageRuleService;
  readonly responses: ResponseRuleService;
  readonly actionQuery: ActionQueryService;
  private readonly modifiers: RuleModifierAggregator;
  private readonly requirements: ResponseRequirementCalculator;
  private readonly baseDrawCount: number;

  constructor(abilityQuery?: AbilityQueryService, options: RuleServiceOptions = {}) {
    this.modifiers = new RuleModifierAggregator(abilityQuery);
    this.phase = new PhaseRuleService();
    this.range = new RangeRuleService(this.modifiers, options.baseAttackDistance ?? engineConfig.baseAttackDistance);
    this.limits = new LimitRuleService(this.modifiers, options.maxAttacksPerTurn ?? engineConfig.maxAttacksPerTurn);
    this.cardUsage = new CardUsageRuleService(this.phase, this.range, this.limits, this.modifiers);
    this.responses = new ResponseRuleService(this.modifiers);
    this.actionQuery = new ActionQueryService(this.phase, this.cardUsage);
    this.requirements = new ResponseRequirementCalculator(this.modifiers);
    this.baseDrawCount = options.baseDrawCount ?? engineConfig.baseDrawCount;
  }

  availableActions(game: Game, player: Player): ActionDescriptor[] {
    return this.actionQuery.availableActions(game, player);
  }

  validateActionBeforeResolve(game: Game, player: Player, action: ActionDescriptor): RuleResult {
    const base = this.baseValidation(game, player, action);
    return this.modifiers.validateAction(base, { game, player, action });
  }

  canUseCard(ctx: CardUsageContext): RuleResult {
    return this.cardUsage.canUseCard(ctx);
  }

  legalTargets(ctx: CardUsageContext): Player[] {
    return this.cardUsage.legalTargets(ctx);
  }

  legalResponseCards(ctx: ResponseRuleContext): Card[] {
    return this.responses.legalResponseCards(ctx);
  }

  canRespondWithCard(ctx: ResponseRuleContext, card: Card): RuleResult {
    return this.responses.canRespondWithCard(ctx, card);
  }

  seatDistance(game: Game, from: Player, to: Player): number {
    return this.range.seatDistance(game, from, to);
  }

  attackDistance(game: Game, attacker: Player): number {
    return this.range.attackDistance(game, attacker);
  }

  isWithinAttackRange(game: Game, attacker: Player, defender: Player): boolean {
    return this.range.isWithinAttackRange(game, attacker, defender);
  }

  maxAttacksPerTurn(game: Game, player: Player): number {
    return this.limits.maxAttacksPerTurn(game, player);
  }

  /**
   * Cards drawn in the draw phase; bonuses stack
   */
  drawCount(game: Game, player: Player): number {
    return Math.max(0, this.modifiers.drawCount(this.baseDrawCount, { game, player }));
  }

  requiredResponseCount(game: Game, attacker: Player, defender: Player, responseType: ResponseType): number {
    return this.requirements.requiredCount(game, attacker, defender, responseType);
  }

  private baseValidation(game: Game, player: Player, action: ActionDescriptor): RuleResult {
    if (action.actorSeat !== player.seat) return disallowed('rule.action.wrongActor');

    if (action.kind === 'endPlayPhase') {
      return this.phase.isCardUsagePhase(game, player) ? ALLOWED : disallowed('rule.cardUsage.wrongPhase');
    }

    const cardIds = action.cardIds ?? [];
    if (cardIds.length !== 1) return disallowed('rule.action.singleCardRequired');

    const card = player.hand.cards.find(c => c.id === cardIds[0]);
    if (!card) return disallowed('rule.action.cardNotInHand');

    const ctx = { game, player, card };
    const usage = this.cardUsage.canUseCard(ctx);
    if (!usage.allowed) return usage;

    if (this.cardUsage.requiresTargets(card)) {
      const targets = action.targetSeats ?? [];
      if (targets.length !== 1) return disallowed('rule.action.singleTargetRequired');
      const legal = this.cardUsage.legalTargets(ctx);
      if (!legal.some(p => p.seat === targets[0])) return disallowed('rule.action.invalidTarget');
    }

    return ALLOWED;
  }
}
