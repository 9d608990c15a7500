/**
 * rules/ruleModifiers.ts
 *
 * Rule Modifier Aggregator.
 *
 * A rule query starts from its base value; the aggregator then walks the
 * active abilities of the given players, in registration order, and folds
 * in every hook that answers. How an answer combines with the running
 * value is declared once per query kind:
 *
 * - OVERRIDE: the answer replaces the running value (last answer wins)
 * - ADDITIVE: the answer is a delta added to the running value
 *
 * A hook that returns undefined abstains and never changes the value.
 * Abilities are queried live on every evaluation.
 */

import type { Card, CardSubType, Game, Player } from '../../../shared/src';
import type { AbilityQueryService } from '../abilities/ability';
import type { ActionDescriptor } from '../core/types';
import type { ResponseSourceEvent, ResponseType } from '../responseWindow';
import { debug } from '../utils/debug';

export interface RuleResult {
  readonly allowed: boolean;
  /** Message key explaining a refusal */
  readonly reason?: string;
}

export const ALLOWED: RuleResult = Object.freeze({ allowed: true });

export function disallowed(reason: string): RuleResult {
  return { allowed: false, reason };
}

export enum RuleQueryKind {
  CAN_USE_CARD = 'canUseCard',
  CAN_RESPOND = 'canRespond',
  VALIDATE_ACTION = 'validateAction',
  MAX_USES_PER_TURN = 'maxUsesPerTurn',
  ATTACK_DISTANCE = 'attackDistance',
  SEAT_DISTANCE = 'seatDistance',
  DRAW_COUNT = 'drawCount',
  REQUIRED_RESPONSE_COUNT = 'requiredResponseCount',
}

export enum CombinationPolicy {
  OVERRIDE = 'override',
  ADDITIVE = 'additive',
}

export const RULE_QUERY_POLICIES: Readonly<Record<RuleQueryKind, CombinationPolicy>> = {
  [RuleQueryKind.CAN_USE_CARD]: CombinationPolicy.OVERRIDE,
  [RuleQueryKind.CAN_RESPOND]: CombinationPolicy.OVERRIDE,
  [RuleQueryKind.VALIDATE_ACTION]: CombinationPolicy.OVERRIDE,
  [RuleQueryKind.MAX_USES_PER_TURN]: CombinationPolicy.OVERRIDE,
  [RuleQueryKind.ATTACK_DISTANCE]: CombinationPolicy.OVERRIDE,
  [RuleQueryKind.SEAT_DISTANCE]: CombinationPolicy.ADDITIVE,
  [RuleQueryKind.DRAW_COUNT]: CombinationPolicy.ADDITIVE,
  [RuleQueryKind.REQUIRED_RESPONSE_COUNT]: CombinationPolicy.OVERRIDE,
};

export interface CardUseQuery {
  readonly game: Game;
  readonly player: Player;
  readonly card: Card;
}

export interface ResponseQuery {
  readonly game: Game;
  readonly responder: Player;
  readonly card: Card;
  readonly responseType: ResponseType;
  readonly sourceEvent?: ResponseSourceEvent;
}

export interface ActionValidationQuery {
  readonly game: Game;
  readonly player: Player;
  readonly action: ActionDescriptor;
}

export interface UsageLimitQuery {
  readonly game: Game;
  readonly player: Player;
  readonly subType: CardSubType;
}

export interface AttackDistanceQuery {
  readonly game: Game;
  readonly attacker: Player;
}

export interface SeatDistanceQuery {
  readonly game: Game;
  readonly from: Player;
  readonly to: Player;
}

export interface DrawCountQuery {
  readonly game: Game;
  readonly player: Player;
}

export interface RequiredResponseQuery {
  readonly game: Game;
  readonly attacker: Player;
  readonly defender: Player;
  readonly responseType: ResponseType;
}

/**
 * One ability's opinion on a rule query. `owner` is the player the ability
 * belongs to. Return undefined to abstain.
 */
export type RuleModifier<V, Q> = (current: V, query: Q, owner: Player) => V | undefined;

export interface RuleModifierHooks {
  readonly canUseCard?: RuleModifier<RuleResult, CardUseQuery>;
  readonly canRespond?: RuleModifier<RuleResult, ResponseQuery>;
  readonly validateAction?: RuleModifier<RuleResult, ActionValidationQuery>;
  readonly maxUsesPerTurn?: RuleModifier<number, UsageLimitQuery>;
  readonly attackDistance?: RuleModifier<number, AttackDistanceQuery>;
  /** Additive: return the delta */
  readonly seatDistance?: RuleModifier<number, SeatDistanceQuery>;
  /** Additive: return the delta */
  readonly drawCount?: RuleModifier<number, DrawCountQuery>;
  readonly requiredResponseCount?: RuleModifier<number, RequiredResponseQuery>;
}

type HookPicker<V, Q> = (hooks: RuleModifierHooks) => RuleModifier<V, Q> | undefined;

export class RuleModifierAggregator {
  constructor(private readonly abilityQuery?: AbilityQueryService) {}

  canUseCard(base: RuleResult, query: CardUseQuery): RuleResult {
    return this.fold(RuleQueryKind.CAN_USE_CARD, base, query.game, [query.player], query, h => h.canUseCard, override);
  }

  canRespond(base: RuleResult, query: ResponseQuery): RuleResult {
    return this.fold(RuleQueryKind.CAN_RESPOND, base, query.game, [query.responder], query, h => h.canRespond, override);
  }

  validateAction(base: RuleResult, query: ActionValidationQuery): RuleResult {
    return this.fold(RuleQueryKind.VALIDATE_ACTION, base, query.game, [query.player], query, h => h.validateAction, override);
  }

  maxUsesPerTurn(base: number, query: UsageLimitQuery): number {
    return this.foldNumber(RuleQueryKind.MAX_USES_PER_TURN, base, query.game, [query.player], query, h => h.maxUsesPerTurn);
  }

  attackDistance(base: number, query: AttackDistanceQuery): number {
    return this.foldNumber(RuleQueryKind.ATTACK_DISTANCE, base, query.game, [query.attacker], query, h => h.attackDistance);
  }

  /**
   * Defender's modifiers apply before the attacker's
   */
  seatDistance(base: number, query: SeatDistanceQuery): number {
    return this.foldNumber(RuleQueryKind.SEAT_DISTANCE, base, query.game, [query.to, query.from], query, h => h.seatDistance);
  }

  drawCount(base: number, query: DrawCountQuery): number {
    return this.foldNumber(RuleQueryKind.DRAW_COUNT, base, query.game, [query.player], query, h => h.drawCount);
  }

  requiredResponseCount(base: number, query: RequiredResponseQuery): number {
    return this.foldNumber(
      RuleQueryKind.REQUIRED_RESPONSE_COUNT,
      base,
      query.game,
      [query.attacker, query.defender],
      query,
      h => h.requiredResponseCount
    );
  }

  private foldNumber<Q>(
    kind: RuleQueryKind,
    base: number,
    game: Game,
    players: readonly Player[],
    query: Q,
    pick: HookPicker<number, Q>
  ): number {
    const combine = RULE_QUERY_POLICIES[kind] === CombinationPolicy.ADDITIVE ? add : override;
    return this.fold(kind, base, game, players, query, pick, combine);
  }

  private fold<V, Q>(
    kind: RuleQueryKind,
    base: V,
    game: Game,
    players: readonly Player[],
    query: Q,
    pick: HookPicker<V, Q>,
    combine: (current: V, answer: V) => V
  ): V {
    if (!this.abilityQuery) return base;

    let current = base;
    for (const player of players) {
      for (const ability of this.abilityQuery.activeAbilitiesFor(game, player)) {
        const hook = ability.modifiers ? pick(ability.modifiers) : undefined;
        if (!hook) continue;

        const answer = hook(current, query, player);
        if (answer === undefined) continue;

        current = combine(current, answer);
        debug(2, `[rules] ${kind} adjusted by ${ability.id} of seat ${player.seat}`);
      }
    }
    return current;
  }
}

function override<V>(_current: V, answer: V): V {
  return answer;
}

function add(current: number, answer: number): number {
  return current + answer;
}
