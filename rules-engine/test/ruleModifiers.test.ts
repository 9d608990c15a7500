/**
 * Tests for the rule modifier aggregator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CardSubType, createGame, type Game, type Player } from '../../shared/src';
import { AbilityType, BaseAbility } from '../src/abilities/ability';
import { AbilityManager } from '../src/abilities/abilityManager';
import { AbilityRegistry } from '../src/abilities/abilityRegistry';
import { DrawBonusAbility } from '../src/abilities/heroAbilities';
import { GameEventBus } from '../src/eventBus';
import { ResponseType } from '../src/responseWindow';
import {
  ALLOWED,
  CombinationPolicy,
  disallowed,
  RULE_QUERY_POLICIES,
  RuleModifierAggregator,
  RuleQueryKind,
  type RuleModifierHooks,
} from '../src/rules/ruleModifiers';
import { attackCard } from './fixtures';

class HookAbility extends BaseAbility {
  readonly name = 'Hook';
  readonly type = AbilityType.LOCKED;

  constructor(
    readonly id: string,
    readonly modifiers: RuleModifierHooks
  ) {
    super();
  }
}

describe('RuleModifierAggregator', () => {
  let game: Game;
  let alice: Player;
  let bob: Player;
  let manager: AbilityManager;
  let aggregator: RuleModifierAggregator;

  beforeEach(() => {
    game = createGame({ players: [{ seat: 0 }, { seat: 1 }] });
    [alice, bob] = game.players;
    manager = new AbilityManager(new AbilityRegistry(), new GameEventBus());
    aggregator = new RuleModifierAggregator(manager);
  });

  describe('combination policies', () => {
    it('should declare seat distance and draw count additive', () => {
      expect(RULE_QUERY_POLICIES[RuleQueryKind.SEAT_DISTANCE]).toBe(CombinationPolicy.ADDITIVE);
      expect(RULE_QUERY_POLICIES[RuleQueryKind.DRAW_COUNT]).toBe(CombinationPolicy.ADDITIVE);
      expect(RULE_QUERY_POLICIES[RuleQueryKind.ATTACK_DISTANCE]).toBe(CombinationPolicy.OVERRIDE);
      expect(RULE_QUERY_POLICIES[RuleQueryKind.CAN_USE_CARD]).toBe(CombinationPolicy.OVERRIDE);
    });

    it('should add up draw bonuses from several abilities', () => {
      manager.addAbility(game, alice, new DrawBonusAbility('quick_study', 'Quick Study'));
      manager.addAbility(game, alice, new DrawBonusAbility('keen_insight', 'Keen Insight'));

      expect(aggregator.drawCount(2, { game, player: alice })).toBe(4);
    });

    it('should let the last overriding answer win', () => {
      manager.addAbility(game, alice, new HookAbility('short', { attackDistance: () => 3 }));
      manager.addAbility(game, alice, new HookAbility('long', { attackDistance: () => 5 }));

      expect(aggregator.attackDistance(1, { game, attacker: alice })).toBe(5);
    });

    it('should pass the running value to each hook', () => {
      manager.addAbility(game, alice, new HookAbility('set', { maxUsesPerTurn: () => 4 }));
      manager.addAbility(game, alice, new HookAbility('double', { maxUsesPerTurn: current => current * 2 }));

      expect(aggregator.maxUsesPerTurn(1, { game, player: alice, subType: CardSubType.ATTACK })).toBe(8);
    });
  });

  describe('abstaining', () => {
    it('should return the base value when no ability answers', () => {
      manager.addAbility(game, alice, new HookAbility('silent', { drawCount: () => undefined }));

      expect(aggregator.drawCount(2, { game, player: alice })).toBe(2);
      expect(aggregator.attackDistance(1, { game, attacker: alice })).toBe(1);
    });

    it('should return the base value without an ability query', () => {
      const bare = new RuleModifierAggregator();
      expect(bare.drawCount(2, { game, player: alice })).toBe(2);
    });

    it('should ignore abilities of a dead owner', () => {
      manager.addAbility(game, alice, new DrawBonusAbility('quick_study', 'Quick Study'));
      alice.isAlive = false;

      expect(aggregator.drawCount(2, { game, player: alice })).toBe(2);
    });

    it('should consult abilities live on every evaluation', () => {
      expect(aggregator.drawCount(2, { game, player: alice })).toBe(2);

      manager.addAbility(game, alice, new DrawBonusAbility('quick_study', 'Quick Study'));
      expect(aggregator.drawCount(2, { game, player: alice })).toBe(3);

      manager.removeAbility(game, alice, 'quick_study');
      expect(aggregator.drawCount(2, { game, player: alice })).toBe(2);
    });
  });

  describe('rule results', () => {
    it('should let a modifier veto an allowed card use', () => {
      manager.addAbility(game, alice, new HookAbility('pacifist', { canUseCard: () => disallowed('test.pacifist') }));

      const result = aggregator.canUseCard(ALLOWED, { game, player: alice, card: attackCard(1) });

      expect(result).toEqual({ allowed: false, reason: 'test.pacifist' });
    });
  });

  describe('player order', () => {
    it('should apply the defender modifiers before the attacker modifiers for seat distance', () => {
      const order: number[] = [];
      manager.addAbility(game, alice, new HookAbility('a', { seatDistance: (_c, _q, owner) => { order.push(owner.seat); return 0; } }));
      manager.addAbility(game, bob, new HookAbility('b', { seatDistance: (_c, _q, owner) => { order.push(owner.seat); return 0; } }));

      aggregator.seatDistance(1, { game, from: alice, to: bob });

      expect(order).toEqual([1, 0]);
    });

    it('should consult the attacker and then the defender for required responses', () => {
      const order: number[] = [];
      const record = (seat: number): number | undefined => { order.push(seat); return undefined; };
      manager.addAbility(game, alice, new HookAbility('a', { requiredResponseCount: (_c, _q, owner) => record(owner.seat) }));
      manager.addAbility(game, bob, new HookAbility('b', { requiredResponseCount: (_c, _q, owner) => record(owner.seat) }));

      aggregator.requiredResponseCount(1, { game, attacker: bob, defender: alice, responseType: ResponseType.EVADE_AGAINST_ATTACK });

      expect(order).toEqual([1, 0]);
    });
  });
});
