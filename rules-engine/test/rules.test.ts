/**
 * Tests for range, limit, card usage and response rules
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CardSubType, createGame, Phase, Role, type Game, type PlayerInput } from '../../shared/src';
import { AbilityManager } from '../src/abilities/abilityManager';
import { createDefaultAbilityRegistry } from '../src/abilities/defaultAbilities';
import { GameEventBus } from '../src/eventBus';
import { ResponseType } from '../src/responseWindow';
import { recordCardUse, resetTurnUsage } from '../src/rules/limitRules';
import { BasicRuleService } from '../src/rules/ruleService';
import { attackCard, equipmentCard, evadeCard, healCard } from './fixtures';

function setup(players: PlayerInput[]): { game: Game; rules: BasicRuleService; abilities: AbilityManager } {
  const game = createGame({ players, currentPlayerSeat: 0, currentPhase: Phase.PLAY });
  const abilities = new AbilityManager(createDefaultAbilityRegistry(), new GameEventBus());
  abilities.loadAbilitiesForAllPlayers(game);
  const rules = new BasicRuleService(abilities, { baseDrawCount: 2, baseAttackDistance: 1, maxAttacksPerTurn: 1 });
  return { game, rules, abilities };
}

const fourSeats = (first: Partial<PlayerInput> = {}): PlayerInput[] => [
  { seat: 0, ...first },
  { seat: 1 },
  { seat: 2 },
  { seat: 3 },
];

describe('RangeRuleService', () => {
  it('should measure the shorter way round the table', () => {
    const { game, rules } = setup(fourSeats());
    const [p0, p1, p2, p3] = game.players;

    expect(rules.seatDistance(game, p0, p1)).toBe(1);
    expect(rules.seatDistance(game, p0, p2)).toBe(2);
    expect(rules.seatDistance(game, p0, p3)).toBe(1);
    expect(rules.seatDistance(game, p0, p0)).toBe(0);
  });

  it('should skip dead players when measuring', () => {
    const { game, rules } = setup(fourSeats());
    const [p0, p1, p2] = game.players;
    p1.isAlive = false;

    expect(rules.seatDistance(game, p0, p2)).toBe(1);
  });

  it('should add a defensive mount to the distance towards its owner', () => {
    const { game, rules } = setup([
      { seat: 0 },
      { seat: 1 },
      { seat: 2, equipment: [equipmentCard(40, 'equip_defensive_mount', CardSubType.DEFENSIVE_MOUNT)] },
      { seat: 3 },
    ]);
    const [p0, , p2] = game.players;

    expect(rules.seatDistance(game, p0, p2)).toBe(3);
    expect(rules.seatDistance(game, p2, p0)).toBe(2);
  });

  it('should subtract an offensive mount but never go below one', () => {
    const { game, rules } = setup(
      fourSeats({ equipment: [equipmentCard(41, 'equip_offensive_mount', CardSubType.OFFENSIVE_MOUNT)] })
    );
    const [p0, p1, p2] = game.players;

    expect(rules.seatDistance(game, p0, p2)).toBe(1);
    expect(rules.seatDistance(game, p0, p1)).toBe(1);
  });

  it('should let weapons override the attack distance', () => {
    const { game, rules } = setup(
      fourSeats({ equipment: [equipmentCard(42, 'equip_long_bow', CardSubType.WEAPON)] })
    );
    const [p0, p1, p2, p3] = game.players;

    expect(rules.attackDistance(game, p0)).toBe(5);
    expect(rules.attackDistance(game, p1)).toBe(1);
    expect(rules.isWithinAttackRange(game, p0, p2)).toBe(true);
    expect(rules.isWithinAttackRange(game, p1, p0)).toBe(true);
    expect(rules.isWithinAttackRange(game, p1, p3)).toBe(false);
    expect(rules.isWithinAttackRange(game, p0, p0)).toBe(false);
  });
});

describe('LimitRuleService', () => {
  it('should allow one attack per turn by default', () => {
    const { game, rules } = setup(fourSeats());
    const player = game.players[0];

    expect(rules.maxAttacksPerTurn(game, player)).toBe(1);
    expect(rules.limits.hasUsesRemaining(game, player, CardSubType.ATTACK)).toBe(true);

    recordCardUse(player, CardSubType.ATTACK);
    expect(rules.limits.usesThisTurn(player, CardSubType.ATTACK)).toBe(1);
    expect(rules.limits.hasUsesRemaining(game, player, CardSubType.ATTACK)).toBe(false);

    resetTurnUsage(player);
    expect(rules.limits.hasUsesRemaining(game, player, CardSubType.ATTACK)).toBe(true);
  });

  it('should leave other card types unlimited', () => {
    const { game, rules } = setup(fourSeats());
    expect(rules.limits.maxUsesPerTurn(game, game.players[0], CardSubType.HEAL)).toBe(Number.POSITIVE_INFINITY);
  });

  it('should lift the attack limit with a repeating crossbow', () => {
    const { game, rules } = setup(
      fourSeats({ equipment: [equipmentCard(43, 'equip_repeating_crossbow', CardSubType.WEAPON)] })
    );
    expect(rules.maxAttacksPerTurn(game, game.players[0])).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('CardUsageRuleService', () => {
  let game: Game;
  let rules: BasicRuleService;

  beforeEach(() => {
    ({ game, rules } = setup(
      fourSeats({
        hand: [
          attackCard(1),
          evadeCard(2),
          healCard(3),
          equipmentCard(4, 'equip_long_bow', CardSubType.WEAPON),
        ],
      })
    ));
  });

  const use = (id: number) => {
    const player = game.players[0];
    const card = player.hand.cards.find(c => c.id === id);
    if (!card) throw new Error(`card ${id} missing`);
    return rules.canUseCard({ game, player, card });
  };

  it('should allow an attack with a target in range', () => {
    expect(use(1)).toEqual({ allowed: true });
    expect(rules.legalTargets({ game, player: game.players[0], card: game.players[0].hand.cards[0] }).map(p => p.seat)).toEqual([1, 3]);
  });

  it('should refuse a second attack in the same turn', () => {
    recordCardUse(game.players[0], CardSubType.ATTACK);
    expect(use(1)).toEqual({ allowed: false, reason: 'rule.cardUsage.attackLimitReached' });
  });

  it('should refuse an attack with nobody in range', () => {
    for (const p of game.players.slice(1)) {
      p.isAlive = false;
    }
    expect(use(1)).toEqual({ allowed: false, reason: 'rule.cardUsage.noLegalTarget' });
  });

  it('should keep evades for response windows', () => {
    expect(use(2)).toEqual({ allowed: false, reason: 'rule.cardUsage.responseOnly' });
  });

  it('should refuse a heal at full health', () => {
    expect(use(3)).toEqual({ allowed: false, reason: 'rule.cardUsage.fullHealth' });
    game.players[0].currentHealth = 2;
    expect(use(3)).toEqual({ allowed: true });
  });

  it('should always allow equipment', () => {
    expect(use(4)).toEqual({ allowed: true });
  });

  it('should refuse cards outside the owner play phase', () => {
    game.currentPhase = Phase.DRAW;
    expect(use(1)).toEqual({ allowed: false, reason: 'rule.cardUsage.wrongPhase' });

    game.currentPhase = Phase.PLAY;
    game.currentPlayerSeat = 1;
    expect(use(1)).toEqual({ allowed: false, reason: 'rule.cardUsage.wrongPhase' });
  });

  it('should refuse a dead player', () => {
    game.players[0].isAlive = false;
    expect(use(1)).toEqual({ allowed: false, reason: 'rule.cardUsage.playerNotAlive' });
  });
});

describe('BasicRuleService', () => {
  describe('validateActionBeforeResolve', () => {
    let game: Game;
    let rules: BasicRuleService;

    beforeEach(() => {
      ({ game, rules } = setup(fourSeats({ hand: [attackCard(1)] })));
    });

    it('should accept an attack on a seat in range', () => {
      const result = rules.validateActionBeforeResolve(game, game.players[0], {
        kind: 'useCard',
        actorSeat: 0,
        cardIds: [1],
        targetSeats: [1],
      });
      expect(result.allowed).toBe(true);
    });

    it('should name the first rule an action breaks', () => {
      const player = game.players[0];
      const check = (action: Parameters<BasicRuleService['validateActionBeforeResolve']>[2]) =>
        rules.validateActionBeforeResolve(game, player, action).reason;

      expect(check({ kind: 'useCard', actorSeat: 1, cardIds: [1], targetSeats: [1] })).toBe('rule.action.wrongActor');
      expect(check({ kind: 'useCard', actorSeat: 0, cardIds: [], targetSeats: [1] })).toBe('rule.action.singleCardRequired');
      expect(check({ kind: 'useCard', actorSeat: 0, cardIds: [7], targetSeats: [1] })).toBe('rule.action.cardNotInHand');
      expect(check({ kind: 'useCard', actorSeat: 0, cardIds: [1] })).toBe('rule.action.singleTargetRequired');
      expect(check({ kind: 'useCard', actorSeat: 0, cardIds: [1], targetSeats: [2] })).toBe('rule.action.invalidTarget');
    });

    it('should allow ending the play phase only during it', () => {
      const player = game.players[0];
      expect(rules.validateActionBeforeResolve(game, player, { kind: 'endPlayPhase', actorSeat: 0 }).allowed).toBe(true);

      game.currentPhase = Phase.DISCARD;
      expect(rules.validateActionBeforeResolve(game, player, { kind: 'endPlayPhase', actorSeat: 0 }).reason).toBe(
        'rule.cardUsage.wrongPhase'
      );
    });
  });

  describe('availableActions', () => {
    it('should list usable cards with their targets and the end of the play phase', () => {
      const { game, rules } = setup(fourSeats({ hand: [attackCard(1), evadeCard(2), healCard(3)] }));

      expect(rules.availableActions(game, game.players[0])).toEqual([
        { kind: 'useCard', actorSeat: 0, cardIds: [1], targetSeats: [1, 3], requiresTargets: true },
        { kind: 'endPlayPhase', actorSeat: 0 },
      ]);
    });

    it('should list nothing for a player who is not in their play phase', () => {
      const { game, rules } = setup(fourSeats({ hand: [attackCard(1)] }));
      expect(rules.availableActions(game, game.players[1])).toEqual([]);
    });
  });

  describe('drawCount', () => {
    it('should draw the base count plus every bonus', () => {
      const { game, rules } = setup([{ seat: 0, heroId: 'hero_scholar' }, { seat: 1, heroId: 'hero_scout' }, { seat: 2 }]);

      expect(rules.drawCount(game, game.players[0])).toBe(4);
      expect(rules.drawCount(game, game.players[1])).toBe(3);
      expect(rules.drawCount(game, game.players[2])).toBe(2);
    });
  });

  describe('requiredResponseCount', () => {
    it('should demand two evades against an attacker with unmatched might', () => {
      const { game, rules } = setup([{ seat: 0, heroId: 'hero_brute' }, { seat: 1, role: Role.REBEL }]);
      const [brute, other] = game.players;

      expect(rules.requiredResponseCount(game, brute, other, ResponseType.EVADE_AGAINST_ATTACK)).toBe(2);
      expect(rules.requiredResponseCount(game, other, brute, ResponseType.EVADE_AGAINST_ATTACK)).toBe(1);
      expect(rules.requiredResponseCount(game, brute, other, ResponseType.HEAL_FOR_DYING)).toBe(1);
    });
  });

  describe('response cards', () => {
    it('should list matching hand cards in hand order', () => {
      const { game, rules } = setup(fourSeats({ hand: [evadeCard(5), attackCard(6), evadeCard(7), healCard(8)] }));
      const responder = game.players[0];

      const evades = rules.legalResponseCards({ game, responder, responseType: ResponseType.EVADE_AGAINST_ATTACK });
      const heals = rules.legalResponseCards({ game, responder, responseType: ResponseType.HEAL_FOR_DYING });

      expect(evades.map(c => c.id)).toEqual([5, 7]);
      expect(heals.map(c => c.id)).toEqual([8]);
    });

    it('should refuse responses from a dead player or cards not in hand', () => {
      const { game, rules } = setup(fourSeats({ hand: [evadeCard(5)] }));
      const responder = game.players[0];
      const ctx = { game, responder, responseType: ResponseType.EVADE_AGAINST_ATTACK };

      expect(rules.canRespondWithCard(ctx, evadeCard(99)).reason).toBe('rule.response.cardNotInHand');
      expect(rules.canRespondWithCard(ctx, responder.hand.cards[0]).allowed).toBe(true);

      responder.isAlive = false;
      expect(rules.legalResponseCards(ctx)).toEqual([]);
    });
  });
});
