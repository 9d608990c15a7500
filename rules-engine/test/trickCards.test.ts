/**
 * Tests for area effect tricks, duels and nullification
 */

import { describe, it, expect } from 'vitest';
import { CardSubType, createGame, Phase, type Card, type PlayerInput } from '../../shared/src';
import type { ActionDescriptor, ChoiceProvider } from '../src/core/types';
import { InMemoryLogSink } from '../src/logging';
import { RulesEngineAdapter } from '../src/RulesEngineAdapter';
import { attackCard, eagerChoices, evadeCard, nullificationCard, passiveChoices, trickCard } from './fixtures';

function engine(players: PlayerInput[], getPlayerChoice?: ChoiceProvider) {
  const logSink = new InMemoryLogSink();
  const game = createGame({ players, currentPlayerSeat: 0, currentPhase: Phase.PLAY });
  const adapter = new RulesEngineAdapter({ game, getPlayerChoice, logSink });
  return { adapter, game, logSink };
}

function useCard(cardId: number, targetSeat?: number): ActionDescriptor {
  return {
    kind: 'useCard',
    actorSeat: 0,
    cardIds: [cardId],
    targetSeats: targetSeat === undefined ? undefined : [targetSeat],
  };
}

const ids = (cards: readonly Card[]): number[] => cards.map(c => c.id);

const UNANSWERED_TARGET = [
  'area-effect-target',
  'nullification-window',
  'nullification-gate',
  'response-window',
  'area-effect-outcome',
  'damage',
];

describe('area effects', () => {
  it('should resolve every other player in seat order after the user', () => {
    const { adapter, logSink } = engine(
      [{ seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION)] }, { seat: 1 }, { seat: 2 }],
      passiveChoices().provider
    );

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'area-effect',
      ...UNANSWERED_TARGET,
      ...UNANSWERED_TARGET,
    ]);
    expect(execution.results.every(r => r.success)).toBe(true);
    expect(adapter.getPlayer(1).currentHealth).toBe(3);
    expect(adapter.getPlayer(2).currentHealth).toBe(3);
    expect(adapter.getPlayer(0).currentHealth).toBe(4);
    expect(logSink.ofType('areaEffect')[0].message).toBe('barbarianInvasion from seat 0 hits seats 1, 2');
  });

  it('should start after the user and wrap around the table', () => {
    const { adapter, game, logSink } = engine(
      [{ seat: 0 }, { seat: 1 }, { seat: 2, hand: [trickCard(10, CardSubType.ARROW_BARRAGE)] }],
      passiveChoices().provider
    );
    game.currentPlayerSeat = 2;

    adapter.executeAction({ kind: 'useCard', actorSeat: 2, cardIds: [10] });

    expect(logSink.ofType('areaEffect')[0].message).toBe('arrowBarrage from seat 2 hits seats 0, 1');
    expect(logSink.ofType('damage').map(e => e.data?.targetSeat)).toEqual([0, 1]);
  });

  it('should spare a target who answers while the next one takes damage', () => {
    const { adapter, game } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.ARROW_BARRAGE)] },
        { seat: 1, hand: [evadeCard(11)] },
        { seat: 2 },
      ],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'area-effect',
      'area-effect-target',
      'nullification-window',
      'nullification-gate',
      'response-window',
      'area-effect-outcome',
      ...UNANSWERED_TARGET,
    ]);
    expect(adapter.getPlayer(1).currentHealth).toBe(4);
    expect(adapter.getPlayer(2).currentHealth).toBe(3);
    expect(ids(game.discardPile.cards)).toEqual([11, 10]);
  });

  it('should take an attack, not an evade, against an invasion', () => {
    const { adapter } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION)] },
        { seat: 1, hand: [evadeCard(11)] },
        { seat: 2, hand: [attackCard(12)] },
      ],
      eagerChoices().provider
    );

    adapter.executeAction(useCard(10));

    expect(adapter.getPlayer(1).currentHealth).toBe(3);
    expect(ids(adapter.getPlayer(1).hand.cards)).toEqual([11]);
    expect(adapter.getPlayer(2).currentHealth).toBe(4);
  });

  it('should cancel only the nullified target', () => {
    const { adapter, game, logSink } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION)] },
        { seat: 1, hand: [nullificationCard(20)] },
        { seat: 2 },
      ],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'area-effect',
      'area-effect-target',
      'nullification-window',
      'nullification-window',
      'nullification-gate',
      ...UNANSWERED_TARGET,
    ]);
    expect(adapter.getPlayer(1).currentHealth).toBe(4);
    expect(adapter.getPlayer(2).currentHealth).toBe(3);
    expect(ids(game.discardPile.cards)).toEqual([20, 10]);
    expect(logSink.ofType('nullification').map(e => e.message)).toEqual([
      'Seat 1 played a nullification on barbarianInvasion.target for seat 1',
      'barbarianInvasion.target on seat 1 was nullified',
    ]);
  });

  it('should restore the effect when a nullification is itself nullified', () => {
    const { adapter, game } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION), nullificationCard(21)] },
        { seat: 1, hand: [nullificationCard(20)] },
        { seat: 2 },
      ],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'area-effect',
      'area-effect-target',
      'nullification-window',
      'nullification-window',
      'nullification-window',
      'nullification-gate',
      'response-window',
      'area-effect-outcome',
      'damage',
      ...UNANSWERED_TARGET,
    ]);
    expect(adapter.getPlayer(1).currentHealth).toBe(3);
    expect(adapter.getPlayer(2).currentHealth).toBe(3);
    expect(ids(game.discardPile.cards)).toEqual([21, 20, 10]);
  });

  it('should leave out players who are already dead', () => {
    const { adapter, game, logSink } = engine(
      [{ seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION)] }, { seat: 1 }, { seat: 2 }],
      passiveChoices().provider
    );
    game.players[1].isAlive = false;

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual(['use-card', 'area-effect', ...UNANSWERED_TARGET]);
    expect(logSink.ofType('areaEffect')[0].message).toBe('barbarianInvasion from seat 0 hits seats 2');
  });

  it('should let a target die before moving on to the next one', () => {
    const { adapter } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.BARBARIAN_INVASION)] },
        { seat: 1, currentHealth: 1 },
        { seat: 2 },
      ],
      passiveChoices().provider
    );

    const execution = adapter.executeAction(useCard(10));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'area-effect',
      ...UNANSWERED_TARGET,
      'dying',
      'response-window',
      'dying-rescue',
      ...UNANSWERED_TARGET,
    ]);
    expect(adapter.getPlayer(1).isAlive).toBe(false);
    expect(adapter.getPlayer(2).currentHealth).toBe(3);
  });
});

describe('duel', () => {
  it('should damage a target who has no attack', () => {
    const { adapter } = engine(
      [{ seat: 0, hand: [trickCard(30, CardSubType.DUEL)] }, { seat: 1 }],
      passiveChoices().provider
    );

    const execution = adapter.executeAction(useCard(30, 1));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'duel',
      'nullification-window',
      'nullification-gate',
      'duel-round',
      'response-window',
      'duel-outcome',
      'damage',
    ]);
    expect(adapter.getPlayer(1).currentHealth).toBe(3);
    expect(adapter.getPlayer(0).currentHealth).toBe(4);
  });

  it('should alternate rounds until a player cannot answer', () => {
    const { adapter, game, logSink } = engine(
      [{ seat: 0, hand: [trickCard(30, CardSubType.DUEL)] }, { seat: 1, hand: [attackCard(31)] }],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(30, 1));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'duel',
      'nullification-window',
      'nullification-gate',
      'duel-round',
      'response-window',
      'duel-outcome',
      'duel-round',
      'response-window',
      'duel-outcome',
      'damage',
    ]);
    expect(adapter.getPlayer(0).currentHealth).toBe(3);
    expect(adapter.getPlayer(1).currentHealth).toBe(4);
    expect(ids(game.discardPile.cards)).toEqual([31, 30]);
    expect(logSink.ofType('duel').map(e => e.message)).toEqual([
      'Seat 0 challenges seat 1 to a duel',
      'Seat 0 lost the duel to seat 1',
    ]);
  });

  it('should need two attacks against a challenger with unmatched might', () => {
    const { adapter } = engine(
      [{ seat: 0, heroId: 'hero_brute', hand: [trickCard(30, CardSubType.DUEL)] }, { seat: 1, hand: [attackCard(31)] }],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(30, 1));

    expect(execution.results[5]).toMatchObject({ success: false, messageKey: 'response.window.failed' });
    expect(execution.history.map(h => h.kind).slice(6)).toEqual(['duel-outcome', 'damage']);
    expect(adapter.getPlayer(1).currentHealth).toBe(3);
    expect(adapter.getPlayer(1).hand.cards).toEqual([]);
  });

  it('should be cancelled as a whole by a nullification', () => {
    const { adapter, game } = engine(
      [{ seat: 0, hand: [trickCard(30, CardSubType.DUEL)] }, { seat: 1, hand: [nullificationCard(20)] }],
      eagerChoices().provider
    );

    const execution = adapter.executeAction(useCard(30, 1));

    expect(execution.history.map(h => h.kind)).toEqual([
      'use-card',
      'duel',
      'nullification-window',
      'nullification-window',
      'nullification-gate',
    ]);
    expect(adapter.getPlayer(1).currentHealth).toBe(4);
    expect(ids(game.discardPile.cards)).toEqual([20, 30]);
  });

  it('should refuse a duel without a target', () => {
    const { adapter } = engine(
      [{ seat: 0, hand: [trickCard(30, CardSubType.DUEL)] }, { seat: 1 }],
      passiveChoices().provider
    );

    const execution = adapter.executeAction(useCard(30));

    expect(execution.results[0].messageKey).toBe('rule.action.singleTargetRequired');
  });
});

describe('trick card usage', () => {
  it('should offer area effects without targets and duels against anyone', () => {
    const { adapter } = engine(
      [
        { seat: 0, hand: [trickCard(10, CardSubType.ARROW_BARRAGE), trickCard(30, CardSubType.DUEL), nullificationCard(20)] },
        { seat: 1 },
        { seat: 2 },
        { seat: 3 },
      ],
      passiveChoices().provider
    );

    expect(adapter.availableActions(0)).toEqual([
      { kind: 'useCard', actorSeat: 0, cardIds: [10], targetSeats: [], requiresTargets: false },
      { kind: 'useCard', actorSeat: 0, cardIds: [30], targetSeats: [1, 2, 3], requiresTargets: true },
      { kind: 'endPlayPhase', actorSeat: 0 },
    ]);
  });

  it('should keep nullification for response windows', () => {
    const { adapter } = engine([{ seat: 0, hand: [nullificationCard(20)] }, { seat: 1 }], passiveChoices().provider);

    const execution = adapter.executeAction(useCard(20));

    expect(execution.results[0].messageKey).toBe('rule.cardUsage.responseOnly');
  });
});
