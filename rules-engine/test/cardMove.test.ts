/**
 * Tests for the card move service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createGame, type Game, type Player } from '../../shared/src';
import { BasicCardMoveService, CardMoveOrdering, CardMoveReason, type CardMoveSnapshot } from '../src/cardMove';
import { InvariantViolationError } from '../src/core/errors';
import { GameEventType } from '../src/core/events';
import { GameEventBus } from '../src/eventBus';
import { attackCard, evadeCard, healCard } from './fixtures';

describe('BasicCardMoveService', () => {
  let game: Game;
  let player: Player;
  let bus: GameEventBus;
  let moves: BasicCardMoveService;

  beforeEach(() => {
    game = createGame({
      players: [{ seat: 0, hand: [attackCard(1), evadeCard(2), healCard(3)] }, { seat: 1 }],
      drawPile: [attackCard(10), attackCard(11), evadeCard(12)],
      discardPile: [healCard(9)],
    });
    player = game.players[0];
    bus = new GameEventBus();
    moves = new BasicCardMoveService(bus);
  });

  const ids = (cards: readonly { id: number }[]): number[] => cards.map(c => c.id);

  describe('moveMany', () => {
    it('should put a block on top of the target keeping its order', () => {
      moves.moveMany({
        game,
        source: player.hand,
        target: game.discardPile,
        cards: [player.hand.cards[0], player.hand.cards[1]],
        reason: CardMoveReason.DISCARD,
        ordering: CardMoveOrdering.TO_TOP,
      });

      expect(ids(game.discardPile.cards)).toEqual([1, 2, 9]);
      expect(ids(player.hand.cards)).toEqual([3]);
    });

    it('should append to the bottom of the target', () => {
      moves.moveMany({
        game,
        source: player.hand,
        target: game.discardPile,
        cards: [player.hand.cards[2], player.hand.cards[0]],
        reason: CardMoveReason.DISCARD,
        ordering: CardMoveOrdering.TO_BOTTOM,
      });

      expect(ids(game.discardPile.cards)).toEqual([9, 3, 1]);
      expect(ids(player.hand.cards)).toEqual([2]);
    });

    it('should publish before and after events with the same snapshot', () => {
      const seen: Array<[string, CardMoveSnapshot]> = [];
      bus.subscribe(GameEventType.BEFORE_CARD_MOVE, e => seen.push(['before', e.move]));
      bus.subscribe(GameEventType.AFTER_CARD_MOVE, e => seen.push(['after', e.move]));

      const result = moves.moveSingle({
        game,
        source: player.hand,
        target: game.discardPile,
        cards: [player.hand.cards[0]],
        reason: CardMoveReason.PLAY,
        ordering: CardMoveOrdering.TO_TOP,
      });

      const expected: CardMoveSnapshot = {
        sourceZoneId: 'hand_0',
        targetZoneId: 'discardPile',
        cardIds: [1],
        reason: CardMoveReason.PLAY,
        ordering: CardMoveOrdering.TO_TOP,
      };
      expect(seen).toEqual([['before', expected], ['after', expected]]);
      expect(result.move).toEqual(expected);
      expect(ids(result.movedCards)).toEqual([1]);
    });

    it('should work without an event bus', () => {
      const quiet = new BasicCardMoveService();
      quiet.moveSingle({
        game,
        source: player.hand,
        target: game.discardPile,
        cards: [player.hand.cards[1]],
        reason: CardMoveReason.DISCARD,
        ordering: CardMoveOrdering.TO_TOP,
      });

      expect(ids(game.discardPile.cards)).toEqual([2, 9]);
    });
  });

  describe('invariants', () => {
    it('should reject a card that is not in the source zone', () => {
      expect(() =>
        moves.moveMany({
          game,
          source: player.hand,
          target: game.discardPile,
          cards: [attackCard(99)],
          reason: CardMoveReason.DISCARD,
          ordering: CardMoveOrdering.TO_TOP,
        })
      ).toThrow(InvariantViolationError);
    });

    it('should reject a move into the same zone', () => {
      expect(() =>
        moves.moveMany({
          game,
          source: player.hand,
          target: player.hand,
          cards: [player.hand.cards[0]],
          reason: CardMoveReason.OTHER,
          ordering: CardMoveOrdering.TO_TOP,
        })
      ).toThrow('Source and target are the same zone (hand_0)');
    });

    it('should reject the same card twice', () => {
      const card = player.hand.cards[0];
      expect(() =>
        moves.moveMany({
          game,
          source: player.hand,
          target: game.discardPile,
          cards: [card, card],
          reason: CardMoveReason.DISCARD,
          ordering: CardMoveOrdering.TO_TOP,
        })
      ).toThrow('Card 1 appears more than once in the move');
    });

    it('should reject a card already present in the target', () => {
      game.discardPile.cards.push(attackCard(1));
      expect(() =>
        moves.moveSingle({
          game,
          source: player.hand,
          target: game.discardPile,
          cards: [player.hand.cards[0]],
          reason: CardMoveReason.DISCARD,
          ordering: CardMoveOrdering.TO_TOP,
        })
      ).toThrow('Card 1 is already in target zone discardPile');
    });

    it('should reject an empty move and a multi-card single move', () => {
      const base = {
        game,
        source: player.hand,
        target: game.discardPile,
        reason: CardMoveReason.DISCARD,
        ordering: CardMoveOrdering.TO_TOP,
      };
      expect(() => moves.moveMany({ ...base, cards: [] })).toThrow(InvariantViolationError);
      expect(() => moves.moveSingle({ ...base, cards: player.hand.cards.slice(0, 2) })).toThrow(
        'moveSingle expects exactly one card, got 2'
      );
    });

    it('should leave both zones untouched when a move is rejected', () => {
      expect(() =>
        moves.moveMany({
          game,
          source: player.hand,
          target: game.discardPile,
          cards: [player.hand.cards[0], attackCard(99)],
          reason: CardMoveReason.DISCARD,
          ordering: CardMoveOrdering.TO_TOP,
        })
      ).toThrow(InvariantViolationError);

      expect(ids(player.hand.cards)).toEqual([1, 2, 3]);
      expect(ids(game.discardPile.cards)).toEqual([9]);
    });
  });

  describe('drawCards', () => {
    it('should move cards from the top of the draw pile to the end of the hand', () => {
      const drawn = moves.drawCards(game, player, 2);

      expect(ids(drawn)).toEqual([10, 11]);
      expect(ids(player.hand.cards)).toEqual([1, 2, 3, 10, 11]);
      expect(ids(game.drawPile.cards)).toEqual([12]);
    });

    it('should return nothing for a zero draw', () => {
      expect(moves.drawCards(game, player, 0)).toEqual([]);
      expect(game.drawPile.cards).toHaveLength(3);
    });

    it('should throw when the draw pile is too small or the count is negative', () => {
      expect(() => moves.drawCards(game, player, 4)).toThrow('Draw pile has 3 card(s), 4 requested');
      expect(() => moves.drawCards(game, player, -1)).toThrow(InvariantViolationError);
    });
  });

  describe('discardFromHand', () => {
    it('should put discarded cards on top of the discard pile', () => {
      const result = moves.discardFromHand(game, player, [player.hand.cards[2]]);

      expect(result.move.reason).toBe(CardMoveReason.DISCARD);
      expect(ids(game.discardPile.cards)).toEqual([3, 9]);
      expect(ids(player.hand.cards)).toEqual([1, 2]);
    });
  });
});
