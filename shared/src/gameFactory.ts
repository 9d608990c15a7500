/**
 * shared/src/gameFactory.ts
 *
 * Construction helpers for the game model so hosts and tests build
 * players and zones with consistent ids and defaults.
 */

import {
  CardSubType,
  CardType,
  Phase,
  Suit,
  type Card,
  type CardId,
  type Game,
  type Player,
  type Role,
  type Seat,
  type Zone,
} from "./types.js";

const ZONE_IDS = {
  DRAW_PILE: 'drawPile',
  DISCARD_PILE: 'discardPile',
} as const;

export interface CardInput {
  id: CardId;
  definitionId?: string;
  name?: string;
  type?: CardType;
  subType: CardSubType;
  suit?: Suit;
  rank?: number;
}

const DEFAULT_CARD_TYPES: Record<CardSubType, CardType> = {
  [CardSubType.ATTACK]: CardType.BASIC,
  [CardSubType.EVADE]: CardType.BASIC,
  [CardSubType.HEAL]: CardType.BASIC,
  [CardSubType.WEAPON]: CardType.EQUIPMENT,
  [CardSubType.ARMOR]: CardType.EQUIPMENT,
  [CardSubType.OFFENSIVE_MOUNT]: CardType.EQUIPMENT,
  [CardSubType.DEFENSIVE_MOUNT]: CardType.EQUIPMENT,
  [CardSubType.BARBARIAN_INVASION]: CardType.TRICK,
  [CardSubType.ARROW_BARRAGE]: CardType.TRICK,
  [CardSubType.DUEL]: CardType.TRICK,
  [CardSubType.NULLIFICATION]: CardType.TRICK,
  [CardSubType.OTHER]: CardType.TRICK,
};

export function createCard(input: CardInput): Card {
  return {
    id: input.id,
    definitionId: input.definitionId ?? `base_${input.subType}`,
    name: input.name ?? input.subType,
    type: input.type ?? DEFAULT_CARD_TYPES[input.subType],
    subType: input.subType,
    suit: input.suit ?? Suit.SPADE,
    rank: input.rank ?? 1,
  };
}

export function createZone(id: string, ownerSeat?: Seat, isPublic = false, cards: Card[] = []): Zone {
  return { id, ownerSeat, isPublic, cards: [...cards] };
}

export interface PlayerInput {
  seat: Seat;
  name?: string;
  heroId?: string;
  role?: Role;
  campId?: string;
  maxHealth?: number;
  currentHealth?: number;
  hand?: Card[];
  equipment?: Card[];
}

export function createPlayer(input: PlayerInput): Player {
  const maxHealth = input.maxHealth ?? 4;
  return {
    seat: input.seat,
    name: input.name ?? `Player ${input.seat}`,
    heroId: input.heroId,
    role: input.role,
    campId: input.campId,
    maxHealth,
    currentHealth: input.currentHealth ?? maxHealth,
    isAlive: true,
    hand: createZone(`hand_${input.seat}`, input.seat, false, input.hand),
    equipment: createZone(`equip_${input.seat}`, input.seat, true, input.equipment),
    judgement: createZone(`judge_${input.seat}`, input.seat, true),
    turnUsage: {},
  };
}

export interface GameInput {
  id?: string;
  players: PlayerInput[];
  drawPile?: Card[];
  discardPile?: Card[];
  currentPlayerSeat?: Seat;
  currentPhase?: Phase;
}

/**
 * Build a game with players ordered by seat.
 */
export function createGame(input: GameInput): Game {
  const players = [...input.players]
    .sort((a, b) => a.seat - b.seat)
    .map(createPlayer);

  return {
    id: input.id ?? 'game',
    players,
    currentPlayerSeat: input.currentPlayerSeat ?? (players.length > 0 ? players[0].seat : 0),
    currentPhase: input.currentPhase ?? Phase.NONE,
    turnNumber: 1,
    drawPile: createZone(ZONE_IDS.DRAW_PILE, undefined, false, input.drawPile),
    discardPile: createZone(ZONE_IDS.DISCARD_PILE, undefined, true, input.discardPile),
  };
}

export function findPlayer(game: Game, seat: Seat): Player | undefined {
  return game.players.find(p => p.seat === seat);
}

export function isRedSuit(suit: Suit): boolean {
  return suit === Suit.HEART || suit === Suit.DIAMOND;
}

export function isBlackSuit(suit: Suit): boolean {
  return suit === Suit.SPADE || suit === Suit.CLUB;
}
