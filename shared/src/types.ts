/**
 * shared/src/types.ts
 *
 * Game state model shared by the rules engine and its hosts.
 *
 * The model is deliberately mutable: resolvers and the card move service
 * update health, liveness and zone contents in place while a chain resolves.
 */

export type Seat = number;
export type CardId = number;
export type GameID = string;

export enum Suit {
  SPADE = 'spade',
  HEART = 'heart',
  CLUB = 'club',
  DIAMOND = 'diamond',
}

export enum CardType {
  BASIC = 'basic',
  TRICK = 'trick',
  EQUIPMENT = 'equipment',
}

export enum CardSubType {
  ATTACK = 'attack',
  EVADE = 'evade',
  HEAL = 'heal',
  WEAPON = 'weapon',
  ARMOR = 'armor',
  OFFENSIVE_MOUNT = 'offensiveMount',
  DEFENSIVE_MOUNT = 'defensiveMount',
  BARBARIAN_INVASION = 'barbarianInvasion',
  ARROW_BARRAGE = 'arrowBarrage',
  DUEL = 'duel',
  NULLIFICATION = 'nullification',
  OTHER = 'other',
}

export enum Phase {
  NONE = 'none',
  START = 'start',
  JUDGE = 'judge',
  DRAW = 'draw',
  PLAY = 'play',
  DISCARD = 'discard',
  END = 'end',
}

export enum Role {
  LORD = 'lord',
  LOYALIST = 'loyalist',
  REBEL = 'rebel',
  RENEGADE = 'renegade',
}

export interface Card {
  readonly id: CardId;
  /** Definition the card was printed from, e.g. `base_attack` */
  readonly definitionId: string;
  readonly name: string;
  readonly type: CardType;
  readonly subType: CardSubType;
  readonly suit: Suit;
  /** 1 (ace) to 13 (king) */
  readonly rank: number;
}

export interface Zone {
  readonly id: string;
  readonly ownerSeat?: Seat;
  readonly isPublic: boolean;
  /** Index 0 is the top of the zone */
  cards: Card[];
}

export interface Player {
  readonly seat: Seat;
  readonly name: string;
  readonly heroId?: string;
  readonly role?: Role;
  /** Players sharing a camp are allies for assistance purposes */
  readonly campId?: string;
  readonly maxHealth: number;
  currentHealth: number;
  isAlive: boolean;
  readonly hand: Zone;
  readonly equipment: Zone;
  readonly judgement: Zone;
  /** Card uses this turn keyed by sub-type */
  turnUsage: Partial<Record<CardSubType, number>>;
}

export interface Game {
  readonly id: GameID;
  readonly players: readonly Player[];
  currentPlayerSeat: Seat;
  currentPhase: Phase;
  turnNumber: number;
  readonly drawPile: Zone;
  readonly discardPile: Zone;
}
