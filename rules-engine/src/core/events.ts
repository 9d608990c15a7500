/**
 * core/events.ts
 * 
 * Centralized event definitions for the rules engine.
 * Every event the engine publishes on the event bus is declared here
 * together with the payload its handlers receive.
 */

import type { Card, Game, Phase, Seat } from '../../../shared/src';
import type { DamageDescriptor } from './types';
import type { CardMoveSnapshot } from '../cardMove';
import type { JudgementReason, JudgementResult } from '../judgement';
import type { ResponseType, ResponseWindowState } from '../responseWindow';
import type { ResolutionContext } from '../resolutionContext';

export enum GameEventType {
  // Turn flow
  TURN_START = 'turnStart',
  TURN_END = 'turnEnd',
  PHASE_START = 'phaseStart',
  PHASE_END = 'phaseEnd',

  // Damage
  BEFORE_DAMAGE = 'beforeDamage',
  DAMAGE_CREATED = 'damageCreated',
  DAMAGE_APPLIED = 'damageApplied',
  DAMAGE_RESOLVED = 'damageResolved',
  DYING_START = 'dyingStart',
  PLAYER_DIED = 'playerDied',

  // Cards
  BEFORE_CARD_MOVE = 'beforeCardMove',
  AFTER_CARD_MOVE = 'afterCardMove',
  CARD_PLAYED = 'cardPlayed',

  // Judgement
  JUDGEMENT_STARTED = 'judgementStarted',
  JUDGEMENT_COMPLETED = 'judgementCompleted',

  // Responses
  RESPONSE_WINDOW_OPENED = 'responseWindowOpened',
  RESPONSE_WINDOW_CLOSED = 'responseWindowClosed',
}

export interface TurnEvent {
  readonly game: Game;
  readonly seat: Seat;
  readonly turnNumber: number;
}

export interface PhaseEvent {
  readonly game: Game;
  readonly seat: Seat;
  readonly phase: Phase;
}

/**
 * Published before damage is applied. Handlers veto the damage by setting
 * `prevented`; the damage resolver reads the flag after publish returns.
 */
export interface BeforeDamageEvent {
  readonly game: Game;
  readonly damage: DamageDescriptor;
  prevented: boolean;
  preventedBy?: string;
  readonly context?: ResolutionContext;
}

export interface DamageEvent {
  readonly game: Game;
  readonly damage: DamageDescriptor;
}

export interface DamageAppliedEvent extends DamageEvent {
  readonly previousHealth: number;
  readonly currentHealth: number;
}

/**
 * Published once the damage step is over. Carries the resolving context
 * so trigger abilities can push follow-up resolvers onto the same stack.
 */
export interface DamageResolvedEvent extends DamageEvent {
  readonly context?: ResolutionContext;
}

export interface DyingEvent {
  readonly game: Game;
  readonly seat: Seat;
  readonly sourceSeat?: Seat;
}

export interface PlayerDiedEvent {
  readonly game: Game;
  readonly seat: Seat;
  readonly killerSeat?: Seat;
}

export interface CardMoveEvent {
  readonly game: Game;
  readonly move: CardMoveSnapshot;
}

export interface CardPlayedEvent {
  readonly game: Game;
  readonly seat: Seat;
  readonly card: Card;
  readonly responseType?: ResponseType;
}

export interface JudgementStartedEvent {
  readonly game: Game;
  readonly judgementId: string;
  readonly ownerSeat: Seat;
  readonly reason: JudgementReason;
}

export interface JudgementCompletedEvent {
  readonly game: Game;
  readonly judgementId: string;
  readonly result: JudgementResult;
}

export interface ResponseWindowEvent {
  readonly game: Game;
  readonly windowId: string;
  readonly responseType: ResponseType;
  readonly state?: ResponseWindowState;
}

export interface GameEventPayloads {
  [GameEventType.TURN_START]: TurnEvent;
  [GameEventType.TURN_END]: TurnEvent;
  [GameEventType.PHASE_START]: PhaseEvent;
  [GameEventType.PHASE_END]: PhaseEvent;
  [GameEventType.BEFORE_DAMAGE]: BeforeDamageEvent;
  [GameEventType.DAMAGE_CREATED]: DamageEvent;
  [GameEventType.DAMAGE_APPLIED]: DamageAppliedEvent;
  [GameEventType.DAMAGE_RESOLVED]: DamageResolvedEvent;
  [GameEventType.DYING_START]: DyingEvent;
  [GameEventType.PLAYER_DIED]: PlayerDiedEvent;
  [GameEventType.BEFORE_CARD_MOVE]: CardMoveEvent;
  [GameEventType.AFTER_CARD_MOVE]: CardMoveEvent;
  [GameEventType.CARD_PLAYED]: CardPlayedEvent;
  [GameEventType.JUDGEMENT_STARTED]: JudgementStartedEvent;
  [GameEventType.JUDGEMENT_COMPLETED]: JudgementCompletedEvent;
  [GameEventType.RESPONSE_WINDOW_OPENED]: ResponseWindowEvent;
  [GameEventType.RESPONSE_WINDOW_CLOSED]: ResponseWindowEvent;
}

export type GameEventHandler<K extends GameEventType> = (payload: GameEventPayloads[K]) => void;

/**
 * Typed publish/subscribe. Publication is synchronous and re-entrant.
 */
export interface EventBus {
  subscribe<K extends GameEventType>(type: K, handler: GameEventHandler<K>): void;
  unsubscribe<K extends GameEventType>(type: K, handler: GameEventHandler<K>): void;
  publish<K extends GameEventType>(type: K, payload: GameEventPayloads[K]): void;
  subscriberCount(type: GameEventType): number;
}
