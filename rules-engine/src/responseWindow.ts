/**
 * responseWindow.ts
 *
 * Response Window: polls an ordered list of responders for a card that
 * answers a requirement (an evade against an attack, a heal for a dying
 * player). Polling is sequential and single-pass; the first responder to
 * play enough legal cards wins and the window closes.
 *
 * Outcomes:
 * - NO_RESPONSE: every responder passed or had nothing legal
 * - RESPONSE_SUCCESS: a responder played the required number of cards
 * - RESPONSE_FAILED: a responder started answering but stopped short
 *
 * An empty selection is a pass. A selection naming a card that is not
 * legal is logged and also treated as a pass.
 */

import { v4 as uuidv4 } from 'uuid';
import { CardSubType, type Card, type Game, type Player, type Seat } from '../../shared/src';
import { CardMoveOrdering, CardMoveReason, type CardMoveService } from './cardMove';
import { createChoiceRequest, pickAllowedCards } from './choice';
import { GameEventType, type EventBus } from './core/events';
import { ChoiceType, failure, ResolutionErrorCode, SUCCESS, type ChoiceProvider, type ResolutionResult } from './core/types';
import { logTo, type LogSink } from './logging';
import { requireSession, SessionKey, type ResolutionContext } from './resolutionContext';
import { ResolverKind, type Resolver } from './resolutionStack';
import type { RuleService } from './rules/ruleService';

export enum ResponseType {
  EVADE_AGAINST_ATTACK = 'evadeAgainstAttack',
  HEAL_FOR_DYING = 'healForDying',
  ATTACK_AGAINST_INVASION = 'attackAgainstInvasion',
  EVADE_AGAINST_BARRAGE = 'evadeAgainstBarrage',
  ATTACK_AGAINST_DUEL = 'attackAgainstDuel',
  NULLIFICATION = 'nullification',
}

/**
 * Card sub-type that answers each response type
 */
export const RESPONSE_CARD_SUBTYPES: Readonly<Record<ResponseType, CardSubType>> = {
  [ResponseType.EVADE_AGAINST_ATTACK]: CardSubType.EVADE,
  [ResponseType.HEAL_FOR_DYING]: CardSubType.HEAL,
  [ResponseType.ATTACK_AGAINST_INVASION]: CardSubType.ATTACK,
  [ResponseType.EVADE_AGAINST_BARRAGE]: CardSubType.EVADE,
  [ResponseType.ATTACK_AGAINST_DUEL]: CardSubType.ATTACK,
  [ResponseType.NULLIFICATION]: CardSubType.NULLIFICATION,
};

export enum ResponseWindowState {
  NO_RESPONSE = 'noResponse',
  RESPONSE_SUCCESS = 'responseSuccess',
  RESPONSE_FAILED = 'responseFailed',
}

export interface AttackSourceEvent {
  readonly kind: 'attack';
  readonly attackerSeat: Seat;
  readonly defenderSeat: Seat;
  readonly card: Card;
}

export interface DyingSourceEvent {
  readonly kind: 'dying';
  readonly dyingSeat: Seat;
  readonly sourceSeat?: Seat;
}

/**
 * One target's share of an area effect card
 */
export interface AreaEffectSourceEvent {
  readonly kind: 'areaEffect';
  readonly sourceSeat: Seat;
  readonly targetSeat: Seat;
  readonly card: Card;
}

export interface DuelSourceEvent {
  readonly kind: 'duel';
  readonly responderSeat: Seat;
  readonly opponentSeat: Seat;
  readonly card: Card;
}

export interface NullificationSourceEvent {
  readonly kind: 'nullification';
  /** Names the effect being cancelled, e.g. `barbarianInvasion.target` */
  readonly effectKey: string;
  readonly targetSeat: Seat;
  readonly card?: Card;
  /** Nullifications already played against this effect */
  readonly chainLength: number;
}

export type ResponseSourceEvent =
  | AttackSourceEvent
  | DyingSourceEvent
  | AreaEffectSourceEvent
  | DuelSourceEvent
  | NullificationSourceEvent;

export interface ResponseWindowContext {
  readonly windowId: string;
  readonly game: Game;
  readonly responseType: ResponseType;
  readonly responders: readonly Player[];
  readonly sourceEvent?: ResponseSourceEvent;
  readonly cardMoveService: CardMoveService;
  readonly ruleService: RuleService;
  readonly getPlayerChoice: ChoiceProvider;
  readonly eventBus?: EventBus;
  readonly logSink?: LogSink;
  /** Cards one responder must play; defaults to 1 */
  readonly requiredResponseCount?: number;
}

export interface ResponseWindowResult {
  readonly windowId: string;
  readonly responseType: ResponseType;
  readonly state: ResponseWindowState;
  readonly responder?: Player;
  /** First card played, kept for callers that only care about one */
  readonly responseCard?: Card;
  readonly responseCards: readonly Card[];
}

/**
 * Result of the most recent window in the chain
 */
export const LAST_RESPONSE_RESULT = new SessionKey<ResponseWindowResult>('lastResponseResult');

export function runResponseWindow(ctx: ResponseWindowContext): ResponseWindowResult {
  const required = Math.max(1, ctx.requiredResponseCount ?? 1);

  ctx.eventBus?.publish(GameEventType.RESPONSE_WINDOW_OPENED, {
    game: ctx.game,
    windowId: ctx.windowId,
    responseType: ctx.responseType,
  });

  const result = pollResponders(ctx, required);

  logTo(ctx.logSink, {
    eventType: 'responseWindow',
    level: 'info',
    message: `Response window ${ctx.responseType} closed: ${result.state}`,
    data: {
      windowId: ctx.windowId,
      state: result.state,
      responderSeat: result.responder?.seat,
      cardIds: result.responseCards.map(c => c.id),
    },
  });

  ctx.eventBus?.publish(GameEventType.RESPONSE_WINDOW_CLOSED, {
    game: ctx.game,
    windowId: ctx.windowId,
    responseType: ctx.responseType,
    state: result.state,
  });

  return result;
}

function pollResponders(ctx: ResponseWindowContext, required: number): ResponseWindowResult {
  for (const responder of ctx.responders) {
    if (!responder.isAlive) continue;

    const played: Card[] = [];
    while (played.length < required) {
      const card = requestResponseCard(ctx, responder);
      if (!card) break;
      playResponseCard(ctx, responder, card);
      played.push(card);
    }

    if (played.length >= required) {
      return windowResult(ctx, ResponseWindowState.RESPONSE_SUCCESS, responder, played);
    }
    if (played.length > 0) {
      return windowResult(ctx, ResponseWindowState.RESPONSE_FAILED, responder, played);
    }
  }

  return windowResult(ctx, ResponseWindowState.NO_RESPONSE, undefined, []);
}

/**
 * Ask one responder for one card; undefined means a pass
 */
function requestResponseCard(ctx: ResponseWindowContext, responder: Player): Card | undefined {
  const ruleContext = {
    game: ctx.game,
    responder,
    responseType: ctx.responseType,
    sourceEvent: ctx.sourceEvent,
  };
  const legal = ctx.ruleService.legalResponseCards(ruleContext);
  if (legal.length === 0) return undefined;

  const request = createChoiceRequest({
    playerSeat: responder.seat,
    choiceType: ChoiceType.SELECT_CARDS,
    allowedCards: legal,
    responseWindowId: ctx.windowId,
    canPass: true,
  });
  const choice = ctx.getPlayerChoice(request);
  if (!choice.selectedCardIds || choice.selectedCardIds.length === 0) return undefined;

  const { cards, rejected } = pickAllowedCards(choice, legal);
  if (rejected.length > 0 || cards.length === 0) {
    logTo(ctx.logSink, {
      eventType: 'responseWindow',
      level: 'warn',
      message: `Seat ${responder.seat} selected an illegal response card; treated as a pass`,
      data: { windowId: ctx.windowId, rejectedCardIds: rejected },
    });
    return undefined;
  }
  return cards[0];
}

function playResponseCard(ctx: ResponseWindowContext, responder: Player, card: Card): void {
  ctx.cardMoveService.moveSingle({
    game: ctx.game,
    source: responder.hand,
    target: ctx.game.discardPile,
    cards: [card],
    reason: CardMoveReason.PLAY,
    ordering: CardMoveOrdering.TO_TOP,
  });

  ctx.eventBus?.publish(GameEventType.CARD_PLAYED, {
    game: ctx.game,
    seat: responder.seat,
    card,
    responseType: ctx.responseType,
  });
}

function windowResult(
  ctx: ResponseWindowContext,
  state: ResponseWindowState,
  responder: Player | undefined,
  cards: readonly Card[]
): ResponseWindowResult {
  return {
    windowId: ctx.windowId,
    responseType: ctx.responseType,
    state,
    responder,
    responseCard: cards[0],
    responseCards: cards,
  };
}

/**
 * The defender alone answers an attack
 */
export function evadeResponders(defender: Player): Player[] {
  return [defender];
}

/**
 * The dying player first, then everyone else alive in seat order
 */
export function healResponders(game: Game, dyingSeat: Seat): Player[] {
  const dying = game.players.find(p => p.seat === dyingSeat);
  const others = game.players.filter(p => p.seat !== dyingSeat && p.isAlive);
  return dying ? [dying, ...others] : others;
}

/**
 * Living players clockwise from `first`. With `includeFirst` false the
 * list starts at the seat after it.
 */
export function livingInSeatOrder(game: Game, first: Seat, includeFirst = true): Player[] {
  const players = game.players;
  const start = players.findIndex(p => p.seat === first);
  if (start < 0) return [];
  const ordered = [...players.slice(start), ...players.slice(0, start)];
  return ordered.filter(p => p.isAlive && (includeFirst || p.seat !== first));
}

/**
 * Living players sharing the owner's camp, clockwise from the owner
 */
export function alliesInSeatOrder(game: Game, owner: Player): Player[] {
  if (owner.campId === undefined) return [];
  const players = game.players;
  const start = players.findIndex(p => p.seat === owner.seat);
  const ordered = [...players.slice(start + 1), ...players.slice(0, Math.max(start, 0))];
  return ordered.filter(p => p.isAlive && p.seat !== owner.seat && p.campId === owner.campId);
}

export interface ResponseWindowResolverOptions {
  readonly responseType: ResponseType;
  readonly responders: readonly Player[];
  readonly sourceEvent?: ResponseSourceEvent;
  readonly requiredResponseCount?: number;
}

/**
 * Runs a response window as a stack frame and stores its result for the
 * handler pushed beneath it.
 */
export class ResponseWindowResolver implements Resolver {
  readonly kind: string = ResolverKind.RESPONSE_WINDOW;

  constructor(private readonly options: ResponseWindowResolverOptions) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);

    if (!context.getPlayerChoice) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'response.window.noChoiceProvider');
    }

    const result = runResponseWindow({
      windowId: uuidv4(),
      game: context.game,
      responseType: this.options.responseType,
      responders: this.options.responders,
      sourceEvent: this.options.sourceEvent,
      cardMoveService: context.cardMoveService,
      ruleService: context.ruleService,
      getPlayerChoice: context.getPlayerChoice,
      eventBus: context.eventBus,
      logSink: context.logSink,
      requiredResponseCount: this.options.requiredResponseCount,
    });

    session.set(LAST_RESPONSE_RESULT, result);

    if (result.state === ResponseWindowState.RESPONSE_FAILED) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'response.window.failed', {
        responderSeat: result.responder?.seat,
      });
    }
    return SUCCESS;
  }
}
