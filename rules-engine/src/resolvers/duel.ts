/**
 * resolvers/duel.ts
 *
 * Duel: the target and the user take turns playing attacks, target
 * first. The first one who does not answer takes the damage, dealt by
 * the other. The whole duel can be nullified before the first round.
 */

import type { Card, Player } from '../../../shared/src';
import { engineConfig } from '../config';
import { createDamage, failure, ResolutionErrorCode, SUCCESS, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import { pushNullifiable } from '../nullification';
import { deriveContext, requireSession, type ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';
import {
  LAST_RESPONSE_RESULT,
  ResponseType,
  ResponseWindowResolver,
  ResponseWindowState,
  type DuelSourceEvent,
} from '../responseWindow';
import { DamageResolver } from './damage';

export const DUEL_REASON = 'duel';

export class DuelResolver implements Resolver {
  readonly kind: string = ResolverKind.DUEL;

  constructor(
    private readonly card: Card,
    private readonly damageAmount: number = engineConfig.defaultAttackDamage
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const challenger = context.sourcePlayer;
    const targetSeat = context.action?.targetSeats?.[0] ?? context.choice?.selectedTargetSeats?.[0];
    if (targetSeat === undefined) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.duel.noTarget');
    }
    const target = context.game.players.find(p => p.seat === targetSeat);
    if (!target || target.seat === challenger.seat) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.duel.invalidTarget');
    }
    if (!target.isAlive) {
      return failure(ResolutionErrorCode.TARGET_NOT_ALIVE, 'resolution.duel.targetNotAlive');
    }

    logTo(context.logSink, {
      eventType: 'duel',
      level: 'info',
      message: `Seat ${challenger.seat} challenges seat ${target.seat} to a duel`,
      data: { challengerSeat: challenger.seat, targetSeat: target.seat, cardId: this.card.id },
    });
    pushNullifiable(context, { effectKey: DUEL_REASON, target, card: this.card }, [
      new DuelRoundResolver(this.card, target, challenger, this.damageAmount),
    ]);
    return SUCCESS;
  }
}

/**
 * The responder must play an attack or lose to the opponent
 */
export class DuelRoundResolver implements Resolver {
  readonly kind: string = ResolverKind.DUEL_ROUND;

  constructor(
    private readonly card: Card,
    private readonly responder: Player,
    private readonly opponent: Player,
    private readonly damageAmount: number
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    if (!this.responder.isAlive || !this.opponent.isAlive) return SUCCESS;

    const responseType = ResponseType.ATTACK_AGAINST_DUEL;
    const sourceEvent: DuelSourceEvent = {
      kind: 'duel',
      responderSeat: this.responder.seat,
      opponentSeat: this.opponent.seat,
      card: this.card,
    };

    session.delete(LAST_RESPONSE_RESULT);
    context.stack.push(
      new DuelOutcomeResolver(this.card, this.responder, this.opponent, this.damageAmount),
      context
    );
    context.stack.push(
      new ResponseWindowResolver({
        responseType,
        responders: [this.responder],
        sourceEvent,
        requiredResponseCount: context.ruleService.requiredResponseCount(
          context.game,
          this.opponent,
          this.responder,
          responseType
        ),
      }),
      context
    );
    return SUCCESS;
  }
}

export class DuelOutcomeResolver implements Resolver {
  readonly kind: string = ResolverKind.DUEL_OUTCOME;

  constructor(
    private readonly card: Card,
    private readonly responder: Player,
    private readonly opponent: Player,
    private readonly damageAmount: number
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const last = session.get(LAST_RESPONSE_RESULT);
    if (!last) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.duel.responseResultMissing');
    }

    if (last.responseType === ResponseType.ATTACK_AGAINST_DUEL && last.state === ResponseWindowState.RESPONSE_SUCCESS) {
      context.stack.push(
        new DuelRoundResolver(this.card, this.opponent, this.responder, this.damageAmount),
        context
      );
      return SUCCESS;
    }

    logTo(context.logSink, {
      eventType: 'duel',
      level: 'info',
      message: `Seat ${this.responder.seat} lost the duel to seat ${this.opponent.seat}`,
      data: { loserSeat: this.responder.seat, winnerSeat: this.opponent.seat },
    });
    const damage = createDamage({
      sourceSeat: this.opponent.seat,
      targetSeat: this.responder.seat,
      amount: this.damageAmount,
      reason: DUEL_REASON,
      causingCard: this.card,
    });
    context.stack.push(new DamageResolver(), deriveContext(context, { pendingDamage: damage }));
    return SUCCESS;
  }
}
