/**
 * resolvers/areaEffect.ts
 *
 * Area effect tricks hit every other living player, one at a time,
 * clockwise from the seat after the user. For each target:
 *   nullification window -> gate -> response window -> outcome -> damage
 * A target that died before its turn comes up is skipped.
 */

import { CardSubType, type Card, type Player } from '../../../shared/src';
import { engineConfig } from '../config';
import { createDamage, failure, ResolutionErrorCode, SUCCESS, type DamageDescriptor, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import { pushNullifiable } from '../nullification';
import { deriveContext, requireSession, type ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';
import {
  LAST_RESPONSE_RESULT,
  livingInSeatOrder,
  ResponseType,
  ResponseWindowResolver,
  ResponseWindowState,
  type AreaEffectSourceEvent,
} from '../responseWindow';
import { DamageResolver } from './damage';

export interface AreaEffectRule {
  /** What each target must play to avoid the damage */
  readonly responseType: ResponseType;
  /** Damage reason and nullification key prefix */
  readonly effectKey: string;
}

export const AREA_EFFECT_RULES: Readonly<Partial<Record<CardSubType, AreaEffectRule>>> = {
  [CardSubType.BARBARIAN_INVASION]: {
    responseType: ResponseType.ATTACK_AGAINST_INVASION,
    effectKey: 'barbarianInvasion',
  },
  [CardSubType.ARROW_BARRAGE]: {
    responseType: ResponseType.EVADE_AGAINST_BARRAGE,
    effectKey: 'arrowBarrage',
  },
};

export class AreaEffectResolver implements Resolver {
  readonly kind: string = ResolverKind.AREA_EFFECT;

  constructor(
    private readonly card: Card,
    private readonly damageAmount: number = engineConfig.defaultAttackDamage
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const rule = AREA_EFFECT_RULES[this.card.subType];
    if (!rule) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.areaEffect.unsupportedCard', {
        cardId: this.card.id,
      });
    }

    const user = context.sourcePlayer;
    const targets = livingInSeatOrder(context.game, user.seat, false);
    logTo(context.logSink, {
      eventType: 'areaEffect',
      level: 'info',
      message:
        targets.length > 0
          ? `${this.card.name} from seat ${user.seat} hits seats ${targets.map(t => t.seat).join(', ')}`
          : `${this.card.name} from seat ${user.seat} has no targets`,
      data: { cardId: this.card.id, targetSeats: targets.map(t => t.seat) },
    });

    // Reversed so the first target ends on top
    for (const target of [...targets].reverse()) {
      context.stack.push(new AreaEffectTargetResolver(this.card, rule, target, this.damageAmount), context);
    }
    return SUCCESS;
  }
}

/**
 * One target's share of an area effect
 */
export class AreaEffectTargetResolver implements Resolver {
  readonly kind: string = ResolverKind.AREA_EFFECT_TARGET;

  constructor(
    private readonly card: Card,
    private readonly rule: AreaEffectRule,
    private readonly target: Player,
    private readonly damageAmount: number
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const user = context.sourcePlayer;

    if (!this.target.isAlive) {
      logTo(context.logSink, {
        eventType: 'areaEffect',
        level: 'debug',
        message: `Seat ${this.target.seat} skipped by ${this.card.name}: no longer alive`,
      });
      return SUCCESS;
    }

    const sourceEvent: AreaEffectSourceEvent = {
      kind: 'areaEffect',
      sourceSeat: user.seat,
      targetSeat: this.target.seat,
      card: this.card,
    };
    const damage = createDamage({
      sourceSeat: user.seat,
      targetSeat: this.target.seat,
      amount: this.damageAmount,
      reason: this.rule.effectKey,
      causingCard: this.card,
    });

    // Results of the previous target must not be read for this one
    session.delete(LAST_RESPONSE_RESULT);
    pushNullifiable(
      context,
      { effectKey: `${this.rule.effectKey}.target`, target: this.target, card: this.card },
      [
        new AreaEffectOutcomeResolver(damage, this.rule.responseType),
        new ResponseWindowResolver({
          responseType: this.rule.responseType,
          responders: [this.target],
          sourceEvent,
        }),
      ]
    );
    return SUCCESS;
  }
}

export class AreaEffectOutcomeResolver implements Resolver {
  readonly kind: string = ResolverKind.AREA_EFFECT_OUTCOME;

  constructor(
    private readonly damage: DamageDescriptor,
    private readonly responseType: ResponseType
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const last = session.get(LAST_RESPONSE_RESULT);
    if (!last) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.areaEffect.responseResultMissing');
    }

    if (last.responseType === this.responseType && last.state === ResponseWindowState.RESPONSE_SUCCESS) {
      logTo(context.logSink, {
        eventType: 'areaEffect',
        level: 'info',
        message: `Seat ${this.damage.targetSeat} answered ${this.damage.reason}`,
        data: { targetSeat: this.damage.targetSeat, cardIds: last.responseCards.map(c => c.id) },
      });
      return SUCCESS;
    }

    context.stack.push(new DamageResolver(), deriveContext(context, { pendingDamage: this.damage }));
    return SUCCESS;
  }
}
