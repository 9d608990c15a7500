/**
 * resolvers/attack.ts
 *
 * Attack: checks the target, lets the target's armor veto the card, then
 * asks the defender to evade. When the defender has no alternative way
 * to evade, a plain response window is pushed; otherwise a provider
 * chain arbitrates. The outcome resolver beneath either one turns a
 * missing evade into damage.
 */

import type { Card, Player } from '../../../shared/src';
import { armorIgnoredBy } from '../abilities/ability';
import { engineConfig } from '../config';
import { createDamage, failure, ResolutionErrorCode, SUCCESS, type DamageDescriptor, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import {
  createResponseRequest,
  ManualResponseProvider,
  ProviderChainResolver,
  requiredCountFor,
  type ResponseProvider,
  type ResponseRequestContext,
} from '../providerChain';
import { activeAbilities, deriveContext, requireSession, type ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';
import {
  evadeResponders,
  LAST_RESPONSE_RESULT,
  ResponseType,
  ResponseWindowResolver,
  ResponseWindowState,
  type AttackSourceEvent,
} from '../responseWindow';
import { DamageResolver } from './damage';

export class AttackResolver implements Resolver {
  readonly kind: string = ResolverKind.ATTACK;

  constructor(
    private readonly card: Card,
    private readonly damageAmount: number = engineConfig.defaultAttackDamage
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const { game } = context;
    const attacker = context.sourcePlayer;

    const targetSeat = context.action?.targetSeats?.[0] ?? context.choice?.selectedTargetSeats?.[0];
    if (targetSeat === undefined) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.attack.noTarget');
    }
    const defender = game.players.find(p => p.seat === targetSeat);
    if (!defender || defender.seat === attacker.seat) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.attack.invalidTarget');
    }
    if (!defender.isAlive) {
      return failure(ResolutionErrorCode.TARGET_NOT_ALIVE, 'resolution.attack.targetNotAlive');
    }

    const veto = this.findVeto(context, attacker, defender);
    if (veto) {
      logTo(context.logSink, {
        eventType: 'attack',
        level: 'info',
        message: `Attack from seat ${attacker.seat} on seat ${defender.seat} cancelled by ${veto}`,
        data: { attackerSeat: attacker.seat, defenderSeat: defender.seat, cardId: this.card.id, vetoedBy: veto },
      });
      return SUCCESS;
    }

    const sourceEvent: AttackSourceEvent = {
      kind: 'attack',
      attackerSeat: attacker.seat,
      defenderSeat: defender.seat,
      card: this.card,
    };
    const request = createResponseRequest({
      defender,
      attacker,
      responseType: ResponseType.EVADE_AGAINST_ATTACK,
      sourceEvent,
    });
    const damage = createDamage({
      sourceSeat: attacker.seat,
      targetSeat: defender.seat,
      amount: this.damageAmount,
      reason: 'attack',
      causingCard: this.card,
    });

    // A window from earlier in the chain must not be mistaken for this one
    session.delete(LAST_RESPONSE_RESULT);
    context.stack.push(new AttackOutcomeResolver(damage, request), context);

    const providers: ResponseProvider[] = [
      ...activeAbilities(context, defender).flatMap(a => a.createResponseProviders?.(game, defender) ?? []),
      new ManualResponseProvider(),
    ];

    if (providers.length === 1) {
      context.stack.push(
        new ResponseWindowResolver({
          responseType: ResponseType.EVADE_AGAINST_ATTACK,
          responders: evadeResponders(defender),
          sourceEvent,
          requiredResponseCount: requiredCountFor(request, context),
        }),
        context
      );
    } else {
      context.stack.push(new ProviderChainResolver(request, providers), context);
    }

    logTo(context.logSink, {
      eventType: 'attack',
      level: 'info',
      message: `Seat ${attacker.seat} attacks seat ${defender.seat}`,
      data: { attackerSeat: attacker.seat, defenderSeat: defender.seat, cardId: this.card.id },
    });
    return SUCCESS;
  }

  private findVeto(context: ResolutionContext, attacker: Player, defender: Player): string | undefined {
    if (armorIgnoredBy(context, attacker)) return undefined;
    return activeAbilities(context, defender).find(
      a => a.vetoesCardEffect?.(context.game, defender, this.card, attacker) === true
    )?.id;
  }
}

/**
 * Evaded when a provider resolved the request or the last window
 * succeeded; otherwise pushes the damage.
 */
export class AttackOutcomeResolver implements Resolver {
  readonly kind: string = ResolverKind.ATTACK_OUTCOME;

  constructor(
    private readonly damage: DamageDescriptor,
    private readonly request: ResponseRequestContext
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const last = session.get(LAST_RESPONSE_RESULT);

    if (!this.request.resolved && !last) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.attack.responseResultMissing');
    }

    const evaded =
      this.request.resolved ||
      (last?.responseType === ResponseType.EVADE_AGAINST_ATTACK &&
        last.state === ResponseWindowState.RESPONSE_SUCCESS);

    if (evaded) {
      logTo(context.logSink, {
        eventType: 'attack',
        level: 'info',
        message: `Seat ${this.damage.targetSeat} evaded the attack`,
        data: {
          defenderSeat: this.damage.targetSeat,
          providedBy: this.request.providedBy?.seat ?? last?.responder?.seat,
        },
      });
      return SUCCESS;
    }

    context.stack.push(new DamageResolver(), deriveContext(context, { pendingDamage: this.damage }));
    return SUCCESS;
  }
}
