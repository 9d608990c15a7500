/**
 * resolvers/damage.ts
 *
 * Damage, dying and rescue.
 *
 * Health never drops below zero. A player brought to zero by damage that
 * triggers dying stays alive until the heal window closes: a heal saves
 * them, otherwise they die. Damage that does not trigger dying kills at
 * once.
 */

import type { Game, Player, Seat } from '../../../shared/src';
import { GameEventType, type BeforeDamageEvent } from '../core/events';
import { failure, ResolutionErrorCode, SUCCESS, type DamageDescriptor, type ResolutionResult } from '../core/types';
import { logTo } from '../logging';
import { requireSession, type ResolutionContext } from '../resolutionContext';
import { ResolverKind, type Resolver } from '../resolutionStack';
import {
  healResponders,
  LAST_RESPONSE_RESULT,
  ResponseType,
  ResponseWindowResolver,
  ResponseWindowState,
} from '../responseWindow';

function findPlayer(game: Game, seat: Seat): Player | undefined {
  return game.players.find(p => p.seat === seat);
}

export function killPlayer(context: ResolutionContext, player: Player, killerSeat?: Seat): void {
  player.isAlive = false;
  logTo(context.logSink, {
    eventType: 'death',
    level: 'info',
    message: `Seat ${player.seat} died`,
    data: { seat: player.seat, killerSeat },
  });
  context.eventBus?.publish(GameEventType.PLAYER_DIED, { game: context.game, seat: player.seat, killerSeat });
}

export class DamageResolver implements Resolver {
  readonly kind: string = ResolverKind.DAMAGE;

  resolve(context: ResolutionContext): ResolutionResult {
    const pending = context.pendingDamage;
    if (!pending) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'resolution.damage.noPendingDamage');
    }

    const damage: DamageDescriptor =
      pending.redirectToSeat === undefined
        ? pending
        : { ...pending, targetSeat: pending.redirectToSeat, redirectToSeat: undefined };

    const { game, eventBus } = context;
    const target = findPlayer(game, damage.targetSeat);
    if (!target) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.damage.targetNotFound');
    }
    if (!target.isAlive) {
      return failure(ResolutionErrorCode.TARGET_NOT_ALIVE, 'resolution.damage.targetNotAlive');
    }

    eventBus?.publish(GameEventType.DAMAGE_CREATED, { game, damage });

    if (damage.preventable && eventBus) {
      const before: BeforeDamageEvent = { game, damage, prevented: false, context };
      eventBus.publish(GameEventType.BEFORE_DAMAGE, before);
      if (before.prevented) {
        logTo(context.logSink, {
          eventType: 'damage',
          level: 'info',
          message: `Damage to seat ${target.seat} prevented by ${before.preventedBy ?? 'an effect'}`,
          data: { targetSeat: target.seat, amount: damage.amount, preventedBy: before.preventedBy },
        });
        return SUCCESS;
      }
    }

    const previousHealth = target.currentHealth;
    target.currentHealth = Math.max(0, previousHealth - damage.amount);

    logTo(context.logSink, {
      eventType: 'damage',
      level: 'info',
      message: `Seat ${target.seat} took ${damage.amount} ${damage.type} damage (${previousHealth} -> ${target.currentHealth})`,
      data: {
        sourceSeat: damage.sourceSeat,
        targetSeat: target.seat,
        amount: damage.amount,
        reason: damage.reason,
        previousHealth,
        currentHealth: target.currentHealth,
      },
    });

    eventBus?.publish(GameEventType.DAMAGE_APPLIED, {
      game,
      damage,
      previousHealth,
      currentHealth: target.currentHealth,
    });
    eventBus?.publish(GameEventType.DAMAGE_RESOLVED, { game, damage, context });

    if (target.currentHealth === 0) {
      if (damage.triggersDying) {
        eventBus?.publish(GameEventType.DYING_START, { game, seat: target.seat, sourceSeat: damage.sourceSeat });
        // Pushed last so dying resolves before anything triggered above
        context.stack.push(new DyingResolver(target.seat, damage.sourceSeat), context);
      } else {
        killPlayer(context, target, damage.sourceSeat);
      }
    }

    return SUCCESS;
  }
}

/**
 * Opens the heal window for a player at zero health
 */
export class DyingResolver implements Resolver {
  readonly kind: string = ResolverKind.DYING;

  constructor(
    private readonly dyingSeat: Seat,
    private readonly sourceSeat?: Seat
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    requireSession(context, this.kind);

    const player = findPlayer(context.game, this.dyingSeat);
    if (!player) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.dying.playerNotFound');
    }
    if (!player.isAlive || player.currentHealth > 0) {
      return SUCCESS;
    }

    context.stack.push(new DyingRescueResolver(this.dyingSeat, this.sourceSeat), context);
    context.stack.push(
      new ResponseWindowResolver({
        responseType: ResponseType.HEAL_FOR_DYING,
        responders: healResponders(context.game, this.dyingSeat),
        sourceEvent: { kind: 'dying', dyingSeat: this.dyingSeat, sourceSeat: this.sourceSeat },
      }),
      context
    );
    return SUCCESS;
  }
}

/**
 * Reads the heal window: a heal restores the player to at least 1
 * health, no heal kills them.
 */
export class DyingRescueResolver implements Resolver {
  readonly kind: string = ResolverKind.DYING_RESCUE;

  constructor(
    private readonly dyingSeat: Seat,
    private readonly sourceSeat?: Seat
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const player = findPlayer(context.game, this.dyingSeat);
    if (!player) {
      return failure(ResolutionErrorCode.INVALID_TARGET, 'resolution.dying.playerNotFound');
    }

    const last = session.get(LAST_RESPONSE_RESULT);
    if (
      last?.responseType === ResponseType.HEAL_FOR_DYING &&
      last.state === ResponseWindowState.RESPONSE_SUCCESS
    ) {
      player.currentHealth = Math.max(1, player.currentHealth + 1);
      logTo(context.logSink, {
        eventType: 'dying',
        level: 'info',
        message: `Seat ${player.seat} was rescued by seat ${last.responder?.seat}`,
        data: { seat: player.seat, rescuerSeat: last.responder?.seat, currentHealth: player.currentHealth },
      });
      return SUCCESS;
    }

    killPlayer(context, player, this.sourceSeat);
    return SUCCESS;
  }
}
