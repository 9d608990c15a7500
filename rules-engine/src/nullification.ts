/**
 * nullification.ts
 *
 * Before a trick takes effect on one target, every living player,
 * starting with that target, may cancel it with a nullification card.
 * A nullification can itself be nullified, so the effect is cancelled
 * when an odd number of them were played.
 *
 * The window and the gate share a tally: the window records each
 * nullification and reopens itself until nobody answers, then the gate
 * either drops the guarded frames or pushes them.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Card, Player } from '../../shared/src';
import { failure, ResolutionErrorCode, SUCCESS, type ResolutionResult } from './core/types';
import { logTo } from './logging';
import type { ResolutionContext } from './resolutionContext';
import { ResolverKind, type Resolver } from './resolutionStack';
import { livingInSeatOrder, ResponseType, ResponseWindowState, runResponseWindow } from './responseWindow';

export interface NullifiableEffect {
  /** e.g. `barbarianInvasion.target` or `duel` */
  readonly effectKey: string;
  readonly target: Player;
  readonly card?: Card;
}

export class NullificationTally {
  private played = 0;

  get count(): number {
    return this.played;
  }

  get nullified(): boolean {
    return this.played % 2 === 1;
  }

  record(): void {
    this.played += 1;
  }
}

export class NullificationWindowResolver implements Resolver {
  readonly kind: string = ResolverKind.NULLIFICATION_WINDOW;

  constructor(
    private readonly effect: NullifiableEffect,
    private readonly tally: NullificationTally
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    if (!context.getPlayerChoice) {
      return failure(ResolutionErrorCode.INVALID_STATE, 'response.window.noChoiceProvider');
    }

    const { game } = context;
    const target = this.effect.target;
    const result = runResponseWindow({
      windowId: uuidv4(),
      game,
      responseType: ResponseType.NULLIFICATION,
      responders: livingInSeatOrder(game, target.seat),
      sourceEvent: {
        kind: 'nullification',
        effectKey: this.effect.effectKey,
        targetSeat: target.seat,
        card: this.effect.card,
        chainLength: this.tally.count,
      },
      cardMoveService: context.cardMoveService,
      ruleService: context.ruleService,
      getPlayerChoice: context.getPlayerChoice,
      eventBus: context.eventBus,
      logSink: context.logSink,
    });

    if (result.state !== ResponseWindowState.RESPONSE_SUCCESS) return SUCCESS;

    this.tally.record();
    logTo(context.logSink, {
      eventType: 'nullification',
      level: 'info',
      message: `Seat ${result.responder?.seat} played a nullification on ${this.effect.effectKey} for seat ${target.seat}`,
      data: { effectKey: this.effect.effectKey, targetSeat: target.seat, chainLength: this.tally.count },
    });
    // The nullification just played may be answered in turn
    context.stack.push(new NullificationWindowResolver(this.effect, this.tally), context);
    return SUCCESS;
  }
}

export class NullificationGateResolver implements Resolver {
  readonly kind: string = ResolverKind.NULLIFICATION_GATE;

  constructor(
    private readonly effect: NullifiableEffect,
    private readonly tally: NullificationTally,
    private readonly guarded: readonly Resolver[]
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    if (this.tally.nullified) {
      logTo(context.logSink, {
        eventType: 'nullification',
        level: 'info',
        message: `${this.effect.effectKey} on seat ${this.effect.target.seat} was nullified`,
        data: { effectKey: this.effect.effectKey, targetSeat: this.effect.target.seat, chainLength: this.tally.count },
      });
      return SUCCESS;
    }

    for (const resolver of this.guarded) {
      context.stack.push(resolver, context);
    }
    return SUCCESS;
  }
}

/**
 * Push `guarded` behind a nullification window for the effect. The
 * frames are pushed in order, so the last one resolves first.
 */
export function pushNullifiable(
  context: ResolutionContext,
  effect: NullifiableEffect,
  guarded: readonly Resolver[]
): void {
  const tally = new NullificationTally();
  context.stack.push(new NullificationGateResolver(effect, tally, guarded), context);
  context.stack.push(new NullificationWindowResolver(effect, tally), context);
}
