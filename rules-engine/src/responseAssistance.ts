/**
 * responseAssistance.ts
 *
 * Assistance: the defender asks allies to answer on their behalf. When
 * the defender accepts, assistance takes precedence over every other
 * provider. Allies are polled in seat order through an ordinary response
 * window; if none answers, the defender gets their own window.
 */

import type { Player } from '../../shared/src';
import { askConfirm } from './choice';
import { SUCCESS, type ResolutionResult } from './core/types';
import { logTo } from './logging';
import {
  markResolved,
  PROVIDER_PRIORITY,
  ProviderOutcome,
  requiredCountFor,
  type ResponseProvider,
  type ResponseRequestContext,
} from './providerChain';
import { requireSession, SessionKey, type ResolutionContext } from './resolutionContext';
import { ResolverKind, type Resolver } from './resolutionStack';
import {
  alliesInSeatOrder,
  LAST_RESPONSE_RESULT,
  ResponseType,
  ResponseWindowResolver,
  ResponseWindowState,
} from './responseWindow';

export interface AssistanceRecord {
  readonly beneficiarySeat: number;
  readonly assistantSeat: number;
}

export const RESPONSE_ASSISTANCE = new SessionKey<AssistanceRecord>('responseAssistance');

export class AssistanceProvider implements ResponseProvider {
  readonly priority = PROVIDER_PRIORITY.ASSISTANCE;

  constructor(
    readonly id: string,
    private readonly owner: Player
  ) {}

  canProvide(request: ResponseRequestContext, context: ResolutionContext): boolean {
    return (
      request.defender.seat === this.owner.seat &&
      request.responseType === ResponseType.EVADE_AGAINST_ATTACK &&
      context.getPlayerChoice !== undefined &&
      alliesInSeatOrder(context.game, this.owner).length > 0
    );
  }

  provide(request: ResponseRequestContext, context: ResolutionContext): ProviderOutcome {
    if (!context.getPlayerChoice || !askConfirm(context.getPlayerChoice, this.owner.seat)) {
      return ProviderOutcome.DECLINED;
    }

    request.highPriorityActivated = true;
    const requiredResponseCount = requiredCountFor(request, context);

    context.stack.push(new AssistanceOutcomeResolver(request, requiredResponseCount), context);
    context.stack.push(
      new ResponseWindowResolver({
        responseType: request.responseType,
        responders: alliesInSeatOrder(context.game, this.owner),
        sourceEvent: request.sourceEvent,
        requiredResponseCount,
      }),
      context
    );
    return ProviderOutcome.DEFERRED;
  }
}

/**
 * Reads the allies' window. Success resolves the request for the
 * defender; otherwise the defender answers for themselves.
 */
export class AssistanceOutcomeResolver implements Resolver {
  readonly kind: string = ResolverKind.ASSISTANCE_OUTCOME;

  constructor(
    private readonly request: ResponseRequestContext,
    private readonly requiredResponseCount: number
  ) {}

  resolve(context: ResolutionContext): ResolutionResult {
    const session = requireSession(context, this.kind);
    const last = session.get(LAST_RESPONSE_RESULT);

    if (last?.state === ResponseWindowState.RESPONSE_SUCCESS && last.responder) {
      markResolved(this.request, last.responder, last.responseCard);
      session.set(RESPONSE_ASSISTANCE, {
        beneficiarySeat: this.request.defender.seat,
        assistantSeat: last.responder.seat,
      });
      logTo(context.logSink, {
        eventType: 'assistance',
        level: 'info',
        message: `Seat ${last.responder.seat} answered for seat ${this.request.defender.seat}`,
      });
      return SUCCESS;
    }

    context.stack.push(
      new ResponseWindowResolver({
        responseType: this.request.responseType,
        responders: [this.request.defender],
        sourceEvent: this.request.sourceEvent,
        requiredResponseCount: this.requiredResponseCount,
      }),
      context
    );
    return SUCCESS;
  }
}
