/**
 * providerChain.ts
 *
 * Priority Provider Chain: several independent mechanisms (an ally's
 * assistance, an armor's judgement, the defender's own card) compete to
 * satisfy one response requirement. Providers are tried in ascending
 * priority. The chain stops as soon as the shared request is resolved,
 * or as soon as a provider raises `highPriorityActivated`, which locks
 * out every lower-priority provider for this invocation.
 *
 * A provider either resolves the request synchronously or defers by
 * pushing its own resolvers; a deferred chain writes the shared request
 * later. The chain resolver itself always succeeds.
 */

import type { Card, Player } from '../../shared/src';
import { InvariantViolationError } from './core/errors';
import { SUCCESS, type ResolutionResult } from './core/types';
import { logTo } from './logging';
import { requireSession, type ResolutionContext } from './resolutionContext';
import { ResolverKind, type Resolver } from './resolutionStack';
import { ResponseWindowResolver, type ResponseSourceEvent, type ResponseType } from './responseWindow';

/**
 * Shared by every provider tried for one requirement
 */
export interface ResponseRequestContext {
  readonly defender: Player;
  readonly attacker?: Player;
  readonly responseType: ResponseType;
  readonly sourceEvent?: ResponseSourceEvent;
  resolved: boolean;
  providedBy?: Player;
  providedCard?: Card;
  highPriorityActivated: boolean;
}

export function createResponseRequest(input: {
  defender: Player;
  attacker?: Player;
  responseType: ResponseType;
  sourceEvent?: ResponseSourceEvent;
}): ResponseRequestContext {
  return { ...input, resolved: false, highPriorityActivated: false };
}

/**
 * Only one provider may ever resolve a request
 */
export function markResolved(request: ResponseRequestContext, providedBy: Player, providedCard?: Card): void {
  if (request.resolved) {
    throw new InvariantViolationError(
      `Response request for seat ${request.defender.seat} was already resolved by seat ${request.providedBy?.seat}`
    );
  }
  request.resolved = true;
  request.providedBy = providedBy;
  request.providedCard = providedCard;
}

export enum ProviderOutcome {
  RESOLVED = 'resolved',
  /** Resolvers were pushed; they finish the request later */
  DEFERRED = 'deferred',
  DECLINED = 'declined',
}

export interface ResponseProvider {
  readonly id: string;
  /** Lower values are tried first */
  readonly priority: number;
  canProvide(request: ResponseRequestContext, context: ResolutionContext): boolean;
  provide(request: ResponseRequestContext, context: ResolutionContext): ProviderOutcome;
}

export const PROVIDER_PRIORITY = {
  ASSISTANCE: 0,
  EQUIPMENT: 1,
  MANUAL: 2,
} as const;

/**
 * Falls back to the defender playing their own cards
 */
export class ManualResponseProvider implements ResponseProvider {
  readonly id = 'manual';
  readonly priority = PROVIDER_PRIORITY.MANUAL;

  canProvide(): boolean {
    return true;
  }

  provide(request: ResponseRequestContext, context: ResolutionContext): ProviderOutcome {
    context.stack.push(
      new ResponseWindowResolver({
        responseType: request.responseType,
        responders: [request.defender],
        sourceEvent: request.sourceEvent,
        requiredResponseCount: requiredCountFor(request, context),
      }),
      context
    );
    return ProviderOutcome.DEFERRED;
  }
}

export function requiredCountFor(request: ResponseRequestContext, context: ResolutionContext): number {
  if (!request.attacker) return 1;
  return context.ruleService.requiredResponseCount(
    context.game,
    request.attacker,
    request.defender,
    request.responseType
  );
}

export class ProviderChainResolver implements Resolver {
  readonly kind: string = ResolverKind.PROVIDER_CHAIN;
  private readonly providers: ResponseProvider[];

  constructor(
    private readonly request: ResponseRequestContext,
    providers: readonly ResponseProvider[]
  ) {
    // Stable sort keeps registration order among equal priorities
    this.providers = [...providers].sort((a, b) => a.priority - b.priority);
  }

  resolve(context: ResolutionContext): ResolutionResult {
    requireSession(context, this.kind);

    for (const provider of this.providers) {
      if (this.request.resolved || this.request.highPriorityActivated) break;
      if (!provider.canProvide(this.request, context)) continue;

      const outcome = provider.provide(this.request, context);
      logTo(context.logSink, {
        eventType: 'providerChain',
        level: 'debug',
        message: `Provider ${provider.id} for seat ${this.request.defender.seat}: ${outcome}`,
        data: { providerId: provider.id, priority: provider.priority, outcome },
      });
    }

    return SUCCESS;
  }

  providerIds(): string[] {
    return this.providers.map(p => p.id);
  }
}
