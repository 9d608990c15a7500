/**
 * resolutionContext.ts
 *
 * The bundle every resolver receives, and the per-chain session that
 * resolvers of the same chain use to hand results to one another.
 */

import type { Game, Player } from '../../shared/src';
import type { Ability, AbilityQueryService, EquipmentAbilityHost } from './abilities/ability';
import type { CardMoveService } from './cardMove';
import { PreconditionError } from './core/errors';
import type { EventBus } from './core/events';
import type { ActionDescriptor, ChoiceProvider, ChoiceResult, DamageDescriptor } from './core/types';
import type { JudgementService } from './judgement';
import type { LogSink } from './logging';
import type { ResolutionStack } from './resolutionStack';
import type { RuleService } from './rules/ruleService';

/**
 * Typed handle for one session entry. Values are stored on the key itself,
 * one per session, so reads come back with the key's type.
 */
export class SessionKey<T> {
  private readonly values = new WeakMap<ChainSession, T>();

  constructor(readonly name: string) {}

  read(session: ChainSession): T | undefined {
    return this.values.get(session);
  }

  has(session: ChainSession): boolean {
    return this.values.has(session);
  }

  write(session: ChainSession, value: T): void {
    this.values.set(session, value);
  }

  clear(session: ChainSession): void {
    this.values.delete(session);
  }
}

/**
 * Scratch state shared by every resolver of one top-level action
 */
export class ChainSession {
  get<T>(key: SessionKey<T>): T | undefined {
    return key.read(this);
  }

  require<T>(key: SessionKey<T>): T {
    if (!key.has(this)) {
      throw new PreconditionError(`Chain session has no entry for ${key.name}`);
    }
    const value = key.read(this);
    if (value === undefined) {
      throw new PreconditionError(`Chain session entry ${key.name} is undefined`);
    }
    return value;
  }

  set<T>(key: SessionKey<T>, value: T): void {
    key.write(this, value);
  }

  has<T>(key: SessionKey<T>): boolean {
    return key.has(this);
  }

  delete<T>(key: SessionKey<T>): void {
    key.clear(this);
  }
}

export interface ResolutionContext {
  readonly game: Game;
  /** The player on whose behalf this frame resolves */
  readonly sourcePlayer: Player;
  readonly action?: ActionDescriptor;
  readonly choice?: ChoiceResult;
  readonly stack: ResolutionStack;
  readonly cardMoveService: CardMoveService;
  readonly ruleService: RuleService;
  readonly pendingDamage?: DamageDescriptor;
  readonly logSink?: LogSink;
  readonly getPlayerChoice?: ChoiceProvider;
  readonly session?: ChainSession;
  readonly eventBus?: EventBus;
  readonly abilityQuery?: AbilityQueryService;
  readonly equipmentHost?: EquipmentAbilityHost;
  readonly judgementService?: JudgementService;
}

/**
 * Fields a derived context may replace. The stack, session and services
 * always carry over so the whole chain shares them.
 */
export type ContextOverrides = Partial<
  Pick<ResolutionContext, 'sourcePlayer' | 'action' | 'choice' | 'pendingDamage'>
>;

export function deriveContext(context: ResolutionContext, overrides: ContextOverrides): ResolutionContext {
  return { ...context, ...overrides };
}

/**
 * The session is a hard precondition for resolvers that pass results
 * along the chain; it is never created lazily.
 */
export function requireSession(context: ResolutionContext, resolverKind: string): ChainSession {
  if (!context.session) {
    throw new PreconditionError(`${resolverKind} requires a chain session on its resolution context`);
  }
  return context.session;
}

/**
 * Active abilities of a player, or none when no ability query is wired
 */
export function activeAbilities(context: ResolutionContext, player: Player): readonly Ability[] {
  return context.abilityQuery?.activeAbilitiesFor(context.game, player) ?? [];
}
