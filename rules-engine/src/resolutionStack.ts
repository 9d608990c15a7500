/**
 * resolutionStack.ts
 *
 * The interpreter loop for one top-level action. Resolvers are pushed as
 * (resolver, context) frames and executed last-in-first-out; a resolver
 * that needs follow-up work pushes further frames instead of recursing.
 *
 * Every pop appends to the execution history, which is never rewritten,
 * so a drained stack still reports the full chain it executed.
 */

import { InvariantViolationError, PreconditionError } from './core/errors';
import type { ResolutionResult } from './core/types';
import type { ResolutionContext } from './resolutionContext';
import { traceFailedFrame, traceFrame } from './utils/debug';

/**
 * Kind tags of the built-in resolvers
 */
export enum ResolverKind {
  USE_CARD = 'use-card',
  ATTACK = 'attack',
  ATTACK_OUTCOME = 'attack-outcome',
  RESPONSE_WINDOW = 'response-window',
  PROVIDER_CHAIN = 'provider-chain',
  ASSISTANCE_OUTCOME = 'assistance-outcome',
  DAMAGE = 'damage',
  DYING = 'dying',
  DYING_RESCUE = 'dying-rescue',
  HEAL = 'heal',
  EQUIP = 'equip',
  AREA_EFFECT = 'area-effect',
  AREA_EFFECT_TARGET = 'area-effect-target',
  AREA_EFFECT_OUTCOME = 'area-effect-outcome',
  DUEL = 'duel',
  DUEL_ROUND = 'duel-round',
  DUEL_OUTCOME = 'duel-outcome',
  NULLIFICATION_WINDOW = 'nullification-window',
  NULLIFICATION_GATE = 'nullification-gate',
}

export interface Resolver {
  /** Tag recorded in the execution history */
  readonly kind: string;
  resolve(context: ResolutionContext): ResolutionResult;
}

export interface ExecutionHistoryEntry {
  readonly index: number;
  readonly kind: string;
  readonly result: ResolutionResult;
}

interface StackFrame {
  readonly resolver: Resolver;
  readonly context: ResolutionContext;
}

export class ResolutionStack {
  private frames: StackFrame[] = [];
  private history: ExecutionHistoryEntry[] = [];

  push(resolver: Resolver, context: ResolutionContext): void {
    if (resolver == null || context == null) {
      throw new PreconditionError('push requires both a resolver and a context');
    }
    this.frames.push({ resolver, context });
    traceFrame('push', resolver.kind, this.frames.length);
  }

  /**
   * Execute the most recently pushed frame. Popping an empty stack is a
   * fault, not a no-op.
   */
  pop(): ResolutionResult {
    const frame = this.frames.pop();
    if (!frame) {
      throw new InvariantViolationError('Cannot pop an empty resolution stack');
    }

    traceFrame('pop', frame.resolver.kind, this.frames.length);
    const result = frame.resolver.resolve(frame.context);

    this.history.push(
      Object.freeze({ index: this.history.length, kind: frame.resolver.kind, result })
    );

    traceFailedFrame(frame.resolver.kind, result);
    return result;
  }

  isEmpty(): boolean {
    return this.frames.length === 0;
  }

  size(): number {
    return this.frames.length;
  }

  /**
   * Kinds of the frames still waiting, top of stack first
   */
  pendingKinds(): string[] {
    return this.frames.map(f => f.resolver.kind).reverse();
  }

  getHistory(): readonly ExecutionHistoryEntry[] {
    return [...this.history];
  }

  historyKinds(): string[] {
    return this.history.map(h => h.kind);
  }

  /**
   * Pop until empty and return every result in execution order. A fault
   * thrown by a resolver stops the drain and leaves the remaining frames
   * unexecuted.
   */
  drain(): ResolutionResult[] {
    const results: ResolutionResult[] = [];
    while (!this.isEmpty()) {
      results.push(this.pop());
    }
    return results;
  }
}
