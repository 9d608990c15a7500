/**
 * utils/debug.ts
 *
 * Developer trace for the engine, gated by DEBUG_STATE:
 * - 0: off
 * - 1: essential (failed frames, faults, deaths)
 * - 2: verbose (every push, pop, publish and card move)
 *
 * Lines are tagged with the subsystem that wrote them, e.g.
 * `[stack] push attack (depth 2)`.
 */

import type { ResolutionResult } from '../core/types';

export enum DebugLevel {
  OFF = 0,
  ESSENTIAL = 1,
  VERBOSE = 2,
}

let cachedLevel: DebugLevel | undefined;

/**
 * Clamp a raw DEBUG_STATE value into a level
 */
export function parseDebugLevel(raw: string | undefined): DebugLevel {
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (isNaN(parsed) || parsed <= 0) return DebugLevel.OFF;
  return parsed === 1 ? DebugLevel.ESSENTIAL : DebugLevel.VERBOSE;
}

function currentLevel(): DebugLevel {
  if (cachedLevel === undefined) {
    cachedLevel = parseDebugLevel(process.env.DEBUG_STATE);
  }
  return cachedLevel;
}

/**
 * Re-read DEBUG_STATE on the next call; tests use it after stubbing the env
 */
export function resetDebugLevel(): void {
  cachedLevel = undefined;
}

export function isDebugEnabled(requiredLevel: number): boolean {
  return currentLevel() >= requiredLevel;
}

export function debug(requiredLevel: number, ...args: unknown[]): void {
  if (isDebugEnabled(requiredLevel)) console.log(...args);
}

export function debugWarn(requiredLevel: number, ...args: unknown[]): void {
  if (isDebugEnabled(requiredLevel)) console.warn(...args);
}

export function debugError(requiredLevel: number, ...args: unknown[]): void {
  if (isDebugEnabled(requiredLevel)) console.error(...args);
}

export type FrameOperation = 'push' | 'pop';

/**
 * One resolution stack movement. Depth is the frame count after the move.
 */
export function traceFrame(operation: FrameOperation, resolverKind: string, depth: number): void {
  debug(DebugLevel.VERBOSE, `[stack] ${operation} ${resolverKind} (depth ${depth})`);
}

/**
 * A frame that returned a failure result; faults are not traced here
 */
export function traceFailedFrame(resolverKind: string, result: ResolutionResult): void {
  if (result.success) return;
  const key = result.messageKey ? ` ${result.messageKey}` : '';
  debug(DebugLevel.ESSENTIAL, `[stack] ${resolverKind} failed: ${result.errorCode}${key}`);
}
