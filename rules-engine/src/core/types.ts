/**
 * core/types.ts
 *
 * Core value types for the resolution engine: results, action and damage
 * descriptors, and the choice protocol that carries every player decision.
 */

import type { Card, CardId, Seat } from '../../../shared/src';
import { PreconditionError } from './errors';

/**
 * Expected, caller-recoverable failure reasons
 */
export enum ResolutionErrorCode {
  CARD_NOT_FOUND = 'cardNotFound',
  TARGET_NOT_ALIVE = 'targetNotAlive',
  INVALID_TARGET = 'invalidTarget',
  INVALID_STATE = 'invalidState',
  RULE_VALIDATION_FAILED = 'ruleValidationFailed',
}

export interface ResolutionResult {
  readonly success: boolean;
  readonly errorCode?: ResolutionErrorCode;
  readonly messageKey?: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export const SUCCESS: ResolutionResult = Object.freeze({ success: true });

export function failure(
  errorCode: ResolutionErrorCode,
  messageKey?: string,
  details?: Readonly<Record<string, unknown>>
): ResolutionResult {
  return { success: false, errorCode, messageKey, details };
}

export type ActionKind = 'useCard' | 'endPlayPhase';

/**
 * A player's top-level action as offered by the action query service
 */
export interface ActionDescriptor {
  readonly kind: ActionKind;
  readonly actorSeat: Seat;
  readonly cardIds?: readonly CardId[];
  readonly targetSeats?: readonly Seat[];
  readonly requiresTargets?: boolean;
}

export enum DamageType {
  NORMAL = 'normal',
  FIRE = 'fire',
  THUNDER = 'thunder',
}

export interface DamageDescriptor {
  /** Undefined for damage with no source player */
  readonly sourceSeat?: Seat;
  readonly targetSeat: Seat;
  readonly amount: number;
  readonly type: DamageType;
  /** Reason tag such as `attack` or `retaliation` */
  readonly reason: string;
  readonly causingCard?: Card;
  readonly preventable: boolean;
  readonly redirectToSeat?: Seat;
  readonly triggersDying: boolean;
}

export function createDamage(
  input: Omit<DamageDescriptor, 'type' | 'preventable' | 'triggersDying'> &
    Partial<Pick<DamageDescriptor, 'type' | 'preventable' | 'triggersDying'>>
): DamageDescriptor {
  if (!Number.isInteger(input.amount) || input.amount < 0) {
    throw new PreconditionError(`Damage amount must be a non-negative integer, got ${input.amount}`);
  }
  return {
    type: DamageType.NORMAL,
    preventable: true,
    triggersDying: true,
    ...input,
  };
}

export enum ChoiceType {
  SELECT_TARGETS = 'selectTargets',
  SELECT_CARDS = 'selectCards',
  CONFIRM = 'confirm',
  SELECT_OPTION = 'selectOption',
}

export interface TargetConstraints {
  readonly minTargets: number;
  readonly maxTargets: number;
  readonly allowedSeats?: readonly Seat[];
}

export interface ChoiceOption {
  readonly optionId: string;
  readonly label: string;
}

export interface ChoiceRequest {
  readonly requestId: string;
  readonly playerSeat: Seat;
  readonly choiceType: ChoiceType;
  readonly targetConstraints?: TargetConstraints;
  readonly allowedCards?: readonly Card[];
  readonly options?: readonly ChoiceOption[];
  readonly responseWindowId?: string;
  readonly canPass: boolean;
}

export interface ChoiceResult {
  readonly requestId: string;
  readonly playerSeat: Seat;
  readonly selectedTargetSeats?: readonly Seat[];
  readonly selectedCardIds?: readonly CardId[];
  readonly selectedOptionId?: string;
  /** Tri-state: undefined means the question was not answered */
  readonly confirmed?: boolean;
}

/**
 * The single boundary through which decisions enter the engine
 */
export type ChoiceProvider = (request: ChoiceRequest) => ChoiceResult;
