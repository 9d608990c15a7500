/**
 * Shared builders for rules engine tests
 */

import { CardSubType, createCard, Suit, type Card, type CardId } from '../../shared/src';
import { ChoiceType, type ChoiceProvider, type ChoiceRequest, type ChoiceResult } from '../src/core/types';

export function attackCard(id: CardId, suit: Suit = Suit.SPADE): Card {
  return createCard({ id, subType: CardSubType.ATTACK, suit });
}

export function evadeCard(id: CardId): Card {
  return createCard({ id, subType: CardSubType.EVADE, suit: Suit.DIAMOND });
}

export function healCard(id: CardId): Card {
  return createCard({ id, subType: CardSubType.HEAL, suit: Suit.HEART });
}

export function trickCard(id: CardId, subType: CardSubType): Card {
  return createCard({ id, subType });
}

export function nullificationCard(id: CardId): Card {
  return createCard({ id, subType: CardSubType.NULLIFICATION, suit: Suit.CLUB });
}

export function equipmentCard(id: CardId, definitionId: string, subType: CardSubType): Card {
  return createCard({ id, subType, definitionId, name: definitionId });
}

function answer(request: ChoiceRequest, fields: Partial<ChoiceResult> = {}): ChoiceResult {
  return { requestId: request.requestId, playerSeat: request.playerSeat, ...fields };
}

export function passResult(request: ChoiceRequest): ChoiceResult {
  return answer(request);
}

export function selectCards(request: ChoiceRequest, cardIds: readonly CardId[]): ChoiceResult {
  return answer(request, { selectedCardIds: cardIds });
}

export function confirmResult(request: ChoiceRequest, confirmed: boolean): ChoiceResult {
  return answer(request, { confirmed });
}

/**
 * Records every request and answers through the given function
 */
export class RecordingChoices {
  readonly requests: ChoiceRequest[] = [];

  constructor(private readonly answerWith: (request: ChoiceRequest) => ChoiceResult) {}

  readonly provider: ChoiceProvider = request => {
    this.requests.push(request);
    return this.answerWith(request);
  };

  requestsOfType(type: ChoiceType): ChoiceRequest[] {
    return this.requests.filter(r => r.choiceType === type);
  }
}

/**
 * Confirms every question and plays the first allowed card
 */
export function eagerChoices(): RecordingChoices {
  return new RecordingChoices(request => {
    if (request.choiceType === ChoiceType.CONFIRM) return confirmResult(request, true);
    const first = request.allowedCards?.[0];
    return first ? selectCards(request, [first.id]) : passResult(request);
  });
}

/**
 * Declines every question and passes every window
 */
export function passiveChoices(): RecordingChoices {
  return new RecordingChoices(request =>
    request.choiceType === ChoiceType.CONFIRM ? confirmResult(request, false) : passResult(request)
  );
}
