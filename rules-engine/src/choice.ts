/**
 * choice.ts
 *
 * Helpers around the choice protocol. The engine never looks at how a
 * result was produced; it only checks the result against its request.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Card, CardId } from '../../shared/src';
import { ChoiceType, type ChoiceProvider, type ChoiceRequest, type ChoiceResult } from './core/types';

export function createChoiceRequest(input: Omit<ChoiceRequest, 'requestId'>): ChoiceRequest {
  return { requestId: uuidv4(), ...input };
}

/**
 * Ask a yes/no question. Anything but an explicit `true` is a no.
 */
export function askConfirm(getPlayerChoice: ChoiceProvider, playerSeat: number, responseWindowId?: string): boolean {
  const request = createChoiceRequest({
    playerSeat,
    choiceType: ChoiceType.CONFIRM,
    responseWindowId,
    canPass: true,
  });
  return getPlayerChoice(request).confirmed === true;
}

/**
 * Selected cards that are among the allowed ones, in selection order.
 * Unknown ids are dropped and reported back.
 */
export function pickAllowedCards(
  result: ChoiceResult,
  allowed: readonly Card[]
): { cards: Card[]; rejected: CardId[] } {
  const cards: Card[] = [];
  const rejected: CardId[] = [];
  for (const id of result.selectedCardIds ?? []) {
    const card = allowed.find(c => c.id === id);
    if (card && !cards.includes(card)) {
      cards.push(card);
    } else {
      rejected.push(id);
    }
  }
  return { cards, rejected };
}
