/**
 * rules/responseRules.ts
 *
 * Which hand cards may answer a response window.
 */

import type { Card, Game, Player } from '../../../shared/src';
import { RESPONSE_CARD_SUBTYPES, type ResponseSourceEvent, type ResponseType } from '../responseWindow';
import { ALLOWED, disallowed, type RuleModifierAggregator, type RuleResult } from './ruleModifiers';

export interface ResponseRuleContext {
  readonly game: Game;
  readonly responder: Player;
  readonly responseType: ResponseType;
  readonly sourceEvent?: ResponseSourceEvent;
}

export class ResponseRuleService {
  constructor(private readonly modifiers: RuleModifierAggregator) {}

  canRespondWithCard(ctx: ResponseRuleContext, card: Card): RuleResult {
    let base = ALLOWED;
    if (!ctx.responder.isAlive) {
      base = disallowed('rule.response.responderNotAlive');
    } else if (!ctx.responder.hand.cards.some(c => c.id === card.id)) {
      base = disallowed('rule.response.cardNotInHand');
    } else if (card.subType !== RESPONSE_CARD_SUBTYPES[ctx.responseType]) {
      base = disallowed('rule.response.wrongCardType');
    }

    return this.modifiers.canRespond(base, {
      game: ctx.game,
      responder: ctx.responder,
      card,
      responseType: ctx.responseType,
      sourceEvent: ctx.sourceEvent,
    });
  }

  /**
   * Hand cards that may answer, in hand order
   */
  legalResponseCards(ctx: ResponseRuleContext): Card[] {
    return ctx.responder.hand.cards.filter(card => this.canRespondWithCard(ctx, card).allowed);
  }
}
