/**
 * rules/actionQuery.ts
 *
 * Lists the actions a player may take right now. Hosts use it to offer
 * choices; the engine itself re-validates every action before resolving.
 */

import type { Game, Player } from '../../../shared/src';
import type { ActionDescriptor } from '../core/types';
import type { CardUsageRuleService } from './cardUsageRules';
import type { PhaseRuleService } from './phaseRules';

export class ActionQueryService {
  constructor(
    private readonly phase: PhaseRuleService,
    private readonly cardUsage: CardUsageRuleService
  ) {}

  availableActions(game: Game, player: Player): ActionDescriptor[] {
    if (!this.phase.isCardUsagePhase(game, player)) return [];

    const actions: ActionDescriptor[] = [];
    for (const card of player.hand.cards) {
      const ctx = { game, player, card };
      if (!this.cardUsage.canUseCard(ctx).allowed) continue;

      actions.push({
        kind: 'useCard',
        actorSeat: player.seat,
        cardIds: [card.id],
        targetSeats: this.cardUsage.legalTargets(ctx).map(p => p.seat),
        requiresTargets: this.cardUsage.requiresTargets(card),
      });
    }

    actions.push({ kind: 'endPlayPhase', actorSeat: player.seat });
    return actions;
  }
}
