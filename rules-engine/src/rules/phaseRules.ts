/**
 * rules/phaseRules.ts
 *
 * Cards are actively used only by the current player during the play phase.
 */

import { Phase, type Game, type Player } from '../../../shared/src';

export class PhaseRuleService {
  isCardUsagePhase(game: Game, player: Player): boolean {
    return game.currentPlayerSeat === player.seat && game.currentPhase === Phase.PLAY;
  }
}
