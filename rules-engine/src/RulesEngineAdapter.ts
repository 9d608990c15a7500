/**
 * RulesEngineAdapter.ts
 * 
 * Single entry point for hosts. The adapter wires the event bus, card
 * move, rule, ability and judgement services to one game and exposes:
 * - action listing and execution (one resolution stack per action)
 * - turn and phase bookkeeping the host drives
 * - draw phase draws, honouring draw-count modifiers
 */

import { Phase, type Card, type Game, type Player, type Seat } from '../../shared/src';
import { AbilityManager } from './abilities/abilityManager';
import type { AbilityRegistry } from './abilities/abilityRegistry';
import { createDefaultAbilityRegistry } from './abilities/defaultAbilities';
import { BasicCardMoveService } from './cardMove';
import { PreconditionError } from './core/errors';
import { GameEventType, type EventBus } from './core/events';
import {
  failure,
  ResolutionErrorCode,
  SUCCESS,
  type ActionDescriptor,
  type ChoiceProvider,
  type DamageDescriptor,
  type ResolutionResult,
} from './core/types';
import { GameEventBus } from './eventBus';
import { BasicJudgementService } from './judgement';
import { logTo, type LogSink } from './logging';
import { ChainSession, type ContextOverrides, type ResolutionContext } from './resolutionContext';
import { ResolutionStack, type ExecutionHistoryEntry, type Resolver } from './resolutionStack';
import { DamageResolver } from './resolvers/damage';
import { UseCardResolver } from './resolvers/useCard';
import { resetTurnUsage } from './rules/limitRules';
import { BasicRuleService, type RuleServiceOptions } from './rules/ruleService';

export interface RulesEngineOptions {
  readonly game: Game;
  readonly getPlayerChoice?: ChoiceProvider;
  readonly logSink?: LogSink;
  readonly registry?: AbilityRegistry;
  readonly eventBus?: EventBus;
  readonly ruleOptions?: RuleServiceOptions;
}

/**
 * Everything one top-level action produced
 */
export interface ActionExecution {
  readonly results: readonly ResolutionResult[];
  readonly history: readonly ExecutionHistoryEntry[];
  readonly session: ChainSession;
}

export class RulesEngineAdapter {
  readonly game: Game;
  readonly eventBus: EventBus;
  readonly abilities: AbilityManager;
  readonly ruleService: BasicRuleService;
  readonly cardMoveService: BasicCardMoveService;
  readonly judgementService: BasicJudgementService;
  private readonly getPlayerChoice?: ChoiceProvider;
  private readonly logSink?: LogSink;

  constructor(options: RulesEngineOptions) {
    this.game = options.game;
    this.getPlayerChoice = options.getPlayerChoice;
    this.logSink = options.logSink;
    this.eventBus = options.eventBus ?? new GameEventBus();
    this.abilities = new AbilityManager(options.registry ?? createDefaultAbilityRegistry(), this.eventBus);
    this.ruleService = new BasicRuleService(this.abilities, options.ruleOptions);
    this.cardMoveService = new BasicCardMoveService(this.eventBus);
    this.judgementService = new BasicJudgementService(this.eventBus);

    this.abilities.loadAbilitiesForAllPlayers(this.game);
  }

  getPlayer(seat: Seat): Player {
    const player = this.game.players.find(p => p.seat === seat);
    if (!player) {
      throw new PreconditionError(`No player at seat ${seat} in game ${this.game.id}`);
    }
    return player;
  }

  /**
   * Build the root context of a new chain
   */
  createContext(
    stack: ResolutionStack,
    player: Player,
    overrides: ContextOverrides = {},
    session: ChainSession = new ChainSession()
  ): ResolutionContext {
    return {
      game: this.game,
      sourcePlayer: player,
      stack,
      cardMoveService: this.cardMoveService,
      ruleService: this.ruleService,
      logSink: this.logSink,
      getPlayerChoice: this.getPlayerChoice,
      session,
      eventBus: this.eventBus,
      abilityQuery: this.abilities,
      equipmentHost: this.abilities,
      judgementService: this.judgementService,
      ...overrides,
    };
  }

  availableActions(seat: Seat): ActionDescriptor[] {
    return this.ruleService.availableActions(this.game, this.getPlayer(seat));
  }

  executeAction(action: ActionDescriptor): ActionExecution {
    const player = this.getPlayer(action.actorSeat);

    if (action.kind === 'endPlayPhase') {
      const validation = this.ruleService.validateActionBeforeResolve(this.game, player, action);
      const result = validation.allowed
        ? SUCCESS
        : failure(ResolutionErrorCode.RULE_VALIDATION_FAILED, validation.reason);
      if (validation.allowed) {
        this.setPhase(Phase.DISCARD);
      }
      return { results: [result], history: [], session: new ChainSession() };
    }

    return this.run(new UseCardResolver(), player, { action });
  }

  /**
   * Resolve damage outside any card, e.g. from a host-side effect
   */
  applyDamage(damage: DamageDescriptor): ActionExecution {
    const source = damage.sourceSeat === undefined ? this.getPlayer(damage.targetSeat) : this.getPlayer(damage.sourceSeat);
    return this.run(new DamageResolver(), source, { pendingDamage: damage });
  }

  startTurn(seat: Seat): void {
    const player = this.getPlayer(seat);
    this.game.currentPlayerSeat = seat;
    this.game.currentPhase = Phase.START;
    resetTurnUsage(player);
    this.eventBus.publish(GameEventType.TURN_START, { game: this.game, seat, turnNumber: this.game.turnNumber });
    this.eventBus.publish(GameEventType.PHASE_START, { game: this.game, seat, phase: Phase.START });
  }

  endTurn(): void {
    const seat = this.game.currentPlayerSeat;
    this.eventBus.publish(GameEventType.PHASE_END, { game: this.game, seat, phase: this.game.currentPhase });
    this.eventBus.publish(GameEventType.TURN_END, { game: this.game, seat, turnNumber: this.game.turnNumber });
    this.game.currentPhase = Phase.NONE;
    this.game.turnNumber++;
  }

  setPhase(phase: Phase): void {
    const seat = this.game.currentPlayerSeat;
    this.eventBus.publish(GameEventType.PHASE_END, { game: this.game, seat, phase: this.game.currentPhase });
    this.game.currentPhase = phase;
    this.eventBus.publish(GameEventType.PHASE_START, { game: this.game, seat, phase });
  }

  /**
   * Draw-phase draw for the current player
   */
  drawPhase(): Card[] {
    const player = this.getPlayer(this.game.currentPlayerSeat);
    const count = this.ruleService.drawCount(this.game, player);
    const drawn = this.cardMoveService.drawCards(this.game, player, count);
    logTo(this.logSink, {
      eventType: 'draw',
      level: 'info',
      message: `Seat ${player.seat} drew ${drawn.length} card(s)`,
      data: { seat: player.seat, cardIds: drawn.map(c => c.id) },
    });
    return drawn;
  }

  private run(resolver: Resolver, player: Player, overrides: ContextOverrides): ActionExecution {
    const stack = new ResolutionStack();
    const session = new ChainSession();
    stack.push(resolver, this.createContext(stack, player, overrides, session));
    const results = stack.drain();
    return { results, history: stack.getHistory(), session };
  }
}
