import dotenv from 'dotenv';

dotenv.config();

/**
 * Non-negative integer from the environment; anything else keeps the default
 */
function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export interface EngineConfig {
  /** Nested publish depth at which the event bus raises a recursion fault */
  readonly maxEventDepth: number;
  readonly defaultAttackDamage: number;
  readonly baseDrawCount: number;
  readonly maxAttacksPerTurn: number;
  readonly baseAttackDistance: number;
}

export function loadEngineConfig(): EngineConfig {
  return {
    maxEventDepth: readInt('RULES_MAX_EVENT_DEPTH', 32),
    defaultAttackDamage: readInt('RULES_ATTACK_DAMAGE', 1),
    baseDrawCount: readInt('RULES_BASE_DRAW_COUNT', 2),
    maxAttacksPerTurn: readInt('RULES_MAX_ATTACKS_PER_TURN', 1),
    baseAttackDistance: readInt('RULES_BASE_ATTACK_DISTANCE', 1),
  };
}

export const engineConfig: EngineConfig = loadEngineConfig();
