/**
 * Rules engine public API
 */

export * from './core/types';
export * from './core/events';
export * from './core/errors';
export * from './config';
export * from './logging';
export * from './eventBus';
export * from './cardMove';
export * from './choice';
export * from './judgement';
export * from './resolutionStack';
export * from './resolutionContext';
export * from './responseWindow';
export * from './providerChain';
export * from './responseAssistance';
export * from './nullification';
export * from './resolvers/useCard';
export * from './resolvers/attack';
export * from './resolvers/damage';
export * from './resolvers/cardEffects';
export * from './resolvers/areaEffect';
export * from './resolvers/duel';
export * from './rules/ruleModifiers';
export * from './rules/phaseRules';
export * from './rules/rangeRules';
export * from './rules/limitRules';
export * from './rules/cardUsageRules';
export * from './rules/responseRules';
export * from './rules/responseRequirement';
export * from './rules/actionQuery';
export * from './rules/ruleService';
export * from './abilities/ability';
export * from './abilities/abilityRegistry';
export * from './abilities/abilityManager';
export * from './abilities/heroAbilities';
export * from './abilities/equipmentAbilities';
export * from './abilities/defaultAbilities';
export * from './RulesEngineAdapter';
export { debug, debugWarn, debugError, isDebugEnabled, DebugLevel } from './utils/debug';
