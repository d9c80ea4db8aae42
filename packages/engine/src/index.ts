/**
 * Stranded Engine
 * Story graph, combat resolver and player progression
 * Pure deterministic state machine (no IO)
 */

// Main API
export { createNewGame, applyOption, applyCombatAction, getCurrentScene, UNAVAILABLE_OPTION_TEXT } from './runtime/engine';
export { GameController } from './runtime/controller';
export type { GameControllerOptions, SceneListener } from './runtime/controller';

// Story graph
export { getNode, hasNode, enterNode, DEFAULT_REVISIT_TEXT } from './runtime/story';
export { applyEffect, applyEffects } from './runtime/effects';

// Characters and progression
export { takeDamage, heal, isAlive, toWholeAmount } from './runtime/character';
export { expToNextLevel, addExperience, addItem, boostAttack, useConsumable, itemName } from './runtime/progression';

// Combat
export {
  instantiateEnemy,
  startBattle,
  getCombatPhase,
  canAct,
  continueAfterVictory,
} from './runtime/combat/combat';
export { runEnemyTurn, enemyAttackRange } from './runtime/combat/enemyTurn';
export { quickAttackRange, heavyAttackRange, isCombatAction } from './runtime/combat/actions';
export { battleSlots } from './runtime/selectors';

// Utilities
export { RNG, rngForSession } from './runtime/rng';
export type { IRNG } from './runtime/rng';
export { DEFAULT_RULES, resolveRules } from './runtime/rules';

// Content loading and validation
export { loadStoryPack } from './content/load';
export { validateStoryPack } from './content/validate';

// Errors
export { UnknownNodeError, ContentError } from './runtime/errors';
export type { ValidationIssue } from './runtime/errors';

// Types
export { MAX_OPTIONS } from './runtime/types';
export type * from './runtime/types';
