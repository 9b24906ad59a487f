/**
 * Skirmish Engine
 * Deterministic two-party, role-based battle simulation
 * Pure state machine (no IO)
 */

// Main API
export { startBattle, playRound, runBattle, outcomeOf, actionRecords, DEFAULT_BATTLE_CONFIG } from "./runtime/engine";

// Construction
export { createCharacter, createParty, DEFAULT_STATS } from "./runtime/roster";

// Utilities
export { isAlive, partyDefeated, livingCombatants, combatantsOf, opponentOf } from "./runtime/selectors";
export { RNG, rollDie, rollDice, shuffle, randomSeed } from "./runtime/rng";
export type { IRNG } from "./runtime/rng";

// Combat building blocks
export { tickCooldowns, resetTurnFlags, buildTurnOrder } from "./runtime/combat/scheduler";
export { chooseAction } from "./runtime/combat/policy";
export {
  resolveAction,
  resolveAttack,
  resolveAoeAttack,
  resolveSupportAttack,
  resolveHeal,
  resolveDefend,
  effectiveAttack,
  applyDamage,
  phaseMultiplier,
} from "./runtime/combat/resolver";
export { narrateBattle, narrateEvent, formatActionRecord, formatParty, formatStatus } from "./runtime/combat/narration";

// Types
export type * from "./runtime/types";
