import type { BattleState, Character, Combatant, Party, SideId } from "./types";

export function isAlive(character: Character): boolean {
  return character.stats.hp > 0;
}

/**
 * Clamps hp into [0, maxHp]
 */
export function clampHp(character: Character): void {
  const { stats } = character;
  stats.hp = Math.max(0, Math.min(stats.hp, stats.maxHp));
}

/**
 * A party is defeated when none of its members is alive (an empty party counts as defeated)
 */
export function partyDefeated(party: Party): boolean {
  return party.members.every((member) => !isAlive(member));
}

export function opponentOf(side: SideId): SideId {
  return side === "A" ? "B" : "A";
}

/**
 * All members of a side as combatants, dead ones included
 */
export function combatantsOf(state: Pick<BattleState, "parties">, side: SideId): Combatant[] {
  return state.parties[side].members.map((character, slot) => ({ side, slot, character }));
}

/**
 * Living members of a side, read from current state
 */
export function livingCombatants(state: Pick<BattleState, "parties">, side: SideId): Combatant[] {
  return combatantsOf(state, side).filter((c) => isAlive(c.character));
}
