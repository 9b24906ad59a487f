import type { BattleState, Combatant, Party } from "../types";
import { shuffle, type IRNG } from "../rng";
import { livingCombatants } from "../selectors";

function everyone(parties: BattleState["parties"]): Party["members"] {
  return [...parties.A.members, ...parties.B.members];
}

/**
 * Lowers every AOE cooldown by one round, floored at 0
 */
export function tickCooldowns(parties: BattleState["parties"]): void {
  for (const character of everyone(parties)) {
    character.cooldowns.aoeAttack = Math.max(0, character.cooldowns.aoeAttack - 1);
  }
}

/**
 * Clears per-round effects. atkDebuff survives until consumed by an attack
 */
export function resetTurnFlags(parties: BattleState["parties"]): void {
  for (const character of everyone(parties)) {
    character.effects.defending = false;
    character.effects.atkBuff = 0;
  }
}

/**
 * Builds the acting order for one round:
 * living combatants of A then B, shuffled, then stable-sorted by spd desc.
 * The shuffle decides speed ties.
 */
export function buildTurnOrder(state: Pick<BattleState, "parties">, rng: IRNG): Combatant[] {
  const order = shuffle(rng, [...livingCombatants(state, "A"), ...livingCombatants(state, "B")]);
  return order.sort((a, b) => b.character.stats.spd - a.character.stats.spd);
}
