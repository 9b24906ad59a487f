import type { ActionChoice, Combatant, Role } from "../types";
import { isAlive } from "../selectors";

/** Attacker switches to AOE against at least this many living enemies */
const AOE_MIN_TARGETS = 3;
/** ...when one of them is at or below this hp */
const AOE_LOW_HP = 50;
/** Healer heals an ally strictly below this hp ratio */
const HEAL_THRESHOLD = 0.7;

type RolePolicy = (actor: Combatant, allies: Combatant[], enemies: Combatant[]) => ActionChoice;

const DEFEND: ActionChoice = { kind: "DEFEND" };

/**
 * Living combatant with the lowest absolute hp; first found wins ties
 */
export function pickLowestHp(candidates: Combatant[]): Combatant | null {
  let best: Combatant | null = null;
  for (const c of candidates) {
    if (!isAlive(c.character)) continue;
    if (!best || c.character.stats.hp < best.character.stats.hp) {
      best = c;
    }
  }
  return best;
}

/**
 * Living combatant with the lowest hp/maxHp ratio; first found wins ties
 */
export function pickMostDamaged(candidates: Combatant[]): Combatant | null {
  let best: Combatant | null = null;
  let bestRatio = Infinity;
  for (const c of candidates) {
    if (!isAlive(c.character)) continue;
    const ratio = hpRatio(c);
    if (!best || ratio < bestRatio) {
      best = c;
      bestRatio = ratio;
    }
  }
  return best;
}

function hpRatio(c: Combatant): number {
  return c.character.stats.hp / c.character.stats.maxHp;
}

const attackerPolicy: RolePolicy = (actor, _allies, enemies) => {
  const lowHpExists = enemies.some((e) => e.character.stats.hp <= AOE_LOW_HP);
  if (enemies.length >= AOE_MIN_TARGETS && actor.character.cooldowns.aoeAttack === 0 && lowHpExists) {
    return { kind: "AOE_ATTACK" };
  }

  const target = pickLowestHp(enemies);
  return target ? { kind: "ATTACK", target } : DEFEND;
};

const healerPolicy: RolePolicy = (_actor, allies) => {
  const target = pickMostDamaged(allies);
  if (target && hpRatio(target) < HEAL_THRESHOLD) {
    return { kind: "HEAL", target };
  }
  return DEFEND;
};

const supporterPolicy: RolePolicy = (_actor, _allies, enemies) => {
  // Enemy attackers first, otherwise the weakest enemy
  const target = enemies.find((e) => e.character.role === "ATTACKER") ?? pickLowestHp(enemies);
  if (!target) {
    return DEFEND;
  }
  return { kind: "SUPPORT_ATTACK", target };
};

const tankPolicy: RolePolicy = () => DEFEND;

/**
 * Registry of action policies by role
 */
const rolePolicies: Record<Role, RolePolicy> = {
  ATTACKER: attackerPolicy,
  HEALER: healerPolicy,
  SUPPORTER: supporterPolicy,
  TANK: tankPolicy,
};

/**
 * Picks the action for an actor from the current members of both parties.
 * Only living allies/enemies are considered; callers pass live state, never a
 * snapshot taken at round start.
 */
export function chooseAction(actor: Combatant, allies: Combatant[], enemies: Combatant[]): ActionChoice {
  const livingAllies = allies.filter((c) => isAlive(c.character));
  const livingEnemies = enemies.filter((c) => isAlive(c.character));

  if (livingEnemies.length === 0) {
    return DEFEND;
  }

  const policy = rolePolicies[actor.character.role];
  if (policy) {
    return policy(actor, livingAllies, livingEnemies);
  }
  return DEFEND;
}
