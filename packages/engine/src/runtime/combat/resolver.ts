import type {
  ActionChoice,
  ActionRecord,
  AoeAttackRecord,
  AttackRecord,
  Character,
  Combatant,
  DamageHit,
  DefendRecord,
  HealRecord,
  SupportAttackRecord,
} from "../types";
import { rollDice, type IRNG } from "../rng";
import { clampHp, isAlive } from "../selectors";

const DEFEND_DAMAGE_FACTOR = 0.6;
const AOE_DAMAGE_FACTOR = 0.8;
const AOE_COOLDOWN = 3;
const SUPPORT_DEBUFF = -2;

/**
 * Damage scaling by round: late rounds hit harder so battles converge
 */
export function phaseMultiplier(turn: number): number {
  if (turn >= 15) return 1.4;
  if (turn >= 10) return 1.2;
  return 1.0;
}

/**
 * atk + buff + debuff, floored at 1.
 * Reading it consumes a pending debuff.
 */
export function effectiveAttack(character: Character): number {
  const { stats, effects } = character;
  const value = stats.atk + effects.atkBuff + effects.atkDebuff;

  if (effects.atkDebuff !== 0) {
    effects.atkDebuff = 0;
  }

  return Math.max(1, value);
}

/**
 * Applies raw damage (reduced when defending) and returns the damage dealt
 */
export function applyDamage(target: Character, raw: number): number {
  const damage = target.effects.defending ? Math.floor(raw * DEFEND_DAMAGE_FACTOR) : raw;
  target.stats.hp -= damage;
  clampHp(target);
  return damage;
}

function recordBase(actor: Combatant, turn: number) {
  return {
    turn,
    actor: actor.character.name,
    actorSide: actor.side,
    actorRole: actor.character.role,
    aoeCooldown: actor.character.cooldowns.aoeAttack,
  };
}

function hitOn(target: Combatant, raw: number): DamageHit {
  const damage = applyDamage(target.character, raw);
  return {
    target: target.character.name,
    targetSide: target.side,
    defending: target.character.effects.defending,
    raw,
    damage,
    hpAfter: target.character.stats.hp,
  };
}

/**
 * Single-target attack: 2d6 x effective atk x phase multiplier
 */
export function resolveAttack(attacker: Combatant, target: Combatant, turn: number, rng: IRNG): AttackRecord | null {
  if (!isAlive(attacker.character) || !isAlive(target.character)) {
    return null;
  }

  const dice = rollDice(rng, 2);
  const attackValue = effectiveAttack(attacker.character);
  const multiplier = phaseMultiplier(turn);
  const raw = Math.floor(dice * attackValue * multiplier);
  const hit = hitOn(target, raw);

  return { ...recordBase(attacker, turn), kind: "ATTACK", dice, attackValue, multiplier, hit };
}

/**
 * Hits every living enemy with the same raw damage (1d6, x0.8), then starts the cooldown
 */
export function resolveAoeAttack(
  attacker: Combatant,
  enemies: Combatant[],
  turn: number,
  rng: IRNG
): AoeAttackRecord | null {
  if (!isAlive(attacker.character)) {
    return null;
  }

  const targets = enemies.filter((e) => isAlive(e.character));
  if (targets.length === 0) {
    return null;
  }

  const dice = rollDice(rng, 1);
  const attackValue = effectiveAttack(attacker.character);
  const multiplier = phaseMultiplier(turn);
  const raw = Math.floor(dice * attackValue * multiplier * AOE_DAMAGE_FACTOR);
  const hits = targets.map((t) => hitOn(t, raw));

  attacker.character.cooldowns.aoeAttack = AOE_COOLDOWN;

  return { ...recordBase(attacker, turn), kind: "AOE_ATTACK", dice, attackValue, multiplier, raw, hits };
}

/**
 * 1d6 attack that leaves an atk debuff on the target
 */
export function resolveSupportAttack(
  supporter: Combatant,
  target: Combatant,
  turn: number,
  rng: IRNG
): SupportAttackRecord | null {
  if (!isAlive(supporter.character) || !isAlive(target.character)) {
    return null;
  }

  const dice = rollDice(rng, 1);
  const attackValue = effectiveAttack(supporter.character);
  const multiplier = phaseMultiplier(turn);
  const raw = Math.floor(dice * attackValue * multiplier);
  const hit = hitOn(target, raw);

  target.character.effects.atkDebuff = SUPPORT_DEBUFF;

  return {
    ...recordBase(supporter, turn),
    kind: "SUPPORT_ATTACK",
    dice,
    attackValue,
    multiplier,
    hit,
    debuff: SUPPORT_DEBUFF,
  };
}

export function resolveHeal(healer: Combatant, target: Combatant, turn: number, rng: IRNG): HealRecord | null {
  if (!isAlive(healer.character) || !isAlive(target.character)) {
    return null;
  }

  const dice = rollDice(rng, 1);
  const amount = dice * healer.character.stats.vit;

  const before = target.character.stats.hp;
  target.character.stats.hp += amount;
  clampHp(target.character);
  const hpAfter = target.character.stats.hp;

  return {
    ...recordBase(healer, turn),
    kind: "HEAL",
    target: target.character.name,
    targetSide: target.side,
    dice,
    amount,
    healed: hpAfter - before,
    hpAfter,
  };
}

export function resolveDefend(actor: Combatant, turn: number): DefendRecord | null {
  if (!isAlive(actor.character)) {
    return null;
  }
  actor.character.effects.defending = true;
  return { ...recordBase(actor, turn), kind: "DEFEND" };
}

/**
 * Resolves a chosen action against live state.
 * Returns null when nothing happened (dead actor or target).
 */
export function resolveAction(
  choice: ActionChoice,
  actor: Combatant,
  enemies: Combatant[],
  turn: number,
  rng: IRNG
): ActionRecord | null {
  switch (choice.kind) {
    case "ATTACK":
      return resolveAttack(actor, choice.target, turn, rng);
    case "AOE_ATTACK":
      return resolveAoeAttack(actor, enemies, turn, rng);
    case "SUPPORT_ATTACK":
      return resolveSupportAttack(actor, choice.target, turn, rng);
    case "HEAL":
      return resolveHeal(actor, choice.target, turn, rng);
    case "DEFEND":
      return resolveDefend(actor, turn);
  }
}
