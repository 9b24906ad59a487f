// Runtime Types for the Skirmish Engine

import type { IRNG } from "./rng";

/* ---------------------------------- */
/* Roles / Actions                     */
/* ---------------------------------- */

export type Role = "ATTACKER" | "HEALER" | "SUPPORTER" | "TANK";

export type ActionKind = "ATTACK" | "HEAL" | "DEFEND" | "SUPPORT_ATTACK" | "AOE_ATTACK";

/**
 * Which of the two parties a combatant belongs to
 */
export type SideId = "A" | "B";

/* ---------------------------------- */
/* Character / Party                   */
/* ---------------------------------- */

export type Stats = {
  maxHp: number;
  hp: number;
  atk: number;
  vit: number;
  luk: number; // carried, unused by the rules
  spd: number;
};

export type Effects = {
  defending: boolean;
  atkBuff: number; // reserved, cleared every round
  atkDebuff: number; // consumed by the next effective attack computation
};

export type Cooldowns = {
  aoeAttack: number; // rounds remaining
};

export type Character = {
  name: string;
  role: Role;
  stats: Stats;
  effects: Effects;
  cooldowns: Cooldowns;
};

export type Party = {
  name: string;
  members: Character[];
};

/**
 * A character together with its owning side and slot in that party
 */
export type Combatant = {
  side: SideId;
  slot: number;
  character: Character;
};

/* ---------------------------------- */
/* Action choices                      */
/* ---------------------------------- */

export type ActionChoice =
  | { kind: "ATTACK"; target: Combatant }
  | { kind: "AOE_ATTACK" }
  | { kind: "SUPPORT_ATTACK"; target: Combatant }
  | { kind: "HEAL"; target: Combatant }
  | { kind: "DEFEND" };

/* ---------------------------------- */
/* Resolution records                  */
/* ---------------------------------- */

export type DamageHit = {
  target: string;
  targetSide: SideId;
  defending: boolean;
  raw: number;
  damage: number;
  hpAfter: number;
};

type RecordBase = {
  turn: number;
  actor: string;
  actorSide: SideId;
  actorRole: Role;
  /** Actor's AOE cooldown after the action resolved */
  aoeCooldown: number;
};

export type AttackRecord = RecordBase & {
  kind: "ATTACK";
  dice: number;
  attackValue: number;
  multiplier: number;
  hit: DamageHit;
};

export type AoeAttackRecord = RecordBase & {
  kind: "AOE_ATTACK";
  dice: number;
  attackValue: number;
  multiplier: number;
  raw: number;
  hits: DamageHit[];
};

export type SupportAttackRecord = RecordBase & {
  kind: "SUPPORT_ATTACK";
  dice: number;
  attackValue: number;
  multiplier: number;
  hit: DamageHit;
  debuff: number;
};

export type HealRecord = RecordBase & {
  kind: "HEAL";
  target: string;
  targetSide: SideId;
  dice: number;
  amount: number;
  healed: number;
  hpAfter: number;
};

export type DefendRecord = RecordBase & {
  kind: "DEFEND";
};

export type ActionRecord = AttackRecord | AoeAttackRecord | SupportAttackRecord | HealRecord | DefendRecord;

/* ---------------------------------- */
/* Battle state                        */
/* ---------------------------------- */

export type Outcome = { kind: "winner"; name: string; side: SideId } | { kind: "draw" };

export type BattleStatus =
  | { state: "inProgress"; turn: number }
  | { state: "won"; winner: SideId; partyName: string }
  | { state: "draw" };

export type MemberSnapshot = {
  name: string;
  role: Role;
  hp: number;
  maxHp: number;
  atk: number;
  vit: number;
  spd: number;
};

export type PartySnapshot = {
  side: SideId;
  name: string;
  members: MemberSnapshot[];
};

export type BattleEvent =
  | { type: "battleStart"; parties: PartySnapshot[] }
  | { type: "roundStart"; turn: number; multiplier: number; order: string[] }
  | { type: "action"; record: ActionRecord }
  | { type: "roundEnd"; turn: number; parties: PartySnapshot[] }
  | { type: "battleEnd"; turn: number; outcome: Outcome };

export type BattleOptions = {
  seed?: number;
  turnLimit?: number;
  /** Overrides `seed` when given */
  rng?: IRNG;
};

export type BattleState = {
  parties: Record<SideId, Party>;
  rng: IRNG;
  turn: number;
  turnLimit: number;
  status: BattleStatus;
  events: BattleEvent[];
};

export type BattleResult = {
  outcome: Outcome;
  rounds: number;
  seed: number;
  events: BattleEvent[];
  records: ActionRecord[];
};
