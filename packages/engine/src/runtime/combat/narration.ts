import type { ActionRecord, BattleEvent, DamageHit, PartySnapshot } from "../types";

function defTag(defending: boolean): string {
  return defending ? " (DEF)" : "";
}

function formatMultiplier(multiplier: number): string {
  return Number.isInteger(multiplier) ? multiplier.toFixed(1) : String(multiplier);
}

function formatAoeHit(hit: DamageHit): string {
  return `${hit.target}${defTag(hit.defending)} -${hit.damage} (HP ${hit.hpAfter})`;
}

function describeAction(record: ActionRecord): string {
  switch (record.kind) {
    case "ATTACK": {
      const { hit } = record;
      return (
        `${record.actor} attacks ${hit.target}${defTag(hit.defending)}: dice=${record.dice}, ` +
        `mult=${formatMultiplier(record.multiplier)} raw=${hit.raw} -> dmg=${hit.damage} | ${hit.target} HP=${hit.hpAfter}`
      );
    }
    case "AOE_ATTACK":
      return (
        `${record.actor} uses WHIRLWIND (AOE)! dice=${record.dice}, mult=${formatMultiplier(record.multiplier)} ` +
        `raw=${record.raw} | ${record.hits.map(formatAoeHit).join(", ")} | CT=${record.aoeCooldown}`
      );
    case "SUPPORT_ATTACK": {
      const { hit } = record;
      return (
        `${record.actor} support-attacks ${hit.target}${defTag(hit.defending)}: dice=${record.dice}, ` +
        `mult=${formatMultiplier(record.multiplier)} raw=${hit.raw} -> dmg=${hit.damage} | ` +
        `${hit.target} HP=${hit.hpAfter} | ${hit.target} ATK debuff ${record.debuff}`
      );
    }
    case "HEAL":
      return (
        `${record.actor} heals ${record.target}: dice=${record.dice}, heal=${record.amount} -> ` +
        `+${record.healed} | ${record.target} HP=${record.hpAfter}`
      );
    case "DEFEND":
      return `${record.actor} defends (incoming dmg x0.6)`;
  }
}

/**
 * One log line for a resolved action
 */
export function formatActionRecord(record: ActionRecord): string {
  let line = describeAction(record);
  if (record.actorRole === "ATTACKER") {
    line += ` | ${record.actor} AOE_CT=${record.aoeCooldown}`;
  }
  return line;
}

/**
 * Roster listing shown before the first round
 */
export function formatParty(party: PartySnapshot): string[] {
  const lines = [`[${party.name}]`];
  for (const m of party.members) {
    lines.push(
      `  - ${m.name.padEnd(10)} ${m.role.padEnd(9)} HP=${m.hp}/${m.maxHp} ATK=${m.atk} VIT=${m.vit} SPD=${m.spd}`
    );
  }
  return lines;
}

/**
 * Compact hp line per party, printed after each full round
 */
export function formatStatus(party: PartySnapshot): string {
  const parts = party.members.map((m) => `${m.name}:${m.hp}`);
  return `${party.name} | ${parts.join(" ")}`;
}

/**
 * Text lines for one battle event
 */
export function narrateEvent(event: BattleEvent): string[] {
  switch (event.type) {
    case "battleStart":
      return [
        `=== Battle Start: ${event.parties.map((p) => p.name).join(" vs ")} ===`,
        ...event.parties.flatMap(formatParty),
        "",
      ];
    case "roundStart":
      return ["", `--- Turn ${event.turn} ---`];
    case "action":
      return [formatActionRecord(event.record)];
    case "roundEnd":
      return event.parties.map(formatStatus);
    case "battleEnd":
      return event.outcome.kind === "winner"
        ? ["", `=== Winner: ${event.outcome.name} ===`]
        : ["", "=== Draw (turn limit reached) ==="];
  }
}

/**
 * Full battle log as text lines
 */
export function narrateBattle(events: BattleEvent[]): string[] {
  return events.flatMap(narrateEvent);
}
