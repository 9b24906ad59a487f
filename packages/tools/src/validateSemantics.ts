import { DEFAULT_STATS } from '@skirmish/engine';
import type { RosterFile } from './types.js';

export type ValidationIssue = {
  type: 'error' | 'warning';
  message: string;
  path?: string;
};

/**
 * Performs semantic validation on a schema-valid roster
 */
export function validateRosterSemantics(roster: RosterFile): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (roster.turnLimit !== undefined && roster.turnLimit < 1) {
    issues.push({
      type: 'warning',
      message: `turnLimit ${roster.turnLimit} ends the battle as a draw before any round`,
      path: 'turnLimit',
    });
  }

  // Party names identify the winner, so they must differ
  const partyNames = new Set<string>();
  roster.parties.forEach((party, p) => {
    if (partyNames.has(party.name)) {
      issues.push({
        type: 'error',
        message: `Duplicate party name: "${party.name}"`,
        path: `parties[${p}].name`,
      });
    }
    partyNames.add(party.name);

    if (party.members.length === 0) {
      issues.push({
        type: 'warning',
        message: `Party "${party.name}" has no members and loses immediately`,
        path: `parties[${p}].members`,
      });
    }

    const memberNames = new Set<string>();
    party.members.forEach((member, m) => {
      const path = `parties[${p}].members[${m}]`;

      if (memberNames.has(member.name)) {
        issues.push({
          type: 'error',
          message: `Duplicate member name "${member.name}" in party "${party.name}"`,
          path: `${path}.name`,
        });
      }
      memberNames.add(member.name);

      // Omitted maxHp falls back to the engine default
      const maxHp = member.stats?.maxHp ?? DEFAULT_STATS.maxHp;
      const hp = member.stats?.hp;
      if (maxHp <= 0) {
        issues.push({
          type: 'warning',
          message: `"${member.name}" has maxHp ${maxHp} and can never be alive after taking a hit`,
          path: `${path}.stats.maxHp`,
        });
      }
      if (hp !== undefined && hp > maxHp) {
        issues.push({
          type: 'warning',
          message: `"${member.name}" starts with hp ${hp} above maxHp ${maxHp}; it is clamped on the first hit`,
          path: `${path}.stats.hp`,
        });
      }
    });
  });

  return issues;
}
