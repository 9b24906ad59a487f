import { readFileSync } from 'fs';
import { createCharacter, createParty, type Party } from '@skirmish/engine';
import { validateRosterSchema } from './validateSchema.js';
import { validateRosterSemantics } from './validateSemantics.js';
import type { RosterFile } from './types.js';

/**
 * Reads a roster file and checks it against the schema and semantic rules.
 * Throws with every problem found; warnings do not block loading.
 */
export function loadRosterFile(path: string): RosterFile {
  const content = readFileSync(path, 'utf-8');
  return parseRoster(JSON.parse(content), path);
}

export function parseRoster(data: unknown, source: string = 'roster'): RosterFile {
  const schemaResult = validateRosterSchema(data);
  if (!schemaResult.valid) {
    throw new Error(`Invalid ${source}:\n  ${schemaResult.errors.join('\n  ')}`);
  }

  const errors = validateRosterSemantics(schemaResult.roster).filter((i) => i.type === 'error');
  if (errors.length > 0) {
    const lines = errors.map((e) => (e.path ? `${e.message} (${e.path})` : e.message));
    throw new Error(`Invalid ${source}:\n  ${lines.join('\n  ')}`);
  }

  return schemaResult.roster;
}

/**
 * Builds fresh engine parties from a roster (each call returns new characters)
 */
export function buildParties(roster: RosterFile): [Party, Party] {
  const [first, second] = roster.parties.map((party) =>
    createParty(
      party.name,
      party.members.map((member) => createCharacter(member.name, member.role, member.stats))
    )
  );
  if (!first || !second) {
    throw new Error(`Roster "${roster.id}" must define exactly two parties`);
  }
  return [first, second];
}
