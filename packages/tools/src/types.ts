import type { Role, Stats } from '@skirmish/engine';

export type RosterMember = {
  name: string;
  role: Role;
  stats?: Partial<Stats>;
};

export type RosterParty = {
  name: string;
  members: RosterMember[];
};

/**
 * A battle roster file: two parties plus optional battle settings
 */
export type RosterFile = {
  id: string;
  title?: string;
  seed?: number;
  turnLimit?: number;
  parties: RosterParty[];
};
