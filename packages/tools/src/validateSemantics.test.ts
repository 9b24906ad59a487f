import { describe, it, expect } from 'vitest';
import { validateRosterSemantics } from './validateSemantics.js';
import type { RosterFile } from './types.js';

function makeRoster(overrides?: Partial<RosterFile>): RosterFile {
  return {
    id: 'test',
    parties: [
      { name: 'Red', members: [{ name: 'Red_Att', role: 'ATTACKER' }] },
      { name: 'Blue', members: [{ name: 'Blue_Tank', role: 'TANK' }] },
    ],
    ...overrides,
  };
}

describe('validateRosterSemantics', () => {
  it('finds nothing wrong with a well-formed roster', () => {
    expect(validateRosterSemantics(makeRoster())).toEqual([]);
  });

  it('flags duplicate member names within a party', () => {
    const roster = makeRoster();
    roster.parties[0].members.push({ name: 'Red_Att', role: 'HEALER' });

    expect(validateRosterSemantics(roster)).toEqual([
      {
        type: 'error',
        message: 'Duplicate member name "Red_Att" in party "Red"',
        path: 'parties[0].members[1].name',
      },
    ]);
  });

  it('allows the same member name in different parties', () => {
    const roster = makeRoster();
    roster.parties[1].members.push({ name: 'Red_Att', role: 'SUPPORTER' });

    expect(validateRosterSemantics(roster)).toEqual([]);
  });

  it('flags parties sharing a name', () => {
    const roster = makeRoster();
    roster.parties[1].name = 'Red';

    const issues = validateRosterSemantics(roster);
    expect(issues).toEqual([{ type: 'error', message: 'Duplicate party name: "Red"', path: 'parties[1].name' }]);
  });

  it('warns about empty parties, bad hp and a turn limit below 1', () => {
    const roster = makeRoster({
      turnLimit: 0,
      parties: [
        { name: 'Red', members: [] },
        {
          name: 'Blue',
          members: [
            { name: 'Over', role: 'TANK', stats: { maxHp: 50, hp: 80 } },
            { name: 'Hollow', role: 'HEALER', stats: { maxHp: 0 } },
          ],
        },
      ],
    });

    const issues = validateRosterSemantics(roster);

    expect(issues.every((i) => i.type === 'warning')).toBe(true);
    expect(issues.map((i) => i.path)).toEqual([
      'turnLimit',
      'parties[0].members',
      'parties[1].members[0].stats.hp',
      'parties[1].members[1].stats.maxHp',
    ]);
  });

  it('compares hp against the default maxHp when maxHp is omitted', () => {
    const roster = makeRoster();
    roster.parties[0].members[0].stats = { hp: 150 };

    expect(validateRosterSemantics(roster)).toEqual([
      {
        type: 'warning',
        message: '"Red_Att" starts with hp 150 above maxHp 100; it is clamped on the first hit',
        path: 'parties[0].members[0].stats.hp',
      },
    ]);
  });
});
