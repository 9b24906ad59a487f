import type { Character, Party, Role, Stats } from "./types";

/**
 * Stat defaults for characters built without a full stat block
 */
export const DEFAULT_STATS: Readonly<Omit<Stats, "hp">> = {
  maxHp: 100,
  atk: 5,
  vit: 5,
  luk: 5,
  spd: 5,
};

/**
 * Creates a character with fresh effects and cooldowns.
 * Missing stats fall back to DEFAULT_STATS; hp defaults to maxHp.
 */
export function createCharacter(name: string, role: Role, stats?: Partial<Stats>): Character {
  const maxHp = stats?.maxHp ?? DEFAULT_STATS.maxHp;
  return {
    name,
    role,
    stats: {
      ...DEFAULT_STATS,
      ...stats,
      maxHp,
      hp: stats?.hp ?? maxHp,
    },
    effects: { defending: false, atkBuff: 0, atkDebuff: 0 },
    cooldowns: { aoeAttack: 0 },
  };
}

export function createParty(name: string, members: Character[]): Party {
  return { name, members };
}
