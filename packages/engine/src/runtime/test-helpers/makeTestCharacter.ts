import type { Character, Combatant, Party, Role, SideId, Stats } from "../types";

type CharacterOverrides = {
  name?: string;
  role?: Role;
  stats?: Partial<Stats>;
  effects?: Partial<Character["effects"]>;
  cooldowns?: Partial<Character["cooldowns"]>;
};

/**
 * Creates a test character with sensible defaults
 */
export function makeTestCharacter(overrides?: CharacterOverrides): Character {
  const defaultCharacter: Character = {
    name: "Test Fighter",
    role: "ATTACKER",
    stats: { maxHp: 100, hp: 100, atk: 5, vit: 5, luk: 5, spd: 5 },
    effects: { defending: false, atkBuff: 0, atkDebuff: 0 },
    cooldowns: { aoeAttack: 0 },
  };

  return {
    ...defaultCharacter,
    name: overrides?.name ?? defaultCharacter.name,
    role: overrides?.role ?? defaultCharacter.role,
    stats: { ...defaultCharacter.stats, ...(overrides?.stats || {}) },
    effects: { ...defaultCharacter.effects, ...(overrides?.effects || {}) },
    cooldowns: { ...defaultCharacter.cooldowns, ...(overrides?.cooldowns || {}) },
  };
}

export function makeTestParty(name: string, members: CharacterOverrides[]): Party {
  return { name, members: members.map((m) => makeTestCharacter(m)) };
}

/**
 * Wraps a character as a combatant on the given side
 */
export function asCombatant(character: Character, side: SideId = "A", slot: number = 0): Combatant {
  return { side, slot, character };
}

/**
 * The sample four-member party: Att / Heal / Sup / Tank
 */
export function makeSampleParty(name: string): Party {
  return makeTestParty(name, [
    { name: `${name}_Att`, role: "ATTACKER", stats: { atk: 6, vit: 4, spd: 6 } },
    { name: `${name}_Heal`, role: "HEALER", stats: { atk: 3, vit: 6, spd: 5 } },
    { name: `${name}_Sup`, role: "SUPPORTER", stats: { atk: 4, vit: 4, spd: 6 } },
    { name: `${name}_Tank`, role: "TANK", stats: { atk: 4, vit: 5, spd: 4 } },
  ]);
}
