import { describe, it, expect } from "vitest";
import { chooseAction, pickLowestHp, pickMostDamaged } from "./policy";
import { asCombatant, makeTestCharacter } from "../test-helpers/makeTestCharacter";
import type { Character, Combatant } from "../types";

function enemyLine(hps: number[]): Combatant[] {
  return hps.map((hp, slot) => asCombatant(makeTestCharacter({ name: `E${slot}`, role: "TANK", stats: { hp } }), "B", slot));
}

describe("chooseAction", () => {
  it("defends when no enemy is alive", () => {
    const actor = asCombatant(makeTestCharacter({ role: "ATTACKER" }));
    expect(chooseAction(actor, [actor], enemyLine([0, 0]))).toEqual({ kind: "DEFEND" });
  });

  describe("attacker", () => {
    it("uses AOE with three living enemies, cooldown ready and one enemy at 50 hp", () => {
      const actor = asCombatant(makeTestCharacter({ role: "ATTACKER" }));
      expect(chooseAction(actor, [actor], enemyLine([100, 50, 80]))).toEqual({ kind: "AOE_ATTACK" });
    });

    it("never uses AOE while the cooldown is running", () => {
      const actor = asCombatant(makeTestCharacter({ role: "ATTACKER", cooldowns: { aoeAttack: 1 } }));
      const enemies = enemyLine([100, 50, 80]);

      expect(chooseAction(actor, [actor], enemies)).toEqual({ kind: "ATTACK", target: enemies[1] });
    });

    it("attacks single target when fewer than three enemies are alive", () => {
      const actor = asCombatant(makeTestCharacter({ role: "ATTACKER" }));
      const enemies = enemyLine([40, 0, 30]);

      expect(chooseAction(actor, [actor], enemies)).toEqual({ kind: "ATTACK", target: enemies[2] });
    });

    it("attacks single target when no enemy is at or below 50 hp", () => {
      const actor = asCombatant(makeTestCharacter({ role: "ATTACKER" }));
      const enemies = enemyLine([90, 51, 70]);

      expect(chooseAction(actor, [actor], enemies)).toEqual({ kind: "ATTACK", target: enemies[1] });
    });

    it("breaks hp ties by first found", () => {
      const actor = asCombatant(makeTestCharacter({ role: "ATTACKER" }));
      const enemies = enemyLine([70, 60, 60]);

      const choice = chooseAction(actor, [actor], enemies);
      expect(choice).toEqual({ kind: "ATTACK", target: enemies[1] });
    });
  });

  describe("healer", () => {
    function healerWithAlly(allyHp: number) {
      const healer = asCombatant(makeTestCharacter({ name: "Medic", role: "HEALER" }), "A", 0);
      const ally = asCombatant(makeTestCharacter({ name: "Hero", stats: { hp: allyHp } }), "A", 1);
      return { healer, ally };
    }

    it("heals an ally at 69% hp", () => {
      const { healer, ally } = healerWithAlly(69);
      expect(chooseAction(healer, [healer, ally], enemyLine([100]))).toEqual({ kind: "HEAL", target: ally });
    });

    it("defends when the most damaged ally is at exactly 70%", () => {
      const { healer, ally } = healerWithAlly(70);
      expect(chooseAction(healer, [healer, ally], enemyLine([100]))).toEqual({ kind: "DEFEND" });
    });

    it("can heal itself", () => {
      const healer = asCombatant(makeTestCharacter({ role: "HEALER", stats: { hp: 20 } }), "A", 0);
      const ally = asCombatant(makeTestCharacter({ stats: { hp: 40 } }), "A", 1);

      expect(chooseAction(healer, [healer, ally], enemyLine([100]))).toEqual({ kind: "HEAL", target: healer });
    });

    it("ignores dead allies", () => {
      const healer = asCombatant(makeTestCharacter({ role: "HEALER" }), "A", 0);
      const dead = asCombatant(makeTestCharacter({ stats: { hp: 0 } }), "A", 1);

      expect(chooseAction(healer, [healer, dead], enemyLine([100]))).toEqual({ kind: "DEFEND" });
    });
  });

  describe("supporter", () => {
    it("targets an enemy attacker before weaker enemies", () => {
      const actor = asCombatant(makeTestCharacter({ role: "SUPPORTER" }));
      const weak = asCombatant(makeTestCharacter({ role: "HEALER", stats: { hp: 10 } }), "B", 0);
      const brute = asCombatant(makeTestCharacter({ role: "ATTACKER", stats: { hp: 100 } }), "B", 1);

      expect(chooseAction(actor, [actor], [weak, brute])).toEqual({ kind: "SUPPORT_ATTACK", target: brute });
    });

    it("skips dead enemy attackers and falls back to the lowest hp enemy", () => {
      const actor = asCombatant(makeTestCharacter({ role: "SUPPORTER" }));
      const deadBrute = asCombatant(makeTestCharacter({ role: "ATTACKER", stats: { hp: 0 } }), "B", 0);
      const enemies = [deadBrute, ...enemyLine([70, 45])];

      expect(chooseAction(actor, [actor], enemies)).toEqual({ kind: "SUPPORT_ATTACK", target: enemies[2] });
    });
  });

  it("tank always defends", () => {
    const actor = asCombatant(makeTestCharacter({ role: "TANK" }));
    expect(chooseAction(actor, [actor], enemyLine([5]))).toEqual({ kind: "DEFEND" });
  });

  it("falls back to defend for a role it does not know", () => {
    const rogue: Character = JSON.parse(
      '{"name":"Rogue","role":"BARD","stats":{"maxHp":100,"hp":100,"atk":5,"vit":5,"luk":5,"spd":5},' +
        '"effects":{"defending":false,"atkBuff":0,"atkDebuff":0},"cooldowns":{"aoeAttack":0}}'
    );
    const actor = asCombatant(rogue);

    expect(chooseAction(actor, [actor], enemyLine([100]))).toEqual({ kind: "DEFEND" });
  });
});

describe("target pickers", () => {
  it("return null when every candidate is dead", () => {
    const dead = enemyLine([0, 0]);
    expect(pickLowestHp(dead)).toBeNull();
    expect(pickMostDamaged(dead)).toBeNull();
  });

  it("compare ratios, not absolute hp, for the most damaged", () => {
    const big = asCombatant(makeTestCharacter({ stats: { maxHp: 200, hp: 100 } }), "A", 0);
    const small = asCombatant(makeTestCharacter({ stats: { maxHp: 100, hp: 60 } }), "A", 1);

    expect(pickMostDamaged([big, small])).toBe(big);
    expect(pickLowestHp([big, small])).toBe(small);
  });
});
