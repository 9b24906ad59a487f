import type {
  ActionRecord,
  BattleEvent,
  BattleOptions,
  BattleResult,
  BattleState,
  BattleStatus,
  Combatant,
  Outcome,
  Party,
  PartySnapshot,
  SideId,
} from "./types";
import { RNG, randomSeed } from "./rng";
import { combatantsOf, isAlive, opponentOf, partyDefeated } from "./selectors";
import { buildTurnOrder, resetTurnFlags, tickCooldowns } from "./combat/scheduler";
import { chooseAction } from "./combat/policy";
import { phaseMultiplier, resolveAction } from "./combat/resolver";

export const DEFAULT_BATTLE_CONFIG = {
  turnLimit: 50,
} as const;

const SIDES: readonly SideId[] = ["A", "B"];

function snapshotParties(state: Pick<BattleState, "parties">): PartySnapshot[] {
  return SIDES.map((side) => {
    const party = state.parties[side];
    return {
      side,
      name: party.name,
      members: party.members.map((m) => ({
        name: m.name,
        role: m.role,
        hp: m.stats.hp,
        maxHp: m.stats.maxHp,
        atk: m.stats.atk,
        vit: m.stats.vit,
        spd: m.stats.spd,
      })),
    };
  });
}

function finish(state: BattleState, status: Exclude<BattleStatus, { state: "inProgress" }>): BattleStatus {
  state.status = status;
  state.events.push({ type: "battleEnd", turn: state.turn, outcome: outcomeOf(status) });
  return status;
}

function winFor(state: BattleState, side: SideId): BattleStatus {
  return finish(state, { state: "won", winner: side, partyName: state.parties[side].name });
}

/**
 * Maps a terminal status to the public outcome (in-progress reads as draw)
 */
export function outcomeOf(status: BattleStatus): Outcome {
  if (status.state === "won") {
    return { kind: "winner", name: status.partyName, side: status.winner };
  }
  return { kind: "draw" };
}

/**
 * Checks the actor's opponents first: an action that empties both parties
 * awards the win to the acting side.
 */
function checkElimination(state: BattleState, actorSide: SideId): BattleStatus | null {
  const opponent = opponentOf(actorSide);
  if (partyDefeated(state.parties[opponent])) {
    return winFor(state, actorSide);
  }
  if (partyDefeated(state.parties[actorSide])) {
    return winFor(state, opponent);
  }
  return null;
}

/**
 * Sets up a battle between two parties. Parties are mutated in place while it runs.
 * Already-decided matchups (empty or fully defeated parties, no rounds allowed)
 * end immediately.
 */
export function startBattle(partyA: Party, partyB: Party, options: BattleOptions = {}): BattleState {
  const rng = options.rng ?? new RNG(options.seed ?? randomSeed());
  const turnLimit = options.turnLimit ?? DEFAULT_BATTLE_CONFIG.turnLimit;

  const state: BattleState = {
    parties: { A: partyA, B: partyB },
    rng,
    turn: 1,
    turnLimit,
    status: { state: "inProgress", turn: 1 },
    events: [],
  };
  state.events.push({ type: "battleStart", parties: snapshotParties(state) });

  const aDown = partyDefeated(partyA);
  const bDown = partyDefeated(partyB);
  if (aDown && bDown) {
    finish(state, { state: "draw" });
  } else if (aDown) {
    winFor(state, "B");
  } else if (bDown) {
    winFor(state, "A");
  } else if (!(turnLimit >= 1)) {
    // NaN included
    finish(state, { state: "draw" });
  }

  return state;
}

/**
 * Plays one full round: cooldown tick, flag reset, turn order, then each
 * living actor selects and resolves an action. Ends the battle as soon as a
 * party is eliminated, or with a draw once the turn limit is passed.
 */
export function playRound(state: BattleState): BattleStatus {
  if (state.status.state !== "inProgress") {
    return state.status;
  }

  const { parties, rng, turn } = state;
  tickCooldowns(parties);
  resetTurnFlags(parties);
  const order = buildTurnOrder(state, rng);

  state.events.push({
    type: "roundStart",
    turn,
    multiplier: phaseMultiplier(turn),
    order: order.map((c) => c.character.name),
  });

  for (const actor of order) {
    // Order is fixed for the round; actors killed earlier just lose their turn
    if (!isAlive(actor.character)) continue;

    const allies: Combatant[] = combatantsOf(state, actor.side);
    const enemies: Combatant[] = combatantsOf(state, opponentOf(actor.side));

    const choice = chooseAction(actor, allies, enemies);
    const record = resolveAction(choice, actor, enemies, turn, rng);
    if (record) {
      state.events.push({ type: "action", record });
    }

    const ended = checkElimination(state, actor.side);
    if (ended) {
      return ended;
    }
  }

  state.events.push({ type: "roundEnd", turn, parties: snapshotParties(state) });

  if (turn >= state.turnLimit) {
    return finish(state, { state: "draw" });
  }

  state.turn = turn + 1;
  state.status = { state: "inProgress", turn: state.turn };
  return state.status;
}

/**
 * Action records in the order they resolved
 */
export function actionRecords(events: BattleEvent[]): ActionRecord[] {
  const records: ActionRecord[] = [];
  for (const event of events) {
    if (event.type === "action") {
      records.push(event.record);
    }
  }
  return records;
}

/**
 * Runs a battle to completion: a winner once a party is eliminated,
 * a draw when the turn limit is exhausted.
 */
export function runBattle(partyA: Party, partyB: Party, options: BattleOptions = {}): BattleResult {
  const state = startBattle(partyA, partyB, options);

  let status = state.status;
  while (status.state === "inProgress") {
    status = playRound(state);
  }

  const roundsPlayed = state.events.filter((e) => e.type === "roundStart").length;

  return {
    outcome: outcomeOf(status),
    rounds: roundsPlayed,
    seed: state.rng.getSeed(),
    events: state.events,
    records: actionRecords(state.events),
  };
}
