import { resolve } from 'path';
import { narrateBattle, runBattle } from '@skirmish/engine';
import { sampleRosterPath } from './paths.js';
import { buildParties, loadRosterFile } from './roster.js';
import { parseSeedArg } from './args.js';

/**
 * Runs a battle from a roster file and prints the play-by-play
 * Usage: npm run battle -- [rosterPath] [seed]
 */
function main() {
  try {
    const rosterPath = process.argv[2] ? resolve(process.argv[2]) : sampleRosterPath;
    const roster = loadRosterFile(rosterPath);
    const [partyA, partyB] = buildParties(roster);

    const seed = parseSeedArg(process.argv[3]) ?? roster.seed;
    const result = runBattle(partyA, partyB, { seed, turnLimit: roster.turnLimit });

    for (const line of narrateBattle(result.events)) {
      console.log(line);
    }
    console.log(`\n🎲 seed=${result.seed} rounds=${result.rounds} actions=${result.records.length}`);
    process.exit(0);
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Battle error:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Battle error:', error);
    }
    process.exit(1);
  }
}

main();
