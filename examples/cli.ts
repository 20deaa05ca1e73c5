import { Generator } from '../src/engine/Generator';
import { GameController } from '../src/engine/GameController';
import { CommandType } from '../src/engine/Command';
import { countClues, formatGrid } from '../src/engine/Grid';
import { DEFAULT_TARGET_CLUES } from '../src/defaults';

// Usage: ts-node examples/cli.ts [seed] [targetClues]
const seed = process.argv[2] !== undefined ? Number(process.argv[2]) : 1234;
const targetClues = process.argv[3] !== undefined ? Number(process.argv[3]) : DEFAULT_TARGET_CLUES;

const generator = new Generator(seed);
const session = generator.startSession({
    targetClues,
    onTrace: (msg: string) => console.log(`  ${msg}`),
});
const state = session.getState();

console.log(`## Generated Puzzle (Seed: ${seed})`);
console.log(`Clues: ${countClues(state.clues)} (target ${targetClues})\n`);
console.log(formatGrid(state.clues));
console.log('\n### The Answer Key (For Verification Only)\n');
console.log(formatGrid(state.solution));
console.log('\n---\n');

// Play the game out by taking a hint and committing it until the grid is full.
const controller = new GameController(session);
let steps = 0;
while (!session.isComplete()) {
    controller.dispatch({ type: CommandType.HINT });
    const { row, col } = controller.getCursor();
    controller.dispatch({ type: CommandType.COMMIT_PENCIL });
    steps++;
    console.log(`STEP ${steps}: ${session.getStatusMessage()} -> placed at (${row + 1},${col + 1})`);
}

const view = session.getView();
console.log(`\n**Solved:** ${view.solved} in ${view.moves} moves.`);
controller.dispatch({ type: CommandType.QUIT });
