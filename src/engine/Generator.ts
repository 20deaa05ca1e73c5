import { Grid } from '../types';
import { ConfigurationError, GenerationError } from '../errors';
import { DEFAULT_TARGET_CLUES } from '../defaults';
import { CELL_COUNT, GRID_SIZE, cloneGrid, createEmptyGrid } from './Grid';
import { RandomSource, mulberry32, randomSeed, shuffle } from './Random';
import { Solver } from './Solver';
import { GameSession, SessionOptions } from './GameSession';

/**
 * The result of the puzzle generation process.
 */
export interface Puzzle {
    /** The puzzle grid handed to the player. 0 marks a blank. */
    clues: Grid;
    /** The unique completion of `clues`. Never re-derived, so keep it with the puzzle. */
    solution: Grid;
    /** The clue count that was asked for. */
    targetClues: number;
    /**
     * How many cells were blanked. Equals `81 - targetClues` unless the removal pass
     * ran out of cells whose removal kept the solution unique.
     */
    removedCount: number;
}

/**
 * Configuration options for the puzzle generation process.
 */
export interface GeneratorOptions {
    /**
     * How many clues the puzzle should keep. This is a soft target: the generator makes
     * a single pass over the cells and may stop with more clues than requested.
     * Lower values make generation slower.
     * Default: 35.
     */
    targetClues?: number;
    /**
     * Callback for trace logs of generation progress.
     */
    onTrace?: (message: string) => void;
}

/**
 * Generates Sudoku puzzles that have exactly one solution.
 *
 * A random full grid is produced first, then cells are blanked one at a time in
 * random order, keeping each removal only if the puzzle still has a unique solution.
 */
export class Generator {
    private readonly random: RandomSource;
    private readonly solver: Solver;

    /**
     * Creates a new Generator instance.
     *
     * @param seed - A numeric seed for the random number generator to ensure reproducibility.
     *               A random seed is used when omitted.
     */
    constructor(public readonly seed: number = randomSeed()) {
        this.random = mulberry32(seed);
        this.solver = new Solver(this.random);
    }

    /**
     * Generates a puzzle together with its solution.
     *
     * @param options - Generation options.
     * @throws {ConfigurationError} If `targetClues` is not an integer between 0 and 81.
     * @throws {GenerationError} If the solver fails to fill an empty grid.
     */
    public generatePuzzle(options: GeneratorOptions = {}): Puzzle {
        const { targetClues = DEFAULT_TARGET_CLUES, onTrace } = options;

        if (!Number.isInteger(targetClues) || targetClues < 0 || targetClues > CELL_COUNT) {
            throw new ConfigurationError(`Target clue count must be an integer between 0 and ${CELL_COUNT}, got ${targetClues}.`);
        }

        if (onTrace) onTrace(`Generator: generation started (seed ${this.seed}, target ${targetClues} clues).`);

        const solution = createEmptyGrid();
        if (!this.solver.solve(solution, true)) {
            throw new GenerationError('Solver failed to complete an empty grid.');
        }
        if (onTrace) onTrace('Generator: solution created.');

        const clues = cloneGrid(solution);
        const coordinates: Array<[number, number]> = [];
        for (let r = 0; r < GRID_SIZE; r++) {
            for (let c = 0; c < GRID_SIZE; c++) {
                coordinates.push([r, c]);
            }
        }
        shuffle(coordinates, this.random);

        const toRemove = CELL_COUNT - targetClues;
        let removedCount = 0;
        let attempts = 0;

        for (const [r, c] of coordinates) {
            if (removedCount >= toRemove) break;
            attempts++;

            const scratch = cloneGrid(clues);
            scratch[r][c] = 0;
            if (this.solver.hasUniqueSolution(scratch)) {
                clues[r][c] = 0;
                removedCount++;
            }
        }

        const clueCount = CELL_COUNT - removedCount;
        if (onTrace) {
            onTrace(`Generator: removed ${removedCount} cells in ${attempts} attempts, ${clueCount} clues remain.`);
            if (removedCount < toRemove) {
                onTrace(`Generator: target of ${targetClues} clues not reached; accepting ${clueCount}.`);
            }
        }

        return { clues, solution, targetClues, removedCount };
    }

    /**
     * Asynchronously generates a puzzle (non-blocking wrapper).
     * The work itself is synchronous; it is deferred so the caller can keep drawing first.
     *
     * @param options - Generation options.
     */
    public async generatePuzzleAsync(options: GeneratorOptions = {}): Promise<Puzzle> {
        return new Promise((resolve, reject) => {
            setTimeout(() => {
                try {
                    resolve(this.generatePuzzle(options));
                } catch (e) {
                    reject(e);
                }
            }, 0);
        });
    }

    /**
     * Starts a game session on a freshly generated puzzle.
     * The session reuses this generator for hints and for later new games.
     *
     * @param options - Session options; `targetClues` and `onTrace` also apply to generation.
     */
    public startSession(options: SessionOptions = {}): GameSession {
        const puzzle = this.generatePuzzle({ targetClues: options.targetClues, onTrace: options.onTrace });
        return new GameSession(this, puzzle, { random: this.random, ...options });
    }
}
