import { Digit, Grid, ReadonlyGrid } from '../types';
import { DIGITS, GRID_SIZE, cloneGrid } from './Grid';
import { RandomSource, shuffle } from './Random';
import { isLegal } from './Validator';

/**
 * Produces the order in which candidate digits are tried at a cell.
 */
export type CandidateOrder = () => readonly Digit[];

/**
 * Called whenever the search fills the last empty cell.
 * Returning true stops the search with the grid left filled; returning false
 * backtracks to look for further completions.
 */
type CompletionVisitor = () => boolean;

/**
 * Depth-first backtracking solver for 9x9 grids.
 *
 * Cells are visited in row-major order. Both solving and solution counting run
 * through the same search routine; they differ only in the candidate order and
 * in what happens when a completion is reached.
 */
export class Solver {
    private readonly ascending: CandidateOrder = () => DIGITS;
    private readonly shuffled: CandidateOrder;

    /**
     * @param random - Source used to shuffle candidates in randomized mode.
     */
    constructor(random: RandomSource = Math.random) {
        this.shuffled = () => shuffle([...DIGITS], random);
    }

    /**
     * Fills the grid in place with a completion consistent with the clues already present.
     *
     * In deterministic mode candidates are tried in ascending order, so the result is
     * the lexicographically first completion. In randomized mode every empty cell tries
     * a fresh permutation of 1-9, so repeated calls on an empty grid yield different grids.
     *
     * @param grid - The grid to complete. On failure it may be left partially filled.
     * @param randomized - Whether to shuffle candidate digits.
     * @returns true if a completion was found.
     */
    public solve(grid: Grid, randomized: boolean = false): boolean {
        return this.search(grid, randomized ? this.shuffled : this.ascending, () => true);
    }

    /**
     * Counts the completions of a grid, stopping once `limit` have been found.
     * The grid passed in is not modified.
     *
     * @param grid - The grid to examine.
     * @param limit - Stop counting at this many solutions. Default: Infinity.
     */
    public countSolutions(grid: ReadonlyGrid, limit: number = Infinity): number {
        const scratch = cloneGrid(grid);
        let count = 0;
        this.search(scratch, this.ascending, () => {
            count++;
            return count >= limit;
        });
        return count;
    }

    /**
     * Tells whether the grid has exactly one completion.
     * The search gives up as soon as a second solution turns up.
     */
    public hasUniqueSolution(grid: ReadonlyGrid): boolean {
        return this.countSolutions(grid, 2) === 1;
    }

    private search(grid: Grid, order: CandidateOrder, onComplete: CompletionVisitor): boolean {
        const index = this.findEmptyCell(grid);
        if (index === -1) return onComplete();

        const row = Math.floor(index / GRID_SIZE);
        const col = index % GRID_SIZE;
        for (const digit of order()) {
            if (!isLegal(grid, row, col, digit)) continue;
            grid[row][col] = digit;
            if (this.search(grid, order, onComplete)) return true;
            grid[row][col] = 0;
        }
        return false;
    }

    private findEmptyCell(grid: ReadonlyGrid): number {
        for (let r = 0; r < GRID_SIZE; r++) {
            for (let c = 0; c < GRID_SIZE; c++) {
                if (grid[r][c] === 0) return r * GRID_SIZE + c;
            }
        }
        return -1;
    }
}
