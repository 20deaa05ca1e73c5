import { Cell, Grid, ReadonlyGrid } from '../types';
import { GRID_SIZE, cloneGrid } from './Grid';

/**
 * What a session hands to callers outside the command layer. Nothing reachable
 * through it can be assigned to.
 */
export interface ReadonlySessionState {
    readonly cells: ReadonlyArray<ReadonlyArray<Readonly<Cell>>>;
    readonly clues: ReadonlyGrid;
    readonly solution: ReadonlyGrid;
    readonly moves: number;
    readonly startTime: number;
    clone(): SessionState;
    getCell(row: number, col: number): Readonly<Cell>;
    isComplete(): boolean;
    elapsedSeconds(now: number): number;
}

/**
 * The mutable state of one game: the cells the player edits, the puzzle they came
 * from, its solution, the move counter and the moment the game started.
 *
 * Undo works by whole-state snapshots, so {@link SessionState.clone} must copy
 * everything that a command can change.
 */
export class SessionState implements ReadonlySessionState {
    constructor(
        public cells: Cell[][],
        public readonly clues: Grid,
        public readonly solution: Grid,
        public moves: number,
        public startTime: number
    ) { }

    /**
     * Creates the starting state of a game. Every nonzero clue becomes a fixed cell.
     *
     * @param clues - The puzzle grid.
     * @param solution - Its unique completion.
     * @param startTime - Clock reading (ms) that elapsed time is measured from.
     */
    public static fromPuzzle(clues: ReadonlyGrid, solution: ReadonlyGrid, startTime: number): SessionState {
        const cells = clues.map(row => row.map((value): Cell => ({ value, fixed: value !== 0, pencil: 0 })));
        return new SessionState(cells, cloneGrid(clues), cloneGrid(solution), 0, startTime);
    }

    /**
     * Creates a deep copy with no references back to this state.
     */
    public clone(): SessionState {
        return new SessionState(
            this.cells.map(row => row.map(cell => ({ ...cell }))),
            cloneGrid(this.clues),
            cloneGrid(this.solution),
            this.moves,
            this.startTime
        );
    }

    public getCell(row: number, col: number): Cell {
        return this.cells[row][col];
    }

    /**
     * True when every cell is filled and matches the solution.
     */
    public isComplete(): boolean {
        for (let r = 0; r < GRID_SIZE; r++) {
            for (let c = 0; c < GRID_SIZE; c++) {
                const value = this.cells[r][c].value;
                if (value === 0 || value !== this.solution[r][c]) return false;
            }
        }
        return true;
    }

    /**
     * Whole seconds since the game started, never negative.
     *
     * @param now - Current clock reading in milliseconds.
     */
    public elapsedSeconds(now: number): number {
        return Math.max(0, Math.floor((now - this.startTime) / 1000));
    }
}
