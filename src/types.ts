/**
 * A single cell value. 0 means the cell is empty; 1-9 are the placed numerals.
 */
export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * A 9x9 Sudoku grid in row-major order: `grid[row][col]`.
 */
export type Grid = Digit[][];

/**
 * A grid that callers may inspect but not modify.
 */
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<Digit>>;

/**
 * A cell of a game in progress.
 */
export interface Cell {
    /** The value currently shown in the cell (0 = empty). */
    value: Digit;
    /** True for the clues the puzzle started with. These never change. */
    fixed: boolean;
    /** A digit suggested by a hint and not yet committed to `value` (0 = none). */
    pencil: Digit;
}

/**
 * Player-facing settings the engine honours. The rest of what a player can
 * configure (theme, ASCII-only glyphs, animations) belongs to the presentation layer.
 */
export interface GameSettings {
    /** When false, hints are refused without touching the grid. */
    showHints: boolean;
}

/**
 * Outcome of asking for a hint.
 */
export enum HintStatus {
    /** A cell received a pencil value. */
    HINTED,
    /** Every non-clue cell already holds a value. */
    NONE,
    /** Hints are turned off in the settings. */
    DISABLED,
}

export type HintResult =
    | { status: HintStatus.HINTED; row: number; col: number; digit: Digit }
    | { status: HintStatus.NONE }
    | { status: HintStatus.DISABLED };

/**
 * Read-only snapshot of a session, for rendering.
 */
export interface SessionView {
    cells: ReadonlyArray<ReadonlyArray<Readonly<Cell>>>;
    moves: number;
    elapsedSeconds: number;
    solved: boolean;
    statusMessage: string;
}
