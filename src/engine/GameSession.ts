import { Cell, Digit, GameSettings, HintResult, HintStatus, SessionView } from '../types';
import { resolveSettings } from '../defaults';
import { CELL_COUNT, GRID_SIZE, isCoordinate, isDigit } from './Grid';
import { RandomSource, pick } from './Random';
import { ReadonlySessionState, SessionState } from './SessionState';
import { UndoHistory } from './UndoHistory';
import type { Generator, Puzzle } from './Generator';

/**
 * Options for a game session.
 */
export interface SessionOptions {
    /** Clue target for puzzles generated by this session. Default: the target of the starting puzzle. */
    targetClues?: number;
    /** Player settings; missing keys fall back to the defaults. */
    settings?: Partial<GameSettings>;
    /** Maximum undo depth. Default: 200. */
    historyCapacity?: number;
    /** Millisecond clock used for elapsed time. Default: Date.now. */
    clock?: () => number;
    /** Source used to choose hinted cells. Default: Math.random. */
    random?: RandomSource;
    /** Callback for trace logs, forwarded to the generator on new games. */
    onTrace?: (message: string) => void;
}

/**
 * A single-player game in progress: the live state, its undo history and the
 * commands the presentation layer drives it with.
 *
 * Commands never throw. Targeting a clue cell, an out-of-range cell, undoing with
 * an empty history and the like are no-ops that report `false`.
 */
export class GameSession {
    private state: SessionState;
    private readonly history: UndoHistory<SessionState>;
    private currentSettings: GameSettings;
    private statusMessage = '';
    private targetClues: number;
    private readonly clock: () => number;
    private readonly random: RandomSource;
    private readonly onTrace?: (message: string) => void;

    /**
     * @param generator - Used to produce the puzzle for each new game.
     * @param puzzle - The puzzle this session starts on.
     * @param options - Session options.
     */
    constructor(
        private readonly generator: Generator,
        puzzle: Puzzle,
        options: SessionOptions = {}
    ) {
        this.clock = options.clock ?? Date.now;
        this.random = options.random ?? Math.random;
        this.onTrace = options.onTrace;
        this.currentSettings = resolveSettings(options.settings);
        this.targetClues = options.targetClues ?? puzzle.targetClues;
        this.history = new UndoHistory<SessionState>(options.historyCapacity);
        this.state = SessionState.fromPuzzle(puzzle.clues, puzzle.solution, this.clock());
    }

    /**
     * Writes a digit into a cell, replacing any value and discarding its pencil mark.
     *
     * @param digit - 1 to 9.
     * @returns true if the cell changed.
     */
    public place(row: number, col: number, digit: number): boolean {
        if (!isDigit(digit) || digit === 0) return false;
        const value: Digit = digit;
        return this.edit(row, col, () => true, cell => {
            cell.value = value;
            cell.pencil = 0;
        });
    }

    /**
     * Empties a cell that holds a value.
     */
    public clear(row: number, col: number): boolean {
        return this.edit(row, col, cell => cell.value !== 0, cell => {
            cell.value = 0;
            cell.pencil = 0;
        });
    }

    /**
     * Promotes a cell's pencil mark to its value.
     */
    public commitPencil(row: number, col: number): boolean {
        return this.edit(row, col, cell => cell.pencil !== 0, cell => {
            cell.value = cell.pencil;
            cell.pencil = 0;
        });
    }

    /**
     * Pencils the solution digit into a random empty cell.
     *
     * Hints are informational: they are not moves and cannot be undone on their own.
     * The outcome is also described in {@link GameSession.getStatusMessage}.
     */
    public hint(): HintResult {
        if (!this.currentSettings.showHints) {
            this.statusMessage = 'Hints are disabled in Settings.';
            return { status: HintStatus.DISABLED };
        }

        const candidates: Array<[number, number]> = [];
        for (let r = 0; r < GRID_SIZE; r++) {
            for (let c = 0; c < GRID_SIZE; c++) {
                const cell = this.state.getCell(r, c);
                if (!cell.fixed && cell.value === 0) candidates.push([r, c]);
            }
        }

        const choice = pick(candidates, this.random);
        if (!choice) {
            this.statusMessage = 'No hints: puzzle already complete!';
            return { status: HintStatus.NONE };
        }

        const [row, col] = choice;
        const digit = this.state.solution[row][col];
        this.state.getCell(row, col).pencil = digit;
        this.statusMessage = `Hint: try ${digit} at (${row + 1},${col + 1})`;
        return { status: HintStatus.HINTED, row, col, digit };
    }

    /**
     * Restores the state from before the most recent edit.
     *
     * @returns false when there is nothing to undo.
     */
    public undo(): boolean {
        const previous = this.history.pop();
        if (!previous) return false;
        this.state = previous;
        return true;
    }

    /**
     * Discards the current game and its history and starts on a freshly generated puzzle.
     *
     * A target that is not an integer between 0 and 81 leaves the game untouched
     * and is reported in the status message.
     *
     * @param targetClues - Clue target for the new puzzle. Default: the session's current target.
     * @returns The new puzzle, or undefined if the target was rejected.
     */
    public newGame(targetClues: number = this.targetClues): Puzzle | undefined {
        if (!Number.isInteger(targetClues) || targetClues < 0 || targetClues > CELL_COUNT) {
            this.statusMessage = `Clue target must be between 0 and ${CELL_COUNT}, got ${targetClues}.`;
            return undefined;
        }
        const puzzle = this.generator.generatePuzzle({ targetClues, onTrace: this.onTrace });
        this.targetClues = targetClues;
        this.state = SessionState.fromPuzzle(puzzle.clues, puzzle.solution, this.clock());
        this.history.clear();
        this.statusMessage = '';
        return puzzle;
    }

    /**
     * True once every cell matches the solution.
     */
    public isComplete(): boolean {
        return this.state.isComplete();
    }

    public canUndo(): boolean {
        return this.history.canUndo();
    }

    public getUndoDepth(): number {
        return this.history.size;
    }

    /**
     * Replaces some or all settings. Keys left out keep their current values.
     */
    public updateSettings(settings: Partial<GameSettings>): void {
        this.currentSettings = resolveSettings({ ...this.currentSettings, ...settings });
    }

    /**
     * Builds a read-only snapshot for rendering.
     *
     * @param now - Clock reading used for the elapsed time. Default: the session clock.
     */
    public getView(now: number = this.clock()): SessionView {
        return {
            cells: this.state.clone().cells,
            moves: this.state.moves,
            elapsedSeconds: this.state.elapsedSeconds(now),
            solved: this.state.isComplete(),
            statusMessage: this.statusMessage,
        };
    }

    // Getters for UI
    public getState(): ReadonlySessionState { return this.state; }
    public getSettings(): Readonly<GameSettings> { return this.currentSettings; }
    public getStatusMessage(): string { return this.statusMessage; }
    public getTargetClues(): number { return this.targetClues; }

    private edit(row: number, col: number, applies: (cell: Cell) => boolean, apply: (cell: Cell) => void): boolean {
        if (!isCoordinate(row, col)) return false;
        const cell = this.state.getCell(row, col);
        if (cell.fixed || !applies(cell)) return false;

        this.history.push(this.state.clone());
        apply(cell);
        this.state.moves++;
        return true;
    }
}
