import { HintStatus } from '../types';
import { GRID_SIZE } from './Grid';
import { Command, CommandType, Direction } from './Command';
import { GameSession } from './GameSession';

/**
 * A cell position. The cursor is presentation state; the session never sees it.
 */
export interface Cursor {
    row: number;
    col: number;
}

/**
 * Translates presentation-layer commands into session calls at the cursor position.
 */
export class GameController {
    private cursor: Cursor = { row: 0, col: 0 };
    private running = true;

    constructor(private readonly session: GameSession) { }

    /**
     * Applies one command.
     *
     * @returns false once QUIT has been received, true otherwise.
     */
    public dispatch(command: Command): boolean {
        if (!this.running) return false;

        const { row, col } = this.cursor;
        switch (command.type) {
            case CommandType.MOVE_CURSOR:
                this.moveCursor(command.direction);
                break;
            case CommandType.ENTER_DIGIT:
                this.session.place(row, col, command.digit);
                break;
            case CommandType.CLEAR:
                this.session.clear(row, col);
                break;
            case CommandType.COMMIT_PENCIL:
                this.session.commitPencil(row, col);
                break;
            case CommandType.UNDO:
                this.session.undo();
                break;
            case CommandType.HINT: {
                const result = this.session.hint();
                if (result.status === HintStatus.HINTED) {
                    this.cursor = { row: result.row, col: result.col };
                }
                break;
            }
            case CommandType.NEW_GAME:
                this.session.newGame(command.targetClues);
                break;
            case CommandType.QUIT:
                this.running = false;
                break;
        }
        return this.running;
    }

    public getCursor(): Readonly<Cursor> { return this.cursor; }
    public getSession(): GameSession { return this.session; }
    public isRunning(): boolean { return this.running; }

    private moveCursor(direction: Direction): void {
        const { row, col } = this.cursor;
        const wrap = (n: number) => (n + GRID_SIZE) % GRID_SIZE;
        switch (direction) {
            case Direction.UP:
                this.cursor = { row: wrap(row - 1), col };
                break;
            case Direction.DOWN:
                this.cursor = { row: wrap(row + 1), col };
                break;
            case Direction.LEFT:
                this.cursor = { row, col: wrap(col - 1) };
                break;
            case Direction.RIGHT:
                this.cursor = { row, col: wrap(col + 1) };
                break;
        }
    }
}
