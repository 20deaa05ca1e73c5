/**
 * Enumeration of the commands a presentation layer can send to a game.
 */
export enum CommandType {
    /** Moves the cursor one cell, wrapping at the edges. */
    MOVE_CURSOR,
    /** Writes a digit into the cell under the cursor. */
    ENTER_DIGIT,
    /** Empties the cell under the cursor. */
    CLEAR,
    /** Commits the pencil mark of the cell under the cursor. */
    COMMIT_PENCIL,
    UNDO,
    HINT,
    NEW_GAME,
    QUIT,
}

export enum Direction {
    UP,
    DOWN,
    LEFT,
    RIGHT,
}

export interface MoveCursorCommand {
    type: CommandType.MOVE_CURSOR;
    direction: Direction;
}

export interface EnterDigitCommand {
    type: CommandType.ENTER_DIGIT;
    /** 1 to 9. Anything else is ignored. */
    digit: number;
}

export interface NewGameCommand {
    type: CommandType.NEW_GAME;
    /** Clue target for the new puzzle. Default: the session's current target. */
    targetClues?: number;
}

/**
 * A command that acts on the cell under the cursor or on the game as a whole, with no payload.
 */
export interface SimpleCommand {
    type: CommandType.CLEAR | CommandType.COMMIT_PENCIL | CommandType.UNDO | CommandType.HINT | CommandType.QUIT;
}

/**
 * Union type representing any valid command.
 */
export type Command = MoveCursorCommand | EnterDigitCommand | NewGameCommand | SimpleCommand;
