import { GameController } from '../src/engine/GameController';
import { CommandType, Direction } from '../src/engine/Command';
import { createSession } from './fixtures';

describe('GameController', () => {
    jest.setTimeout(30000);

    const move = (direction: Direction) => ({ type: CommandType.MOVE_CURSOR, direction } as const);

    it('should wrap the cursor at every edge', () => {
        const controller = new GameController(createSession());
        expect(controller.getCursor()).toEqual({ row: 0, col: 0 });

        controller.dispatch(move(Direction.LEFT));
        expect(controller.getCursor()).toEqual({ row: 0, col: 8 });
        controller.dispatch(move(Direction.UP));
        expect(controller.getCursor()).toEqual({ row: 8, col: 8 });
        controller.dispatch(move(Direction.DOWN));
        expect(controller.getCursor()).toEqual({ row: 0, col: 8 });
        controller.dispatch(move(Direction.RIGHT));
        expect(controller.getCursor()).toEqual({ row: 0, col: 0 });
    });

    it('should edit the cell under the cursor', () => {
        const session = createSession();
        const controller = new GameController(session);

        expect(controller.dispatch({ type: CommandType.ENTER_DIGIT, digit: 6 })).toBe(true);
        expect(session.getState().getCell(0, 0).value).toBe(6);

        controller.dispatch({ type: CommandType.CLEAR });
        expect(session.getState().getCell(0, 0).value).toBe(0);

        controller.dispatch({ type: CommandType.UNDO });
        expect(session.getState().getCell(0, 0).value).toBe(6);
        expect(session.getState().moves).toBe(1);
    });

    it('should leave clue cells alone', () => {
        const session = createSession();
        const controller = new GameController(session);

        controller.dispatch(move(Direction.RIGHT));
        controller.dispatch({ type: CommandType.ENTER_DIGIT, digit: 9 });
        expect(session.getState().getCell(0, 1).value).toBe(2);
        expect(session.getState().moves).toBe(0);
    });

    it('should move the cursor to a hinted cell so the hint can be committed', () => {
        const session = createSession({ random: () => 0.999 });
        const controller = new GameController(session);

        controller.dispatch({ type: CommandType.HINT });
        expect(controller.getCursor()).toEqual({ row: 8, col: 8 });

        controller.dispatch({ type: CommandType.COMMIT_PENCIL });
        expect(session.getState().getCell(8, 8)).toEqual({ value: 8, fixed: false, pencil: 0 });
    });

    it('should keep the cursor when hints are disabled', () => {
        const session = createSession({ settings: { showHints: false } });
        const controller = new GameController(session);

        controller.dispatch(move(Direction.DOWN));
        controller.dispatch({ type: CommandType.HINT });
        expect(controller.getCursor()).toEqual({ row: 1, col: 0 });
        expect(session.getStatusMessage()).toBe('Hints are disabled in Settings.');
    });

    it('should start a new game on request', () => {
        const session = createSession();
        const controller = new GameController(session);
        controller.dispatch({ type: CommandType.ENTER_DIGIT, digit: 1 });

        controller.dispatch({ type: CommandType.NEW_GAME, targetClues: 45 });
        expect(session.getState().moves).toBe(0);
        expect(session.canUndo()).toBe(false);
        expect(session.getTargetClues()).toBe(45);
    });

    it('should report an out-of-range clue target instead of throwing', () => {
        const session = createSession();
        const controller = new GameController(session);
        controller.dispatch({ type: CommandType.ENTER_DIGIT, digit: 4 });

        expect(controller.dispatch({ type: CommandType.NEW_GAME, targetClues: 100 })).toBe(true);
        expect(session.getStatusMessage()).toBe('Clue target must be between 0 and 81, got 100.');
        expect(controller.dispatch({ type: CommandType.NEW_GAME, targetClues: -1 })).toBe(true);
        expect(session.getStatusMessage()).toBe('Clue target must be between 0 and 81, got -1.');

        expect(session.getState().getCell(0, 0).value).toBe(4);
        expect(session.getState().moves).toBe(1);
        expect(session.canUndo()).toBe(true);
        expect(session.getTargetClues()).toBe(72);
    });

    it('should stop accepting commands after quit', () => {
        const session = createSession();
        const controller = new GameController(session);

        expect(controller.dispatch({ type: CommandType.QUIT })).toBe(false);
        expect(controller.isRunning()).toBe(false);
        expect(controller.dispatch({ type: CommandType.ENTER_DIGIT, digit: 1 })).toBe(false);
        expect(session.getState().getCell(0, 0).value).toBe(0);
    });
});
