import { SessionState } from '../src/engine/SessionState';
import { parseGrid } from '../src/engine/Grid';
import { DIAGONAL_TEXT, SOLUTION_TEXT } from './fixtures';

describe('SessionState', () => {
    const clues = parseGrid(DIAGONAL_TEXT);
    const solution = parseGrid(SOLUTION_TEXT);

    it('should mark exactly the clues as fixed', () => {
        const state = SessionState.fromPuzzle(clues, solution, 100);
        const fixed = state.cells.flat().filter(cell => cell.fixed);

        expect(fixed).toHaveLength(72);
        expect(state.cells.flat().every(cell => cell.pencil === 0)).toBe(true);
        expect(state.moves).toBe(0);
        expect(state.startTime).toBe(100);
    });

    it('should not share grids with the puzzle it was built from', () => {
        const source = parseGrid(DIAGONAL_TEXT);
        const state = SessionState.fromPuzzle(source, solution, 0);
        source[0][1] = 0;
        expect(state.clues[0][1]).toBe(2);
    });

    it('should clone deeply', () => {
        const state = SessionState.fromPuzzle(clues, solution, 0);
        const copy = state.clone();

        copy.cells[0][0].value = 1;
        copy.moves = 3;

        expect(state.getCell(0, 0).value).toBe(0);
        expect(state.moves).toBe(0);
        expect(copy.clues).not.toBe(state.clues);
        expect(copy.solution).toEqual(state.solution);
    });

    it('should be complete only when every cell matches the solution', () => {
        const state = SessionState.fromPuzzle(clues, solution, 0);
        expect(state.isComplete()).toBe(false);

        for (let i = 0; i < 9; i++) state.cells[i][i].value = solution[i][i];
        expect(state.isComplete()).toBe(true);

        state.cells[0][0].value = 9;
        expect(state.isComplete()).toBe(false);
    });

    it('should measure elapsed time in whole seconds', () => {
        const state = SessionState.fromPuzzle(clues, solution, 10_000);
        expect(state.elapsedSeconds(10_999)).toBe(0);
        expect(state.elapsedSeconds(12_000)).toBe(2);
        expect(state.elapsedSeconds(5_000)).toBe(0);
    });
});
