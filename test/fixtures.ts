import { Generator, Puzzle } from '../src/engine/Generator';
import { GameSession, SessionOptions } from '../src/engine/GameSession';
import { parseGrid } from '../src/engine/Grid';
import { ReadonlyGrid } from '../src/types';

// A valid solved grid built from shifted rows.
export const SOLUTION_TEXT = `
123456789
456789123
789123456
234567891
567891234
891234567
345678912
678912345
912345678
`;

// SOLUTION_TEXT with the main diagonal blanked. One blank per row, so the completion is unique.
export const DIAGONAL_TEXT = `
.23456789
4.6789123
78.123456
234.67891
5678.1234
89123.567
345678.12
6789123.5
91234567.
`;

export function diagonalPuzzle(): Puzzle {
    return {
        clues: parseGrid(DIAGONAL_TEXT),
        solution: parseGrid(SOLUTION_TEXT),
        targetClues: 72,
        removedCount: 9,
    };
}

/**
 * A session on the diagonal puzzle. Hints pick the first candidate unless the options say otherwise.
 */
export function createSession(options: SessionOptions = {}): GameSession {
    return new GameSession(new Generator(42), diagonalPuzzle(), { random: () => 0, clock: () => 0, ...options });
}

/**
 * Collects the nine rows, nine columns and nine boxes of a grid.
 */
export function groupsOf(grid: ReadonlyGrid): number[][] {
    const groups: number[][] = [];
    for (let i = 0; i < 9; i++) {
        const row: number[] = [];
        const col: number[] = [];
        const box: number[] = [];
        for (let j = 0; j < 9; j++) {
            row.push(grid[i][j]);
            col.push(grid[j][i]);
            box.push(grid[3 * Math.floor(i / 3) + Math.floor(j / 3)][3 * (i % 3) + (j % 3)]);
        }
        groups.push(row, col, box);
    }
    return groups;
}
