import { Digit, ReadonlyGrid } from '../types';
import { BOX_SIZE, GRID_SIZE } from './Grid';

/**
 * Checks whether `digit` may go at (row, col) under Sudoku rules.
 *
 * Returns false iff the digit already occurs elsewhere in the row, the column,
 * or the 3x3 box containing the cell. The cell itself is not inspected.
 */
export function isLegal(grid: ReadonlyGrid, row: number, col: number, digit: Digit): boolean {
    for (let i = 0; i < GRID_SIZE; i++) {
        if (i !== col && grid[row][i] === digit) return false;
        if (i !== row && grid[i][col] === digit) return false;
    }

    const boxRow = BOX_SIZE * Math.floor(row / BOX_SIZE);
    const boxCol = BOX_SIZE * Math.floor(col / BOX_SIZE);
    for (let r = boxRow; r < boxRow + BOX_SIZE; r++) {
        for (let c = boxCol; c < boxCol + BOX_SIZE; c++) {
            if ((r !== row || c !== col) && grid[r][c] === digit) return false;
        }
    }
    return true;
}

/**
 * Tells whether no row, column or box of the grid repeats a nonzero digit.
 * Empty cells are ignored.
 */
export function isConsistent(grid: ReadonlyGrid): boolean {
    for (let r = 0; r < GRID_SIZE; r++) {
        for (let c = 0; c < GRID_SIZE; c++) {
            const value = grid[r][c];
            if (value !== 0 && !isLegal(grid, r, c, value)) return false;
        }
    }
    return true;
}

/**
 * Tells whether the grid is completely filled and consistent.
 */
export function isSolvedGrid(grid: ReadonlyGrid): boolean {
    return grid.every(row => row.every(value => value !== 0)) && isConsistent(grid);
}
