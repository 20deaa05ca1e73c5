import { Digit, Grid, ReadonlyGrid } from '../types';
import { ConfigurationError } from '../errors';

/** Rows and columns in a grid. */
export const GRID_SIZE = 9;
/** Rows and columns in a box. */
export const BOX_SIZE = 3;
/** Total number of cells. */
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
/** The placeable numerals, in ascending order. */
export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * Narrows a number to a {@link Digit}.
 */
export function isDigit(n: number): n is Digit {
    return Number.isInteger(n) && n >= 0 && n <= 9;
}

/**
 * Tells whether (row, col) addresses a cell of the grid.
 */
export function isCoordinate(row: number, col: number): boolean {
    return Number.isInteger(row) && Number.isInteger(col) && row >= 0 && row < GRID_SIZE && col >= 0 && col < GRID_SIZE;
}

export function createEmptyGrid(): Grid {
    return Array.from({ length: GRID_SIZE }, () => Array<Digit>(GRID_SIZE).fill(0));
}

/**
 * Creates a deep copy of a grid. The copy shares no rows with the original.
 */
export function cloneGrid(grid: ReadonlyGrid): Grid {
    return grid.map(row => [...row]);
}

/**
 * Counts the filled (nonzero) cells.
 */
export function countClues(grid: ReadonlyGrid): number {
    let count = 0;
    for (const row of grid) {
        for (const value of row) {
            if (value !== 0) count++;
        }
    }
    return count;
}

/**
 * Parses the 81-character form of a grid: row-major, a numeral for a filled cell and
 * `.` or `0` for an empty one. Whitespace is ignored, so multi-line layouts parse too.
 *
 * @throws {ConfigurationError} If the text holds anything else, or the wrong number of cells.
 */
export function parseGrid(text: string): Grid {
    const compact = text.replace(/\s+/g, '');
    if (compact.length !== CELL_COUNT) {
        throw new ConfigurationError(`Grid text has ${compact.length} cells, expected ${CELL_COUNT}.`);
    }

    const grid = createEmptyGrid();
    for (let i = 0; i < CELL_COUNT; i++) {
        const ch = compact[i];
        const n = ch === '.' ? 0 : Number(ch);
        if (!isDigit(n)) {
            throw new ConfigurationError(`Invalid character '${ch}' at cell ${i}.`);
        }
        grid[Math.floor(i / GRID_SIZE)][i % GRID_SIZE] = n;
    }
    return grid;
}

/**
 * Returns the 81-character form of a grid, with dots for blanks.
 */
export function toFlatString(grid: ReadonlyGrid): string {
    return grid.map(row => row.map(v => (v === 0 ? '.' : String(v))).join('')).join('');
}

/**
 * Returns the grid as nine lines of text, boxes separated by spaces and blank lines.
 */
export function formatGrid(grid: ReadonlyGrid): string {
    const lines: string[] = [];
    grid.forEach((row, r) => {
        if (r > 0 && r % BOX_SIZE === 0) lines.push('');
        const chunks: string[] = [];
        for (let c = 0; c < GRID_SIZE; c += BOX_SIZE) {
            chunks.push(row.slice(c, c + BOX_SIZE).map(v => (v === 0 ? '.' : String(v))).join(''));
        }
        lines.push(chunks.join(' '));
    });
    return lines.join('\n');
}
