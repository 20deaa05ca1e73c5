/**
 * Base error class for the Sudoku engine.
 */
export class SudokuError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SudokuError';
    }
}

/**
 * Thrown when the provided options are invalid (e.g., a clue target outside 0-81, malformed grid text).
 */
export class ConfigurationError extends SudokuError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when the solver cannot complete an empty grid. This indicates a defect, not bad input.
 */
export class GenerationError extends SudokuError {
    constructor(message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}
