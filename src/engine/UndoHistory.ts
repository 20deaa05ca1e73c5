import { ConfigurationError } from '../errors';
import { UNDO_CAPACITY } from '../defaults';

/**
 * A bounded stack of snapshots. Pushing past capacity evicts the oldest entry.
 */
export class UndoHistory<T> {
    private readonly entries: T[] = [];

    /**
     * @param capacity - Maximum number of entries kept. Must be a positive integer.
     * @throws {ConfigurationError} If the capacity is not a positive integer.
     */
    constructor(public readonly capacity: number = UNDO_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ConfigurationError(`Undo capacity must be a positive integer, got ${capacity}.`);
        }
    }

    public push(snapshot: T): void {
        this.entries.push(snapshot);
        if (this.entries.length > this.capacity) {
            this.entries.shift();
        }
    }

    /**
     * Removes and returns the most recent snapshot, or undefined when the history is empty.
     */
    public pop(): T | undefined {
        return this.entries.pop();
    }

    public canUndo(): boolean {
        return this.entries.length > 0;
    }

    public clear(): void {
        this.entries.length = 0;
    }

    public get size(): number {
        return this.entries.length;
    }
}
