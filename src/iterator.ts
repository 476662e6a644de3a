/**
 * @module iterator
 * Bidirectional cursor over the entries of a matrix, in the backing store's native order.
 *
 * A cursor is a position in `[0, size]`; `size` is the past-the-end position. Reading
 * (`current`, `key`, `value`) always produces fresh copies, so nothing obtained from a
 * cursor can modify the matrix. Which positions survive a mutation depends on the
 * backing store (see `TreeStore` and `HashStore`).
 */

import { isCoordinates, isMatrixEntry, type Coordinates, type MatrixEntry } from './coordinates';
import { MATRIX_ERROR, MatrixError } from './errors';
import type { SparseStore } from './sparse-store';
import type { StoreEntry } from './store';

/** Flattens a stored `[key, value]` pair into `[...coordinates, value]`. */
export function toMatrixEntry<T, D extends number>(entry: StoreEntry<T>, dimensions: D): MatrixEntry<T, D> {
    const flat = [...entry[0], entry[1]];
    if (!isMatrixEntry<T, D>(flat, dimensions)) {
        throw new MatrixError(
            MATRIX_ERROR.ARITY_MISMATCH,
            `Stored key (${entry[0].join(', ')}) does not have ${dimensions} coordinates.`,
            { key: [...entry[0]], dimensions },
        );
    }
    return flat;
}

export class EntryIterator<T, D extends number> {
    readonly #store: SparseStore<T>;
    readonly #dimensions: D;
    #position: number;

    constructor(store: SparseStore<T>, dimensions: D, position: number) {
        this.#store = store;
        this.#dimensions = dimensions;
        this.#position = position;
    }

    get position(): number { return this.#position; }

    /** The entry under the cursor. @throws MatrixError at or outside the end position. */
    get current(): MatrixEntry<T, D> {
        return toMatrixEntry(this.entry(), this.#dimensions);
    }

    get key(): Coordinates<D> {
        const coordinates = this.entry()[0].slice();
        if (!isCoordinates(coordinates, this.#dimensions)) {
            throw new MatrixError(
                MATRIX_ERROR.ARITY_MISMATCH,
                `Stored key (${coordinates.join(', ')}) does not have ${this.#dimensions} coordinates.`,
                { key: coordinates, dimensions: this.#dimensions },
            );
        }
        return coordinates;
    }

    get value(): T {
        return this.entry()[1];
    }

    /** Pre-increment: moves forward and returns this cursor. */
    increment(): this {
        this.#position++;
        return this;
    }

    /** Pre-decrement: moves back and returns this cursor. */
    decrement(): this {
        this.#position--;
        return this;
    }

    /** Post-increment: moves forward and returns a cursor at the previous position. */
    postIncrement(): EntryIterator<T, D> {
        const previous = this.clone();
        this.#position++;
        return previous;
    }

    /** Post-decrement: moves back and returns a cursor at the previous position. */
    postDecrement(): EntryIterator<T, D> {
        const previous = this.clone();
        this.#position--;
        return previous;
    }

    equals(other: EntryIterator<T, D>): boolean {
        return this.#store === other.#store && this.#position === other.#position;
    }

    clone(): EntryIterator<T, D> {
        return new EntryIterator(this.#store, this.#dimensions, this.#position);
    }

    toString(): string { return `EntryIterator@${this.#position}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    private entry(): StoreEntry<T> {
        const entry = this.#store.entryAt(this.#position);
        if (!entry) {
            throw new MatrixError(
                MATRIX_ERROR.OUT_OF_RANGE,
                `No entry at position ${this.#position} (size ${this.#store.size}).`,
                { position: this.#position, size: this.#store.size },
            );
        }
        return entry;
    }
}
