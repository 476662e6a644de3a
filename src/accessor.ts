/**
 * @module accessor
 * Lvalue-like handle on one cell of a matrix.
 *
 * An accessor holds the matrix storage and a complete key, nothing else. Every read
 * re-queries the store, so two accessors on the same cell always agree.
 *
 * An accessor is meant to be short-lived. One kept past `clear()` still addresses the
 * same cell of the same storage.
 */

import type { Key } from './coordinates';
import type { SparseStore } from './sparse-store';

/** Read side of a cell handle. */
export interface ReadonlyCoordinateAccessor<T> {
    readonly coordinates: number[];
    get(): T;
    equals(value: T): boolean;
    valueOf(): T;
}

export class CoordinateAccessor<T> implements ReadonlyCoordinateAccessor<T> {
    readonly #store: SparseStore<T>;
    readonly #key: Key;

    constructor(store: SparseStore<T>, key: Key) {
        this.#store = store;
        this.#key = key;
    }

    /** Copy of the bound coordinates. */
    get coordinates(): number[] { return this.#key.slice(); }

    /** Stored value, or the matrix default when the cell is unset. */
    get(): T {
        return this.#store.getOrDefault(this.#key);
    }

    /**
     * Writes `value` to the cell. Writing the default value erases the entry
     * (or does nothing if there was none).
     */
    set(value: T): this {
        if (this.#store.isDefault(value)) {
            this.#store.erase(this.#key);
        } else {
            this.#store.set(this.#key, value);
        }
        return this;
    }

    /** Copies the current value of another cell into this one. */
    assign(source: CoordinateAccessor<T>): this {
        return this.set(source.get());
    }

    equals(value: T): boolean {
        return this.#store.equals(this.get(), value);
    }

    valueOf(): T { return this.get(); }

    toString(): string { return String(this.get()); }
    [Symbol.for('nodejs.util.inspect.custom')]() {
        return `(${this.#key.join(', ')}) => ${String(this.get())}`;
    }
}
