/**
 * @module indexer
 * Chained indexing: `matrix.index(i0).index(i1)…` builds a coordinate tuple one axis at
 * a time and yields a {@link CoordinateAccessor} once every axis is supplied.
 *
 * The number of remaining axes is tracked at the type level through the prefix tuple
 * `P`, so chaining past the last axis does not compile.
 */

import { CoordinateAccessor } from './accessor';
import { assertCoordinate, toKey } from './coordinates';
import type { SparseStore } from './sparse-store';

/**
 * Result of supplying the coordinates in `P`: an accessor once `P` covers every axis,
 * another indexer before that. Without a literal dimension count either can come back.
 */
export type IndexStep<T, D extends number, P extends number[]> =
    number extends D
        ? CoordinateAccessor<T> | DimensionalIndexer<T, D, P>
        : P['length'] extends D
            ? CoordinateAccessor<T>
            : DimensionalIndexer<T, D, P>;

export class DimensionalIndexer<T, D extends number, P extends number[]> {
    readonly #store: SparseStore<T>;
    readonly #prefix: P;
    readonly #dimensions: D;

    constructor(store: SparseStore<T>, prefix: P, dimensions: D) {
        this.#store = store;
        this.#prefix = prefix;
        this.#dimensions = dimensions;
    }

    /** Coordinates supplied so far. */
    get prefix(): number[] { return this.#prefix.slice(); }

    get remaining(): number { return this.#dimensions - this.#prefix.length; }

    index(coordinate: number): IndexStep<T, D, [...P, number]>;
    index(coordinate: number): CoordinateAccessor<T> | DimensionalIndexer<T, D, [...P, number]> {
        assertCoordinate(coordinate, this.#prefix.length);
        const prefix: [...P, number] = [...this.#prefix, coordinate];
        if (prefix.length < this.#dimensions) {
            return new DimensionalIndexer(this.#store, prefix, this.#dimensions);
        }
        return new CoordinateAccessor(this.#store, toKey(prefix, this.#dimensions));
    }
}
