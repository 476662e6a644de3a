/**
 * @module matrix
 * Sparse N-dimensional matrix with delete-on-default semantics.
 *
 * Only cells holding something other than the default value occupy storage. Writing
 * the default value through an accessor removes the cell, so `size` always counts the
 * non-default cells.
 *
 * @example
 * const m = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
 * m.index(0).index(0).set(42);
 * m.at(1, 2).get();           // 0
 * m.at(0, 0).set(0);          // removes (0, 0)
 * m.size;                     // 0
 */

import { CoordinateAccessor, type ReadonlyCoordinateAccessor } from './accessor';
import { sameValueZero, toKey, type Coordinates, type MatrixEntry } from './coordinates';
import { MATRIX_ERROR, MatrixError } from './errors';
import { DimensionalIndexer, type IndexStep } from './indexer';
import { EntryIterator, toMatrixEntry } from './iterator';
import { SparseStore, type Equality } from './sparse-store';
import type { BackingStoreFactory } from './store';
import { TreeStore } from './tree-store';

export interface MatrixOptions<T, D extends number> {
    /** Value every unset cell reads as. */
    defaultValue: T;
    /** Number of coordinates per cell, an integer >= 1. */
    dimensions: D;
    /** Builds the owned backing store. Defaults to an ordered {@link TreeStore}. */
    store?: BackingStoreFactory<T>;
    /** Decides whether a written value is the default. Defaults to SameValueZero. */
    equals?: Equality<T>;
}

/**
 * Read-only view of a matrix: lookups and traversal, no writes. Obtained from
 * {@link SparseMatrix.asReadonly}; it is the same object, so later writes through the
 * matrix show up in the view.
 */
export interface ReadonlySparseMatrix<T, D extends number = 2> extends Iterable<MatrixEntry<T, D>> {
    readonly dimensions: D;
    readonly defaultValue: T;
    readonly size: number;
    isEmpty(): boolean;
    at(...coordinates: Coordinates<D>): ReadonlyCoordinateAccessor<T>;
    getOrDefault(...coordinates: Coordinates<D>): T;
    has(...coordinates: Coordinates<D>): boolean;
    begin(): EntryIterator<T, D>;
    end(): EntryIterator<T, D>;
    cbegin(): EntryIterator<T, D>;
    cend(): EntryIterator<T, D>;
    entries(): Iterator<MatrixEntry<T, D>>;
}

export class SparseMatrix<T, D extends number = 2> implements ReadonlySparseMatrix<T, D> {
    readonly dimensions: D;
    readonly #store: SparseStore<T>;

    constructor(options: MatrixOptions<T, D>) {
        const { defaultValue, dimensions, store = () => new TreeStore<T>(), equals = sameValueZero } = options;
        if (!Number.isSafeInteger(dimensions) || dimensions < 1) {
            throw new MatrixError(
                MATRIX_ERROR.INVALID_DIMENSIONS,
                `Dimension count must be an integer >= 1, got ${dimensions}.`,
                { dimensions },
            );
        }
        this.dimensions = dimensions;
        this.#store = new SparseStore(defaultValue, store(), equals);
    }

    get defaultValue(): T { return this.#store.defaultValue; }

    /** Number of stored (non-default) cells. */
    get size(): number { return this.#store.size; }
    isEmpty(): boolean { return this.#store.isEmpty(); }

    /**
     * First step of chained indexing. With `dimensions === 1` this is already the
     * accessor; otherwise keep calling `index` on the result.
     */
    index(coordinate: number): IndexStep<T, D, [number]> {
        return new DimensionalIndexer<T, D, []>(this.#store, [], this.dimensions).index(coordinate);
    }

    /** Accessor for a complete coordinate tuple; same effect as chaining `index`. */
    at(...coordinates: Coordinates<D>): CoordinateAccessor<T> {
        return new CoordinateAccessor(this.#store, toKey(coordinates, this.dimensions));
    }

    getOrDefault(...coordinates: Coordinates<D>): T {
        return this.#store.getOrDefault(toKey(coordinates, this.dimensions));
    }

    has(...coordinates: Coordinates<D>): boolean {
        return this.#store.has(toKey(coordinates, this.dimensions));
    }

    /**
     * Raw insert-or-overwrite. Unlike `at(...).set(value)` this stores the default value
     * as a real entry when given one.
     */
    set(value: T, ...coordinates: Coordinates<D>): void {
        this.#store.set(toKey(coordinates, this.dimensions), value);
    }

    /** Removes the cell if stored. Returns whether anything was removed. */
    erase(...coordinates: Coordinates<D>): boolean {
        return this.#store.erase(toKey(coordinates, this.dimensions));
    }

    clear(): void {
        this.#store.clear();
    }

    asReadonly(): ReadonlySparseMatrix<T, D> {
        return this;
    }

    // ------------------------------------------------------------------------
    // Traversal
    // ------------------------------------------------------------------------

    begin(): EntryIterator<T, D> { return new EntryIterator(this.#store, this.dimensions, 0); }
    end(): EntryIterator<T, D> { return new EntryIterator(this.#store, this.dimensions, this.#store.size); }
    cbegin(): EntryIterator<T, D> { return this.begin(); }
    cend(): EntryIterator<T, D> { return this.end(); }

    /** Entries as `[...coordinates, value]` in the backing store's order. */
    *entries(): Generator<MatrixEntry<T, D>, void, undefined> {
        for (const entry of this.#store) yield toMatrixEntry(entry, this.dimensions);
    }

    [Symbol.iterator](): Iterator<MatrixEntry<T, D>> { return this.entries(); }

    toString(): string {
        const cells: string[] = [];
        for (const [key, value] of this.#store) cells.push(`(${key.join(', ')}) => ${String(value)}`);
        return `SparseMatrix{${cells.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
