/**
 * @module sparse-store
 * Storage engine of a matrix: the only place entries are physically written or removed.
 *
 * Keys reaching this layer are already validated (see `toKey`). Reads fall back to the
 * default value; nothing here enforces the delete-on-default rule, which lives in the
 * accessor write path.
 */

import type { Key } from './coordinates';
import type { BackingStore, StoreEntry } from './store';

export type Equality<T> = (a: T, b: T) => boolean;

export class SparseStore<T> implements Iterable<StoreEntry<T>> {
    constructor(
        readonly defaultValue: T,
        private readonly _data: BackingStore<T>,
        private readonly _equals: Equality<T>,
    ) {}

    get size(): number { return this._data.size; }
    isEmpty(): boolean { return this._data.isEmpty(); }

    isDefault(value: T): boolean {
        return this._equals(value, this.defaultValue);
    }

    equals(a: T, b: T): boolean {
        return this._equals(a, b);
    }

    getOrDefault(key: Key): T {
        const entry = this._data.find(key);
        return entry ? entry[1] : this.defaultValue;
    }

    has(key: Key): boolean {
        return this._data.find(key) !== undefined;
    }

    /**
     * Unconditional insert-or-overwrite. Passing the default value materializes an
     * entry holding it; use an accessor to get delete-on-default.
     */
    set(key: Key, value: T): void {
        this._data.set(key, value);
    }

    /** No-op when the key is absent. */
    erase(key: Key): boolean {
        return this._data.delete(key);
    }

    entryAt(position: number): StoreEntry<T> | undefined {
        return this._data.entryAt(position);
    }

    clear(): void {
        this._data.clear();
    }

    [Symbol.iterator](): Iterator<StoreEntry<T>> {
        return this._data[Symbol.iterator]();
    }
}
