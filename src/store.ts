/**
 * @module store
 * Contract every backing store must satisfy to hold matrix entries.
 *
 * A store maps coordinate keys to values and exposes its entries in a native order
 * that is stable between mutations. Positions (`entryAt`) index into that order;
 * which positions survive a mutation is up to the implementation and is documented
 * on each one.
 */

import type { Key } from './coordinates';

export type StoreEntry<V> = readonly [key: Key, value: V];

export interface BackingStore<V> extends Iterable<StoreEntry<V>> {
    readonly size: number;
    isEmpty(): boolean;

    /** Inserts a new entry or overwrites the value of an existing one. */
    set(key: Key, value: V): void;

    find(key: Key): StoreEntry<V> | undefined;

    /** Removes the entry if present. Returns whether anything was removed. */
    delete(key: Key): boolean;

    /** Entry at `position` of native iteration order, or undefined outside `[0, size)`. */
    entryAt(position: number): StoreEntry<V> | undefined;

    clear(): void;
}

/** Builds the store a matrix will own. Capture constructor arguments here. */
export type BackingStoreFactory<V> = () => BackingStore<V>;
