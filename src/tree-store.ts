/**
 * @module tree-store
 * Ordered backing store on top of a persistent red-black tree.
 *
 * Entries iterate in lexicographic coordinate order. Positions are ranks: inserting
 * or erasing an entry shifts the position of every entry after it. Since the tree is
 * persistent, a `for...of` loop keeps walking the version it started on even if the
 * store is mutated meanwhile.
 */

import createRBTree from 'functional-red-black-tree';
import { compareCoordinates, freezeKey, type Key } from './coordinates';
import type { BackingStore, StoreEntry } from './store';

/** Boxed so that a stored `undefined` is distinguishable from a missing node. */
interface Slot<V> {
    readonly value: V;
}

export class TreeStore<V> implements BackingStore<V> {
    private _tree = createRBTree<Key, Slot<V>>(compareCoordinates);

    get size(): number { return this._tree.length; }
    isEmpty(): boolean { return this._tree.length === 0; }

    /**
     * The tree accepts duplicate keys, so an existing node is updated in place
     * rather than inserted again. New nodes get a frozen copy of `key`.
     * @complexity O(log N).
     */
    set(key: Key, value: V): void {
        const it = this._tree.find(key);
        this._tree = it.valid ? it.update({ value }) : this._tree.insert(freezeKey(key), { value });
    }

    find(key: Key): StoreEntry<V> | undefined {
        const it = this._tree.find(key);
        if (!it.valid) return undefined;
        return toEntry(it.key, it.value);
    }

    delete(key: Key): boolean {
        const it = this._tree.find(key);
        if (!it.valid) return false;
        this._tree = it.remove();
        return true;
    }

    entryAt(position: number): StoreEntry<V> | undefined {
        if (!Number.isInteger(position) || position < 0 || position >= this._tree.length) return undefined;
        const it = this._tree.at(position);
        return it.valid ? toEntry(it.key, it.value) : undefined;
    }

    clear(): void {
        this._tree = createRBTree<Key, Slot<V>>(compareCoordinates);
    }

    *[Symbol.iterator](): Iterator<StoreEntry<V>> {
        const it = this._tree.begin;
        while (it.valid) {
            const entry = toEntry(it.key, it.value);
            if (entry) yield entry;
            it.next();
        }
    }

    toString() { return `TreeStore{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

function toEntry<V>(key: Key | undefined, slot: Slot<V> | undefined): StoreEntry<V> | undefined {
    if (key === undefined || slot === undefined) return undefined;
    return [key, slot.value];
}
