/**
 * @module hash-store
 * Unordered backing store: open addressing over dense parallel arrays.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * - `_keys`, `_values`, `_hashes`: dense storage, one slot per entry. Iteration and
 *   positional access walk these arrays directly.
 * - `_indices`: sparse `Uint32Array` lookup table holding `dense index + 1`
 *   (0 marks an empty bucket), probed linearly.
 *
 * Invalidation: inserting appends, so existing positions stay valid. Erasing moves the
 * last entry into the erased position; only that position and the old last one change.
 */

import { coordinatesEqual, freezeKey, hashCoordinates, type Key } from './coordinates';
import { MATRIX_ERROR, MatrixError } from './errors';
import type { BackingStore, StoreEntry } from './store';

const LOAD_FACTOR = 0.75;
const MIN_BUCKETS = 16;

export class HashStore<V> implements BackingStore<V> {

    // Dense storage (Parallel Arrays)
    private _keys: Key[] = [];
    private _values: V[] = [];
    private _hashes: number[] = [];

    // Sparse index table for O(1) lookup
    private _indices: Uint32Array;

    private _bucketCount = MIN_BUCKETS;
    private _mask = MIN_BUCKETS - 1;

    /**
     * @param capacity Expected number of entries. The bucket table is pre-sized so that
     * this many inserts never trigger a rehash.
     */
    constructor(capacity = 0) {
        this._indices = new Uint32Array(this._bucketCount);
        this.ensureCapacity(capacity);
    }

    get size(): number { return this._keys.length; }
    get bucketCount(): number { return this._bucketCount; }
    isEmpty(): boolean { return this._keys.length === 0; }

    /**
     * Grows the bucket table so `capacity` entries stay under the load factor.
     * Only the lookup table is rebuilt; the dense arrays are untouched.
     * @throws MatrixError when `capacity` is not a non-negative safe integer.
     */
    ensureCapacity(capacity: number): void {
        if (!Number.isSafeInteger(capacity) || capacity < 0) {
            throw new MatrixError(
                MATRIX_ERROR.INVALID_CAPACITY,
                `Capacity must be a non-negative safe integer, got ${capacity}.`,
                { capacity },
            );
        }
        if (capacity <= this._bucketCount * LOAD_FACTOR) return;

        let target = this._bucketCount;
        while (target * LOAD_FACTOR < capacity) target *= 2;

        this._bucketCount = target;
        this._mask = target - 1;
        this._indices = new Uint32Array(target);

        for (let i = 0; i < this._keys.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    /**
     * @complexity Amortized O(1).
     */
    set(key: Key, value: V): void {
        const h = hashCoordinates(key);
        const ptr = this.locate(key, h);
        if (ptr !== -1) {
            this._values[ptr] = value;
            return;
        }

        this.ensureCapacity(this._keys.length + 1);
        let idx = h & this._mask;
        while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;

        this._hashes.push(h);
        this._keys.push(freezeKey(key));
        this._values.push(value);
        this._indices[idx] = this._keys.length; // 1-based
    }

    find(key: Key): StoreEntry<V> | undefined {
        const ptr = this.locate(key, hashCoordinates(key));
        return ptr === -1 ? undefined : [this._keys[ptr], this._values[ptr]];
    }

    /**
     * Swap & Pop: the last entry of all three dense arrays moves into the gap.
     * @complexity O(1)
     */
    delete(key: Key): boolean {
        if (this._keys.length === 0) return false;

        const h = hashCoordinates(key);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;

            const ptr = entry - 1;
            if (this._hashes[ptr] === h && coordinatesEqual(this._keys[ptr], key)) {
                this.removeIndex(idx);

                const lastLoc = this._keys.length;
                const lastKey = this._keys[lastLoc - 1];
                const lastVal = this._values[lastLoc - 1];
                const lastHash = this._hashes[lastLoc - 1];
                this._keys.length = lastLoc - 1;
                this._values.length = lastLoc - 1;
                this._hashes.length = lastLoc - 1;

                if (ptr < this._keys.length) {
                    this._keys[ptr] = lastKey;
                    this._values[ptr] = lastVal;
                    this._hashes[ptr] = lastHash;
                    this.updateIndexForKey(lastHash, lastLoc, ptr + 1);
                }
                return true;
            }
            idx = (idx + 1) & this._mask;
        }
    }

    entryAt(position: number): StoreEntry<V> | undefined {
        if (!Number.isInteger(position) || position < 0 || position >= this._keys.length) return undefined;
        return [this._keys[position], this._values[position]];
    }

    clear(): void {
        this._keys = [];
        this._values = [];
        this._hashes = [];
        this._indices.fill(0);
    }

    *[Symbol.iterator](): Iterator<StoreEntry<V>> {
        for (let i = 0; i < this._keys.length; i++) yield [this._keys[i], this._values[i]];
    }

    toString() { return `HashStore{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    // ------------------------------------------------------------------------
    // Probe chain maintenance
    // ------------------------------------------------------------------------

    /** Dense index of `key`, or -1. */
    private locate(key: Key, h: number): number {
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return -1;

            const ptr = entry - 1;
            if (this._hashes[ptr] === h && coordinatesEqual(this._keys[ptr], key)) return ptr;

            idx = (idx + 1) & this._mask;
        }
    }

    /** Repoints the bucket of an entry that moved in the dense arrays. */
    private updateIndexForKey(hash: number, oldLoc: number, newLoc: number): void {
        let idx = hash & this._mask;
        while (true) {
            if (this._indices[idx] === oldLoc) {
                this._indices[idx] = newLoc;
                return;
            }
            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Backward-shift deletion: later members of the probe chain move into the hole
     * when the hole is closer to their ideal bucket.
     */
    private removeIndex(holeIdx: number): void {
        let i = (holeIdx + 1) & this._mask;
        while (this._indices[i] !== 0) {
            const entry = this._indices[i];
            const ideal = this._hashes[entry - 1] & this._mask;
            const distHole = (holeIdx - ideal + this._bucketCount) & this._mask;
            const distI = (i - ideal + this._bucketCount) & this._mask;

            if (distHole < distI) {
                this._indices[holeIdx] = entry;
                holeIdx = i;
            }
            i = (i + 1) & this._mask;
        }
        this._indices[holeIdx] = 0;
    }
}
