/**
 * @module coordinates
 * Coordinate tuples: arity-checked types, key construction, ordering and hashing.
 *
 * Contracts:
 * - A coordinate is a non-negative safe integer. Extents are unbounded.
 * - Keys held by a backing store are frozen copies with `-0` folded into `0`; callers
 *   may keep mutating the array they passed in.
 */

import { MATRIX_ERROR, MatrixError } from './errors';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Key as stored in a backing store. Always frozen. */
export type Key = readonly number[];

type Repeat<E, N extends number, Acc extends E[] = []> =
    number extends N ? E[] : Acc['length'] extends N ? Acc : Repeat<E, N, [...Acc, E]>;

/**
 * Fixed-length coordinate tuple. `Coordinates<3>` is `[number, number, number]`;
 * a non-literal `number` dimension count degrades to `number[]`.
 */
export type Coordinates<D extends number> =
    Repeat<number, D> extends infer C extends number[] ? C : never;

/** One traversed entry: every coordinate followed by the stored value. */
export type MatrixEntry<T, D extends number> =
    Repeat<number, D> extends infer C extends number[] ? readonly [...C, T] : never;

// ============================================================================
// 2. VALIDATION & GUARDS
// ============================================================================

export const isCoordinate = (v: unknown): v is number =>
    typeof v === 'number' && Number.isSafeInteger(v) && v >= 0;

/** @throws MatrixError when `value` is not a non-negative safe integer. */
export function assertCoordinate(value: number, axis: number): void {
    if (!isCoordinate(value)) {
        throw new MatrixError(
            MATRIX_ERROR.INVALID_COORDINATE,
            `Coordinate ${axis} must be a non-negative safe integer, got ${value}.`,
            { value, axis },
        );
    }
}

/**
 * Validates arity and components, then returns a frozen copy usable as a store key.
 * @throws MatrixError when the tuple length differs from `dimensions` or a component
 * is not a non-negative safe integer.
 */
export function toKey(coordinates: readonly number[], dimensions: number): Key {
    if (coordinates.length !== dimensions) {
        throw new MatrixError(
            MATRIX_ERROR.ARITY_MISMATCH,
            `Expected ${dimensions} coordinates, got ${coordinates.length}.`,
            { coordinates: [...coordinates], dimensions },
        );
    }
    for (let i = 0; i < coordinates.length; i++) assertCoordinate(coordinates[i], i);
    return freezeKey(coordinates);
}

/** Frozen copy of `coordinates` with `-0` folded into `0`. */
export function freezeKey(coordinates: readonly number[]): Key {
    return Object.freeze(coordinates.map((c) => c + 0));
}

export function isCoordinates<D extends number>(value: unknown, dimensions: D): value is Coordinates<D> {
    return Array.isArray(value) && value.length === dimensions && value.every(isCoordinate);
}

export function isMatrixEntry<T, D extends number>(value: unknown, dimensions: D): value is MatrixEntry<T, D> {
    return Array.isArray(value)
        && value.length === dimensions + 1
        && value.slice(0, dimensions).every(isCoordinate);
}

// ============================================================================
// 3. COMPARATOR & HASHING
// ============================================================================

/** Lexicographic order; shorter tuples sort first. */
export function compareCoordinates(a: Key, b: Key): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = a[i] - b[i];
        if (diff !== 0) return diff;
    }
    return 0;
}

export function coordinatesEqual(a: Key, b: Key): boolean {
    if (a === b) return true;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashCoordinate(val: number): number {
    // Int32 fast path
    if ((val | 0) === val) {
        let h = val;
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        return (h >> 16) ^ h;
    }
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h | 0;
}

/**
 * Combining 32-bit hash over all components. Not cryptographic: collisions are
 * resolved by the hash store's probe chain.
 */
export function hashCoordinates(key: Key): number {
    let h = 1;
    for (let i = 0; i < key.length; i++) {
        h = (Math.imul(h, 31) + hashCoordinate(key[i])) | 0;
    }
    return h;
}

/** Equality used for the delete-on-default check: `===`, except NaN equals NaN. */
export function sameValueZero<T>(a: T, b: T): boolean {
    return a === b || (a !== a && b !== b);
}
