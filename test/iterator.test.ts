import { describe, expect, it } from 'vitest';
import {
    HashStore,
    MatrixError,
    SparseMatrix,
    TreeStore,
    type BackingStoreFactory,
} from '../src/index';

const DEFAULT_VALUE = 42;

const stores: Array<[string, BackingStoreFactory<number>]> = [
    ['TreeStore', () => new TreeStore<number>()],
    ['HashStore', () => new HashStore<number>()],
];

// ============================================================================
// 1. Cursor basics
// ============================================================================

describe('EntryIterator', () => {
    it('walks a single entry like a bidirectional iterator', () => {
        const m = new SparseMatrix({ defaultValue: DEFAULT_VALUE, dimensions: 2 });
        m.at(0, 0).set(1);
        expect(m.isEmpty()).toBe(false);

        const begin = m.begin();
        expect(begin.value).toBe(1);
        expect(begin.key).toEqual([0, 0]);

        const [x, y, data] = begin.current;
        expect(x).toBe(0);
        expect(y).toBe(0);
        expect(data).toBe(1);

        expect(m.begin().equals(m.end())).toBe(false);
        expect(begin.postIncrement().equals(m.begin())).toBe(true);
        expect(begin.equals(m.end())).toBe(true);
        expect(m.begin().increment().equals(m.end())).toBe(true);

        expect(m.end().postDecrement().equals(m.end())).toBe(true);
        expect(m.end().decrement().equals(m.begin())).toBe(true);
    });

    it('treats cbegin/cend as begin/end', () => {
        const m = new SparseMatrix({ defaultValue: DEFAULT_VALUE, dimensions: 2 });
        m.at(2, 2).set(2);
        expect(m.cbegin().equals(m.begin())).toBe(true);
        expect(m.cend().equals(m.end())).toBe(true);
    });

    it('starts at the end for an empty matrix', () => {
        const m = new SparseMatrix({ defaultValue: DEFAULT_VALUE, dimensions: 2 });
        expect(m.begin().equals(m.end())).toBe(true);
        expect(m.begin().position).toBe(0);
    });

    it('only compares equal over the same storage', () => {
        const a = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        const b = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        expect(a.begin().equals(b.begin())).toBe(false);
    });

    it('throws when dereferencing the end position', () => {
        const m = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        m.at(1, 1).set(1);
        expect(() => m.end().current).toThrow(MatrixError);
        expect(() => m.end().current).toThrow('No entry at position 1 (size 1).');
        expect(() => m.begin().decrement().current).toThrow(MatrixError);
    });

    it('hands out copies of the key', () => {
        const m = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        m.at(3, 4).set(5);
        const key = m.begin().key;
        key[0] = 99;
        expect(m.has(3, 4)).toBe(true);
        expect(m.begin().key).toEqual([3, 4]);
    });

    it('moves independently of its clones', () => {
        const m = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        m.at(0, 0).set(1);
        m.at(0, 1).set(2);
        const it = m.begin();
        const copy = it.clone();
        it.increment();
        expect(copy.position).toBe(0);
        expect(it.current).toEqual([0, 1, 2]);
        expect(String(it)).toBe('EntryIterator@1');
    });
});

// ============================================================================
// 2. Properties over both store families
// ============================================================================

for (const [name, store] of stores) {
    describe(`traversal over ${name}`, () => {
        function filled() {
            const m = new SparseMatrix({ defaultValue: DEFAULT_VALUE, dimensions: 2, store });
            const expected = new Map<string, number>();
            for (let i = 0; i < 30; i++) {
                const x = (i * 7) % 11;
                const y = (i * 3) % 5;
                const value = i % 4 === 0 ? DEFAULT_VALUE : i;
                m.at(x, y).set(value);
                if (value === DEFAULT_VALUE) expected.delete(`${x},${y}`);
                else expected.set(`${x},${y}`, value);
            }
            return { m, expected };
        }

        it('visits exactly the non-default cells', () => {
            const { m, expected } = filled();
            const seen = new Map<string, number>();
            for (const [x, y, value] of m) {
                expect(seen.has(`${x},${y}`)).toBe(false);
                seen.set(`${x},${y}`, value);
            }
            expect(m.size).toBe(expected.size);
            expect(seen).toEqual(expected);
        });

        it('reaches end after size increments and steps back onto the last entry', () => {
            const { m } = filled();
            const it = m.begin();
            let last: readonly [number, number, number] | undefined;
            for (let i = 0; i < m.size; i++) {
                last = it.current;
                it.increment();
            }
            expect(it.equals(m.end())).toBe(true);
            expect(m.end().decrement().current).toEqual(last);
        });

        it('matches for...of order when walking forward', () => {
            const { m } = filled();
            const walked: Array<readonly [number, number, number]> = [];
            for (const it = m.begin(); !it.equals(m.end()); it.increment()) walked.push(it.current);
            expect(walked).toEqual([...m]);
        });
    });
}

// ============================================================================
// 3. Store-specific invalidation
// ============================================================================

describe('position invalidation', () => {
    it('shifts later positions of an ordered store on insert', () => {
        const m = new SparseMatrix({ defaultValue: 0, dimensions: 2 });
        m.at(1, 0).set(10);
        const it = m.begin();
        m.at(0, 0).set(5);
        expect(it.current).toEqual([0, 0, 5]);
        expect(it.increment().current).toEqual([1, 0, 10]);
    });

    it('moves the last entry of a hash store into an erased position', () => {
        const m = new SparseMatrix({ defaultValue: 0, dimensions: 2, store: () => new HashStore<number>() });
        m.at(0, 0).set(1);
        m.at(0, 1).set(2);
        m.at(0, 2).set(3);
        const first = m.begin();
        m.at(0, 0).set(0);
        expect(first.current).toEqual([0, 2, 3]);
        expect(m.end().position).toBe(2);
    });
});
