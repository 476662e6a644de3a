/**
 * Fills both diagonals of a 10x10 hash-backed matrix and renders it.
 *
 * The main diagonal holds its row index, the anti-diagonal its column index. Both
 * diagonals hit a zero at one corner, which is the default value, so those two cells
 * never materialize and the matrix ends up with 18 entries.
 */

import { HashStore, SparseMatrix } from '../src/index';

export const SIDE = 10;

export function buildDiagonalMatrix(): SparseMatrix<number, 2> {
    const matrix = new SparseMatrix({
        defaultValue: 0,
        dimensions: 2,
        store: () => new HashStore<number>(SIDE * 2),
    });

    for (let i = 0; i < SIDE; i++) {
        matrix.index(i).index(i).set(i);
    }
    for (let row = 0; row < SIDE; row++) {
        const col = SIDE - 1 - row;
        matrix.index(row).index(col).set(col);
    }
    return matrix;
}

/** Rows `from..to` (inclusive) restricted to the same column range, space separated. */
export function renderBlock(matrix: SparseMatrix<number, 2>, from: number, to: number): string[] {
    const lines: string[] = [];
    for (let row = from; row <= to; row++) {
        const cells: number[] = [];
        for (let col = from; col <= to; col++) cells.push(matrix.at(row, col).get());
        lines.push(cells.join(' '));
    }
    return lines;
}

export function renderEntries(matrix: SparseMatrix<number, 2>): string[] {
    return [...matrix].map(([x, y, value]) => `${x} ${y} ${value}`);
}

export function diagonalReport(): string[] {
    const matrix = buildDiagonalMatrix();
    return [
        ...renderBlock(matrix, 1, 8),
        String(matrix.size),
        ...renderEntries(matrix),
    ];
}
