/**
 * @module sparse-ndmatrix
 * Sparse N-dimensional matrix: only non-default cells are stored, writing the default
 * value deletes a cell, and storage is a pluggable ordered or hashed map.
 */

export { SparseMatrix, type MatrixOptions, type ReadonlySparseMatrix } from './matrix';
export { CoordinateAccessor, type ReadonlyCoordinateAccessor } from './accessor';
export { DimensionalIndexer, type IndexStep } from './indexer';
export { EntryIterator } from './iterator';
export { SparseStore, type Equality } from './sparse-store';
export type { BackingStore, BackingStoreFactory, StoreEntry } from './store';
export { TreeStore } from './tree-store';
export { HashStore } from './hash-store';
export {
    compareCoordinates,
    coordinatesEqual,
    hashCoordinates,
    sameValueZero,
    type Coordinates,
    type Key,
    type MatrixEntry,
} from './coordinates';
export { MATRIX_ERROR, MatrixError, isMatrixError } from './errors';
