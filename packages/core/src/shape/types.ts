/**
 * Shape types for the dense 1-D and 2-D containers
 */

/**
 * Shape of a vector: its length
 */
export type VectorShape = readonly [length: number];

/**
 * Shape of a matrix: row count, then column count
 */
export type MatrixShape = readonly [rows: number, columns: number];

/**
 * Any shape the kernels produce or inspect
 */
export type Shape = VectorShape | MatrixShape | readonly number[];

/**
 * Row-major 2-D data, each row a plain array
 */
export type Rows<T> = readonly (readonly T[])[];
