/**
 * Text summaries and rendering for containers
 */

import type { DType, Scalar } from '../dtype/types';
import type { Rows } from '../shape/types';
import { max, min, sum } from '../ops';

/**
 * Number of leading items an {@link info} summary lists
 */
export const INFO_PREVIEW_ITEMS = 5;

function header(count: number, shape: readonly number[], dtypeName: string): string[] {
  return [
    'Array Information:',
    `Count: ${count.toString()}`,
    `Shape: [${shape.join(', ')}]`,
    `Type: ${dtypeName}`,
  ];
}

function preview(items: readonly string[]): string[] {
  if (items.length === 0) {
    return [];
  }
  const shown = items.slice(0, INFO_PREVIEW_ITEMS);
  return ['', `First ${shown.length.toString()} items:`, ...shown.map((item, i) => `[${i.toString()}]: ${item}`)];
}

function joinLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Multi-line summary of a vector
 *
 * Floating-point data also reports mean, min and max.
 *
 * @example
 * info([1, 2, 3], float64);
 * // Array Information:
 * // Count: 3
 * // Shape: [3]
 * // Type: float64
 * // Mean: 2
 * // Min: 1
 * // Max: 3
 * //
 * // First 3 items:
 * // [0]: 1
 * // [1]: 2
 * // [2]: 3
 */
export function info<T extends Scalar>(values: readonly T[], dtype: DType<T>): string {
  const lines = header(values.length, [values.length], dtype.__dtype);
  if (values.length > 0 && !dtype.__isInteger) {
    const mean = dtype.fromNumber(dtype.toNumber(sum(dtype, values)) / values.length);
    lines.push(`Mean: ${String(mean)}`, `Min: ${String(min(dtype, values))}`, `Max: ${String(max(dtype, values))}`);
  }
  lines.push(...preview(values.map(String)));
  return joinLines(lines);
}

/**
 * Multi-line summary of a matrix, previewing whole rows
 */
export function infoRows<T extends Scalar>(rows: Rows<T>, dtype: DType<T>): string {
  const lines = header(rows.length, [rows.length, rows[0]?.length ?? 0], dtype.__dtype);
  lines.push(...preview(rows.map(formatValues)));
  return joinLines(lines);
}

/**
 * `[1, 2, 3]`
 */
export function formatValues(values: readonly Scalar[]): string {
  return `[${values.map(String).join(', ')}]`;
}

/**
 * Render rows aligned under the opening bracket
 */
export function formatRows(rows: Rows<Scalar>): string {
  const prefix = 'matrix([';
  const indent = ' '.repeat(prefix.length);
  return `${prefix}${rows.map(formatValues).join(`,\n${indent}`)}])`;
}
