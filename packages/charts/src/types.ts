/**
 * Shared types for chart data shaping
 */

import type { Vector } from '@vecta/core';

/**
 * A numeric series: a plain array or a number-backed vector
 */
export type Series = readonly number[] | Vector<number>;

/**
 * How the values of a group or window collapse to one number
 */
export type AggregationMethod = 'sum' | 'mean' | 'count' | 'min' | 'max';

export interface HistogramBin {
  readonly midpoint: number;
  readonly count: number;
}

export interface Quartiles {
  readonly min: number;
  readonly q1: number;
  readonly median: number;
  readonly q3: number;
  readonly max: number;
  /** Interquartile range, `q3 - q1` */
  readonly iqr: number;
}

export interface GroupedDatum {
  readonly category: string;
  readonly value: number;
}

export interface HeatmapCell {
  readonly x: string;
  readonly y: string;
  readonly value: number;
}
