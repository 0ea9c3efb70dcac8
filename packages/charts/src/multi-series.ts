/**
 * Operations across several aligned series: stacking and correlation
 */

import type { HeatmapCell, Series } from './types';
import { valuesOf } from './values';

/**
 * Running totals across series for stacked area and bar charts
 *
 * Series whose length differs from the first are skipped.
 *
 * @example
 * stackedCumulative([[1, 2], [3, 4]]); // [[1, 2], [4, 6]]
 */
export function stackedCumulative(seriesList: readonly Series[]): number[][] {
  if (seriesList.length === 0) {
    return [];
  }
  const length = valuesOf(seriesList[0]).length;
  const running = new Array<number>(length).fill(0);
  const result: number[][] = [];
  for (const series of seriesList) {
    const values = valuesOf(series);
    if (values.length !== length) {
      continue;
    }
    result.push(
      values.map((value, i) => {
        running[i] += value;
        return running[i];
      }),
    );
  }
  return result;
}

/**
 * Each series as a percentage of the per-position total; 0 where the total is zero
 *
 * Totals come from the series matching the first series' length, but every
 * series is converted. Positions past that length have a zero total.
 */
export function stackedPercentage(seriesList: readonly Series[]): number[][] {
  if (seriesList.length === 0) {
    return [];
  }
  const length = valuesOf(seriesList[0]).length;
  const totals = new Array<number>(length).fill(0);
  for (const series of seriesList) {
    const values = valuesOf(series);
    if (values.length === length) {
      values.forEach((value, i) => {
        totals[i] += value;
      });
    }
  }
  return seriesList.map((series) =>
    valuesOf(series).map((value, i) => {
      const total = i < length ? totals[i] : 0;
      return total === 0 ? 0 : (value / total) * 100;
    }),
  );
}

/**
 * Pearson correlation coefficient
 *
 * 0 when the lengths differ, the series are empty or either has no variance.
 */
export function pearsonCorrelation(x: Series, y: Series): number {
  const xs = valuesOf(x);
  const ys = valuesOf(y);
  if (xs.length !== ys.length || xs.length === 0) {
    return 0;
  }
  const meanX = xs.reduce((acc, value) => acc + value, 0) / xs.length;
  const meanY = ys.reduce((acc, value) => acc + value, 0) / ys.length;

  let numerator = 0;
  let sumSquaresX = 0;
  let sumSquaresY = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    numerator += dx * dy;
    sumSquaresX += dx * dx;
    sumSquaresY += dy * dy;
  }
  if (!(sumSquaresX > 0 && sumSquaresY > 0)) {
    return 0;
  }
  return numerator / Math.sqrt(sumSquaresX * sumSquaresY);
}

/**
 * Pairwise Pearson correlations; the diagonal is exactly 1
 */
export function correlationMatrix(seriesList: readonly Series[]): number[][] {
  return seriesList.map((x, i) => seriesList.map((y, j) => (i === j ? 1 : pearsonCorrelation(x, y))));
}

/**
 * Flatten {@link correlationMatrix} into labelled cells, row by row
 *
 * Empty when the label count differs from the series count.
 */
export function heatmapData(seriesList: readonly Series[], labels: readonly string[]): HeatmapCell[] {
  if (labels.length !== seriesList.length) {
    return [];
  }
  return correlationMatrix(seriesList).flatMap((row, i) =>
    row.map((value, j) => ({ x: labels[i], y: labels[j], value })),
  );
}
