/**
 * @vecta/charts
 *
 * Data shaping for charts: moving averages, distributions, scaling, grouping,
 * stacking and correlation. Every function accepts a plain array or a
 * number-backed Vector and returns plain arrays ready for a plotting library.
 */

export type { AggregationMethod, GroupedDatum, HeatmapCell, HistogramBin, Quartiles, Series } from './types';
export { aggregate, valuesOf } from './values';
export { rollingMean, diff, percentChange } from './time-series';
export { histogram, percentile, quartiles, percentileRank, percentileRanks } from './distribution';
export { scaled, asPercentages, standardized } from './scaling';
export { groupBy, groupedData, downsample } from './grouping';
export {
  stackedCumulative,
  stackedPercentage,
  pearsonCorrelation,
  correlationMatrix,
  heatmapData,
} from './multi-series';
