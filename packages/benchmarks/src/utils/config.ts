/**
 * Benchmark configuration profiles and result statistics
 */

import { float64, ops } from '@vecta/core';
import type { Options as BenchOptions } from 'tinybench';

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES = {
  /**
   * Quick profile for development
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * High-precision profile for CI
   * Longer runtime but more stable results
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 250,
    warmupIterations: 20,
  },
} as const satisfies Record<BenchmarkProfile, BenchOptions>;

function isBenchmarkProfile(name: string): name is BenchmarkProfile {
  return name === 'quick' || name === 'standard' || name === 'precise';
}

/**
 * Profile named by `BENCHMARK_PROFILE`, `standard` when unset or unknown
 */
export function getBenchmarkProfile(env: NodeJS.ProcessEnv = process.env): BenchmarkProfile {
  const name = env.BENCHMARK_PROFILE ?? 'standard';
  return isBenchmarkProfile(name) ? name : 'standard';
}

/**
 * Get benchmark configuration based on environment
 */
export function getBenchmarkConfig(env: NodeJS.ProcessEnv = process.env): BenchOptions {
  return BENCHMARK_PROFILES[getBenchmarkProfile(env)];
}

export interface SampleAnalysis {
  readonly mean: number;
  readonly median: number;
  readonly stdDev: number;
  /** Coefficient of variation, `stdDev / mean` */
  readonly cv: number;
  readonly outliers: number;
  readonly isStable: boolean;
}

/**
 * Summarize timing samples; `undefined` for fewer than two samples
 *
 * Samples are stable when the coefficient of variation and the share of
 * outliers are both under 5%.
 */
export function analyzeResults(samples: readonly number[]): SampleAnalysis | undefined {
  const mean = ops.mean(float64, samples);
  const median = ops.median(float64, samples);
  const stdDev = ops.std(float64, samples, 1);
  if (mean === undefined || median === undefined || stdDev === undefined) {
    return undefined;
  }
  const cv = mean === 0 ? 0 : stdDev / mean;
  const outliers = ops.trueIndices(ops.outlierMask(float64, samples, { threshold: 3, mean, std: stdDev })).length;
  return {
    mean,
    median,
    stdDev,
    cv,
    outliers,
    isStable: cv < 0.05 && outliers / samples.length < 0.05,
  };
}
