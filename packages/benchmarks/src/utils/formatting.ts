/**
 * Benchmark result formatting utilities
 */

import type { Bench, Task } from 'tinybench';

export interface FormattedResult {
  readonly name: string;
  readonly ops: number;
  /** Mean latency in nanoseconds */
  readonly mean: number;
  readonly p75: number;
  readonly p99: number;
  readonly stdDev: number;
  readonly margin: number;
  readonly samples: number;
  /** Coefficient of variation */
  readonly cv: number;
}

// tinybench reports milliseconds
const NS_PER_MS = 1_000_000;

/**
 * Format a single benchmark task result, or `undefined` if the task has not run
 */
export function formatTaskResult(task: Task): FormattedResult | undefined {
  const result = task.result;
  if (result === undefined) {
    return undefined;
  }
  const mean = result.mean * NS_PER_MS;
  const stdDev = result.sd * NS_PER_MS;
  return {
    name: task.name,
    ops: result.hz,
    mean,
    p75: result.p75 * NS_PER_MS,
    p99: result.p99 * NS_PER_MS,
    stdDev,
    margin: result.moe * NS_PER_MS,
    samples: result.samples.length,
    cv: mean > 0 ? stdDev / mean : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task);
    if (formatted !== undefined) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Pick a unit for a latency given in nanoseconds
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P75', 'P99', 'Std Dev', 'Margin'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatLatency(r.p75),
    formatLatency(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
  ]);

  return [headers, separator, ...rows].map((row) => row.join(' | ')).join('\n');
}
