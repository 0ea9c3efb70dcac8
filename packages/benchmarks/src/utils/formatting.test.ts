import { describe, it, expect } from 'vitest';
import { formatLatency, resultsToMarkdownTable } from './formatting';

describe('benchmark formatting', () => {
  it('should choose a latency unit', () => {
    expect(formatLatency(500)).toBe('500ns');
    expect(formatLatency(1500)).toBe('1.5μs');
    expect(formatLatency(2_500_000)).toBe('2.500ms');
  });

  it('should render a markdown table', () => {
    const table = resultsToMarkdownTable([
      { name: 'dot tiny', ops: 1000, mean: 500, p75: 600, p99: 900, stdDev: 50, margin: 10, samples: 100, cv: 0.1 },
    ]);
    expect(table.split('\n')).toEqual([
      'Name | Ops/sec | Mean | P75 | P99 | Std Dev | Margin',
      '---- | ------- | ---- | --- | --- | ------- | ------',
      'dot tiny | 1000.00 | 500ns | 600ns | 900ns | 50ns | ±10ns',
    ]);
  });
});
