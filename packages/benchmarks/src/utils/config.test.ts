import { describe, it, expect } from 'vitest';
import { BENCHMARK_PROFILES, analyzeResults, getBenchmarkConfig, getBenchmarkProfile } from './config';

describe('benchmark config', () => {
  it('should pick the profile named in the environment', () => {
    expect(getBenchmarkProfile({ BENCHMARK_PROFILE: 'quick' })).toBe('quick');
    expect(getBenchmarkConfig({ BENCHMARK_PROFILE: 'precise' })).toBe(BENCHMARK_PROFILES.precise);
  });

  it('should fall back to the standard profile', () => {
    expect(getBenchmarkProfile({})).toBe('standard');
    expect(getBenchmarkProfile({ BENCHMARK_PROFILE: 'turbo' })).toBe('standard');
  });

  it('should analyze timing samples', () => {
    const analysis = analyzeResults([10, 10, 10, 10]);
    expect(analysis).toEqual({ mean: 10, median: 10, stdDev: 0, cv: 0, outliers: 0, isStable: true });
  });

  it('should need at least two samples', () => {
    expect(analyzeResults([5])).toBeUndefined();
    expect(analyzeResults([])).toBeUndefined();
  });
});
