// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Task, Options as BenchOptions, TaskResult } from 'tinybench';

// Export utilities
export * from './utils/config';
export * from './utils/sizes';
export * from './utils/data';
export * from './utils/formatting';
