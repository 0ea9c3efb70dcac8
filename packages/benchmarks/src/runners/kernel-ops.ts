/**
 * Kernel Benchmark Runner
 *
 * Benchmarks element-wise arithmetic, vector algebra, the matrix product and
 * similarity ranking with tinybench, then prints a results table.
 *
 * Run with `BENCHMARK_PROFILE=quick|standard|precise`.
 */

import { Bench } from 'tinybench';
import { matrix, vector } from '@vecta/core';
import { getBenchmarkConfig, getBenchmarkProfile } from '../utils/config';
import { generateEmbeddings, generateRandomRows, generateRandomValues } from '../utils/data';
import { formatBenchResults, resultsToMarkdownTable } from '../utils/formatting';
import { MATRIX_SIZES, VECTOR_SIZES } from '../utils/sizes';

export async function runKernelBenchmarks(): Promise<Bench> {
  const profile = getBenchmarkProfile();
  const bench = new Bench(getBenchmarkConfig());
  console.log(`📊 Using profile: ${profile}\n`);

  console.log('Setting up operands...');
  for (const size of VECTOR_SIZES) {
    const a = vector(generateRandomValues(size.elements));
    const b = vector(generateRandomValues(size.elements));
    bench
      .add(`add ${size.name} (${size.shape.join('×')})`, () => {
        a.add(b);
      })
      .add(`dot ${size.name} (${size.shape.join('×')})`, () => {
        a.dot(b);
      })
      .add(`variance ${size.name} (${size.shape.join('×')})`, () => {
        a.variance();
      });
  }

  for (const size of MATRIX_SIZES) {
    const [rows, columns] = size.shape;
    const a = matrix(generateRandomRows(rows, columns));
    const b = matrix(generateRandomRows(columns, rows));
    bench.add(`multiplyMatrix ${size.name} (${size.shape.join('×')})`, () => {
      a.multiplyMatrix(b);
    });
  }

  const database = matrix(generateEmbeddings(1000, 64));
  const query = vector(generateEmbeddings(1, 64)[0]);
  bench.add('top-10 search over 1000×64 embeddings', () => {
    database.cosineSimilarities(query).topIndices(10);
  });

  console.log(`\nRunning ${bench.tasks.length.toString()} benchmarks...\n`);

  let completed = 0;
  const total = bench.tasks.length;
  bench.addEventListener('cycle', (e) => {
    completed++;
    console.log(`[${completed.toString()}/${total.toString()}] Completed: ${e.task?.name ?? 'unknown'}`);
  });

  await bench.warmup();
  await bench.run();

  console.log('\n📊 Benchmark Results\n');
  console.log(resultsToMarkdownTable(formatBenchResults(bench)));
  return bench;
}

runKernelBenchmarks().catch((error: unknown) => {
  console.error('Benchmark run failed:', error);
  process.exitCode = 1;
});
