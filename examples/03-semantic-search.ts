import { SemanticIndex, loadEmbeddings } from '@vecta/semantic';
import { histogram, quartiles, rollingMean } from '@vecta/charts';

function main() {
  const embeddings = loadEmbeddings(
    [
      'running 0.9 0.1 0.0',
      'shoes 0.8 0.2 0.1',
      'sneakers 0.85 0.15 0.05',
      'coffee 0.0 0.1 0.9',
      'espresso 0.05 0.0 0.95',
    ].join('\n'),
  );

  const index = new SemanticIndex(
    ['sneakers', 'espresso machine', 'trail shoes'],
    ['sneakers for running', 'espresso coffee', 'shoes for running'],
    embeddings,
  );

  for (const { label, score } of index.search('running shoes', 2)) {
    console.log(`${label}: ${score.toFixed(3)}`);
  }
  console.log(index.duplicates(0.99));

  const latencies = [12, 15, 11, 30, 14, 13, 16, 12];
  console.log(rollingMean(latencies, 3));
  console.log(quartiles(latencies));
  console.log(histogram(latencies, 4));
}

main();
