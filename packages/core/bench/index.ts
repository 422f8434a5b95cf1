/**
 * Geometry benchmarks
 *
 * Informative timings for the incidence primitives and the constructions
 * built on them, with the five polarities side by side.
 *
 * Usage:
 *   npm run bench --workspace @projective-plane/core
 */

import { runModelBenchmarks } from './models.bench.js';
import { runPlaneBenchmarks } from './plane.bench.js';

export function runAllBenchmarks(): void {
  console.log('');
  console.log(`Date: ${new Date().toISOString()}`);
  console.log(`Node: ${process.version}`);
  console.log('');

  const plane = runPlaneBenchmarks();
  console.log('');
  const models = runModelBenchmarks();
  console.log('');

  const all = [...plane, ...models];
  const slowest = all.reduce((a, b) => (a.meanUs > b.meanUs ? a : b));
  console.log(`Slowest: ${slowest.group} ${slowest.operation} (${slowest.meanUs.toFixed(2)} us)`);
}

const isMain = typeof process !== 'undefined' && process.argv[1]?.includes('bench');
if (isMain) {
  runAllBenchmarks();
}
