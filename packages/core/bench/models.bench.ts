/**
 * Cayley-Klein benchmarks: the same constructions under each polarity
 */

import {
  ELLIPTIC,
  EUCLID,
  HYPERBOLIC,
  MYCK,
  PERSP,
  ckLine,
  ckPoint,
  orthocenter,
  reflect,
  triAltitude,
  type CayleyKleinModel,
} from '../src/index.js';
import { comparisonTable, relativeCost, timeOperation, type Timing } from './utils.js';

const MODELS: CayleyKleinModel[] = [ELLIPTIC, HYPERBOLIC, MYCK, EUCLID, PERSP];

function benchmarkModel(model: CayleyKleinModel): Timing[] {
  const a = ckPoint(model, [1, 3, 2]);
  const b = ckPoint(model, [4, -2, 3]);
  const c = ckPoint(model, [-1, 1, 5]);
  const mirror = ckLine(model, [3, -7, 11]);
  const p = ckPoint(model, [13, 17, 19]);

  return [
    timeOperation('orthocenter', model.name, () => orthocenter([a, b, c])),
    timeOperation('triAltitude', model.name, () => triAltitude([a, b, c])),
    timeOperation('reflect', model.name, () => reflect(mirror, p)),
    // coordinates grow past 2^53 on the second reflection
    timeOperation('reflect twice', model.name, () => reflect(mirror, reflect(mirror, p))),
  ];
}

export function runModelBenchmarks(): Timing[] {
  console.log('='.repeat(60));
  console.log('CAYLEY-KLEIN MODELS (mean us per call)');
  console.log('='.repeat(60));
  console.log('');

  const timings = MODELS.flatMap(benchmarkModel);
  console.log(comparisonTable(timings));
  console.log('');
  for (const line of relativeCost(timings)) {
    console.log(`  ${line}`);
  }
  return timings;
}
