/**
 * Projective plane benchmarks
 *
 * Incidence primitives and the configuration checks built on them, on
 * small coordinates and on coordinates far beyond 2^53.
 */

import {
  checkDesargue,
  checkPappus,
  harmConj,
  involution,
  pgLine,
  pgPoint,
  type PgPoint,
  type Triangle,
} from '../src/index.js';
import { comparisonTable, timeOperation, type Timing } from './utils.js';

const BIG = 2n ** 80n;

const tri1: Triangle<PgPoint> = [pgPoint([1, 0, 1]), pgPoint([0, 1, 1]), pgPoint([1, 2, 1])];
const tri2: Triangle<PgPoint> = [pgPoint([2, 0, 1]), pgPoint([0, 2, 1]), pgPoint([3, 1, 1])];

const co1: Triangle<PgPoint> = [pgPoint([0, 0, 1]), pgPoint([1, 0, 1]), pgPoint([3, 0, 1])];
const co2: Triangle<PgPoint> = [pgPoint([0, 1, 1]), pgPoint([2, 1, 1]), pgPoint([5, 1, 1])];

function benchmarkScale(group: string, k: bigint): Timing[] {
  const p = pgPoint([k, 3n, 2n]);
  const q = pgPoint([-2n, k, -1n]);
  const l = pgLine([-5n, 3n, 4n * k]);
  const a = pgPoint([0n, 0n, 1n]);
  const b = pgPoint([4n * k, 0n, 1n]);
  const c = pgPoint([1n, 0n, 1n]);

  return [
    timeOperation('meet', group, () => p.meet(q), { iterations: 10000 }),
    timeOperation('incident', group, () => p.incident(l), { iterations: 10000 }),
    timeOperation('harmConj', group, () => harmConj(a, b, c)),
    timeOperation('involution', group, () => involution(p, l, q)),
  ];
}

export function runPlaneBenchmarks(): Timing[] {
  console.log('='.repeat(60));
  console.log('PROJECTIVE PLANE (mean us per call)');
  console.log('='.repeat(60));
  console.log('');

  const timings = [
    ...benchmarkScale('pg', 1n),
    ...benchmarkScale('pg 2^80', BIG),
    timeOperation('checkDesargue', 'pg', () => checkDesargue(tri1, tri2)),
    timeOperation('checkPappus', 'pg', () => checkPappus(co1, co2)),
  ];
  console.log(comparisonTable(timings));
  return timings;
}
