/**
 * Timing helpers for the geometry benchmarks
 *
 * Every timing is tagged with an operation and a group: the Cayley-Klein
 * model it ran under, or `pg` for the plain plane. Reports put the groups
 * side by side so the polarities can be compared on one construction.
 */

export interface Timing {
  operation: string;
  group: string;
  iterations: number;
  /** Mean time per call in microseconds */
  meanUs: number;
  /** Median time per call in microseconds */
  medianUs: number;
}

export interface TimingOptions {
  /** Timed calls (default: 2000) */
  iterations?: number;
  /** Untimed calls before timing (default: 50) */
  warmup?: number;
  /** Log each timing as it finishes (default: false) */
  verbose?: boolean;
}

const DEFAULT_TIMING_OPTIONS: Required<TimingOptions> = {
  iterations: 2000,
  warmup: 50,
  verbose: false,
};

/**
 * Time one operation of one group
 */
export function timeOperation(
  operation: string,
  group: string,
  fn: () => unknown,
  options?: TimingOptions
): Timing {
  const opts = { ...DEFAULT_TIMING_OPTIONS, ...options };
  for (let i = 0; i < opts.warmup; i++) {
    fn();
  }

  const samples: number[] = [];
  for (let i = 0; i < opts.iterations; i++) {
    const start = performance.now();
    fn();
    samples.push((performance.now() - start) * 1000);
  }
  samples.sort((a, b) => a - b);

  const timing: Timing = {
    operation,
    group,
    iterations: samples.length,
    meanUs: samples.reduce((a, b) => a + b, 0) / Math.max(samples.length, 1),
    medianUs: samples.length > 0 ? samples[Math.floor(samples.length / 2)] : 0,
  };
  if (opts.verbose) {
    console.log(`[bench] ${group} ${operation}: ${timing.meanUs.toFixed(2)} us`);
  }
  return timing;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Mean microseconds per call: one row per operation, one column per group
 */
export function comparisonTable(timings: Timing[]): string {
  const operations = unique(timings.map((t) => t.operation));
  const groups = unique(timings.map((t) => t.group));
  const width = Math.max(9, ...operations.map((o) => o.length));
  const cell = Math.max(10, ...groups.map((g) => g.length));

  const header = `| ${'operation'.padEnd(width)} | ${groups.map((g) => g.padStart(cell)).join(' | ')} |`;
  const separator = `|${'-'.repeat(width + 2)}|${groups.map(() => '-'.repeat(cell + 2)).join('|')}|`;
  const rows = operations.map((op) => {
    const cells = groups.map((g) => {
      const t = timings.find((x) => x.operation === op && x.group === g);
      return (t ? t.meanUs.toFixed(2) : '-').padStart(cell);
    });
    return `| ${op.padEnd(width)} | ${cells.join(' | ')} |`;
  });
  return [header, separator, ...rows].join(`\n`);
}

/**
 * For each operation run in more than one group, the fastest and slowest
 * group and how many times slower the latter is
 */
export function relativeCost(timings: Timing[]): string[] {
  const lines: string[] = [];
  for (const op of unique(timings.map((t) => t.operation))) {
    const runs = timings.filter((t) => t.operation === op);
    if (runs.length < 2) continue;
    const fastest = runs.reduce((a, b) => (a.meanUs <= b.meanUs ? a : b));
    const slowest = runs.reduce((a, b) => (a.meanUs >= b.meanUs ? a : b));
    const ratio = fastest.meanUs > 0 ? slowest.meanUs / fastest.meanUs : 1;
    lines.push(`${op}: ${fastest.group} fastest, ${slowest.group} ${ratio.toFixed(2)}x slower`);
  }
  return lines;
}
