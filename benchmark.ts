import { Map as ImmutableMap, Set as ImmutableSet } from 'immutable';
import { LinearProbeTable } from './linear-probe-table';
import { LinearProbeSet } from './linear-probe-set';

function parseSizes(raw: string | undefined): number[] {
  if (!raw) return [100, 1000, 10000];
  const sizes = raw.split(',').map(s => Number(s.trim()));
  for (const n of sizes) {
    if (!Number.isInteger(n) || n <= 0) throw new Error(`BENCH_SIZES: invalid size "${n}"`);
  }
  return sizes;
}

const SIZES = parseSizes(process.env.BENCH_SIZES);

function bench(fn: () => void, iterations: number): number {
  for (let i = 0; i < Math.min(50, iterations); i++) fn();
  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  return (performance.now() - start) / iterations;
}

function printRow(op: string, probeMs: number, immMs: number, nativeMs?: number) {
  const ratio = probeMs < immMs ? `${(immMs/probeMs).toFixed(2)}x faster` : `${(probeMs/immMs).toFixed(2)}x slower`;
  let row = `${op.padEnd(12)} │ ${probeMs.toFixed(4).padStart(9)} │ ${immMs.toFixed(4).padStart(8)} │ ${ratio.padEnd(14)}`;
  if (nativeMs !== undefined) {
    const nRatio = probeMs < nativeMs ? `${(nativeMs/probeMs).toFixed(2)}x faster` : `${(probeMs/nativeMs).toFixed(2)}x slower`;
    row += ` │ ${nativeMs.toFixed(4).padStart(8)} │ ${nRatio}`;
  }
  console.log(row);
}

function header3() {
  console.log('Operation     │ LP (ms)   │ Imm (ms) │ vs Imm         │ Nat (ms) │ vs Native');
  console.log('──────────────┼───────────┼──────────┼────────────────┼──────────┼──────────');
}

function benchTable() {
  console.log(`\n${'='.repeat(60)}`);
  console.log(`LinearProbeTable vs Immutable.Map vs Native Map`);
  console.log(`${'='.repeat(60)}`);

  for (const N of SIZES) {
    const iterations = Math.max(20, Math.floor(50000 / N));
    const keys = Array.from({ length: N }, (_, i) => `key${i}`);

    console.log(`\n--- N=${N} (${iterations} iterations) ---`);
    header3();

    // Starts small so growth is part of the measurement.
    printRow('set',
      bench(() => { const t = new LinearProbeTable<number>(); for (let i = 0; i < N; i++) t.set(keys[i], i); }, iterations),
      bench(() => { let m = ImmutableMap<string, number>(); for (let i = 0; i < N; i++) m = m.set(keys[i], i); }, iterations),
      bench(() => { const m = new Map<string, number>(); for (let i = 0; i < N; i++) m.set(keys[i], i); }, iterations));

    const pairs = keys.map((k, i): [string, number] => [k, i]);
    const lp = LinearProbeTable.from(pairs);
    const im = ImmutableMap<string, number>(pairs);
    const nm = new Map(pairs);

    printRow('get',
      bench(() => { for (const k of keys) lp.get(k); }, iterations),
      bench(() => { for (const k of keys) im.get(k); }, iterations),
      bench(() => { for (const k of keys) nm.get(k); }, iterations));

    printRow('has',
      bench(() => { for (const k of keys) lp.has(k); }, iterations),
      bench(() => { for (const k of keys) im.has(k); }, iterations),
      bench(() => { for (const k of keys) nm.has(k); }, iterations));

    // Delete then restore, so every iteration sees the same clusters.
    printRow('delete',
      bench(() => { for (let i = 0; i < 10; i++) { lp.delete(keys[i]); lp.set(keys[i], i); } }, iterations),
      bench(() => { let x = im; for (let i = 0; i < 10; i++) x = x.delete(keys[i]).set(keys[i], i); }, iterations),
      bench(() => { for (let i = 0; i < 10; i++) { nm.delete(keys[i]); nm.set(keys[i], i); } }, iterations));

    printRow('iter',
      bench(() => { let c = 0; lp.forEach(() => c++); }, iterations),
      bench(() => { let c = 0; im.forEach(() => c++); }, iterations),
      bench(() => { let c = 0; nm.forEach(() => c++); }, iterations));
  }
}

function benchSet() {
  console.log(`\n${'='.repeat(60)}`);
  console.log(`LinearProbeSet vs Immutable.Set vs Native Set`);
  console.log(`${'='.repeat(60)}`);

  for (const N of SIZES) {
    const iterations = Math.max(20, Math.floor(50000 / N));
    const values = Array.from({ length: N }, (_, i) => `item${i}`);

    console.log(`\n--- N=${N} (${iterations} iterations) ---`);
    header3();

    printRow('add',
      bench(() => { const s = new LinearProbeSet<string>(); for (const v of values) s.add(v); }, iterations),
      bench(() => { let s = ImmutableSet<string>(); for (const v of values) s = s.add(v); }, iterations),
      bench(() => { const s = new Set<string>(); for (const v of values) s.add(v); }, iterations));

    const ls = new LinearProbeSet<string>().addMany(values);
    const is = ImmutableSet<string>(values);
    const ns = new Set(values);

    printRow('has',
      bench(() => { for (const v of values) ls.has(v); }, iterations),
      bench(() => { for (const v of values) is.has(v); }, iterations),
      bench(() => { for (const v of values) ns.has(v); }, iterations));

    printRow('iter',
      bench(() => { let c = 0; ls.forEach(() => c++); }, iterations),
      bench(() => { let c = 0; is.forEach(() => c++); }, iterations),
      bench(() => { let c = 0; ns.forEach(() => c++); }, iterations));
  }
}

benchTable();
benchSet();
