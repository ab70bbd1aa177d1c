// Ascending prime capacities a table grows through
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export function parsePrimes(raw: unknown, source = 'primes'): readonly number[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new Error(`${source}: expected a non-empty array of primes`);
  }
  const items: unknown[] = raw;
  const primes: number[] = [];
  for (const p of items) {
    if (typeof p !== 'number' || !Number.isInteger(p) || p < 2) {
      throw new Error(`${source}: ${String(p)} is not a valid capacity`);
    }
    if (primes.length > 0 && p <= primes[primes.length - 1]) {
      throw new Error(`${source}: capacities must be strictly ascending, got ${p} after ${primes[primes.length - 1]}`);
    }
    primes.push(p);
  }
  return Object.freeze(primes);
}

export function loadPrimes(filename: string): readonly number[] {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, filename), 'utf8'));
  return parsePrimes(raw, filename);
}

export const PRIMES = loadPrimes('primes.json');
