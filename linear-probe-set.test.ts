import { LinearProbeSet } from './linear-probe-set';
import { LinearProbeTable } from './linear-probe-table';
import { expect, test, describe } from 'vitest';

describe('LinearProbeSet', () => {
  test('empty set has size 0', () => {
    expect(new LinearProbeSet().size).toBe(0);
  });

  test('add increases size', () => {
    const s = new LinearProbeSet().add('a').add('b');
    expect(s.size).toBe(2);
  });

  test('add duplicate does not increase size', () => {
    const s = new LinearProbeSet().add('a').add('a');
    expect(s.size).toBe(1);
  });

  test('has returns true for existing', () => {
    const s = new LinearProbeSet().add('x');
    expect(s.has('x')).toBe(true);
    expect(s.has('y')).toBe(false);
  });

  test('delete removes element', () => {
    const s = new LinearProbeSet().add('a').add('b');
    expect(s.delete('a')).toBe(true);
    expect(s.has('a')).toBe(false);
    expect(s.has('b')).toBe(true);
    expect(s.size).toBe(1);
  });

  test('delete non-existent returns false', () => {
    const s = new LinearProbeSet().add('a');
    expect(s.delete('b')).toBe(false);
    expect(s.size).toBe(1);
  });

  test('values iteration', () => {
    const s = new LinearProbeSet().add('a').add('b').add('c');
    const vals = [...s.values()].sort();
    expect(vals).toEqual(['a', 'b', 'c']);
  });

  test('forEach', () => {
    const s = new LinearProbeSet<string>().add('x').add('y');
    const seen: string[] = [];
    s.forEach(v => seen.push(v));
    expect(seen.sort()).toEqual(['x', 'y']);
  });

  test('addMany', () => {
    const s = new LinearProbeSet().addMany(['a', 'b', 'c', 'a']);
    expect(s.size).toBe(3);
    expect(s.has('a')).toBe(true);
    expect(s.has('b')).toBe(true);
    expect(s.has('c')).toBe(true);
  });

  test('numeric values come back as numbers', () => {
    const s = new LinearProbeSet<number>().add(1).add(2).add(3);
    expect(s.has(1)).toBe(true);
    expect(s.has(4)).toBe(false);
    expect(s.size).toBe(3);
    expect([...s.values()].sort()).toEqual([1, 2, 3]);
  });

  test('number and its string form are one member', () => {
    const s = new LinearProbeSet<string | number>().add(7).add('7');
    expect(s.size).toBe(1);
    expect([...s.values()]).toEqual([7]);
  });

  test('wraps an existing table', () => {
    const table = new LinearProbeTable<string>(3);
    const s = new LinearProbeSet(table).addMany(['p', 'q', 'r', 's']);
    expect(table.size).toBe(4);
    expect(table.capacity).toBe(7);
    expect(s.has('s')).toBe(true);
  });

  test('many elements', () => {
    const s = new LinearProbeSet<string>();
    for (let i = 0; i < 1000; i++) s.add(`item${i}`);
    expect(s.size).toBe(1000);
    for (let i = 0; i < 1000; i++) expect(s.has(`item${i}`)).toBe(true);
    for (let i = 0; i < 1000; i += 3) s.delete(`item${i}`);
    expect(s.size).toBe(666);
    expect(s.has('item999')).toBe(false);
    expect(s.has('item998')).toBe(true);
  });
});
