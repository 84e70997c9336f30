import { describe, expect, it } from 'vitest';
import { daysFrom, flagBool, flagStr, parseFlags, positionals, splitCSV } from './utils.js';

describe('flags parsing & accessors', () => {
  it('parseFlags handles --k=v and bare --k', () => {
    const flags = parseFlags(['--a=1', '--b', 'positional', '--empty=   ', '--c=hello']);
    // values are strings
    expect(flags).toEqual({ a: '1', b: 'true', empty: '', c: 'hello' });
  });

  it('parseFlags ignores non --* tokens and keeps last occurrence', () => {
    const flags = parseFlags(['a=1', '-x', '--k=1', '--k=2']);
    expect(flags.k).toBe('2');
    expect(flags).not.toHaveProperty('a');
  });

  it('positionals keeps order and drops flags', () => {
    expect(positionals(['ops-bot', '--prefix=test', 'tracking:read'])).toEqual([
      'ops-bot',
      'tracking:read',
    ]);
  });

  it('flagStr trims and returns undefined for empty/whitespace', () => {
    const f = { a: ' x ', b: '', c: '   ' };
    expect(flagStr(f, 'a')).toBe('x');
    expect(flagStr(f, 'b')).toBeUndefined();
    expect(flagStr(f, 'c')).toBeUndefined();
    expect(flagStr(f, 'missing')).toBeUndefined();
  });

  it('flagBool accepts true-ish variants, otherwise false', () => {
    const f = parseFlags(['--t1=true', '--t2=1', '--t3=YES', '--t4=on', '--f1=false', '--f2=0']);
    expect(flagBool(f, 't1')).toBe(true);
    expect(flagBool(f, 't2')).toBe(true);
    expect(flagBool(f, 't3')).toBe(true);
    expect(flagBool(f, 't4')).toBe(true);

    expect(flagBool(f, 'f1')).toBe(false);
    expect(flagBool(f, 'f2')).toBe(false);
    expect(flagBool({}, 'missing')).toBe(false);
  });

  it('splitCSV splits on commas/whitespace and filters empties', () => {
    expect(splitCSV('a,b c')).toEqual(['a', 'b', 'c']);
    expect(splitCSV('  x,  y ,   z  ')).toEqual(['x', 'y', 'z']);
    expect(splitCSV(undefined)).toEqual([]);
  });
});

describe('daysFrom', () => {
  it('offsets by whole days in either direction', () => {
    const now = new Date('2025-05-06T07:08:09.000Z');
    expect(daysFrom(now, 9).toISOString()).toBe('2025-05-15T07:08:09.000Z');
    expect(daysFrom(now, -5).toISOString()).toBe('2025-05-01T07:08:09.000Z');
  });
});
