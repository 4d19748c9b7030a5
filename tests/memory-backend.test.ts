/**
 * In-memory backend tests - operators and SQL null semantics
 */

import { describe, it, expect } from 'vitest';
import {
  MemoryBackend,
  scan,
  filter,
  aggregate,
  joinNodes,
  orderBy,
  extend,
  window,
  union,
  col,
  agg,
  lit,
  Plan,
} from '../packages/index.js';
import { evaluate, matches } from '../packages/executor/index.js';

const backend = new MemoryBackend({
  a: [
    { k: 1, v: 10 },
    { k: 2, v: null },
    { k: null, v: 5 },
  ],
  b: [
    { k: 1, w: 'x' },
    { k: 1, w: 'y' },
    { k: null, w: 'z' },
  ],
});

describe('joins', () => {
  it('never matches NULL keys in a plain join', () => {
    const rows = backend.run(joinNodes('left', scan('a', ['k']), scan('b', ['k', 'w']), [{ left: 'a.k', right: 'b.k' }]));
    expect(rows).toEqual([
      { 'a.k': 1, 'b.k': 1, 'b.w': 'x' },
      { 'a.k': 1, 'b.k': 1, 'b.w': 'y' },
      { 'a.k': 2, 'b.k': null, 'b.w': null },
      { 'a.k': null, 'b.k': null, 'b.w': null },
    ]);
  });

  it('matches NULL keys when null-safe', () => {
    const rows = backend.run(joinNodes('inner', scan('a', ['k']), scan('b', ['k', 'w']), [{ left: 'a.k', right: 'b.k' }], true));
    expect(rows.map((row) => row['b.w'])).toEqual(['x', 'y', 'z']);
  });

  it('keeps each left row once in a semi-join', () => {
    const rows = backend.run(joinNodes('semi', scan('a', ['k', 'v']), scan('b', ['k']), [{ left: 'a.k', right: 'b.k' }]));
    expect(rows).toEqual([{ 'a.k': 1, 'a.v': 10 }]);
  });
});

describe('aggregates', () => {
  it('skips NULLs and returns NULL for empty sums', () => {
    const rows = backend.run(
      aggregate(scan('a', ['k', 'v']), [], [
        { name: 'total', expr: agg('sum', col('a.v')) },
        { name: 'rows', expr: agg('count') },
        { name: 'values', expr: agg('count', col('a.v')) },
        { name: 'mean', expr: agg('mean', col('a.v')) },
      ])
    );
    expect(rows).toEqual([{ total: 15, rows: 3, values: 2, mean: 7.5 }]);
  });

  it('yields one row for a grand aggregate over no input', () => {
    const empty = filter(scan('a', ['v']), [{ kind: 'compare', operator: '>', operand: col('a.v'), value: 100 }]);
    const rows = backend.run(aggregate(empty, [], [{ name: 'total', expr: agg('sum', col('a.v')) }, { name: 'n', expr: agg('count') }]));
    expect(rows).toEqual([{ total: null, n: 0 }]);
  });

  it('groups NULL keys together', () => {
    const rows = backend.run(
      aggregate(scan('b', ['k', 'w']), [{ name: 'k', expr: col('b.k') }], [{ name: 'n', expr: agg('count') }])
    );
    expect(rows).toEqual([
      { k: 1, n: 2 },
      { k: null, n: 1 },
    ]);
  });
});

describe('expressions and conditions', () => {
  it('returns NULL for division by zero', () => {
    expect(evaluate({ kind: 'binary', op: 'div', left: lit(1), right: lit(0) }, {})).toBeNull();
  });

  it('treats comparisons with NULL as false', () => {
    const row = { x: null };
    expect(matches({ kind: 'compare', operator: '=', operand: col('x'), value: 1 }, row)).toBe(false);
    expect(matches({ kind: 'compare', operator: '!=', operand: col('x'), value: 1 }, row)).toBe(false);
    expect(matches({ kind: 'compare', operator: 'is null', operand: col('x') }, row)).toBe(true);
  });

  it('matches LIKE patterns', () => {
    const row = { name: 'Anna' };
    expect(matches({ kind: 'compare', operator: 'like', operand: col('name'), value: 'A_n%' }, row)).toBe(true);
    expect(matches({ kind: 'compare', operator: 'like', operand: col('name'), value: 'a%' }, row)).toBe(false);
    expect(matches({ kind: 'compare', operator: 'ilike', operand: col('name'), value: 'a%' }, row)).toBe(true);
  });

  it('compares dates with date strings', () => {
    const row = { at: new Date('2024-03-17T00:00:00Z') };
    expect(matches({ kind: 'compare', operator: '>=', operand: col('at'), value: '2024-03-01' }, row)).toBe(true);
  });
});

describe('plans', () => {
  it('sorts NULLs last ascending', () => {
    const rows = backend.run(orderBy(scan('a', ['k']), [{ column: 'a.k', direction: 'asc' }]));
    expect(rows.map((row) => row['a.k'])).toEqual([1, 2, null]);
  });

  it('computes extended columns from earlier ones', () => {
    const plan = extend(scan('a', ['v']), [
      { name: 'double', expr: { kind: 'binary', op: 'mul', left: col('a.v'), right: lit(2) } },
      { name: 'plus_one', expr: { kind: 'binary', op: 'add', left: col('double'), right: lit(1) } },
    ]);
    expect(backend.run(plan).map((row) => row.plus_one)).toEqual([21, null, 11]);
  });

  it('executes through Plan', async () => {
    const plan = new Plan(aggregate(scan('a', ['v']), [], [{ name: 'n', expr: agg('count') }]));
    expect(await plan.execute(backend)).toEqual([{ n: 3 }]);
    await expect(plan.execute()).rejects.toThrow('No execution backend configured');
  });

  it('rejects tables it has no rows for', () => {
    expect(() => backend.run(scan('missing', ['x']))).toThrow("No rows registered for table 'missing'");
  });
});

describe('windows', () => {
  const scores = new MemoryBackend({
    s: [
      { g: 'a', n: 3 },
      { g: 'a', n: 1 },
      { g: 'a', n: 3 },
      { g: 'b', n: 2 },
      { g: 'b', n: null },
    ],
  });

  it('ranks, numbers, accumulates and looks back within partitions', () => {
    const byGroup = ['s.g'];
    const rows = scores.run(
      window(scan('s', ['g', 'n']), [
        { name: 'rk', fn: 'rank', partitionBy: byGroup, orderBy: [{ column: 's.n', direction: 'desc' }] },
        { name: 'dr', fn: 'dense_rank', partitionBy: byGroup, orderBy: [{ column: 's.n', direction: 'desc' }] },
        { name: 'rn', fn: 'row_number', partitionBy: [], orderBy: [{ column: 's.n', direction: 'asc' }] },
        { name: 'run', fn: 'running_sum', column: 's.n', partitionBy: byGroup, orderBy: [{ column: 's.n', direction: 'asc' }] },
        { name: 'prev', fn: 'lag', column: 's.n', partitionBy: byGroup, orderBy: [{ column: 's.n', direction: 'asc' }] },
      ])
    );
    // input order is kept; NULL sorts first descending and last ascending
    expect(rows).toEqual([
      { 's.g': 'a', 's.n': 3, rk: 1, dr: 1, rn: 3, run: 4, prev: 1 },
      { 's.g': 'a', 's.n': 1, rk: 3, dr: 2, rn: 1, run: 1, prev: null },
      { 's.g': 'a', 's.n': 3, rk: 1, dr: 1, rn: 4, run: 7, prev: 3 },
      { 's.g': 'b', 's.n': 2, rk: 2, dr: 2, rn: 2, run: 2, prev: null },
      { 's.g': 'b', 's.n': null, rk: 1, dr: 1, rn: 5, run: 2, prev: 2 },
    ]);
  });

  it('leads by an offset', () => {
    const rows = scores.run(
      window(scan('s', ['n']), [
        { name: 'next2', fn: 'lead', column: 's.n', offset: 2, partitionBy: [], orderBy: [{ column: 's.n', direction: 'asc' }] },
      ])
    );
    // ascending: 1, 2, 3, 3, NULL
    expect(rows.map((row) => row.next2)).toEqual([null, 3, null, 3, null]);
  });
});

describe('unions', () => {
  it('stacks inputs in order', () => {
    const k = col('a.k');
    const rows = backend.run(
      union([
        filter(scan('a', ['k']), [{ kind: 'compare', operator: '=', operand: k, value: 1 }]),
        filter(scan('a', ['k']), [{ kind: 'compare', operator: 'is null', operand: k }]),
      ])
    );
    expect(rows).toEqual([{ 'a.k': 1 }, { 'a.k': null }]);
  });

  it('rejects inputs with different columns', () => {
    expect(() => union([scan('a', ['k']), scan('b', ['k'])])).toThrow('Union inputs disagree on columns: [a.k] vs [b.k]');
  });
});

describe('text', () => {
  it('concatenates with NULL as empty text', () => {
    expect(evaluate({ kind: 'call', fn: 'concat', args: [lit('x'), lit(null), lit(2)] }, {})).toBe('x2');
  });

  it('casts dates to day or timestamp text', () => {
    const text = (value: Date) => evaluate({ kind: 'cast', to: 'string', operand: lit(value) }, {});
    expect(text(new Date('2024-03-01T00:00:00Z'))).toBe('2024-03-01');
    expect(text(new Date('2024-03-01T10:30:00Z'))).toBe('2024-03-01 10:30:00');
  });
});
