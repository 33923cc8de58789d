import fc from 'fast-check';
import {expect, test} from 'vitest';
import {Counter} from './counter.js';
import {CountOverflowError} from './error/count-errors.js';
import {add, intersect, subtract, union} from './operators.js';

const letters = fc.constantFrom('a', 'b', 'c', 'd', 'e');
const counter = fc.array(letters).map(s => new Counter(s));

function counterOf(entries: [string, number][]) {
  return Counter.fromEntries(entries);
}

test('operators', () => {
  type Case = {
    name: string;
    op: (c: Counter<string>, d: Counter<string>) => Counter<string>;
    c: [string, number][];
    d: [string, number][];
    expected: [string, number][];
  };

  const c: [string, number][] = [
    ['a', 2],
    ['b', 1],
  ];
  const d: [string, number][] = [
    ['a', 1],
    ['c', 5],
  ];

  const cases: Case[] = [
    {
      name: 'add',
      op: add,
      c,
      d,
      expected: [
        ['a', 3],
        ['b', 1],
        ['c', 5],
      ],
    },
    {
      name: 'subtract',
      op: subtract,
      c,
      d,
      expected: [
        ['a', 1],
        ['b', 1],
      ],
    },
    {
      name: 'subtract reversed',
      op: subtract,
      c: d,
      d: c,
      expected: [['c', 5]],
    },
    {
      name: 'intersect',
      op: intersect,
      c,
      d,
      expected: [['a', 1]],
    },
    {
      name: 'union',
      op: union,
      c,
      d,
      expected: [
        ['a', 2],
        ['b', 1],
        ['c', 5],
      ],
    },
    {
      name: 'add empty',
      op: add,
      c,
      d: [],
      expected: c,
    },
    {
      name: 'intersect empty',
      op: intersect,
      c,
      d: [],
      expected: [],
    },
    {
      name: 'union with empty',
      op: union,
      c: [],
      d,
      expected: d,
    },
  ];

  for (const k of cases) {
    const left = counterOf(k.c);
    const right = counterOf(k.d);
    const out = k.op(left, right);
    expect([...out], k.name).toEqual(k.expected);
    expect(out, k.name).not.toBe(left);
    expect(out, k.name).not.toBe(right);
  }
});

test('methods match the free functions', () => {
  const c = new Counter(['a', 'a', 'b']);
  const d = new Counter(['a', 'c', 'c', 'c', 'c', 'c']);
  expect(c.add(d).equals(add(c, d))).toBe(true);
  expect(c.difference(d).equals(subtract(c, d))).toBe(true);
  expect(c.intersect(d).equals(intersect(c, d))).toBe(true);
  expect(c.union(d).equals(union(c, d))).toBe(true);
});

test('operands are not modified', () => {
  fc.assert(
    fc.property(counter, counter, (c, d) => {
      const cBefore = [...c];
      const dBefore = [...d];
      for (const op of [add, subtract, intersect, union]) {
        op(c, d);
        expect([...c]).toEqual(cBefore);
        expect([...d]).toEqual(dBefore);
      }
    }),
  );
});

test('add is commutative', () => {
  fc.assert(
    fc.property(counter, counter, (c, d) => {
      expect(add(c, d).equals(add(d, c))).toBe(true);
    }),
  );
});

test('intersect plus union equals add', () => {
  fc.assert(
    fc.property(counter, counter, (c, d) => {
      const low = intersect(c, d);
      const high = union(c, d);
      const keys = new Set([...c.keys(), ...d.keys()]);
      for (const x of keys) {
        expect(low.get(x) + high.get(x)).toBe(c.get(x) + d.get(x));
      }
    }),
  );
});

test('results never hold non-positive counts', () => {
  fc.assert(
    fc.property(counter, counter, (c, d) => {
      for (const op of [add, subtract, intersect, union]) {
        for (const [, count] of op(c, d)) {
          expect(count).toBeGreaterThan(0);
        }
      }
    }),
  );
});

test('subtract floors at zero', () => {
  fc.assert(
    fc.property(counter, counter, (c, d) => {
      const out = subtract(c, d);
      for (const x of c.keys()) {
        expect(out.get(x)).toBe(Math.max(c.get(x) - d.get(x), 0));
      }
      for (const x of out.keys()) {
        expect(c.has(x)).toBe(true);
      }
    }),
  );
});

test('result takes the options of the left operand', () => {
  type E = {id: number; tag: string};
  const getIdentity = (e: E) => e.id;
  const c = new Counter<E>([{id: 1, tag: 'c'}], {getIdentity});
  const d = new Counter<E>([
    {id: 1, tag: 'd'},
    {id: 2, tag: 'd'},
  ]);
  const out = add(c, d);
  expect(out.options.getIdentity).toBe(getIdentity);
  expect([...out]).toEqual([
    [{id: 1, tag: 'c'}, 2],
    [{id: 2, tag: 'd'}, 1],
  ]);
});

test('add past the largest safe integer throws', () => {
  const c = counterOf([['a', Number.MAX_SAFE_INTEGER]]);
  const d = counterOf([['a', 1]]);
  expect(() => add(c, d)).toThrow(CountOverflowError);
});
