import { HashMap, NumberSet, numberSetMap } from './sets.js';

describe('NumberSet', () => {
  test('hash', () => {
    expect(new NumberSet([6, 2, 7, 3]).hash()).toBe('{2,3,6,7}');
    expect(new NumberSet([10, 9]).hash()).toBe('{9,10}');
    expect(new NumberSet().hash()).toBe('{}');
  });

  test('sorted and min', () => {
    expect(new NumberSet([3, 11, 2]).sorted()).toEqual([2, 3, 11]);
    expect(new NumberSet([3, 11, 2]).min()).toBe(2);
    expect(new NumberSet().min()).toBeUndefined();
  });

  test('intersection, difference and intersects', () => {
    const a = new NumberSet([1, 2, 3, 4]);
    const b = new NumberSet([3, 4, 5]);
    expect(a.intersection(b).sorted()).toEqual([3, 4]);
    expect(a.difference(b).sorted()).toEqual([1, 2]);
    expect(a.intersects(b)).toBe(true);
    expect(a.intersects(new Set([7]))).toBe(false);
  });
});

describe('HashMap', () => {
  test('keys that hash the same share an entry', () => {
    const map = numberSetMap<string>();
    map.set(new NumberSet([1, 2]), 'first');
    map.set(new NumberSet([2, 1]), 'second');
    expect(map.get(new NumberSet([1, 2]))).toBe('second');
    expect(map.get(new NumberSet([1]))).toBeUndefined();
  });

  test('uses the given hasher', () => {
    const map = new HashMap<string, number>((s) => s.toLowerCase());
    map.set('A', 1).set('b', 2);
    expect(map.get('a')).toBe(1);
    expect(map.get('B')).toBe(2);
  });
});
