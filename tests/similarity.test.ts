import { matchingBlocks, matchRatio, similarity } from '../shared/src/similarity';

test('matchingBlocks takes the longest run first', () => {
  expect(matchingBlocks('abxcd', 'abcd')).toEqual([
    { a: 0, b: 0, size: 2 },
    { a: 3, b: 2, size: 2 },
  ]);
  expect(matchRatio('abxcd', 'abcd')).toBeCloseTo(8 / 9, 10);
});

test('similarity of a name against its domain token', () => {
  expect(similarity('Carlos Reyes', 'carlosreyeszumba')).toBeCloseTo(22 / 28, 10);
});

test('similarity normalizes first', () => {
  expect(similarity('Acme Inc', 'ACME, LLC')).toBe(1);
  expect(similarity('Acme', 'Globex')).toBeCloseTo(0.2, 10);
});

test('similarity is symmetric', () => {
  const pairs: Array<[string, string]> = [
    ['abcd', 'bcda'],
    ['Acme Widgets', 'widgetsacme'],
    ['Initech', 'initrode'],
  ];
  for (const [a, b] of pairs) {
    expect(similarity(a, b)).toBe(similarity(b, a));
  }
});

test('identical names score one', () => {
  expect(similarity('Globex', 'globex')).toBe(1);
  expect(similarity('Initech Group', 'Initech Group')).toBe(1);
});

test('empty sides score zero', () => {
  expect(similarity('Acme', '')).toBe(0);
  expect(similarity(null, 'Acme')).toBe(0);
  expect(similarity('Inc', 'acme')).toBe(similarity('inc', 'acme'));
  expect(matchRatio('', '')).toBe(0);
});
