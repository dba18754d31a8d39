import { fieldText, firstPopulated, normalizeCompanyName, stripLegalSuffix } from '../shared/src/normalize';

test('normalizeCompanyName strips legal suffixes', () => {
  expect(normalizeCompanyName('Tacoma Inc')).toBe('tacoma');
  expect(normalizeCompanyName('Acme-Corp')).toBe('acme');
  expect(normalizeCompanyName('Acme Holdings LLC')).toBe('acme');
  expect(normalizeCompanyName('Acme Co., Inc.')).toBe('acme');
});

test('suffix needs a separator', () => {
  expect(normalizeCompanyName('Cisco')).toBe('cisco');
  expect(normalizeCompanyName('Costco')).toBe('costco');
  expect(stripLegalSuffix('acme inc')).toBe('acme');
  expect(stripLegalSuffix('acme incorporated')).toBe('acme');
  expect(stripLegalSuffix('zinc')).toBe('zinc');
});

test('punctuation becomes whitespace', () => {
  expect(normalizeCompanyName('AT&T Inc.')).toBe('at t');
  expect(normalizeCompanyName('  Foo   Bar!! ')).toBe('foo bar');
});

test('empty input', () => {
  expect(normalizeCompanyName('')).toBe('');
  expect(normalizeCompanyName(null)).toBe('');
  expect(normalizeCompanyName(' , ')).toBe('');
});

test('normalizeCompanyName is idempotent', () => {
  for (const name of ['Acme Co., Inc.', 'Globex Corporation', 'Initech Group Ltd', 'AT&T Inc.', 'Foo-Co']) {
    const once = normalizeCompanyName(name);
    expect(normalizeCompanyName(once)).toBe(once);
  }
});

test('fieldText and firstPopulated', () => {
  expect(fieldText(75001)).toBe('75001');
  expect(fieldText('  x ')).toBe('x');
  expect(fieldText(null)).toBe('');
  expect(firstPopulated({ Name: ' ', EnrichedCompanyName: 'Acme' }, ['Name', 'EnrichedCompanyName'])).toEqual({
    value: 'Acme',
    field: 'EnrichedCompanyName',
  });
  expect(firstPopulated({}, ['Name'])).toBeNull();
});
