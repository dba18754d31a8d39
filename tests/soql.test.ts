import { buildIdQuery, effectiveLimit, extractLimit, validateIdQuery } from '../shared/src/soql';

test('accepts id-only account queries', () => {
  expect(validateIdQuery("SELECT Id FROM Account WHERE Name LIKE 'Acme%'")).toEqual({ ok: true });
  expect(validateIdQuery('select id from account limit 10')).toEqual({ ok: true });
});

test('rejects everything else', () => {
  expect(validateIdQuery('')).toEqual({ ok: false, error: 'Empty query not allowed' });
  expect(validateIdQuery('DELETE FROM Account')).toEqual({ ok: false, error: 'Query must start with SELECT' });
  expect(validateIdQuery("SELECT Id FROM Account WHERE Name = 'delete me'")).toEqual({ ok: false, error: 'Query contains write keywords' });
  expect(validateIdQuery('SELECT Id, Name FROM Account')).toEqual({ ok: false, error: 'Query must select only the Account Id field' });
  expect(validateIdQuery('SELECT Id FROM Contact')).toEqual({ ok: false, error: 'Query must be from the Account object' });
});

test('limits', () => {
  expect(extractLimit('SELECT Id FROM Account LIMIT 25')).toBe(25);
  expect(extractLimit('SELECT Id FROM Account')).toBeUndefined();
  expect(effectiveLimit('SELECT Id FROM Account LIMIT 500', 100)).toBe(100);
  expect(effectiveLimit('SELECT Id FROM Account LIMIT 50', 100)).toBe(50);
  expect(effectiveLimit('SELECT Id FROM Account LIMIT 50')).toBe(50);
  expect(effectiveLimit('SELECT Id FROM Account')).toBeUndefined();
});

test('buildIdQuery caps or appends LIMIT', () => {
  expect(buildIdQuery('SELECT Id FROM Account', 100)).toBe('SELECT Id FROM Account LIMIT 100');
  expect(buildIdQuery('SELECT Id FROM Account limit 500', 100)).toBe('SELECT Id FROM Account LIMIT 100');
  expect(buildIdQuery(' SELECT Id FROM Account ')).toBe('SELECT Id FROM Account');
});
