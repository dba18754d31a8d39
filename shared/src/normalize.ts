import type { AccountField, AccountRecord, FieldValue } from './models';

const LEGAL_SUFFIXES = [
  'inc',
  'incorporated',
  'llc',
  'corp',
  'corporation',
  'ltd',
  'limited',
  'llp',
  'company',
  'co',
  'group',
  'holdings',
  'enterprises',
] as const;

const SUFFIX_SEPARATORS = [' ', '.', ',', '-'] as const;

// Every "<sep><suffix>" pattern, longest first so a longer suffix always wins
const SUFFIX_PATTERNS: readonly string[] = LEGAL_SUFFIXES.flatMap((s) => SUFFIX_SEPARATORS.map((sep) => `${sep}${s}`)).sort(
  (a, b) => b.length - a.length
);

// Trimmed text of a record field; numbers (postal codes from exports) are stringified.
export function fieldText(v: FieldValue): string {
  if (v == null) return '';
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : '';
  return v.trim();
}

export type FieldPick<F extends AccountField> = { value: string; field: F };

export function firstPopulated<F extends AccountField>(record: AccountRecord, fields: readonly F[]): FieldPick<F> | null {
  for (const field of fields) {
    const value = fieldText(record[field]);
    if (value) return { value, field };
  }
  return null;
}

export function stripLegalSuffix(lowered: string): string {
  for (const pattern of SUFFIX_PATTERNS) {
    if (lowered.endsWith(pattern)) return lowered.slice(0, -pattern.length);
  }
  return lowered;
}

function normalizePass(s: string): string {
  return stripLegalSuffix(s.toLowerCase())
    .replace(/[^a-z0-9 ]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// One suffix per pass, repeated until stable: "Acme Co., Inc." -> "acme"
export function normalizeCompanyName(text?: string | null): string {
  if (!text) return '';
  let current = normalizePass(text);
  for (;;) {
    const next = normalizePass(current);
    if (next === current) return current;
    current = next;
  }
}
