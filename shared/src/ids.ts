// 15/18-character record identifiers. The 18-char form appends a 3-char
// checksum encoding which of the first 15 characters are uppercase, so the
// two forms of one id compare equal only after reducing both to 15 chars.

const CHUNK = 5;

function checksumChar(chunk: string): string {
  let value = 0;
  for (let i = 0; i < chunk.length; i++) {
    const c = chunk.charAt(i);
    if (c >= 'A' && c <= 'Z') value += 2 ** i;
  }
  return value < 26 ? String.fromCharCode(65 + value) : String(value - 26);
}

function checksum(id15: string): string {
  let suffix = '';
  for (let i = 0; i < 3; i++) {
    suffix += checksumChar(id15.slice(i * CHUNK, (i + 1) * CHUNK));
  }
  return suffix;
}

export function to18(id: string): string {
  if (id.length !== 15) return id;
  return id + checksum(id);
}

export function to15(id: string): string {
  if (id.length === 18) return id.slice(0, 15);
  return id;
}

// The only identifier equality check in the codebase: trims both sides and
// compares their 15-char forms. Empty or missing ids never match.
export function sameEntity(a?: string | null, b?: string | null): boolean {
  const x = (a || '').trim();
  const y = (b || '').trim();
  if (!x || !y) return false;
  return to15(x) === to15(y);
}

export function isWellFormedId(id: string, prefix = '001'): boolean {
  const s = id.trim();
  if (s.length !== 15 && s.length !== 18) return false;
  if (!/^[a-zA-Z0-9]+$/.test(s)) return false;
  return s.startsWith(prefix);
}

export function hasValidChecksum(id: string): boolean {
  if (id.length !== 18) return false;
  return to18(id.slice(0, 15)) === id;
}

// Canonical 18-char form: checksum recomputed from the first 15 chars, so
// two spellings of one id (e.g. a lowercased checksum) share a key.
export function canonicalId(id: string): string {
  return to18(to15(id.trim()));
}

export type PartitionedIds = {
  // canonical 18-char id -> id as the caller first supplied it
  valid: Map<string, string>;
  invalid: string[];
};

export function partitionIds(ids: readonly string[], prefix = '001'): PartitionedIds {
  const valid = new Map<string, string>();
  const invalid: string[] = [];
  for (const raw of ids) {
    const id = String(raw).trim();
    if (isWellFormedId(id, prefix)) {
      const key = canonicalId(id);
      if (!valid.has(key)) valid.set(key, id);
    } else {
      invalid.push(id);
    }
  }
  return { valid, invalid };
}
