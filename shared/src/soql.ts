// Guards for caller-supplied SOQL that selects account ids only.

const WRITE_KEYWORDS = ['DELETE', 'UPDATE', 'INSERT', 'UPSERT', 'MERGE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE'];
const LIMIT_RE = /LIMIT\s+(\d+)/i;

export type QueryCheck = { ok: true } | { ok: false; error: string };

export function validateIdQuery(query?: string | null): QueryCheck {
  const q = (query || '').trim();
  if (!q) return { ok: false, error: 'Empty query not allowed' };
  const upper = q.toUpperCase();
  if (!upper.startsWith('SELECT')) return { ok: false, error: 'Query must start with SELECT' };
  if (WRITE_KEYWORDS.some((k) => new RegExp(`\\b${k}\\b`).test(upper))) {
    return { ok: false, error: 'Query contains write keywords' };
  }
  const select = /^SELECT\s+([\s\S]*?)\s+FROM\b/.exec(upper);
  if (!select) return { ok: false, error: 'Invalid SELECT clause' };
  const fields = select[1].replace(/\s+/g, '');
  if (!/^(ID|\w+\.ID)$/.test(fields)) return { ok: false, error: 'Query must select only the Account Id field' };
  if (!/\bACCOUNT\b/.test(upper)) return { ok: false, error: 'Query must be from the Account object' };
  return { ok: true };
}

export function extractLimit(query?: string | null): number | undefined {
  const m = LIMIT_RE.exec(query || '');
  return m ? Number(m[1]) : undefined;
}

// undefined: no cap on either side
export function effectiveLimit(query: string, max?: number): number | undefined {
  const own = extractLimit(query);
  if (own === undefined) return max;
  if (max === undefined) return own;
  return Math.min(own, max);
}

export function buildIdQuery(query: string, max?: number): string {
  const q = query.trim();
  const limit = effectiveLimit(q, max);
  if (limit === undefined) return q;
  if (LIMIT_RE.test(q)) return q.replace(LIMIT_RE, `LIMIT ${limit}`);
  return `${q} LIMIT ${limit}`;
}
