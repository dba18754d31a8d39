import { normalizeCompanyName } from './normalize';

export type MatchBlock = { a: number; b: number; size: number };

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const c = b.charAt(j);
    const list = positions.get(c);
    if (list) list.push(j);
    else positions.set(c, [j]);
  }
  return positions;
}

// Longest common substring of a[alo:ahi] and b[blo:bhi]; ties go to the
// earliest position in a, then in b.
function longestMatch(
  a: string,
  bIndex: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchBlock {
  let best: MatchBlock = { a: alo, b: blo, size: 0 };
  let runs = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of bIndex.get(a.charAt(i)) || []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) || 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
    }
    runs = next;
  }
  return best;
}

export function matchingBlocks(a: string, b: string): MatchBlock[] {
  const bIndex = indexPositions(b);
  const blocks: MatchBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const m = longestMatch(a, bIndex, alo, ahi, blo, bhi);
    if (m.size === 0) continue;
    blocks.push(m);
    if (alo < m.a && blo < m.b) queue.push([alo, m.a, blo, m.b]);
    if (m.a + m.size < ahi && m.b + m.size < bhi) queue.push([m.a + m.size, ahi, m.b + m.size, bhi]);
  }
  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

export function matchRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  // Fixed argument order keeps the ratio symmetric
  const [x, y] = a <= b ? [a, b] : [b, a];
  const matched = matchingBlocks(x, y).reduce((sum, m) => sum + m.size, 0);
  return (2 * matched) / total;
}

export function similarity(a?: string | null, b?: string | null): number {
  const na = normalizeCompanyName(a);
  const nb = normalizeCompanyName(b);
  if (!na || !nb) return 0;
  return matchRatio(na, nb);
}
