import fs from 'fs';
import { logger, errorMessage } from './logger';
import type { BadDomainSet } from './models';

const HEADER = 'bad_domains';

function cleanCell(cell: string): string {
  return cell.replace(/[\t"]/g, '').trim().toLowerCase();
}

export function parseBadDomainsCsv(text: string): Set<string> {
  const domains = new Set<string>();
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const header = (lines[0] || '').split(',').map(cleanCell);
  const col = header.indexOf(HEADER);
  if (col < 0) {
    logger.warn('Bad domain list has no bad_domains column', { header });
    return domains;
  }
  for (const line of lines.slice(1)) {
    if (!line.trim()) continue;
    const domain = cleanCell(line.split(',')[col] || '');
    if (domain) domains.add(domain);
  }
  return domains;
}

// Missing file: empty set, so no record is ever flagged
export function loadBadDomains(filePath: string): BadDomainSet {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    logger.warn('Bad domain list unavailable; bad-domain checks disabled', { path: filePath, err: errorMessage(e) });
    return new Set<string>();
  }
  const domains = parseBadDomainsCsv(text);
  logger.info('Bad domain list loaded', { path: filePath, count: domains.size });
  return domains;
}
