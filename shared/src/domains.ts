import { domainToUnicode } from 'url';
import type { BadDomainSet } from './models';

export const SUBDOMAIN_PREFIXES = ['app.', 'portal.', 'my.', 'secure.', 'admin.'] as const;

// TLD tokens seen in operator-entered data that are never real TLDs
export const INVALID_TLDS: ReadonlySet<string> = new Set(['comno', 'comxyz', 'com123', 'netno', 'orgno', 'comabc']);

const REPAIR_TLDS = ['com', 'net', 'org'] as const;
const ALNUM = /^[a-z0-9]+$/;

function hostFromEmail(input: string): string {
  const host = input.slice(input.lastIndexOf('@') + 1).trim().toLowerCase().replace(/\.$/, '');
  return host.includes('.') ? host : '';
}

function hostFromUrl(input: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `http://${input}`;
  let parsed: string;
  try {
    parsed = new URL(withScheme).hostname.toLowerCase();
  } catch {
    return '';
  }
  const typed = input.toLowerCase();
  // URL punycodes IDN hosts; keep them as typed
  const unicode = (domainToUnicode(parsed) || parsed).replace(/\.$/, '');
  if (typed.includes(unicode)) return unicode;
  const ascii = parsed.replace(/\.$/, '');
  // numeric hosts get rewritten to IPv4 ("12345" -> "0.0.48.57"), which is no domain
  return typed.includes(ascii) ? ascii : '';
}

export function extractDomain(input?: string | null): string {
  const s = (input || '').trim();
  if (!s) return '';
  let host = s.includes('@') ? hostFromEmail(s) : hostFromUrl(s);
  if (host.startsWith('www.')) host = host.slice(4);
  for (const prefix of SUBDOMAIN_PREFIXES) {
    if (host.startsWith(prefix)) {
      host = host.slice(prefix.length);
      break;
    }
  }
  return host;
}

export function companyNameFromDomain(domain?: string | null): string {
  const d = (domain || '').trim().toLowerCase();
  if (!d) return '';
  const dot = d.lastIndexOf('.');
  const base = dot > 0 ? d.slice(0, dot) : d;
  return base.replace(/[^a-z0-9]/g, '');
}

function longestFirst(set: BadDomainSet): string[] {
  return Array.from(set).sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

// Anything not recognisably a mangled bad domain comes back unchanged
export function repairDomain(domain: string | null | undefined, badSet: BadDomainSet): string {
  const d = (domain || '').trim().toLowerCase();
  if (!d) return '';
  if (badSet.has(d)) return d;
  if (badSet.size === 0) return d;

  const candidates = longestFirst(badSet);

  // gmail.comno -> gmail.com
  for (const bad of candidates) {
    if (d.length > bad.length && d.startsWith(bad)) {
      const extra = d.slice(bad.length);
      if (extra.length <= 4 && ALNUM.test(extra)) return bad;
    }
  }

  // test.ringcentral.com -> ringcentral.com
  for (const bad of candidates) {
    if (d.endsWith(`.${bad}`)) return bad;
  }

  // yahoo.comxyz -> yahoo.com, only for TLD tokens that cannot be real
  const dot = d.lastIndexOf('.');
  if (dot > 0) {
    const base = d.slice(0, dot);
    const tld = d.slice(dot + 1);
    if (INVALID_TLDS.has(tld) || (ALNUM.test(tld) && tld.length > 4)) {
      for (const replacement of REPAIR_TLDS) {
        const repaired = `${base}.${replacement}`;
        if (badSet.has(repaired)) return repaired;
      }
    }
  }

  return d;
}

export function isBadDomain(domain: string | null | undefined, badSet: BadDomainSet): boolean {
  const repaired = repairDomain(domain, badSet);
  return repaired !== '' && badSet.has(repaired);
}
