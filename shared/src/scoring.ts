import { companyNameFromDomain, extractDomain, repairDomain } from './domains';
import { fieldText, firstPopulated, normalizeCompanyName, type FieldPick } from './normalize';
import { similarity } from './similarity';
import type {
  AccountRecord,
  AddressConsistencyResult,
  AddressSource,
  BadDomainMatch,
  BadDomainResult,
  BadDomainSet,
  ConsistencyResult,
} from './models';

const DIRECT_WEIGHT = 0.7;
const CROSS_WEIGHT = 0.3;

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function mean(xs: readonly number[]): number {
  return xs.reduce((s, x) => s + x, 0) / xs.length;
}

function pct(ratio: number): string {
  return (ratio * 100).toFixed(1);
}

function result(ratio: number, explanation: string[]): ConsistencyResult {
  return { score: round1(ratio * 100), explanation };
}

type NameVsWebsite = { ratio: number; detail: string; ok: boolean };

function nameVsWebsite(name: string, website: string): NameVsWebsite {
  if (!name) return { ratio: 0, detail: 'No company name provided', ok: false };
  const domain = extractDomain(website);
  if (!domain) return { ratio: 0, detail: `Could not extract a valid domain from website: ${website}`, ok: false };
  const domainName = companyNameFromDomain(domain);
  if (!domainName) return { ratio: 0, detail: `Could not extract a company name from domain: ${domain}`, ok: false };
  const ratio = similarity(name, domainName);
  return { ratio, detail: `Comparing '${normalizeCompanyName(name)}' with domain '${domainName}' from ${domain}`, ok: true };
}

// Native website first; otherwise the best enrichment score, not the average
export function customerConsistency(record: AccountRecord): ConsistencyResult {
  const name = fieldText(record.Name);
  const website = fieldText(record.Website);

  if (website) {
    const { ratio, detail } = nameVsWebsite(name, website);
    return result(ratio, ['Using Website', detail]);
  }

  if (!name) return result(0, ['Using enrichment fields', 'No company name provided']);

  const scores: number[] = [];
  const details: string[] = [];
  const enrichedName = fieldText(record.EnrichedCompanyName);
  if (enrichedName) {
    const ratio = similarity(name, enrichedName);
    scores.push(ratio);
    details.push(`Name vs enriched company name: ${ratio.toFixed(2)}`);
  }
  const enrichedWebsite = fieldText(record.EnrichedWebsite);
  if (enrichedWebsite) {
    const { ratio, detail } = nameVsWebsite(name, enrichedWebsite);
    scores.push(ratio);
    details.push(`Name vs enriched website: ${pct(ratio)} (${detail})`);
  }

  if (scores.length === 0) {
    return result(0, ['Using enrichment fields', 'No data: no enrichment fields available for comparison']);
  }
  return result(Math.max(...scores), ['Using enrichment fields', 'Best match from enrichment fields', ...details]);
}

export type NameField = 'Name' | 'EnrichedCompanyName';
export type WebsiteField = 'Website' | 'EnrichedWebsite';

export function pickName(record: AccountRecord): FieldPick<NameField> | null {
  return firstPopulated(record, ['Name', 'EnrichedCompanyName'] as const);
}

export function pickWebsite(record: AccountRecord): FieldPick<WebsiteField> | null {
  return firstPopulated(record, ['Website', 'EnrichedWebsite'] as const);
}

function domainName(website: FieldPick<WebsiteField> | null): string {
  return website ? companyNameFromDomain(extractDomain(website.value)) : '';
}

function describeSources(side: string, name: FieldPick<NameField> | null, website: FieldPick<WebsiteField> | null): string {
  return `${side} name from ${name ? name.field : 'none'}, website from ${website ? website.field : 'none'}`;
}

// Same-field comparisons weigh 0.7, cross-field 0.3, when both kinds exist
export function shellCoherence(customer: AccountRecord, shell: AccountRecord): ConsistencyResult {
  const cName = pickName(customer);
  const sName = pickName(shell);
  const cSite = pickWebsite(customer);
  const sSite = pickWebsite(shell);
  const cDomainName = domainName(cSite);
  const sDomainName = domainName(sSite);

  const direct: number[] = [];
  const cross: number[] = [];
  const details: string[] = [];

  if (cName && sName) {
    const r = similarity(cName.value, sName.value);
    direct.push(r);
    details.push(`Name similarity: ${pct(r)}`);
  }
  if (cDomainName && sDomainName) {
    const r = similarity(cDomainName, sDomainName);
    direct.push(r);
    details.push(`Website similarity: ${pct(r)} ('${cDomainName}' vs '${sDomainName}')`);
  }
  if (cName && sDomainName) {
    const r = similarity(cName.value, sDomainName);
    cross.push(r);
    details.push(`Customer name vs shell website: ${pct(r)}`);
  }
  if (cDomainName && sName) {
    const r = similarity(cDomainName, sName.value);
    cross.push(r);
    details.push(`Customer website vs shell name: ${pct(r)}`);
  }

  const sources = `${describeSources('Customer', cName, cSite)}; ${describeSources('shell', sName, sSite)}`;
  if (direct.length === 0 && cross.length === 0) {
    return result(0, ['Insufficient data for shell coherence comparison', sources]);
  }

  let ratio: number;
  if (direct.length > 0 && cross.length > 0) {
    ratio = DIRECT_WEIGHT * mean(direct) + CROSS_WEIGHT * mean(cross);
  } else {
    ratio = mean(direct.length > 0 ? direct : cross);
  }
  return result(ratio, [sources, ...details]);
}

export type AddressPick = { text: string; source: AddressSource };

function joinAddress(record: AccountRecord, source: AddressSource): AddressPick | null {
  const parts =
    source === 'Billing_Address'
      ? [record.BillingState, record.BillingCountry, record.BillingPostalCode]
      : [record.EnrichedState, record.EnrichedCountry, record.EnrichedPostalCode];
  const text = parts.map(fieldText).filter(Boolean).join(', ');
  return text ? { text, source } : null;
}

export function customerAddress(record: AccountRecord): AddressPick | null {
  return joinAddress(record, 'Billing_Address') || joinAddress(record, 'Enriched_Address');
}

// Shell side: enrichment first
export function shellAddress(record: AccountRecord): AddressPick | null {
  return joinAddress(record, 'Enriched_Address') || joinAddress(record, 'Billing_Address');
}

export function addressConsistency(customer: AccountRecord, shell: AccountRecord): AddressConsistencyResult {
  const c = customerAddress(customer);
  const s = shellAddress(shell);
  if (!c || !s) {
    const missing = [!c ? 'customer' : null, !s ? 'shell' : null].filter(Boolean).join(' and ');
    return { isConsistent: false, explanation: [`Missing data: no address fields populated for ${missing}`] };
  }
  const isConsistent = c.text.toLowerCase() === s.text.toLowerCase();
  return {
    isConsistent,
    customerSource: c.source,
    shellSource: s.source,
    explanation: [
      `Compared customer ${c.source} vs shell ${s.source}`,
      `'${c.text}' vs '${s.text}': ${isConsistent ? 'match' : 'mismatch'}`,
    ],
  };
}

function emailDomain(email: string): string {
  return email.includes('@') ? extractDomain(email) : '';
}

export function badDomainCheck(record: AccountRecord, badSet: BadDomainSet): BadDomainResult {
  const matches: BadDomainMatch[] = [];
  const email = fieldText(record.ContactEmail);
  if (email) {
    const domain = repairDomain(emailDomain(email), badSet);
    if (domain && badSet.has(domain)) matches.push({ field: 'ContactEmail', domain });
  }
  const website = fieldText(record.Website);
  if (website) {
    const domain = repairDomain(extractDomain(website), badSet);
    if (domain && badSet.has(domain)) matches.push({ field: 'Website', domain });
  }

  if (matches.length === 0) return { isBad: false, explanation: ['No bad domains detected'], matches };
  const described = matches.map((m) => `${m.field === 'ContactEmail' ? 'Email' : 'Website'} domain '${m.domain}' from ${m.field}`);
  const explanation =
    described.length === 1 ? `${described[0]} matches bad domain list` : `${described.join(' and ')} both match bad domain list`;
  return { isBad: true, explanation: [explanation], matches };
}
