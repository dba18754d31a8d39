import axios, { type AxiosInstance } from 'axios';
import pRetry from 'p-retry';
import { z } from 'zod';
import { canonicalId, config, logger, type AccountRecord } from '@shellmatch/shared';
import type { IdQueryResult, QueryableRecordSource } from '../types';

const ACCOUNT_FIELDS = [
  'Id',
  'Name',
  'ParentId',
  'Parent.Name',
  'Website',
  'BillingState',
  'BillingCountry',
  'BillingPostalCode',
  'ZI_Company_Name__c',
  'ZI_Website__c',
  'ZI_Company_State__c',
  'ZI_Company_Country__c',
  'ZI_Company_Postal_Code__c',
  'ContactMostFrequentEmail__c',
  'RecordType.Name',
].join(', ');

// Salesforce caps the size of an IN (...) list
const IN_CLAUSE_BATCH = 200;

const text = z.union([z.string(), z.number()]).nullish();
const related = z.object({ Name: z.string().nullish() }).passthrough().nullish();

export const SalesforceAccountSchema = z
  .object({
    Id: z.string(),
    Name: text,
    ParentId: z.string().nullish(),
    Parent: related,
    Website: text,
    BillingState: text,
    BillingCountry: text,
    BillingPostalCode: text,
    ZI_Company_Name__c: text,
    ZI_Website__c: text,
    ZI_Company_State__c: text,
    ZI_Company_Country__c: text,
    ZI_Company_Postal_Code__c: text,
    ContactMostFrequentEmail__c: text,
    RecordType: related,
  })
  .passthrough();

export type SalesforceAccount = z.infer<typeof SalesforceAccountSchema>;

const QueryResponseSchema = z.object({
  totalSize: z.number(),
  done: z.boolean(),
  nextRecordsUrl: z.string().optional(),
  records: z.array(z.unknown()),
});

const TokenResponseSchema = z.object({
  access_token: z.string(),
  instance_url: z.string(),
});

export function fromSalesforceRow(row: SalesforceAccount): AccountRecord {
  return {
    Identifier: row.Id,
    Name: row.Name,
    ParentIdentifier: row.ParentId,
    ParentName: row.Parent?.Name,
    Website: row.Website,
    BillingState: row.BillingState,
    BillingCountry: row.BillingCountry,
    BillingPostalCode: row.BillingPostalCode,
    EnrichedCompanyName: row.ZI_Company_Name__c,
    EnrichedWebsite: row.ZI_Website__c,
    EnrichedState: row.ZI_Company_State__c,
    EnrichedCountry: row.ZI_Company_Country__c,
    EnrichedPostalCode: row.ZI_Company_Postal_Code__c,
    ContactEmail: row.ContactMostFrequentEmail__c,
    RecordTypeName: row.RecordType?.Name,
  };
}

function quoteIds(ids: readonly string[]): string {
  // Ids are well-formed alphanumerics by the time they get here
  return ids.map((id) => `'${id.replace(/[^a-zA-Z0-9]/g, '')}'`).join(', ');
}

export function accountQuery(ids: readonly string[]): string {
  return `SELECT ${ACCOUNT_FIELDS} FROM Account WHERE Id IN (${quoteIds(ids)})`;
}

type Session = { accessToken: string; instanceUrl: string; openedAt: number };

export type SalesforceCredentials = {
  loginUrl: string;
  username: string;
  password: string;
  securityToken: string;
  clientId: string;
  clientSecret: string;
  apiVersion: string;
};

export function credentialsFromConfig(): SalesforceCredentials {
  const { sfUsername, sfPassword, sfClientId, sfClientSecret } = config;
  if (!sfUsername || !sfPassword || !sfClientId || !sfClientSecret) {
    throw new Error('Salesforce configuration incomplete: SF_USERNAME, SF_PASSWORD, SF_CLIENT_ID and SF_CLIENT_SECRET are required');
  }
  return {
    loginUrl: config.sfLoginUrl,
    username: sfUsername,
    password: sfPassword,
    securityToken: config.sfSecurityToken,
    clientId: sfClientId,
    clientSecret: sfClientSecret,
    apiVersion: config.sfApiVersion,
  };
}

export class SalesforceRecordSource implements QueryableRecordSource {
  readonly name = 'salesforce';
  private session: Session | null = null;

  constructor(private readonly creds: SalesforceCredentials, private readonly http: AxiosInstance = axios.create({ timeout: config.providerTimeoutMs })) {}

  private retry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return pRetry(fn, {
      retries: config.providerMaxRetries,
      minTimeout: config.providerInitialBackoffMs,
      factor: config.providerBackoffFactor,
      onFailedAttempt: (err) => {
        logger.warn('Salesforce call failed', { call: label, attempt: err.attemptNumber, retriesLeft: err.retriesLeft, err: err.message });
      },
    });
  }

  private async connect(): Promise<Session> {
    const now = Date.now();
    if (this.session && now - this.session.openedAt < config.sfSessionTtlSeconds * 1000) return this.session;
    const form = new URLSearchParams({
      grant_type: 'password',
      client_id: this.creds.clientId,
      client_secret: this.creds.clientSecret,
      username: this.creds.username,
      password: `${this.creds.password}${this.creds.securityToken}`,
    });
    const resp = await this.retry('login', () => this.http.post<unknown>(`${this.creds.loginUrl}/services/oauth2/token`, form));
    const token = TokenResponseSchema.parse(resp.data);
    this.session = { accessToken: token.access_token, instanceUrl: token.instance_url, openedAt: now };
    logger.info('Salesforce session opened', { instanceUrl: token.instance_url });
    return this.session;
  }

  async query(soql: string): Promise<{ totalSize: number; records: unknown[] }> {
    const session = await this.connect();
    const headers = { Authorization: `Bearer ${session.accessToken}` };
    const first = await this.retry('query', () =>
      this.http.get<unknown>(`${session.instanceUrl}/services/data/${this.creds.apiVersion}/query`, { params: { q: soql }, headers })
    );
    let page = QueryResponseSchema.parse(first.data);
    const records = [...page.records];
    while (!page.done && page.nextRecordsUrl) {
      const next = page.nextRecordsUrl;
      const resp = await this.retry('query_more', () => this.http.get<unknown>(`${session.instanceUrl}${next}`, { headers }));
      page = QueryResponseSchema.parse(resp.data);
      records.push(...page.records);
    }
    return { totalSize: page.totalSize, records };
  }

  async fetchByIdentifiers(ids: readonly string[]): Promise<AccountRecord[]> {
    const wanted = Array.from(new Set(ids.map(canonicalId)));
    const out: AccountRecord[] = [];
    for (let i = 0; i < wanted.length; i += IN_CLAUSE_BATCH) {
      const { records } = await this.query(accountQuery(wanted.slice(i, i + IN_CLAUSE_BATCH)));
      for (const row of records) {
        const parsed = SalesforceAccountSchema.safeParse(row);
        if (parsed.success) out.push(fromSalesforceRow(parsed.data));
        else logger.warn('Skipping malformed Salesforce account row', { issue: parsed.error.issues[0]?.message ?? 'unknown' });
      }
    }
    return out;
  }

  async fetchByIdentifier(id: string): Promise<AccountRecord | null> {
    const [record] = await this.fetchByIdentifiers([id]);
    return record ?? null;
  }

  async queryIdentifiers(soql: string): Promise<IdQueryResult> {
    const { totalSize, records } = await this.query(soql);
    const ids: string[] = [];
    for (const row of records) {
      const parsed = z.object({ Id: z.string() }).safeParse(row);
      if (parsed.success) ids.push(parsed.data.Id);
    }
    return { ids, totalSize };
  }
}
