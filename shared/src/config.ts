import dotenv from 'dotenv';
import path from 'path';
dotenv.config();

export type RecordSourceKind = 'salesforce' | 'mongo';

function recordSourceKind(raw?: string): RecordSourceKind {
  return (raw || '').trim().toLowerCase() === 'mongo' ? 'mongo' : 'salesforce';
}

export const config = {
  port: Number(process.env.PORT || 4000),
  nodeEnv: process.env.NODE_ENV || 'development',
  // Where customer and shell records are read from
  recordSource: recordSourceKind(process.env.RECORD_SOURCE),
  // Salesforce REST (username-password OAuth flow)
  sfLoginUrl: process.env.SF_LOGIN_URL || 'https://login.salesforce.com',
  sfUsername: process.env.SF_USERNAME,
  sfPassword: process.env.SF_PASSWORD,
  sfSecurityToken: process.env.SF_SECURITY_TOKEN || '',
  sfClientId: process.env.SF_CLIENT_ID,
  sfClientSecret: process.env.SF_CLIENT_SECRET,
  sfApiVersion: process.env.SF_API_VERSION || 'v59.0',
  sfSessionTtlSeconds: Number(process.env.SF_SESSION_TTL_SECONDS || 3600),
  // Mongo mirror of the account object
  mongoUri: process.env.MONGO_URI || 'mongodb://localhost:27017/shellmatch',
  mongoDbName: process.env.MONGO_DB || process.env.MONGO_DB_NAME || 'shellmatch',
  accountsCollection: process.env.ACCOUNTS_COLLECTION || 'accounts',
  // AI judgment
  openaiApiKey: process.env.OPENAI_API_KEY,
  openaiModel: process.env.OPENAI_MODEL || 'gpt-4o',
  openaiTimeoutMs: Number(process.env.OPENAI_TIMEOUT_MS || 60000),
  openaiMaxRetries: Number(process.env.OPENAI_MAX_RETRIES || 2),
  // Provider call behavior
  providerMaxRetries: Number(process.env.PROVIDER_MAX_RETRIES || 2),
  providerInitialBackoffMs: Number(process.env.PROVIDER_INITIAL_BACKOFF_MS || 400),
  providerBackoffFactor: Number(process.env.PROVIDER_BACKOFF_FACTOR || 2),
  providerTimeoutMs: Number(process.env.PROVIDER_TIMEOUT_MS || 15000),
  // Engine reference data and batch limits
  badDomainsPath: process.env.BAD_DOMAINS_PATH || path.resolve(__dirname, '../../data/bad_domains.csv'),
  // ids per record-source fetch; Salesforce caps IN (...) lists at 200
  fetchBatchSize: Math.max(1, Number(process.env.FETCH_BATCH_SIZE || 200)),
  batchConcurrency: Math.max(1, Number(process.env.BATCH_CONCURRENCY || 4)),
  maxAnalyze: Math.max(1, Number(process.env.MAX_ANALYZE || 100)),
  accountIdPrefix: process.env.ACCOUNT_ID_PREFIX || '001',
};

export type AppConfig = typeof config;
