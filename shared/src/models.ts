import mongoose, { Schema } from 'mongoose';
import { config } from './config';

export type FieldValue = string | number | null | undefined;

// Canonical account fields; record sources map their native field names onto these
export type AccountRecord = {
  Identifier?: FieldValue;
  Name?: FieldValue;
  Website?: FieldValue;
  BillingState?: FieldValue;
  BillingCountry?: FieldValue;
  BillingPostalCode?: FieldValue;
  EnrichedCompanyName?: FieldValue;
  EnrichedWebsite?: FieldValue;
  EnrichedState?: FieldValue;
  EnrichedCountry?: FieldValue;
  EnrichedPostalCode?: FieldValue;
  ParentIdentifier?: FieldValue;
  ParentName?: FieldValue;
  ContactEmail?: FieldValue;
  RecordTypeName?: FieldValue;
};

export type AccountField = keyof AccountRecord;

export const ACCOUNT_FIELDS: readonly AccountField[] = [
  'Identifier',
  'Name',
  'Website',
  'BillingState',
  'BillingCountry',
  'BillingPostalCode',
  'EnrichedCompanyName',
  'EnrichedWebsite',
  'EnrichedState',
  'EnrichedCountry',
  'EnrichedPostalCode',
  'ParentIdentifier',
  'ParentName',
  'ContactEmail',
  'RecordTypeName',
];

export type BadDomainSet = ReadonlySet<string>;

export type ConsistencyResult = {
  score: number; // 0..100, one decimal
  explanation: string[];
};

export type AddressSource = 'Billing_Address' | 'Enriched_Address';

export type AddressConsistencyResult = {
  isConsistent: boolean;
  explanation: string[];
  customerSource?: AddressSource;
  shellSource?: AddressSource;
};

export type BadDomainMatch = { field: 'ContactEmail' | 'Website'; domain: string };

export type BadDomainResult = {
  isBad: boolean;
  explanation: string[];
  matches: BadDomainMatch[];
};

// Stopped on a bad domain: nothing past the bad-domain check ran
export type StoppedFlags = {
  Bad_Domain: BadDomainResult;
};

// Shell flags are present only when the shell exists and was resolved
export type ReadyFlags = {
  Bad_Domain: BadDomainResult;
  Has_Shell: boolean;
  Customer_Consistency: ConsistencyResult;
  Customer_Shell_Coherence?: ConsistencyResult;
  Address_Consistency?: AddressConsistencyResult;
};

export type FlagPayload = StoppedFlags | ReadyFlags;

export type AiAssessment = {
  success: boolean;
  confidence_score: number;
  explanation_bullets: string[];
  source: 'ai' | 'computed' | 'error';
  error?: string;
  raw_response?: string;
};

// Mirror of the account object for deployments that read from Mongo instead of Salesforce
const AccountSchema = new Schema(
  {
    Identifier: { type: String, required: true, index: true },
    Name: String,
    Website: String,
    BillingState: String,
    BillingCountry: String,
    BillingPostalCode: Schema.Types.Mixed,
    EnrichedCompanyName: String,
    EnrichedWebsite: String,
    EnrichedState: String,
    EnrichedCountry: String,
    EnrichedPostalCode: Schema.Types.Mixed,
    ParentIdentifier: { type: String, index: true },
    ParentName: String,
    ContactEmail: String,
    RecordTypeName: String,
  },
  { strict: false, timestamps: true }
);

export const AccountModel = mongoose.model('Account', AccountSchema, config.accountsCollection);
