import { ACCOUNT_FIELDS, AccountModel, to15, to18, type AccountRecord, type FieldValue } from '@shellmatch/shared';
import type { RecordSource } from '../types';

function idForms(id: string): string[] {
  const s = id.trim();
  return Array.from(new Set([s, to15(s), to18(to15(s))]));
}

function asField(v: unknown): FieldValue {
  return typeof v === 'string' || typeof v === 'number' ? v : null;
}

export function fromMongoDocument(doc: object): AccountRecord {
  const values = new Map<string, unknown>(Object.entries(doc));
  const record: AccountRecord = {};
  for (const field of ACCOUNT_FIELDS) {
    const v = asField(values.get(field));
    if (v != null) record[field] = v;
  }
  return record;
}

// Stored identifiers may be in either form
export class MongoRecordSource implements RecordSource {
  readonly name = 'mongo';

  async fetchByIdentifiers(ids: readonly string[]): Promise<AccountRecord[]> {
    const forms = ids.flatMap(idForms);
    if (forms.length === 0) return [];
    const docs = await AccountModel.find({ Identifier: { $in: forms } }).lean();
    return docs.map((d) => fromMongoDocument(d));
  }

  async fetchByIdentifier(id: string): Promise<AccountRecord | null> {
    const doc = await AccountModel.findOne({ Identifier: { $in: idForms(id) } }).lean();
    return doc ? fromMongoDocument(doc) : null;
  }
}
