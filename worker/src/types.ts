import type { AccountRecord, AiAssessment, BadDomainSet, ReadyFlags } from '@shellmatch/shared';

export interface RecordSource {
  readonly name: string;
  // Resolves null when no record has this id (either id form).
  fetchByIdentifier(id: string): Promise<AccountRecord | null>;
  // Records found for the given ids; missing ids are simply absent.
  fetchByIdentifiers(ids: readonly string[]): Promise<AccountRecord[]>;
}

export type IdQueryResult = { ids: string[]; totalSize: number };

export interface QueryableRecordSource extends RecordSource {
  queryIdentifiers(soql: string): Promise<IdQueryResult>;
}

export function isQueryable(source: RecordSource): source is QueryableRecordSource {
  return 'queryIdentifiers' in source && typeof source.queryIdentifiers === 'function';
}

export type JudgeInput = {
  customer: AccountRecord;
  shell?: AccountRecord;
  flags: ReadyFlags;
};

export interface RelationshipJudge {
  readonly name: string;
  assess(input: JudgeInput): Promise<AiAssessment>;
}

export type PipelineDeps = {
  badDomains: BadDomainSet;
  source: RecordSource;
  judge: RelationshipJudge;
};
