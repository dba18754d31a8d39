import pLimit from 'p-limit';
import { config, errorMessage, fieldText, logger, partitionIds, sameEntity, type AccountRecord } from '@shellmatch/shared';
import { runFlagPipeline, type FlagAnalysis } from './pipeline';
import type { PipelineDeps } from './types';

export type FailedFetch = { id: string; error: string };

export type BatchSummary = {
  total_requested: number;
  accounts_retrieved: number;
  invalid_ids: string[];
  not_found_ids: string[];
  failed_ids: FailedFetch[];
};

export type BatchResult = {
  accounts: FlagAnalysis[];
  summary: BatchSummary;
  execution_time: string;
};

export async function analyzeRecords(
  records: readonly AccountRecord[],
  deps: PipelineDeps,
  concurrency = config.batchConcurrency
): Promise<FlagAnalysis[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(records.map((r) => limit(() => runFlagPipeline(r, deps))));
}

type FetchOptions = { concurrency?: number; chunkSize?: number };

// A chunk the source fails on goes to failed_ids; the rest still runs
export async function analyzeAccounts(ids: readonly string[], deps: PipelineDeps, opts: FetchOptions = {}): Promise<BatchResult> {
  const started = Date.now();
  const concurrency = opts.concurrency ?? config.batchConcurrency;
  const chunkSize = Math.max(1, opts.chunkSize ?? config.fetchBatchSize);
  const { valid, invalid } = partitionIds(ids, config.accountIdPrefix);
  const wanted = Array.from(valid.keys());

  const records: AccountRecord[] = [];
  const failed: FailedFetch[] = [];
  const failedKeys = new Set<string>();
  for (let i = 0; i < wanted.length; i += chunkSize) {
    const chunk = wanted.slice(i, i + chunkSize);
    try {
      records.push(...(await deps.source.fetchByIdentifiers(chunk)));
    } catch (e) {
      logger.error('Batch fetch failed', { source: deps.source.name, count: chunk.length, err: errorMessage(e) });
      for (const id of chunk) {
        failedKeys.add(id);
        failed.push({ id: valid.get(id) ?? id, error: errorMessage(e) });
      }
    }
  }

  // Return records in the order the ids were requested
  const ordered: AccountRecord[] = [];
  const notFound: string[] = [];
  for (const id of wanted) {
    if (failedKeys.has(id)) continue;
    const found = records.find((r) => sameEntity(fieldText(r.Identifier), id));
    if (found) ordered.push(found);
    else notFound.push(valid.get(id) ?? id);
  }

  const accounts = await analyzeRecords(ordered, deps, concurrency);
  logger.info('Batch analyzed', {
    requested: ids.length,
    analyzed: accounts.length,
    invalid: invalid.length,
    notFound: notFound.length,
    failed: failed.length,
  });
  return {
    accounts,
    summary: {
      total_requested: ids.length,
      accounts_retrieved: accounts.length,
      invalid_ids: invalid,
      not_found_ids: notFound,
      failed_ids: failed,
    },
    execution_time: `${((Date.now() - started) / 1000).toFixed(2)}s`,
  };
}
