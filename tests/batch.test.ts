import { analyzeAccounts, analyzeRecords } from '../worker/src/batch';
import { runFlagPipeline } from '../worker/src/pipeline';
import { ComputedJudge } from '../worker/src/providers/openaiClient';
import { MemoryRecordSource, RecordingJudge } from './fakes';

const records = [
  { Identifier: '001xx000003DGg2AAG', Name: 'Acme', Website: 'acme.com' },
  { Identifier: '001xx000003DGh3', Name: 'Globex', Website: 'globex.com' },
  { Identifier: '001xx000003DGk7AAG', Name: 'Initech', ContactEmail: 'it@gmail.com' },
];

function setup() {
  const source = new MemoryRecordSource(records);
  return { source, deps: { badDomains: new Set(['gmail.com']), source, judge: new RecordingJudge() } };
}

test('results follow request order and report invalid and missing ids', async () => {
  const { source, deps } = setup();
  const r = await analyzeAccounts(['001xx000003DGh3', 'bad-id', '001xx000003DGg2AAG', '001xx000003DGz9'], deps, { concurrency: 2 });
  expect(r.accounts.map((a) => a.accountId)).toEqual(['001xx000003DGh3', '001xx000003DGg2AAG']);
  expect(r.summary).toEqual({
    total_requested: 4,
    accounts_retrieved: 2,
    invalid_ids: ['bad-id'],
    not_found_ids: ['001xx000003DGz9'],
    failed_ids: [],
  });
  expect(r.execution_time).toMatch(/^\d+\.\d{2}s$/);
  // one fetch, canonical 18-char ids
  expect(source.requested).toEqual([['001xx000003DGh3AAG', '001xx000003DGg2AAG', '001xx000003DGz9AAG']]);
});

test('duplicate ids in either form are analyzed once', async () => {
  const { source, deps } = setup();
  const r = await analyzeAccounts(['001xx000003DGg2', '001xx000003DGg2AAG', '001xx000003DGg2aag'], deps);
  expect(r.accounts).toHaveLength(1);
  expect(r.summary.total_requested).toBe(3);
  expect(source.requested).toEqual([['001xx000003DGg2AAG']]);
});

test('each record is analyzed independently', async () => {
  const { deps } = setup();
  const r = await analyzeRecords(records, deps, 3);
  expect(r.map((a) => a.stage)).toEqual(['PAYLOAD_READY', 'PAYLOAD_READY', 'STOPPED_BAD_DOMAIN']);
  expect(deps.judge.inputs).toHaveLength(2);
});

test('a record scores the same alone and inside a shuffled batch', async () => {
  const shell = { Identifier: '001xx000003DGp5AAG', Name: 'Acme Holdings', Website: 'acme.com', EnrichedState: 'TX' };
  const all = [
    ...records,
    { Identifier: '001xx000003DGm1AAG', Name: 'Acme West', Website: 'acmewest.com', BillingState: 'TX', ParentIdentifier: '001xx000003DGp5' },
    { Identifier: '001xx000003DGn4AAG', Name: 'Umbrella', ParentIdentifier: '001xx000003DGn4' },
    shell,
  ];
  const deps = { badDomains: new Set(['gmail.com']), source: new MemoryRecordSource(all), judge: new ComputedJudge() };

  const alone = await Promise.all(all.map((r) => runFlagPipeline(r, deps)));
  const shuffled = [all[4], all[2], all[5], all[0], all[3], all[1]];
  const batched = await analyzeRecords(shuffled, deps, 4);

  for (const single of alone) {
    const same = batched.find((b) => b.accountId === single.accountId);
    expect(same).toEqual(single);
  }
  expect(batched.map((b) => b.accountId)).toEqual(shuffled.map((r) => r.Identifier));
});

test('a failed chunk is reported and the rest still runs', async () => {
  const { source, deps } = setup();
  source.failOn = '001xx000003DGk7';
  const r = await analyzeAccounts(['001xx000003DGk7', '001xx000003DGg2', '001xx000003DGh3'], deps, { chunkSize: 2 });
  expect(source.requested).toEqual([['001xx000003DGk7AAG', '001xx000003DGg2AAG'], ['001xx000003DGh3AAG']]);
  expect(r.accounts.map((a) => a.accountId)).toEqual(['001xx000003DGh3']);
  expect(r.summary.failed_ids).toEqual([
    { id: '001xx000003DGk7', error: 'fetch failed for 001xx000003DGk7' },
    { id: '001xx000003DGg2', error: 'fetch failed for 001xx000003DGk7' },
  ]);
  expect(r.summary.not_found_ids).toEqual([]);
});

test('a source that is down fails every id without rejecting', async () => {
  const { source, deps } = setup();
  source.failWith = new Error('session expired');
  const r = await analyzeAccounts(['001xx000003DGg2'], deps);
  expect(r.accounts).toEqual([]);
  expect(r.summary.failed_ids).toEqual([{ id: '001xx000003DGg2', error: 'session expired' }]);
});

test('only invalid ids skip the fetch', async () => {
  const { source, deps } = setup();
  const r = await analyzeAccounts(['nope'], deps);
  expect(r.accounts).toEqual([]);
  expect(r.summary.invalid_ids).toEqual(['nope']);
  expect(source.requested).toEqual([]);
});
