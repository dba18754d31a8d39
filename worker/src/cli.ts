import fs from 'fs';
import { config, disconnectMongo, loadBadDomains, logger } from '@shellmatch/shared';
import { analyzeAccounts } from './batch';
import { createJudge } from './providers/openaiClient';
import { createRecordSource } from './sources';

// Usage: tsx worker/src/cli.ts <accountId...> | --file ids.txt
function readIds(argv: string[]): string[] {
  const fileIdx = argv.indexOf('--file');
  if (fileIdx >= 0) {
    const file = argv[fileIdx + 1];
    if (!file) throw new Error('--file requires a path');
    return fs
      .readFileSync(file, 'utf8')
      .split(/[\s,]+/)
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return argv.filter(Boolean);
}

async function main() {
  const ids = readIds(process.argv.slice(2));
  if (ids.length === 0) {
    logger.warn('No account ids given');
    return;
  }
  const deps = {
    badDomains: loadBadDomains(config.badDomainsPath),
    source: await createRecordSource(),
    judge: createJudge(),
  };
  const result = await analyzeAccounts(ids.slice(0, config.maxAnalyze), deps);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  await disconnectMongo();
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    logger.error('Batch run failed', { err: String(err), stack: err instanceof Error ? err.stack : undefined });
    process.exit(1);
  });
