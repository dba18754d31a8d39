import { config, loadBadDomains, logger } from '@shellmatch/shared';
import { createJudge, createRecordSource } from '@shellmatch/worker';
import { createApp } from './app';

async function main() {
  const deps = {
    badDomains: loadBadDomains(config.badDomainsPath),
    source: await createRecordSource(),
    judge: createJudge(),
  };
  const app = createApp(deps);

  app.listen(config.port, () => {
    logger.info(`API listening on :${config.port}`, { source: deps.source.name, judge: deps.judge.name });
  });
}

main().catch((err) => {
  logger.error('Fatal error', { err: String(err), stack: err instanceof Error ? err.stack : undefined });
  process.exit(1);
});
