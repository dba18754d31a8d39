import { config, connectMongo, logger, type RecordSourceKind } from '@shellmatch/shared';
import { MongoRecordSource } from './providers/mongoSource';
import { SalesforceRecordSource, credentialsFromConfig } from './providers/salesforceClient';
import type { RecordSource } from './types';

export async function createRecordSource(kind: RecordSourceKind = config.recordSource): Promise<RecordSource> {
  if (kind === 'mongo') {
    await connectMongo();
    logger.info('Record source ready', { source: 'mongo' });
    return new MongoRecordSource();
  }
  const source = new SalesforceRecordSource(credentialsFromConfig());
  logger.info('Record source ready', { source: 'salesforce', loginUrl: config.sfLoginUrl });
  return source;
}
