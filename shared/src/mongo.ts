import mongoose from 'mongoose';
import { config } from './config';
import { logger } from './logger';

let isConnected = false;

export async function connectMongo(): Promise<typeof mongoose> {
  if (isConnected) return mongoose;
  mongoose.set('strictQuery', true);
  await mongoose.connect(config.mongoUri, { dbName: config.mongoDbName });
  isConnected = true;
  logger.info('Mongo connected', { db: config.mongoDbName, collection: config.accountsCollection });
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  if (!isConnected) return;
  await mongoose.disconnect();
  isConnected = false;
}
