import mongoose from 'mongoose';
import { config } from './config.js';
import { logger } from './logger.js';

export async function connectMongo(uri: string = config.mongoUri): Promise<typeof mongoose> {
  mongoose.set('strictQuery', true);
  mongoose.connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
  mongoose.connection.on('error', (err: Error) => logger.error({ err }, 'MongoDB connection error'));
  // Cart merges and order conversion use multi-document transactions: the server must be a replica set
  return mongoose.connect(uri);
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
