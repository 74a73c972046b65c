import { MongoClient } from 'mongodb';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

let client: MongoClient | null = null;

export async function connectDatabase(): Promise<MongoClient> {
  if (client) {
    return client;
  }

  const next = new MongoClient(env.MONGODB_URI, {
    maxPoolSize: env.MONGODB_MAX_POOL_SIZE,
    serverSelectionTimeoutMS: env.MONGODB_SERVER_SELECTION_TIMEOUT_MS
  });

  next.on('serverHeartbeatFailed', event => logger.warn({ connectionId: event.connectionId }, 'MongoDB heartbeat failed'));
  next.on('topologyClosed', () => logger.warn('MongoDB disconnected'));

  await next.connect();
  logger.info('MongoDB connected');
  client = next;
  return next;
}

export async function disconnectDatabase() {
  if (!client) {
    return;
  }
  const current = client;
  client = null;
  await current.close();
}
