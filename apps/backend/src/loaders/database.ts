import mongoose from 'mongoose';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ component: 'database' });

/**
 * Scheme, hosts and database of a connection string, without credentials or
 * options, for log lines.
 */
export function describeMongoUri(uri: string): string {
  const match = /^(mongodb(?:\+srv)?:\/\/)(?:[^@/]*@)?([^/?]*)(\/[^?]*)?/.exec(uri);
  if (!match) {
    return '(unrecognised MongoDB URI)';
  }
  const [, scheme, hosts, database = ''] = match;
  return `${scheme}${hosts}${database}`;
}

mongoose.connection.on('connected', () => log.info({ target: describeMongoUri(env.MONGODB_URI) }, 'MongoDB connected'));
mongoose.connection.on('error', error => log.error({ error }, 'MongoDB connection error'));
mongoose.connection.on('disconnected', () => log.warn('MongoDB disconnected'));

/**
 * Connect the shared mongoose connection. Repositories create their own
 * indexes through `DatabaseService`, so mongoose's model auto-indexing is off.
 */
export async function connectDatabase() {
  await mongoose.connect(env.MONGODB_URI, {
    appName: 'enfyra-backend',
    autoIndex: false,
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });
  return mongoose.connection;
}

export async function disconnectDatabase() {
  await mongoose.disconnect();
}
