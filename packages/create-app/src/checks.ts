import mongoose, { type Connection } from 'mongoose';
import { Redis } from 'ioredis';
import { getLogger } from './log.js';

export type CheckResult = { ok: true } | { ok: false; error: string };

/**
 * Verifies that the services the server depends on are reachable.
 */
export interface IConnectivityChecker {
  checkMongo(uri: string): Promise<CheckResult>;
  checkRedis(url: string): Promise<CheckResult>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConnectivityChecker implements IConnectivityChecker {
  private readonly log = getLogger('checks');

  constructor(private readonly timeoutMs = 5000) {}

  async checkMongo(uri: string): Promise<CheckResult> {
    let connection: Connection | null = null;
    try {
      connection = mongoose.createConnection(uri, { serverSelectionTimeoutMS: this.timeoutMs });
      await connection.asPromise();
      await connection.db?.admin().ping();
      return { ok: true };
    } catch (error) {
      this.log.debug({ error }, 'MongoDB check failed');
      return { ok: false, error: describe(error) };
    } finally {
      if (connection) {
        await connection.close().catch((error: unknown) => {
          this.log.warn({ error }, 'Failed to close MongoDB check connection');
        });
      }
    }
  }

  async checkRedis(url: string): Promise<CheckResult> {
    const client = new Redis(url, {
      lazyConnect: true,
      connectTimeout: this.timeoutMs,
      maxRetriesPerRequest: 0,
      enableOfflineQueue: false,
      retryStrategy: () => null
    });
    // Connection errors also surface through connect(); this keeps them off the unhandled 'error' event
    client.on('error', (error: Error) => this.log.debug({ error }, 'Redis client error'));

    try {
      await client.connect();
      await client.ping();
      return { ok: true };
    } catch (error) {
      this.log.debug({ error }, 'Redis check failed');
      return { ok: false, error: describe(error) };
    } finally {
      client.disconnect();
    }
  }
}
