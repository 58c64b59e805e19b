import { setTimeout as sleep } from 'node:timers/promises';
import { neon } from '@neondatabase/serverless';
import { sql } from 'drizzle-orm';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { logger } from '../logger.js';
import { createAppError, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

const log = logger.child({ module: 'db' });

export interface ConnectOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

export function getConnectionUrl(env: Record<string, string | undefined> = process.env): string {
  const url = env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  return url;
}

function delayWithJitter(attempt: number, baseDelayMs: number): number {
  const base = baseDelayMs * Math.pow(2, attempt);
  return base + Math.random() * base * 0.5;
}

export function createDatabase(url: string = getConnectionUrl()): Database {
  return drizzle(neon(url), { schema });
}

/** Opens the review-run store and proves it answers, backing off between attempts. */
export async function createDatabaseWithRetry(
  url: string,
  options: ConnectOptions = {},
): Promise<Result<Database, AppError>> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  let lastError = '';

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      const db = createDatabase(url);
      await db.execute(sql`select 1`);

      log.info({ attempt: attempt + 1 }, 'Database connection established');
      return ok(db);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      log.warn({ attempt: attempt + 1, maxRetries, error: lastError }, 'Database connection attempt failed');

      if (attempt < maxRetries - 1) {
        await sleep(delayWithJitter(attempt, baseDelayMs));
      }
    }
  }

  log.error({ maxRetries, lastError }, 'Database connection failed after all retries');
  return err(createAppError('DB_CONNECTION_ERROR', `Failed to connect after ${maxRetries} attempts`, true, lastError));
}
