import pg from 'pg';
import { dbLogger } from '../utils/logger.js';
import { describeError } from '../utils/errorHandling.js';
import { RECENT_EVENTS_DEFAULT_LIMIT, RECENT_EVENTS_MAX_LIMIT } from '../config/constants.js';
import type { AnalyticsEvent, EventSink } from './analytics.js';

/**
 * The part of pg.Pool the store relies on
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface StoredEvent {
  event: unknown;
  storedAt: string;
}

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS analytics_events (
    id SERIAL PRIMARY KEY,
    event_data JSONB NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_event_type ON analytics_events ((event_data->>'event'))`,
  `CREATE INDEX IF NOT EXISTS idx_user_id ON analytics_events ((event_data->'properties'->>'user_id'))`,
  `CREATE INDEX IF NOT EXISTS idx_timestamp ON analytics_events ((event_data->'properties'->>'timestamp'))`,
  `CREATE INDEX IF NOT EXISTS idx_created_at ON analytics_events (created_at)`,
];

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    min: 2,
    max: 10,
    statement_timeout: 60000,
  });

  pool.on('error', (error) => {
    dbLogger.error({ error: error.message }, 'Postgres pool error');
  });

  return pool;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Analytics events stored as JSONB documents.
 * Every method logs and degrades instead of throwing.
 */
export class AnalyticsStore implements EventSink {
  constructor(private readonly client: SqlClient) {}

  async ensureSchema(): Promise<boolean> {
    try {
      for (const statement of SCHEMA_STATEMENTS) {
        await this.client.query(statement);
      }
      dbLogger.info('Analytics table and indexes ensured');
      return true;
    } catch (error) {
      dbLogger.error({ error: describeError(error) }, 'Failed to ensure analytics table');
      return false;
    }
  }

  async storeEvent(event: AnalyticsEvent): Promise<boolean> {
    try {
      await this.client.query('INSERT INTO analytics_events (event_data) VALUES ($1)', [JSON.stringify(event)]);
      return true;
    } catch (error) {
      dbLogger.error({ error: describeError(error), event: event.event }, 'Failed to store event in database');
      return false;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async getEventsCount(): Promise<number> {
    try {
      const { rows } = await this.client.query('SELECT COUNT(*)::int AS count FROM analytics_events');
      const row = rows[0];
      return isRecord(row) ? Number(row.count) || 0 : 0;
    } catch (error) {
      dbLogger.error({ error: describeError(error) }, 'Failed to get events count');
      return 0;
    }
  }

  async getRecentEvents(limit = RECENT_EVENTS_DEFAULT_LIMIT): Promise<StoredEvent[]> {
    const safeLimit = Math.min(Math.max(1, Math.floor(limit)), RECENT_EVENTS_MAX_LIMIT);

    try {
      const { rows } = await this.client.query(
        `SELECT event_data, created_at
         FROM analytics_events
         ORDER BY created_at DESC
         LIMIT $1`,
        [safeLimit]
      );

      return rows.filter(isRecord).map((row) => ({
        event: row.event_data,
        storedAt: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
      }));
    } catch (error) {
      dbLogger.error({ error: describeError(error) }, 'Failed to get recent events');
      return [];
    }
  }

  async close(): Promise<void> {
    await this.client.end();
    dbLogger.info('Database connection closed');
  }
}
