import pg from 'pg';
import dotenv from 'dotenv';
import type { InputRecord } from '../concurrent/types.js';
import { describeError } from '../core/errors.js';
import { ComponentLogger } from '../utils/logger.js';
import { rowsToInputRecords, type RecordColumns } from '../utils/records.js';

dotenv.config();

const { Pool } = pg;

const READ_QUERY_PATTERN = /^\s*(select|with)\b/i;

export interface DatabaseSettings {
  host: string;
  port: number;
  user: string;
  password?: string;
  database?: string;
}

/**
 * PostgreSQL Record Source
 *
 * Complaint records can be selected from a database instead of a file. Every
 * query must start with SELECT or WITH and runs inside a READ ONLY
 * transaction.
 */
export class DatabaseConfig {
  private static pool: pg.Pool | null = null;
  private static logger = new ComponentLogger('RecordDatabase');

  /**
   * Connection settings from PG* variables, or null when PGHOST/PGUSER are unset
   */
  static getSettings(env: NodeJS.ProcessEnv = process.env): DatabaseSettings | null {
    if (!env.PGHOST || !env.PGUSER) {
      return null;
    }

    const port = Number(env.PGPORT || '5432');
    if (!Number.isInteger(port) || port < 1) {
      throw new Error(`Invalid PGPORT value: ${env.PGPORT}`);
    }

    return {
      host: env.PGHOST,
      port,
      user: env.PGUSER,
      password: env.PGPASSWORD,
      database: env.PGDATABASE,
    };
  }

  static isConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
    return this.getSettings(env) !== null;
  }

  static assertReadQuery(query: string): void {
    if (!READ_QUERY_PATTERN.test(query)) {
      throw new Error('Record queries must be read-only and start with SELECT or WITH');
    }
  }

  /**
   * Run a record query and map its rows by the id and content columns
   */
  static async loadRecords(query: string, columns: RecordColumns): Promise<InputRecord[]> {
    const result = await this.readOnly(query);

    if (result.rows.length === 0) {
      throw new Error('Database query returned no rows');
    }
    if (!result.fields.some((field) => field.name === columns.contentColumn)) {
      throw new Error(`Query result has no "${columns.contentColumn}" column`);
    }

    return rowsToInputRecords(result.rows, columns);
  }

  static async testConnection(): Promise<boolean> {
    try {
      const result = await this.readOnly<{ database: string }>('SELECT current_database() AS database');
      console.log(`✅ PostgreSQL reachable: ${result.rows[0]?.database ?? 'unknown database'}`);
      return true;
    } catch (error) {
      console.error(`❌ PostgreSQL connection failed: ${describeError(error)}`);
      return false;
    }
  }

  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.debug('Pool closed');
    }
  }

  private static getPool(): pg.Pool {
    if (!this.pool) {
      const settings = this.getSettings();
      if (!settings) {
        throw new Error('PostgreSQL is not configured. Set PGHOST and PGUSER.');
      }

      this.pool = new Pool({
        ...settings,
        max: 2,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 15000,
      });
      this.logger.info(`Record database: ${settings.user}@${settings.host}:${settings.port}/${settings.database ?? ''}`);
    }

    return this.pool;
  }

  private static async readOnly<Row extends pg.QueryResultRow = pg.QueryResultRow>(
    query: string
  ): Promise<pg.QueryResult<Row>> {
    this.assertReadQuery(query);
    const client = await this.getPool().connect();

    try {
      await client.query('BEGIN TRANSACTION READ ONLY');
      const result = await client.query<Row>(query);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn(`Rollback failed: ${describeError(rollbackError)}`);
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
