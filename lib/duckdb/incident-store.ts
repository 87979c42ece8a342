/**
 * DuckDB-backed Incident Store
 */

import * as fs from 'fs';
import type { DuckDBValue } from '@duckdb/node-api';
import { StoreError } from '../errors';
import type { IncidentStore } from '../incidents/store';
import type { StoredIncident } from '../types';
import { closeDuckDB, closeDuckDBAfterFailure, execute, openDuckDB, queryOne, type DuckDBHandle } from './connection';

export const SCHEMA_PATH = new URL('../../docs/duckdb_schema.sql', import.meta.url);

function toBigInt(value: DuckDBValue | undefined): bigint | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') return BigInt(value);
  throw new StoreError(`Expected an integer id, got ${String(value)}`);
}

export class DuckDBIncidentStore implements IncidentStore {
  private constructor(private readonly handle: DuckDBHandle) {}

  /**
   * Open the database at dbPath (or ':memory:') and make sure the incidents table exists
   */
  static async open(dbPath: string): Promise<DuckDBIncidentStore> {
    let handle: DuckDBHandle;
    try {
      handle = await openDuckDB(dbPath);
    } catch (error) {
      throw new StoreError(`Could not open DuckDB at ${dbPath}`, { cause: error });
    }

    try {
      return await DuckDBIncidentStore.attach(handle);
    } catch (error) {
      await closeDuckDBAfterFailure(handle);
      throw error;
    }
  }

  /**
   * Use an already open handle; the store closes it on close()
   */
  static async attach(handle: DuckDBHandle, schemaPath: URL = SCHEMA_PATH): Promise<DuckDBIncidentStore> {
    const store = new DuckDBIncidentStore(handle);
    await store.applySchema(schemaPath);
    return store;
  }

  get path(): string {
    return this.handle.path;
  }

  private async applySchema(schemaPath: URL): Promise<void> {
    try {
      const schemaSQL = fs.readFileSync(schemaPath, 'utf-8');
      await execute(this.handle.connection, schemaSQL);
    } catch (error) {
      throw new StoreError('Could not create incidents table', { cause: error });
    }
  }

  private async scalar(sql: string): Promise<DuckDBValue | undefined> {
    try {
      const row = await queryOne(this.handle.connection, sql);
      return row ? row.value : undefined;
    } catch (error) {
      throw new StoreError(`Query failed: ${sql}`, { cause: error });
    }
  }

  async maxExternalId(): Promise<bigint | undefined> {
    return toBigInt(await this.scalar('SELECT max(tweet_id) AS value FROM incidents'));
  }

  async minExternalId(): Promise<bigint | undefined> {
    return toBigInt(await this.scalar('SELECT min(tweet_id) AS value FROM incidents'));
  }

  async count(): Promise<number> {
    const value = toBigInt(await this.scalar('SELECT count(*) AS value FROM incidents'));
    return Number(value ?? 0n);
  }

  async insertIfAbsent(incident: StoredIncident): Promise<boolean> {
    const { connection } = this.handle;
    const messageId = incident.externalMessageId;

    try {
      const existing = await queryOne(connection, 'SELECT tweet_id FROM incidents WHERE tweet_id = ?', [messageId]);
      if (existing) {
        return false;
      }

      const changed = await execute(
        connection,
        `INSERT INTO incidents (
          id, location, community, type, apparatuses, station,
          created_at, tweet_id, tweet_text, tweet_created_at, ingested_at
        ) VALUES (?, ?, ?, ?, ?, ?, CAST(? AS TIMESTAMP), ?, ?, CAST(? AS TIMESTAMP), CAST(? AS TIMESTAMP))
        ON CONFLICT (tweet_id) DO NOTHING`,
        [
          incident.id,
          incident.location,
          incident.community,
          incident.type,
          incident.apparatuses.join(' '),
          incident.stations.join(' '),
          incident.messageTimestamp,
          messageId,
          incident.messageText,
          incident.messageTimestamp,
          incident.ingestedAt,
        ]
      );
      return changed > 0;
    } catch (error) {
      throw new StoreError(`Insert failed for message ${messageId}`, { messageId, cause: error });
    }
  }

  async close(): Promise<void> {
    await closeDuckDB(this.handle);
  }

  /**
   * Close after a failed run; a close error is logged instead of replacing the run's error
   */
  async closeAfterFailure(): Promise<void> {
    await closeDuckDBAfterFailure(this.handle);
  }
}
