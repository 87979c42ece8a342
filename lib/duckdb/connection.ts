/**
 * DuckDB Connection using @duckdb/node-api
 * One read-write instance per ingest run; statements are prepared and bound positionally.
 */

import { DuckDBInstance, DuckDBConnection, DuckDBPreparedStatement, type DuckDBValue } from '@duckdb/node-api';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';

export const IN_MEMORY = ':memory:';

export type SqlParam = string | bigint | Date;

export type Row = Record<string, DuckDBValue>;

export interface DuckDBHandle {
  path: string;
  instance: DuckDBInstance;
  connection: DuckDBConnection;
}

/**
 * Open (or create) the database file. The parent directory is created when missing.
 */
export async function openDuckDB(dbPath: string): Promise<DuckDBHandle> {
  if (dbPath !== IN_MEMORY) {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const instance = await DuckDBInstance.create(dbPath);
  const connection = await instance.connect();
  return { path: dbPath, instance, connection };
}

/**
 * DuckDB TIMESTAMP literal in UTC, e.g. "2024-03-01 14:05:09.120"
 */
export function toTimestampLiteral(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

function bindParams(prepared: DuckDBPreparedStatement, params: SqlParam[]): void {
  // Bind params – position starts at 1
  params.forEach((val, idx) => {
    const pos = idx + 1;
    if (typeof val === 'bigint') {
      prepared.bindBigInt(pos, val);
    } else if (typeof val === 'string') {
      prepared.bindVarchar(pos, val);
    } else {
      // Dates go over as UTC literals; the SQL casts them with CAST(? AS TIMESTAMP)
      prepared.bindVarchar(pos, toTimestampLiteral(val));
    }
  });
}

async function runPrepared(connection: DuckDBConnection, sql: string, params: SqlParam[]) {
  const prepared = await connection.prepare(sql);
  bindParams(prepared, params);
  return prepared.run();
}

/**
 * Execute a query and return results as an array of row objects
 */
export async function query(connection: DuckDBConnection, sql: string, params: SqlParam[] = []): Promise<Row[]> {
  if (params.length === 0) {
    const reader = await connection.runAndReadAll(sql);
    return reader.getRowObjects();
  }
  const result = await runPrepared(connection, sql, params);
  return result.getRowObjects();
}

/**
 * Execute a query and return a single row
 */
export async function queryOne(connection: DuckDBConnection, sql: string, params: SqlParam[] = []): Promise<Row | null> {
  const rows = await query(connection, sql, params);
  return rows.length > 0 ? rows[0] : null;
}

/**
 * Execute a statement and return the number of rows it changed
 */
export async function execute(connection: DuckDBConnection, sql: string, params: SqlParam[] = []): Promise<number> {
  if (params.length === 0) {
    const result = await connection.run(sql);
    return result.rowsChanged;
  }
  const result = await runPrepared(connection, sql, params);
  return result.rowsChanged;
}

/**
 * Flush the WAL into the database file, disconnect and close the instance
 */
export async function closeDuckDB(handle: DuckDBHandle): Promise<void> {
  try {
    if (handle.path !== IN_MEMORY) {
      await handle.connection.run('CHECKPOINT');
    }
  } finally {
    handle.connection.disconnectSync();
    handle.instance.closeSync();
  }
}

/**
 * Close after something else already failed. A close error is only logged so
 * the original failure is the one that gets reported.
 */
export async function closeDuckDBAfterFailure(handle: DuckDBHandle): Promise<void> {
  try {
    await closeDuckDB(handle);
  } catch (err) {
    console.error(chalk.yellow(`Warning closing database: ${err instanceof Error ? err.message : String(err)}`));
  }
}
