#!/usr/bin/env tsx
/**
 * Initialize DuckDB Database
 * Creates the DuckDB database file and the incidents table
 */

import chalk from 'chalk';
import { resolveDuckDBPath } from '@/lib/config';
import { DuckDBIncidentStore, SCHEMA_PATH } from '@/lib/duckdb/incident-store';

const DUCKDB_PATH = resolveDuckDBPath(process.env.DUCKDB_PATH);

async function initDuckDB() {
  console.log(chalk.blue('🔧 Initializing DuckDB database...'));
  console.log(chalk.gray(`   Database path: ${DUCKDB_PATH}`));
  console.log(chalk.gray(`   Schema: ${SCHEMA_PATH.pathname}`));

  const store = await DuckDBIncidentStore.open(DUCKDB_PATH);
  let count: number;
  try {
    count = await store.count();
  } catch (error) {
    await store.closeAfterFailure();
    throw error;
  }
  await store.close();

  console.log(chalk.green('✓ Schema executed'));
  console.log(chalk.cyan(`   incidents: ${count} rows`));
  console.log(chalk.green(`\n✅ DuckDB database initialized successfully at: ${DUCKDB_PATH}\n`));
}

initDuckDB().catch((error) => {
  console.error(chalk.red(`\n✗ Fatal error: ${error instanceof Error ? error.message : error}`));
  process.exit(1);
});
