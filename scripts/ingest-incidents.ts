#!/usr/bin/env tsx
/**
 * Incident Feed Ingestion Script
 * Pulls the fire department's incident tweets into DuckDB.
 *
 * Runs a forward pass (anything newer than the newest stored tweet) and then a
 * backward pass (anything older than the oldest stored tweet). Safe to re-run:
 * tweets already stored are skipped.
 *
 * Usage:
 *   npx tsx scripts/ingest-incidents.ts
 *
 * Environment variables:
 *   TWITTER_CONSUMER_KEY     - OAuth consumer key
 *   TWITTER_CONSUMER_SECRET  - OAuth consumer secret
 *   TWITTER_APP_TOKEN        - OAuth access token
 *   TWITTER_APP_SECRET       - OAuth access token secret
 *   INCIDENTS_ACCOUNT        - account to poll (default: HRFE_Incidents)
 *   TWITTER_PAGE_SIZE        - tweets per timeline request (1-200)
 *   DUCKDB_PATH              - path to DuckDB file (default: data/incidents.duckdb)
 */

import * as cliProgress from 'cli-progress';
import chalk from 'chalk';
import { formatDistanceStrict } from 'date-fns';
import { loadConfig } from '@/lib/config';
import { DuckDBIncidentStore } from '@/lib/duckdb/incident-store';
import { IngestError } from '@/lib/errors';
import { syncIncidents, type PassSummary, type SyncHooks, type SyncSummary } from '@/lib/incidents/sync';
import { TwitterTimelineSource } from '@/lib/twitter/timeline';
import type { Message } from '@/lib/types';

function idRange(messages: Message[]): string {
  const ids = messages.map((m) => m.id);
  const min = ids.reduce((a, b) => (b < a ? b : a));
  const max = ids.reduce((a, b) => (b > a ? b : a));
  return `${min}..${max}`;
}

function createProgressHooks(): { hooks: SyncHooks; stop: () => void } {
  const progressBar = new cliProgress.SingleBar({
    format: '🔄 {direction}: {bar} {percentage}% | {value}/{total} tweets',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true
  }, cliProgress.Presets.shades_classic);

  let pageTotal = 0;
  let pageDone = 0;
  let pageInserted = 0;
  let pageRange = '';

  const hooks: SyncHooks = {
    onPage(direction, messages) {
      pageTotal = messages.length;
      pageDone = 0;
      pageInserted = 0;
      pageRange = idRange(messages);
      progressBar.start(pageTotal, 0, { direction });
    },
    onStored(_direction, _incident, inserted) {
      pageDone++;
      if (inserted) pageInserted++;
      progressBar.update(pageDone);

      if (pageDone === pageTotal) {
        progressBar.stop();
        console.log(chalk.gray(
          `   tweets ${pageRange}: ${pageInserted} inserted, ${pageTotal - pageInserted} already stored`
        ));
      }
    },
  };

  return { hooks, stop: () => progressBar.stop() };
}

function printPass(summary: PassSummary) {
  console.log(chalk.cyan(`   ${summary.direction === 'forward' ? 'Forward ' : 'Backward'} pass:`));
  console.log(chalk.gray(`     Pages: ${summary.pages} (${summary.fetches} requests)`));
  console.log(chalk.gray(`     Tweets: ${summary.messages} | Inserted: ${summary.inserted} | Already stored: ${summary.duplicates}`));
  console.log(chalk.gray(`     Boundary: ${summary.boundary ?? 'none'}`));
}

function printError(error: unknown) {
  if (error instanceof IngestError) {
    const context = error.describeContext();
    console.error(chalk.red(`\n✗ ${error.name}${context ? ` (${context})` : ''}: ${error.message}`));
  } else {
    console.error(chalk.red(`\n✗ Fatal error: ${error instanceof Error ? error.message : error}`));
  }

  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    console.error(chalk.yellow(`   caused by: ${cause instanceof Error ? cause.message : String(cause)}`));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}

async function ingestIncidents() {
  const startTime = new Date();
  const config = loadConfig();

  console.log(chalk.blue(`📡 Syncing incidents from @${config.account}...`));
  console.log(chalk.gray(`   Using DuckDB: ${config.duckdbPath}`));

  const store = await DuckDBIncidentStore.open(config.duckdbPath);
  const source = new TwitterTimelineSource(config.twitter, config.pageSize);
  const progress = createProgressHooks();

  let summary: SyncSummary;
  let total: number;
  try {
    summary = await syncIncidents(
      { store, source },
      { account: config.account, hooks: progress.hooks }
    );
    total = await store.count();
  } catch (error) {
    progress.stop();
    await store.closeAfterFailure();
    throw error;
  }

  progress.stop();
  await store.close();

  console.log(chalk.green('\n✅ SYNC COMPLETE'));
  printPass(summary.forward);
  printPass(summary.backward);
  console.log(chalk.cyan(`   Stored incidents: ${total}`));
  console.log(chalk.cyan(`   Duration: ${formatDistanceStrict(new Date(), startTime)}\n`));
}

ingestIncidents().catch((error) => {
  printError(error);
  console.error(chalk.gray('   Tweets stored before the failure are kept; re-run to resume.'));
  process.exit(1);
});
