/**
 * Incident Sync Driver
 *
 * Two passes over the account timeline:
 *   - forward:  everything newer than the newest stored message
 *   - backward: everything older than the oldest stored message
 *
 * Each pass reads its boundary from the store once, then advances it from
 * every page it stores until the source hands back an empty page.
 */

import { IngestError, SourceError, StoreError } from '../errors';
import type { MessageSource } from '../twitter/timeline';
import type { Message, StoredIncident, SyncDirection } from '../types';
import { parseIncident } from './parser';
import { toStoredIncident, type IncidentStore } from './store';

export interface SyncHooks {
  onPage?(direction: SyncDirection, messages: Message[]): void;
  onStored?(direction: SyncDirection, incident: StoredIncident, inserted: boolean): void;
}

export interface SyncDeps {
  store: IncidentStore;
  source: MessageSource;
}

export interface SyncOptions {
  account: string;
  hooks?: SyncHooks;
  /** Clock for ingested_at; tests pin it */
  now?: () => Date;
}

export interface PassSummary {
  direction: SyncDirection;
  /** Non-empty pages processed */
  pages: number;
  /** Fetch calls made, including the final empty page */
  fetches: number;
  messages: number;
  inserted: number;
  duplicates: number;
  /** Boundary id after the pass; undefined if nothing has ever been stored */
  boundary: bigint | undefined;
}

export interface SyncSummary {
  forward: PassSummary;
  backward: PassSummary;
}

interface PassStrategy {
  direction: SyncDirection;
  readBoundary(store: IncidentStore): Promise<bigint | undefined>;
  fetch(source: MessageSource, account: string, boundary: bigint | undefined): Promise<Message[]>;
  advance(boundary: bigint, id: bigint): bigint;
}

const forward: PassStrategy = {
  direction: 'forward',
  readBoundary: (store) => store.maxExternalId(),
  fetch: (source, account, boundary) => source.fetchSince(account, boundary),
  advance: (boundary, id) => (id > boundary ? id : boundary),
};

const backward: PassStrategy = {
  direction: 'backward',
  readBoundary: (store) => store.minExternalId(),
  // max_id is inclusive, so step past the oldest stored id
  fetch: (source, account, boundary) =>
    source.fetchUntil(account, boundary === undefined ? undefined : boundary - 1n),
  advance: (boundary, id) => (id < boundary ? id : boundary),
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runPass(strategy: PassStrategy, deps: SyncDeps, options: SyncOptions): Promise<PassSummary> {
  const { direction } = strategy;
  const { store, source } = deps;
  const now = options.now ?? (() => new Date());

  const summary: PassSummary = {
    direction,
    pages: 0,
    fetches: 0,
    messages: 0,
    inserted: 0,
    duplicates: 0,
    boundary: undefined,
  };

  try {
    summary.boundary = await strategy.readBoundary(store);
  } catch (error) {
    throw new StoreError(`Could not read ${direction} boundary: ${describe(error)}`, { direction, cause: error });
  }

  for (;;) {
    let page: Message[];
    summary.fetches++;
    try {
      page = await strategy.fetch(source, options.account, summary.boundary);
    } catch (error) {
      const messageId = error instanceof IngestError ? error.messageId : undefined;
      throw new SourceError(describe(error), { direction, messageId, cause: error });
    }

    if (page.length === 0) {
      return summary;
    }

    summary.pages++;
    options.hooks?.onPage?.(direction, page);

    const previous = summary.boundary;
    let boundary = previous;

    for (const message of page) {
      const parsed = parseIncident(message.text);
      if (!parsed.ok) {
        throw parsed.error.withContext({ direction, messageId: message.id });
      }

      const stored = toStoredIncident(parsed.incident, message, now());
      let inserted: boolean;
      try {
        inserted = await store.insertIfAbsent(stored);
      } catch (error) {
        throw new StoreError(describe(error), { direction, messageId: message.id, cause: error });
      }

      summary.messages++;
      if (inserted) {
        summary.inserted++;
      } else {
        summary.duplicates++;
      }
      boundary = boundary === undefined ? message.id : strategy.advance(boundary, message.id);
      options.hooks?.onStored?.(direction, stored, inserted);
    }

    if (boundary === previous) {
      throw new SourceError(`Cursor did not advance past ${String(previous)}`, { direction });
    }
    summary.boundary = boundary;
  }
}

export function syncForward(deps: SyncDeps, options: SyncOptions): Promise<PassSummary> {
  return runPass(forward, deps, options);
}

export function syncBackward(deps: SyncDeps, options: SyncOptions): Promise<PassSummary> {
  return runPass(backward, deps, options);
}

/**
 * Forward then backward. Either order converges; forward first picks up new
 * incidents before any long backfill.
 */
export async function syncIncidents(deps: SyncDeps, options: SyncOptions): Promise<SyncSummary> {
  const forwardSummary = await syncForward(deps, options);
  const backwardSummary = await syncBackward(deps, options);
  return { forward: forwardSummary, backward: backwardSummary };
}
