/**
 * Ingestion error hierarchy
 * Every failure that aborts a run is one of these, with the pass and message it happened on.
 */

import type { SyncDirection } from './types';

export interface IngestErrorContext {
  direction?: SyncDirection;
  messageId?: bigint;
  cause?: unknown;
}

export class IngestError extends Error {
  readonly direction?: SyncDirection;
  readonly messageId?: bigint;

  constructor(message: string, context: IngestErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.direction = context.direction;
    this.messageId = context.messageId;
  }

  /** "forward pass, message 123" style prefix for log lines */
  describeContext(): string {
    const parts: string[] = [];
    if (this.direction) parts.push(`${this.direction} pass`);
    if (this.messageId !== undefined) parts.push(`message ${this.messageId}`);
    return parts.join(', ');
  }
}

/** The message text does not have the four-line layout. */
export class ParseError extends IngestError {
  readonly lineCount: number;

  constructor(lineCount: number, context: IngestErrorContext = {}) {
    super(`unexpected line count: ${lineCount}`, context);
    this.lineCount = lineCount;
  }

  withContext(context: IngestErrorContext): ParseError {
    return new ParseError(this.lineCount, context);
  }
}

export class SourceError extends IngestError {}

export class StoreError extends IngestError {}

export class ConfigError extends IngestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}
