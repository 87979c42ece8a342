/**
 * Shared TypeScript types for the application
 */

export type SyncDirection = 'forward' | 'backward';

/** One item published by the incidents account. */
export interface Message {
  id: bigint;
  text: string;
  createdAt: Date;
}

/** Structured fields extracted from a single message. */
export interface Incident {
  id: string;
  location: string;
  community: string;
  type: string;
  apparatuses: string[];
  stations: string[];
}

export interface StoredIncident extends Incident {
  externalMessageId: bigint;
  messageText: string;
  messageTimestamp: Date;
  ingestedAt: Date;
}
