/**
 * Incident Store contract
 * Persistence is keyed by the external message id; writing an id twice is a no-op.
 */

import type { Incident, Message, StoredIncident } from '../types';

export interface IncidentStore {
  /** Largest stored external message id, undefined when the store is empty */
  maxExternalId(): Promise<bigint | undefined>;
  /** Smallest stored external message id, undefined when the store is empty */
  minExternalId(): Promise<bigint | undefined>;
  /** Returns false (without failing) when the message id is already stored */
  insertIfAbsent(incident: StoredIncident): Promise<boolean>;
}

export function toStoredIncident(
  incident: Incident,
  message: Message,
  ingestedAt: Date = new Date()
): StoredIncident {
  return {
    ...incident,
    externalMessageId: message.id,
    messageText: message.text,
    messageTimestamp: message.createdAt,
    ingestedAt,
  };
}
