/**
 * Atrium Roomserver - Output Stream Contract
 *
 * Durable, append-only log of roomserver output events, partitioned by
 * room ID.
 */

import { OutputEvent, StoredOutputEvent } from './output-event';

export const OUTPUT_STREAM = Symbol('OUTPUT_STREAM');

export interface OutputStream {
  append(roomId: string, events: readonly OutputEvent[]): Promise<void>;

  /** Returns events with an offset greater than `offset`, oldest first. */
  readSince(offset: number, limit?: number): Promise<StoredOutputEvent[]>;
}
