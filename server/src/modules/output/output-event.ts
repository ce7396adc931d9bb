/**
 * Atrium Roomserver - Output Events
 *
 * Records the roomserver appends to its output stream for downstream
 * components (sync, federation sender) to consume.
 */

export enum OutputEventType {
  NEW_PEEK = 'new_peek',
}

export interface OutputNewPeek {
  roomId: string;
  userId: string;
  deviceId: string;
}

export interface NewPeekOutputEvent {
  type: OutputEventType.NEW_PEEK;
  newPeek: OutputNewPeek;
}

export type OutputEvent = NewPeekOutputEvent;

export interface StoredOutputEvent {
  offset: number;
  roomId: string;
  event: OutputEvent;
  createdAt: string;
}
