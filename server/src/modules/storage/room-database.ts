/**
 * Atrium Roomserver - Room Database Contract
 *
 * Read access to room aliases and current room state. The peek flow never
 * writes through this interface.
 */

export const ROOM_DATABASE = Symbol('ROOM_DATABASE');

export const HISTORY_VISIBILITY_EVENT_TYPE = 'm.room.history_visibility';

export interface RoomStateEvent {
  roomId: string;
  type: string;
  stateKey: string;
  // Raw JSON content as stored.
  content: string;
}

export interface RoomDatabase {
  /** Resolves a locally owned alias, or `null` when it is not known. */
  lookupRoomIdForAlias(alias: string): Promise<string | null>;

  getStateEvent(
    roomId: string,
    eventType: string,
    stateKey: string,
  ): Promise<RoomStateEvent | null>;
}
