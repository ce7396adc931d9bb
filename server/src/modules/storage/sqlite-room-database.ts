/**
 * Atrium Roomserver - SQLite Room Database
 *
 * better-sqlite3 implementation of the room database. The alias and state
 * writers are fixture writers: the peek flow only reads, and production
 * rows come from the components that persist room events.
 */

import { Injectable } from '@nestjs/common';
import { RoomDatabase, RoomStateEvent } from './room-database';
import { SqliteService } from './sqlite.service';

interface AliasRow {
  room_id: string;
}

interface StateRow {
  room_id: string;
  event_type: string;
  state_key: string;
  content: string;
}

@Injectable()
export class SqliteRoomDatabase implements RoomDatabase {
  constructor(private readonly sqlite: SqliteService) {}

  async lookupRoomIdForAlias(alias: string): Promise<string | null> {
    const row = this.sqlite.db
      .prepare<[string], AliasRow>('SELECT room_id FROM room_aliases WHERE alias = ?')
      .get(alias);
    return row ? row.room_id : null;
  }

  async getStateEvent(
    roomId: string,
    eventType: string,
    stateKey: string,
  ): Promise<RoomStateEvent | null> {
    const row = this.sqlite.db
      .prepare<[string, string, string], StateRow>(
        'SELECT room_id, event_type, state_key, content FROM current_room_state WHERE room_id = ? AND event_type = ? AND state_key = ?',
      )
      .get(roomId, eventType, stateKey);
    if (!row) {
      return null;
    }
    return {
      roomId: row.room_id,
      type: row.event_type,
      stateKey: row.state_key,
      content: row.content,
    };
  }

  async setRoomAlias(alias: string, roomId: string, creatorId = ''): Promise<void> {
    this.sqlite.db
      .prepare(
        'INSERT INTO room_aliases (alias, room_id, creator_id) VALUES (?, ?, ?) ON CONFLICT(alias) DO UPDATE SET room_id = excluded.room_id, creator_id = excluded.creator_id',
      )
      .run(alias, roomId, creatorId);
  }

  async setStateEvent(event: RoomStateEvent): Promise<void> {
    this.sqlite.db
      .prepare(
        'INSERT INTO current_room_state (room_id, event_type, state_key, content) VALUES (?, ?, ?, ?) ON CONFLICT(room_id, event_type, state_key) DO UPDATE SET content = excluded.content',
      )
      .run(event.roomId, event.type, event.stateKey, event.content);
  }
}
