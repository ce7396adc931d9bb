/**
 * Atrium Roomserver - SQLite Service
 *
 * Owns the single better-sqlite3 connection shared by the room database
 * and the output stream, and creates the schema on first open.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';

export const IN_MEMORY_PATH = ':memory:';

@Injectable()
export class SqliteService implements OnModuleDestroy {
  private readonly logger = new Logger(SqliteService.name);
  readonly db: Database.Database;

  constructor(configService: ConfigService) {
    const path = configService.get<string>('database.path', IN_MEMORY_PATH);
    this.db = new Database(path);
    if (path !== IN_MEMORY_PATH && configService.get<boolean>('database.walMode', true)) {
      this.db.pragma('journal_mode = WAL');
    }
    initSchema(this.db);
    this.logger.log(`Opened roomserver database at ${path}`);
  }

  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  }

  onModuleDestroy() {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function initSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS room_aliases (
      alias TEXT PRIMARY KEY,
      room_id TEXT NOT NULL,
      creator_id TEXT NOT NULL DEFAULT ''
    );

    CREATE TABLE IF NOT EXISTS current_room_state (
      room_id TEXT NOT NULL,
      event_type TEXT NOT NULL,
      state_key TEXT NOT NULL,
      content TEXT NOT NULL,
      PRIMARY KEY (room_id, event_type, state_key)
    );

    CREATE TABLE IF NOT EXISTS roomserver_output_events (
      stream_offset INTEGER PRIMARY KEY AUTOINCREMENT,
      room_id TEXT NOT NULL,
      event_type TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_room_aliases_room_id ON room_aliases(room_id);
    CREATE INDEX IF NOT EXISTS idx_output_events_room_id ON roomserver_output_events(room_id);
  `);
}
