/**
 * Atrium Roomserver - Storage Module
 *
 * Provides the SQLite connection and the room database collaborator.
 */

import { Module } from '@nestjs/common';
import { ROOM_DATABASE } from './room-database';
import { SqliteRoomDatabase } from './sqlite-room-database';
import { SqliteService } from './sqlite.service';

@Module({
  providers: [
    SqliteService,
    SqliteRoomDatabase,
    { provide: ROOM_DATABASE, useExisting: SqliteRoomDatabase },
  ],
  exports: [SqliteService, SqliteRoomDatabase, ROOM_DATABASE],
})
export class StorageModule {}
