/**
 * Atrium Roomserver - SQLite Output Stream
 *
 * Stores output events in `roomserver_output_events`. The autoincrement
 * key is the stream offset consumers resume from.
 */

import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { describeError } from '../../common/errors/perform-error';
import { SqliteService } from '../storage/sqlite.service';
import { OutputEvent, OutputEventType, StoredOutputEvent } from './output-event';
import { OutputStream } from './output-stream';

const DEFAULT_READ_LIMIT = 100;

interface OutputEventRow {
  stream_offset: number;
  room_id: string;
  payload: string;
  created_at: string;
}

const outputEventSchema = Joi.object<OutputEvent>({
  type: Joi.string().valid(OutputEventType.NEW_PEEK).required(),
  newPeek: Joi.object({
    roomId: Joi.string().required(),
    userId: Joi.string().required(),
    deviceId: Joi.string().allow('').required(),
  }).required(),
});

@Injectable()
export class SqliteOutputStream implements OutputStream {
  constructor(private readonly sqlite: SqliteService) {}

  async append(roomId: string, events: readonly OutputEvent[]): Promise<void> {
    const db = this.sqlite.db;
    const insert = db.prepare(
      'INSERT INTO roomserver_output_events (room_id, event_type, payload, created_at) VALUES (?, ?, ?, ?)',
    );
    const appendAll = db.transaction((batch: readonly OutputEvent[]) => {
      const createdAt = new Date().toISOString();
      for (const event of batch) {
        insert.run(roomId, event.type, JSON.stringify(event), createdAt);
      }
    });
    appendAll(events);
  }

  async readSince(offset: number, limit = DEFAULT_READ_LIMIT): Promise<StoredOutputEvent[]> {
    const rows = this.sqlite.db
      .prepare<[number, number], OutputEventRow>(
        'SELECT stream_offset, room_id, payload, created_at FROM roomserver_output_events WHERE stream_offset > ? ORDER BY stream_offset ASC LIMIT ?',
      )
      .all(offset, limit);
    return rows.map(toStoredOutputEvent);
  }
}

function toStoredOutputEvent(row: OutputEventRow): StoredOutputEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload);
  } catch (err) {
    throw malformed(row, `invalid JSON: ${describeError(err)}`);
  }
  const { value, error } = outputEventSchema.validate(payload);
  if (error) {
    throw malformed(row, error.message);
  }
  return {
    offset: row.stream_offset,
    roomId: row.room_id,
    event: value,
    createdAt: row.created_at,
  };
}

function malformed(row: OutputEventRow, reason: string): Error {
  return new Error(`Output event at offset ${row.stream_offset} is malformed: ${reason}`);
}
