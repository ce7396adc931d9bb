/**
 * Atrium Roomserver - Output Module
 *
 * Provides the output event stream and the peek recorder that writes to it.
 */

import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { OUTPUT_STREAM } from './output-stream';
import { PeekRecorderService } from './peek-recorder.service';
import { SqliteOutputStream } from './sqlite-output-stream';

@Module({
  imports: [StorageModule],
  providers: [
    SqliteOutputStream,
    { provide: OUTPUT_STREAM, useExisting: SqliteOutputStream },
    PeekRecorderService,
  ],
  exports: [OUTPUT_STREAM, PeekRecorderService],
})
export class OutputModule {}
