/**
 * Atrium Roomserver - Peek Recorder
 *
 * Appends one `new_peek` output event per accepted peek. Repeated peeks by
 * the same device are recorded again; consumers deal with repetition.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OutputEventType, OutputNewPeek } from './output-event';
import { OUTPUT_STREAM, OutputStream } from './output-stream';

@Injectable()
export class PeekRecorderService {
  private readonly logger = new Logger(PeekRecorderService.name);

  constructor(@Inject(OUTPUT_STREAM) private readonly outputStream: OutputStream) {}

  async recordPeek(peek: OutputNewPeek): Promise<void> {
    await this.outputStream.append(peek.roomId, [
      {
        type: OutputEventType.NEW_PEEK,
        newPeek: { roomId: peek.roomId, userId: peek.userId, deviceId: peek.deviceId },
      },
    ]);
    this.logger.debug(`Recorded peek of ${peek.roomId} by ${peek.userId} (${peek.deviceId})`);
  }
}
