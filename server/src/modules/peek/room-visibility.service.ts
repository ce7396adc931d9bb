/**
 * Atrium Roomserver - Room Visibility
 *
 * Validates a canonical room ID and admits it for peeking only when its
 * history visibility is `world_readable`. A room without history
 * visibility state is closed.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ensureNotAborted } from '../../common/abort';
import { describeError, PerformError } from '../../common/errors/perform-error';
import { splitId } from '../../common/ids/matrix-id';
import {
  HISTORY_VISIBILITY_EVENT_TYPE,
  ROOM_DATABASE,
  RoomDatabase,
  RoomStateEvent,
} from '../storage/room-database';
import {
  evaluateHistoryVisibility,
  HistoryVisibilityOutcome,
  isWorldReadable,
} from './history-visibility';
import { ResolutionContext, ResolvedRoom } from './resolved-room';

export interface ResolveRoomIdParams extends ResolutionContext {
  roomId: string;
}

@Injectable()
export class RoomVisibilityService {
  private readonly logger = new Logger(RoomVisibilityService.name);

  constructor(@Inject(ROOM_DATABASE) private readonly roomDatabase: RoomDatabase) {}

  async resolveRoomId({
    roomId,
    serverNames,
    localServerName,
    signal,
  }: ResolveRoomIdParams): Promise<ResolvedRoom> {
    let domain: string;
    try {
      ({ domain } = splitId('!', roomId));
    } catch (err) {
      throw PerformError.badRequest(`Room ID "${roomId}" is invalid: ${describeError(err)}`);
    }

    // A room created elsewhere can be reached through its creating server.
    // Visibility is still only checked against local state: federated
    // peeks are not supported, so such rooms are refused unless we hold
    // their state.
    const candidates = domain === localServerName ? [...serverNames] : [...serverNames, domain];

    const outcome = await this.historyVisibility(roomId, signal);
    if (!isWorldReadable(outcome)) {
      this.logger.debug(`Refusing peek of ${roomId}: history visibility ${describeOutcome(outcome)}`);
      throw PerformError.notAllowed('Room is not world-readable');
    }
    return { roomId, serverNames: candidates };
  }

  private async historyVisibility(
    roomId: string,
    signal?: AbortSignal,
  ): Promise<HistoryVisibilityOutcome> {
    ensureNotAborted(signal);
    let event: RoomStateEvent | null;
    try {
      event = await this.roomDatabase.getStateEvent(roomId, HISTORY_VISIBILITY_EVENT_TYPE, '');
    } catch (err) {
      throw PerformError.internal(
        `Fetching history visibility for room "${roomId}" failed: ${describeError(err)}`,
      );
    }

    try {
      return evaluateHistoryVisibility(event);
    } catch (err) {
      this.logger.error(`Decoding history visibility for ${roomId} failed: ${describeError(err)}`);
      throw PerformError.internal(
        `History visibility for room "${roomId}" is malformed: ${describeError(err)}`,
      );
    }
  }
}

function describeOutcome(outcome: HistoryVisibilityOutcome): string {
  switch (outcome.kind) {
    case 'absent':
      return 'absent';
    case 'unset':
      return 'unset';
    case 'unrecognised':
      return `unrecognised (${outcome.value})`;
    case 'known':
      return outcome.visibility;
  }
}
