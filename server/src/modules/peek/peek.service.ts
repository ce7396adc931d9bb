/**
 * Atrium Roomserver - Peek Service
 *
 * Entry point for peeking into a room by ID or alias. Resolves the room,
 * enforces the visibility policy and records the peek on the output
 * stream. Every failure is reported as a PerformError in the response.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ensureNotAborted } from '../../common/abort';
import { PerformErrorCode } from '../../common/enums/perform-error-code.enum';
import { PerformError, toPerformError } from '../../common/errors/perform-error';
import { classifyRoomReference, splitId } from '../../common/ids/matrix-id';
import { PeekRecorderService } from '../output/peek-recorder.service';
import { AliasResolverService } from './alias-resolver.service';
import { ResolvedRoom } from './resolved-room';
import { RoomVisibilityService } from './room-visibility.service';

export interface PerformPeekRequest {
  userId: string;
  roomIdOrAlias: string;
  deviceId: string;
  // Servers the caller already knows to be in the room.
  serverNames?: readonly string[];
}

export interface PerformPeekResponse {
  // Canonical room ID; empty when the peek failed.
  roomId: string;
  serverNames: string[];
  error?: PerformError;
}

@Injectable()
export class PeekService {
  private readonly logger = new Logger(PeekService.name);
  private readonly serverName: string;

  constructor(
    configService: ConfigService,
    private readonly aliasResolver: AliasResolverService,
    private readonly roomVisibility: RoomVisibilityService,
    private readonly peekRecorder: PeekRecorderService,
  ) {
    this.serverName = configService.getOrThrow<string>('app.serverName');
  }

  async performPeek(req: PerformPeekRequest, signal?: AbortSignal): Promise<PerformPeekResponse> {
    try {
      const peeked = await this.peek(req, signal);
      return { roomId: peeked.roomId, serverNames: [...peeked.serverNames] };
    } catch (err) {
      const error = toPerformError(err);
      if (error.code === PerformErrorCode.INTERNAL) {
        this.logger.warn(`Peek of ${req.roomIdOrAlias} by ${req.userId} failed: ${error.msg}`);
      }
      return { roomId: '', serverNames: [...(req.serverNames ?? [])], error };
    }
  }

  private async peek(req: PerformPeekRequest, signal?: AbortSignal): Promise<ResolvedRoom> {
    const localServerName = this.serverName;

    let userDomain: string;
    try {
      ({ domain: userDomain } = splitId('@', req.userId));
    } catch {
      throw PerformError.badRequest(`Supplied user ID "${req.userId}" in incorrect format`);
    }
    if (userDomain !== localServerName) {
      throw PerformError.badRequest(`User "${req.userId}" does not belong to this homeserver`);
    }

    let target: ResolvedRoom = {
      roomId: req.roomIdOrAlias,
      serverNames: req.serverNames ?? [],
    };
    if (classifyRoomReference(req.roomIdOrAlias) === 'alias') {
      target = await this.aliasResolver.resolveAlias({
        alias: req.roomIdOrAlias,
        serverNames: target.serverNames,
        localServerName,
        signal,
      });
    }

    const resolved = await this.roomVisibility.resolveRoomId({
      roomId: target.roomId,
      serverNames: target.serverNames,
      localServerName,
      signal,
    });

    ensureNotAborted(signal);
    await this.peekRecorder.recordPeek({
      roomId: resolved.roomId,
      userId: req.userId,
      deviceId: req.deviceId,
    });
    return resolved;
  }
}
