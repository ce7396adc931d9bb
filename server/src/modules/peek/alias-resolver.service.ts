/**
 * Atrium Roomserver - Alias Resolver
 *
 * Turns a room alias into a canonical room ID. Aliases under our own domain
 * come from the room database; others are looked up in the owning server's
 * directory through the federation sender.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ensureNotAborted } from '../../common/abort';
import { describeError, PerformError } from '../../common/errors/perform-error';
import { splitId } from '../../common/ids/matrix-id';
import { DIRECTORY_LOOKUP, DirectoryLookup } from '../federation/directory-lookup';
import { ROOM_DATABASE, RoomDatabase } from '../storage/room-database';
import { ResolutionContext, ResolvedRoom } from './resolved-room';

export interface ResolveAliasParams extends ResolutionContext {
  alias: string;
}

@Injectable()
export class AliasResolverService {
  private readonly logger = new Logger(AliasResolverService.name);

  constructor(
    @Inject(ROOM_DATABASE) private readonly roomDatabase: RoomDatabase,
    @Inject(DIRECTORY_LOOKUP) private readonly directoryLookup: DirectoryLookup,
  ) {}

  async resolveAlias({
    alias,
    serverNames,
    localServerName,
    signal,
  }: ResolveAliasParams): Promise<ResolvedRoom> {
    let domain: string;
    try {
      ({ domain } = splitId('#', alias));
    } catch (err) {
      throw PerformError.badRequest(`Alias "${alias}" is not in the correct format: ${describeError(err)}`);
    }

    // The owning server goes first, even when it is us.
    let candidates: readonly string[] = [...serverNames, domain];
    ensureNotAborted(signal);

    let roomId: string | null;
    if (domain === localServerName) {
      try {
        roomId = await this.roomDatabase.lookupRoomIdForAlias(alias);
      } catch (err) {
        throw PerformError.internal(`Lookup room alias "${alias}" failed: ${describeError(err)}`);
      }
    } else {
      try {
        const response = await this.directoryLookup.performDirectoryLookup(
          { roomAlias: alias, serverName: domain },
          signal,
        );
        roomId = response.roomId;
        candidates = [...candidates, ...response.serverNames];
      } catch (err) {
        this.logger.error(
          `Error looking up alias ${alias} via ${domain}: ${describeError(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
        throw PerformError.internal(
          `Looking up alias "${alias}" over federation via "${domain}" failed: ${describeError(err)}`,
        );
      }
    }

    if (!roomId) {
      throw PerformError.internal(`Alias "${alias}" not found`);
    }
    return { roomId, serverNames: candidates };
  }
}
