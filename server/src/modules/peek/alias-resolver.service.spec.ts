import { Test } from '@nestjs/testing';
import { FakeDirectoryLookup, FakeRoomDatabase, LOCAL_SERVER } from '../../../test/fakes';
import { PerformErrorCode } from '../../common/enums/perform-error-code.enum';
import { DIRECTORY_LOOKUP } from '../federation/directory-lookup';
import { ROOM_DATABASE } from '../storage/room-database';
import { AliasResolverService } from './alias-resolver.service';

describe('AliasResolverService', () => {
  let resolver: AliasResolverService;
  let roomDatabase: FakeRoomDatabase;
  let directoryLookup: FakeDirectoryLookup;

  beforeEach(async () => {
    roomDatabase = new FakeRoomDatabase();
    directoryLookup = new FakeDirectoryLookup();
    const moduleRef = await Test.createTestingModule({
      providers: [
        AliasResolverService,
        { provide: ROOM_DATABASE, useValue: roomDatabase },
        { provide: DIRECTORY_LOOKUP, useValue: directoryLookup },
      ],
    }).compile();
    resolver = moduleRef.get(AliasResolverService);
  });

  describe('local aliases', () => {
    it('resolves from the room database and seeds the alias domain', async () => {
      roomDatabase.aliases.set('#pub:serverA', '!room1:serverA');
      const serverNames = Object.freeze(['hint.example']);

      const resolved = await resolver.resolveAlias({
        alias: '#pub:serverA',
        serverNames,
        localServerName: LOCAL_SERVER,
      });

      expect(resolved).toEqual({ roomId: '!room1:serverA', serverNames: ['hint.example', 'serverA'] });
      expect(serverNames).toEqual(['hint.example']);
      expect(roomDatabase.lookupRoomIdForAlias).toHaveBeenCalledTimes(1);
      expect(roomDatabase.lookupRoomIdForAlias).toHaveBeenCalledWith('#pub:serverA');
      expect(directoryLookup.performDirectoryLookup).not.toHaveBeenCalled();
    });

    it('fails as not found when the alias is unknown', async () => {
      await expect(
        resolver.resolveAlias({ alias: '#missing:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
      ).rejects.toMatchObject({
        code: PerformErrorCode.INTERNAL,
        msg: 'Alias "#missing:serverA" not found',
      });
    });

    it('wraps room database failures', async () => {
      roomDatabase.lookupRoomIdForAlias.mockRejectedValueOnce(new Error('database is locked'));

      await expect(
        resolver.resolveAlias({ alias: '#pub:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
      ).rejects.toMatchObject({
        code: PerformErrorCode.INTERNAL,
        msg: 'Lookup room alias "#pub:serverA" failed: database is locked',
      });
    });
  });

  describe('remote aliases', () => {
    it('asks the owning server and appends every server it returns', async () => {
      directoryLookup.directory.set('#x:remoteB', {
        roomId: '!r9:remoteB',
        serverNames: ['remoteB', 'remoteC'],
      });
      const signal = new AbortController().signal;

      const resolved = await resolver.resolveAlias({
        alias: '#x:remoteB',
        serverNames: ['hint.example'],
        localServerName: LOCAL_SERVER,
        signal,
      });

      expect(resolved).toEqual({
        roomId: '!r9:remoteB',
        serverNames: ['hint.example', 'remoteB', 'remoteB', 'remoteC'],
      });
      expect(directoryLookup.performDirectoryLookup).toHaveBeenCalledTimes(1);
      expect(directoryLookup.performDirectoryLookup).toHaveBeenCalledWith(
        { roomAlias: '#x:remoteB', serverName: 'remoteB' },
        signal,
      );
      expect(roomDatabase.lookupRoomIdForAlias).not.toHaveBeenCalled();
    });

    it('fails as not found when the directory returns no room', async () => {
      await expect(
        resolver.resolveAlias({ alias: '#x:remoteB', serverNames: [], localServerName: LOCAL_SERVER }),
      ).rejects.toMatchObject({
        code: PerformErrorCode.INTERNAL,
        msg: 'Alias "#x:remoteB" not found',
      });
    });

    it('wraps lookup failures with the alias and queried domain', async () => {
      directoryLookup.performDirectoryLookup.mockRejectedValueOnce(new Error('connection refused'));

      await expect(
        resolver.resolveAlias({ alias: '#x:remoteB', serverNames: [], localServerName: LOCAL_SERVER }),
      ).rejects.toMatchObject({
        code: PerformErrorCode.INTERNAL,
        msg: 'Looking up alias "#x:remoteB" over federation via "remoteB" failed: connection refused',
      });
    });
  });

  it('rejects a malformed alias before any lookup', async () => {
    await expect(
      resolver.resolveAlias({ alias: '#nocolon', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({
      code: PerformErrorCode.BAD_REQUEST,
      msg: `Alias "#nocolon" is not in the correct format: ID "#nocolon" is missing ':'`,
    });
    expect(roomDatabase.lookupRoomIdForAlias).not.toHaveBeenCalled();
    expect(directoryLookup.performDirectoryLookup).not.toHaveBeenCalled();
  });

  it('does not look anything up once aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    await expect(
      resolver.resolveAlias({
        alias: '#x:remoteB',
        serverNames: [],
        localServerName: LOCAL_SERVER,
        signal: controller.signal,
      }),
    ).rejects.toMatchObject({
      code: PerformErrorCode.INTERNAL,
      msg: 'Peek aborted: client went away',
    });
    expect(directoryLookup.performDirectoryLookup).not.toHaveBeenCalled();
  });
});
