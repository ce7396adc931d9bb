import { Test } from '@nestjs/testing';
import { FakeRoomDatabase, LOCAL_SERVER } from '../../../test/fakes';
import { PerformErrorCode } from '../../common/enums/perform-error-code.enum';
import { ROOM_DATABASE } from '../storage/room-database';
import { RoomVisibilityService } from './room-visibility.service';

describe('RoomVisibilityService', () => {
  let service: RoomVisibilityService;
  let roomDatabase: FakeRoomDatabase;

  beforeEach(async () => {
    roomDatabase = new FakeRoomDatabase();
    const moduleRef = await Test.createTestingModule({
      providers: [RoomVisibilityService, { provide: ROOM_DATABASE, useValue: roomDatabase }],
    }).compile();
    service = moduleRef.get(RoomVisibilityService);
  });

  it('admits a world-readable local room without touching the candidates', async () => {
    roomDatabase.worldReadable('!r1:serverA');

    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: ['serverA'], localServerName: LOCAL_SERVER }),
    ).resolves.toEqual({ roomId: '!r1:serverA', serverNames: ['serverA'] });
    expect(roomDatabase.getStateEvent).toHaveBeenCalledWith('!r1:serverA', 'm.room.history_visibility', '');
  });

  it('adds the domain of a remote room to the candidates', async () => {
    roomDatabase.worldReadable('!r9:remoteB');

    await expect(
      service.resolveRoomId({ roomId: '!r9:remoteB', serverNames: ['hint.example'], localServerName: LOCAL_SERVER }),
    ).resolves.toEqual({ roomId: '!r9:remoteB', serverNames: ['hint.example', 'remoteB'] });
  });

  it('refuses a room without history visibility state', async () => {
    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({ code: PerformErrorCode.NOT_ALLOWED, msg: 'Room is not world-readable' });
  });

  it('refuses a remote room whose state is not held locally', async () => {
    await expect(
      service.resolveRoomId({ roomId: '!r9:remoteB', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({ code: PerformErrorCode.NOT_ALLOWED });
  });

  it.each([
    ['shared', '{"history_visibility":"shared"}'],
    ['unset', '{}'],
    ['unrecognised', '{"history_visibility":"WORLD_READABLE"}'],
    ['empty', '{"history_visibility":""}'],
    ['null', 'null'],
  ])('refuses a room whose visibility is %s', async (_label, content) => {
    roomDatabase.setHistoryVisibility('!r1:serverA', content);

    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({ code: PerformErrorCode.NOT_ALLOWED, msg: 'Room is not world-readable' });
  });

  it.each([
    '{"history_visibility":"world_readable","reason":""}',
    '{"history_visibility":"world_readable","":"x"}',
  ])('admits a world-readable room whose content is %s', async (content) => {
    roomDatabase.setHistoryVisibility('!r1:serverA', content);

    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
    ).resolves.toEqual({ roomId: '!r1:serverA', serverNames: [] });
  });

  it('fails hard on malformed visibility content', async () => {
    roomDatabase.setHistoryVisibility('!r1:serverA', '{"history_visibility":5}');

    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({
      code: PerformErrorCode.INTERNAL,
      msg: expect.stringMatching(/^History visibility for room "!r1:serverA" is malformed: /),
    });
  });

  it('wraps state lookup failures', async () => {
    roomDatabase.getStateEvent.mockRejectedValueOnce(new Error('io error'));

    await expect(
      service.resolveRoomId({ roomId: '!r1:serverA', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({
      code: PerformErrorCode.INTERNAL,
      msg: 'Fetching history visibility for room "!r1:serverA" failed: io error',
    });
  });

  it('rejects a malformed room ID before reading state', async () => {
    await expect(
      service.resolveRoomId({ roomId: '!nocolon', serverNames: [], localServerName: LOCAL_SERVER }),
    ).rejects.toMatchObject({
      code: PerformErrorCode.BAD_REQUEST,
      msg: `Room ID "!nocolon" is invalid: ID "!nocolon" is missing ':'`,
    });
    expect(roomDatabase.getStateEvent).not.toHaveBeenCalled();
  });
});
