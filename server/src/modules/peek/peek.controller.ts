/**
 * Atrium Roomserver - Peek Controller
 *
 * Internal API endpoint used by the client API to start a peek. Failures
 * are returned in the body with a 200 status.
 */

import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiSecretGuard } from '../../common/guards/api-secret.guard';
import { PerformPeekDto, PerformPeekResponseBody } from './dto/perform-peek.dto';
import { PeekService } from './peek.service';

@Controller('roomserver')
@UseGuards(ApiSecretGuard)
export class PeekController {
  private readonly timeoutMs: number;

  constructor(
    private readonly peekService: PeekService,
    configService: ConfigService,
  ) {
    this.timeoutMs = configService.get<number>('federation.peekTimeoutMs', 10000);
  }

  @Post('performPeek')
  @HttpCode(200)
  async performPeek(@Body() peekDto: PerformPeekDto): Promise<PerformPeekResponseBody> {
    const response = await this.peekService.performPeek(
      {
        userId: peekDto.user_id,
        roomIdOrAlias: peekDto.room_id_or_alias,
        deviceId: peekDto.device_id,
        serverNames: peekDto.server_names,
      },
      AbortSignal.timeout(this.timeoutMs),
    );

    return {
      room_id: response.roomId,
      server_names: response.serverNames,
      error: response.error?.toJSON(),
    };
  }
}
