/**
 * Atrium Roomserver - Federation Module
 *
 * Wires the directory lookup collaborator to the federation sender.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch from 'node-fetch';
import { DIRECTORY_LOOKUP } from './directory-lookup';
import { FederationSenderClient } from './federation-sender.client';

@Module({
  providers: [
    {
      provide: DIRECTORY_LOOKUP,
      useFactory: (configService: ConfigService) =>
        new FederationSenderClient(
          configService.getOrThrow<string>('federation.senderUrl'),
          fetch,
          configService.get<string>('security.apiSecret'),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [DIRECTORY_LOOKUP],
})
export class FederationModule {}
