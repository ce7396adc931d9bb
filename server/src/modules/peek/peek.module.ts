/**
 * Atrium Roomserver - Peek Module
 *
 * Resolves peek requests against room state and records accepted peeks.
 */

import { Module } from '@nestjs/common';
import { FederationModule } from '../federation/federation.module';
import { OutputModule } from '../output/output.module';
import { StorageModule } from '../storage/storage.module';
import { AliasResolverService } from './alias-resolver.service';
import { PeekController } from './peek.controller';
import { PeekService } from './peek.service';
import { RoomVisibilityService } from './room-visibility.service';

@Module({
  imports: [StorageModule, OutputModule, FederationModule],
  controllers: [PeekController],
  providers: [PeekService, AliasResolverService, RoomVisibilityService],
  exports: [PeekService],
})
export class PeekModule {}
