/**
 * Atrium Roomserver - Perform Peek DTO
 *
 * Request and response bodies of the performPeek internal API route.
 */

import { IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class PerformPeekDto {
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  @IsString()
  room_id_or_alias!: string;

  @IsString()
  device_id!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  server_names?: string[];
}

export interface PerformPeekResponseBody {
  room_id: string;
  server_names: string[];
  error?: {
    code: string;
    msg: string;
  };
}
