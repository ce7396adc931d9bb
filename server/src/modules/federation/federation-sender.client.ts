/**
 * Atrium Roomserver - Federation Sender Client
 *
 * Calls the federation sender's internal API, which performs the actual
 * server-to-server directory query.
 */

import * as Joi from 'joi';
import type { RequestInfo, RequestInit, Response } from 'node-fetch';
import {
  DirectoryLookup,
  DirectoryLookupRequest,
  DirectoryLookupResponse,
} from './directory-lookup';

export type FetchFn = (url: RequestInfo, init?: RequestInit) => Promise<Response>;

export const PERFORM_DIRECTORY_LOOKUP_PATH = '/federationsender/performDirectoryLookup';

interface DirectoryLookupBody {
  room_id: string;
  server_names: string[];
}

const directoryLookupBodySchema = Joi.object<DirectoryLookupBody>({
  room_id: Joi.string().allow('').default(''),
  server_names: Joi.array().items(Joi.string()).default([]),
}).unknown(true);

export class FederationSenderError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`Federation sender error: ${status} ${body}`);
    this.name = 'FederationSenderError';
  }
}

export class FederationSenderClient implements DirectoryLookup {
  constructor(
    private readonly baseUrl: string,
    private readonly fetch: FetchFn,
    private readonly apiSecret?: string,
  ) {}

  async performDirectoryLookup(
    req: DirectoryLookupRequest,
    signal?: AbortSignal,
  ): Promise<DirectoryLookupResponse> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'atrium-roomserver/0.1.0',
    };
    if (this.apiSecret) {
      headers['X-API-SECRET'] = this.apiSecret;
    }

    const response = await this.fetch(`${this.baseUrl}${PERFORM_DIRECTORY_LOOKUP_PATH}`, {
      method: 'post',
      body: JSON.stringify({ room_alias: req.roomAlias, server_name: req.serverName }),
      headers,
      signal,
    });

    if (!response.ok) {
      throw new FederationSenderError(response.status, await response.text());
    }

    const { value, error } = directoryLookupBodySchema.validate(await response.json());
    if (error) {
      throw new Error(`Malformed directory lookup response: ${error.message}`);
    }
    return { roomId: value.room_id, serverNames: value.server_names };
  }
}
