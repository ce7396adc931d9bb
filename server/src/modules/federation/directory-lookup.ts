/**
 * Atrium Roomserver - Directory Lookup Contract
 *
 * Resolves an alias owned by another server by asking that server's room
 * directory.
 */

export const DIRECTORY_LOOKUP = Symbol('DIRECTORY_LOOKUP');

export interface DirectoryLookupRequest {
  roomAlias: string;
  // The server to ask.
  serverName: string;
}

export interface DirectoryLookupResponse {
  roomId: string;
  serverNames: string[];
}

export interface DirectoryLookup {
  performDirectoryLookup(
    req: DirectoryLookupRequest,
    signal?: AbortSignal,
  ): Promise<DirectoryLookupResponse>;
}
