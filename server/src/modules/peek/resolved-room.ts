/**
 * Atrium Roomserver - Resolved Room
 *
 * A room reference resolved so far, with the federation candidates
 * collected on the way. Each resolution step returns a new value and the
 * candidate list only ever grows at the end.
 */

export interface ResolvedRoom {
  roomId: string;
  serverNames: readonly string[];
}

export interface ResolutionContext {
  serverNames: readonly string[];
  // The domain this homeserver answers for.
  localServerName: string;
  signal?: AbortSignal;
}
