/**
 * Atrium Roomserver - Identifier Parsing
 *
 * Splits sigil-prefixed, domain-qualified identifiers (`@user:domain`,
 * `!room:domain`, `#alias:domain`) and classifies room references.
 */

import { PerformError } from '../errors/perform-error';

export type Sigil = '@' | '!' | '#';

export type RoomReferenceKind = 'room_id' | 'alias';

export interface SplitId {
  localpart: string;
  domain: string;
}

export class IdentifierFormatError extends Error {
  constructor(readonly id: string, reason: string) {
    super(`ID "${id}" ${reason}`);
    this.name = 'IdentifierFormatError';
  }
}

export function splitId(sigil: Sigil, id: string): SplitId {
  if (!id.startsWith(sigil)) {
    throw new IdentifierFormatError(id, `doesn't start with "${sigil}"`);
  }
  const separator = id.indexOf(':');
  if (separator === -1) {
    throw new IdentifierFormatError(id, "is missing ':'");
  }
  const domain = id.slice(separator + 1);
  if (domain === '') {
    throw new IdentifierFormatError(id, 'has an empty domain');
  }
  return { localpart: id.slice(1, separator), domain };
}

export function classifyRoomReference(ref: string): RoomReferenceKind {
  if (ref.startsWith('!')) {
    return 'room_id';
  }
  if (ref.startsWith('#')) {
    return 'alias';
  }
  throw PerformError.badRequest(`Room ID or alias "${ref}" is invalid`);
}
