/**
 * Atrium Roomserver - History Visibility
 *
 * Decodes `m.room.history_visibility` state and decides whether a room may
 * be observed by non-members. Only `world_readable` rooms may be peeked.
 */

import * as Joi from 'joi';
import { describeError } from '../../common/errors/perform-error';
import { RoomStateEvent } from '../storage/room-database';

export enum HistoryVisibility {
  INVITED = 'invited',
  JOINED = 'joined',
  SHARED = 'shared',
  WORLD_READABLE = 'world_readable',
}

/** Event content: a JSON object whose values are all strings. */
export type HistoryVisibilityContent = Record<string, string>;

/**
 * `absent`: the room has no history visibility state.
 * `unset`: the state exists but carries no `history_visibility` key.
 * `unrecognised`: the key holds a value outside {@link HistoryVisibility}.
 */
export type HistoryVisibilityOutcome =
  | { kind: 'absent' }
  | { kind: 'unset' }
  | { kind: 'unrecognised'; value: string }
  | { kind: 'known'; visibility: HistoryVisibility };

const contentSchema = Joi.object<HistoryVisibilityContent>()
  .pattern(Joi.string().allow(''), Joi.string().allow(''))
  .required();

const knownVisibilities = new Set<string>(Object.values(HistoryVisibility));

function isHistoryVisibility(value: string): value is HistoryVisibility {
  return knownVisibilities.has(value);
}

export class HistoryVisibilityDecodeError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'HistoryVisibilityDecodeError';
  }
}

export function decodeHistoryVisibilityContent(raw: string): HistoryVisibilityContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new HistoryVisibilityDecodeError(`invalid JSON: ${describeError(err)}`);
  }
  // `null` content decodes to an empty mapping.
  if (parsed === null) {
    return {};
  }
  const { value, error } = contentSchema.validate(parsed);
  if (error) {
    throw new HistoryVisibilityDecodeError(error.message);
  }
  return value;
}

export function evaluateHistoryVisibility(event: RoomStateEvent | null): HistoryVisibilityOutcome {
  if (!event) {
    return { kind: 'absent' };
  }
  const content = decodeHistoryVisibilityContent(event.content);
  if (!Object.prototype.hasOwnProperty.call(content, 'history_visibility')) {
    return { kind: 'unset' };
  }
  const value = content.history_visibility;
  if (!isHistoryVisibility(value)) {
    return { kind: 'unrecognised', value };
  }
  return { kind: 'known', visibility: value };
}

export function isWorldReadable(outcome: HistoryVisibilityOutcome): boolean {
  return outcome.kind === 'known' && outcome.visibility === HistoryVisibility.WORLD_READABLE;
}
