/**
 * Atrium Roomserver - Perform Error Code Enum
 *
 * Classifies every failure returned by a roomserver perform operation.
 * Callers decide how to surface the failure from the code alone.
 */

export enum PerformErrorCode {
  BAD_REQUEST = 'bad_request',
  NOT_ALLOWED = 'not_allowed',
  INTERNAL = 'internal',
}
