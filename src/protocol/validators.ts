import {
  MAX_REQUEST_ID,
  MIN_REQUEST_ID,
  SERVERDATA_AUTH_RESPONSE,
  SERVERDATA_RESPONSE_VALUE,
  TERMINATOR_REQUEST_ID,
  UNSOLICITED_ID,
  type RconResponseType,
} from './types.js';

const RESPONSE_TYPES: ReadonlyMap<number, RconResponseType> = new Map([
  [SERVERDATA_RESPONSE_VALUE, 'RESPONSE_VALUE'],
  [SERVERDATA_AUTH_RESPONSE, 'AUTH_RESPONSE'],
]);

/**
 * Request ids the decoder accepts: -1, the split terminator id, or a
 * nine-digit correlation id.
 */
export function isValidId(id: number): boolean {
  return (
    id === UNSOLICITED_ID ||
    id === TERMINATOR_REQUEST_ID ||
    (id >= MIN_REQUEST_ID && id <= MAX_REQUEST_ID)
  );
}

export function resolveType(code: number): RconResponseType | undefined {
  return RESPONSE_TYPES.get(code);
}
