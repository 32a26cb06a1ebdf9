/**
 * Source RCON response protocol types.
 *
 * Wire layout, all integers 32-bit signed little-endian:
 * | size | id | type | body (UTF-8) | 0x00 | 0x00 |
 */

/** size(4) + id(4) + type(4) + empty body + two terminator bytes */
export const MIN_FRAME_BYTES = 14;
export const SIZE_FIELD_BYTES = 4;

/** Reserved id echoed back on the empty packet that ends a split response. */
export const TERMINATOR_REQUEST_ID = 999;
/** Sent by the server for failed authentication and unsolicited output. */
export const UNSOLICITED_ID = -1;
export const MIN_REQUEST_ID = 100_000_000;
export const MAX_REQUEST_ID = 999_999_999;

export const SERVERDATA_RESPONSE_VALUE = 0;
export const SERVERDATA_AUTH_RESPONSE = 2;

export type RconResponseType = 'RESPONSE_VALUE' | 'AUTH_RESPONSE';

export type RconResponseKind = 'terminator' | 'command' | 'auth';

interface RconResponseBase {
  /** Declared size field, as read from the wire */
  size: number;
  id: number;
  /** Numeric type code, as read from the wire */
  type: number;
  body: string;
}

/** Empty packet with the reserved id; marks the end of a split response. */
export interface TerminatorResponse extends RconResponseBase {
  kind: 'terminator';
}

/** SERVERDATA_RESPONSE_VALUE: output of an executed command. */
export interface CommandResponse extends RconResponseBase {
  kind: 'command';
}

/** SERVERDATA_AUTH_RESPONSE: id -1 means the password was rejected. */
export interface AuthResponse extends RconResponseBase {
  kind: 'auth';
}

export type RconResponse = TerminatorResponse | CommandResponse | AuthResponse;

export type DiscardReason = 'malformed-terminator' | 'stalled';

export interface DiscardEvent {
  reason: DiscardReason;
  discardedBytes: number;
}
