/**
 * Response constructors keyed by resolved type tag.
 */

import type {
  AuthResponse,
  CommandResponse,
  RconResponse,
  RconResponseType,
  TerminatorResponse,
} from './types.js';

type ResponseFactory = () => RconResponse;

const RESPONSE_FACTORIES: Partial<Record<RconResponseType, ResponseFactory>> = {
  RESPONSE_VALUE: (): CommandResponse => ({ kind: 'command', size: 0, id: 0, type: 0, body: '' }),
  AUTH_RESPONSE: (): AuthResponse => ({ kind: 'auth', size: 0, id: 0, type: 0, body: '' }),
};

/**
 * Empty response of the variant registered for `tag`, or undefined when
 * nothing is registered.
 */
export function makeResponse(tag: RconResponseType): RconResponse | undefined {
  const factory = RESPONSE_FACTORIES[tag];
  return factory ? factory() : undefined;
}

export function makeTerminatorResponse(): TerminatorResponse {
  return { kind: 'terminator', size: 0, id: 0, type: 0, body: '' };
}

export function isTerminatorResponse(response: RconResponse): response is TerminatorResponse {
  return response.kind === 'terminator';
}
