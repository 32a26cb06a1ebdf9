/**
 * Incremental Source RCON response decoder.
 */

export { RconFrameDecoder, type RconFrameDecoderOptions } from './protocol/decoder.js';
export { bindDecoder, type ByteSource, type DecoderHandlers } from './protocol/stream.js';
export { isValidId, resolveType } from './protocol/validators.js';
export { makeResponse, makeTerminatorResponse, isTerminatorResponse } from './protocol/packets.js';
export * from './protocol/types.js';

export { DEFAULT_DECODER_CONFIG, resolveDecoderConfig, readDecoderEnv } from './config/decoder-config.js';
export {
  DecoderConfigSchema,
  StallPolicySchema,
  jsonSchemas,
  type DecoderConfig,
  type StallPolicy,
} from './config/schemas.js';

export { RconError, FrameStallError, DecoderConfigError } from './utils/errors.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
