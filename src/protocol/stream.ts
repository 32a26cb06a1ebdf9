import type { EventEmitter } from 'node:events';
import { FrameStallError } from '../utils/errors.js';
import { streamLog } from '../utils/logger.js';
import { RconFrameDecoder } from './decoder.js';
import type { RconResponse } from './types.js';

/** Anything that emits 'data' chunks and 'close', such as a net.Socket. */
export type ByteSource = Pick<EventEmitter, 'on'>;

export interface DecoderHandlers {
  onResponse: (response: RconResponse) => void;
  /**
   * Receives errors thrown while decoding a chunk. Without it the error is
   * rethrown from the 'data' listener.
   */
  onError?: (err: Error) => void;
  onClose?: () => void;
}

/**
 * Feed every chunk from `source` into `decoder` and hand decoded responses
 * to `handlers.onResponse`. A partial frame still buffered when the source
 * closes is dropped, and so is a buffer the decoder reports as stalled.
 */
export function bindDecoder(
  source: ByteSource,
  handlers: DecoderHandlers,
  decoder: RconFrameDecoder = new RconFrameDecoder()
): RconFrameDecoder {
  source.on('data', (chunk: unknown) => {
    if (!Buffer.isBuffer(chunk)) {
      streamLog.warn('Ignoring non-binary chunk; do not set an encoding on the source', {
        chunkType: typeof chunk,
      });
      return;
    }

    let responses: RconResponse[];
    try {
      responses = decoder.feed(chunk);
    } catch (err) {
      // A stalled buffer never completes a frame; the next chunk starts empty
      if (err instanceof FrameStallError) {
        streamLog.warn('Decoder stalled, resetting', { pending: err.pendingBytes });
        decoder.reset();
      }
      if (!handlers.onError) throw err;
      handlers.onError(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    for (const response of responses) {
      handlers.onResponse(response);
    }
  });

  source.on('close', () => {
    if (decoder.pendingBytes > 0) {
      streamLog.debug('Source closed with a partial frame buffered', { pending: decoder.pendingBytes });
    }
    decoder.reset();
    handlers.onClose?.();
  });

  return decoder;
}
