/**
 * Incremental decoder for Source RCON response frames.
 *
 * Bytes are appended to an owned buffer and decoded from a read offset.
 * A decode attempt reads fields ahead of the offset and only moves it once
 * every check has passed, so a failed attempt leaves the offset where the
 * frame started. Consumed bytes are compacted away after the attempt loop.
 */

import { resolveDecoderConfig } from '../config/decoder-config.js';
import type { DecoderConfig } from '../config/schemas.js';
import { FrameStallError } from '../utils/errors.js';
import { decoderLog, type Logger } from '../utils/logger.js';
import { makeResponse, makeTerminatorResponse } from './packets.js';
import {
  MIN_FRAME_BYTES,
  SIZE_FIELD_BYTES,
  TERMINATOR_REQUEST_ID,
  type DiscardEvent,
  type DiscardReason,
  type RconResponse,
} from './types.js';
import { isValidId, resolveType } from './validators.js';

export interface RconFrameDecoderOptions extends Partial<DecoderConfig> {
  /** Called whenever buffered bytes are dropped without producing a frame */
  onDiscard?: (event: DiscardEvent) => void;
  logger?: Logger;
}

type AttemptResult =
  | { status: 'frame'; response?: RconResponse }
  | { status: 'discarded' }
  | { status: 'incomplete' };

const INCOMPLETE: AttemptResult = { status: 'incomplete' };
const DISCARDED: AttemptResult = { status: 'discarded' };

export class RconFrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private offset = 0;
  private continuationCount = 0;
  private readonly config: DecoderConfig;
  private readonly onDiscard?: (event: DiscardEvent) => void;
  private readonly log: Logger;

  constructor(options: RconFrameDecoderOptions = {}) {
    const { onDiscard, logger, ...overrides } = options;
    this.config = resolveDecoderConfig(overrides);
    this.onDiscard = onDiscard;
    this.log = logger ?? decoderLog;
  }

  /**
   * Append a chunk and return every frame it completes, in order.
   * Bytes of a trailing partial frame stay buffered for the next call.
   *
   * @throws FrameStallError when more than `maxPendingBytes` are buffered
   *   without progress and the stall policy is 'throw'
   */
  feed(data: Buffer): RconResponse[] {
    if (data.length === 0) return [];

    this.buffer = Buffer.concat([this.buffer, data]);
    this.continuationCount++;

    this.log.debug('Decoding incoming data', {
      received: data.length,
      pending: this.pendingBytes,
      continuation: this.continuationCount > 1,
    });

    const responses: RconResponse[] = [];
    let progressed = false;

    for (;;) {
      const result = this.attempt();
      if (result.status === 'incomplete') break;
      if (result.status === 'frame') {
        progressed = true;
        if (result.response) responses.push(result.response);
      }
    }

    this.compact();

    if (!progressed && this.pendingBytes > this.config.maxPendingBytes) {
      this.handleStall();
    }

    return responses;
  }

  /**
   * Drop buffered bytes and counters (e.g., when the connection closes).
   */
  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.offset = 0;
    this.continuationCount = 0;
  }

  get pendingBytes(): number {
    return this.buffer.length - this.offset;
  }

  /** Feed calls since the last completed frame. */
  get continuations(): number {
    return this.continuationCount;
  }

  private attempt(): AttemptResult {
    const available = this.pendingBytes;
    if (available < MIN_FRAME_BYTES) {
      return INCOMPLETE;
    }

    const start = this.offset;
    let cursor = start;

    const size = this.buffer.readInt32LE(cursor);
    cursor += SIZE_FIELD_BYTES;
    if (this.buffer.length - cursor < size) {
      this.log.debug('Declared size exceeds buffered bytes', { size, available: this.buffer.length - cursor });
      return INCOMPLETE;
    }

    const id = this.buffer.readInt32LE(cursor);
    cursor += 4;
    if (!isValidId(id)) {
      this.log.debug('Request id outside the accepted range', { id });
      return INCOMPLETE;
    }

    const type = this.buffer.readInt32LE(cursor);
    cursor += 4;
    const tag = resolveType(type);
    if (!tag) {
      this.log.debug('Unknown response type', { type });
      return INCOMPLETE;
    }

    // Body runs up to the first zero byte inside the declared frame
    const frameEnd = Math.min(this.buffer.length, start + SIZE_FIELD_BYTES + size);
    const bodyLength = frameEnd > cursor ? this.buffer.subarray(cursor, frameEnd).indexOf(0) : -1;
    let body = '';
    if (bodyLength > 0) {
      body = this.buffer.toString('utf8', cursor, cursor + bodyLength);
      cursor += bodyLength;
    }

    if (cursor + 2 > this.buffer.length) {
      this.log.debug('Terminator bytes not yet received', { id, type });
      return INCOMPLETE;
    }

    const bodyTerminator = this.buffer.readUInt8(cursor);
    const packetTerminator = this.buffer.readUInt8(cursor + 1);

    if (bodyTerminator !== 0 || packetTerminator !== 0) {
      if (id === TERMINATOR_REQUEST_ID) {
        this.log.warn('Malformed terminator packet, discarding buffered bytes', {
          discarded: this.pendingBytes,
          bodyTerminator,
          packetTerminator,
        });
        this.discardAll('malformed-terminator');
        return DISCARDED;
      }
      this.log.debug('Missing null terminators', { id, bodyTerminator, packetTerminator });
      return INCOMPLETE;
    }

    cursor += 2;
    this.offset = cursor;
    this.continuationCount = 0;

    if (this.log.isDebugEnabled()) {
      this.log.debug('Frame complete', {
        size,
        id,
        type,
        bodyLength: Math.max(bodyLength, 0),
        body: this.preview(body),
        remaining: this.pendingBytes,
      });
    }

    const response = id === TERMINATOR_REQUEST_ID && body.trim().length === 0
      ? makeTerminatorResponse()
      : makeResponse(tag);

    if (!response) {
      this.log.warn('No response constructor for type, dropping frame', { id, type, tag });
      return { status: 'frame' };
    }

    response.size = size;
    response.id = id;
    response.type = type;
    response.body = body;
    return { status: 'frame', response };
  }

  private compact(): void {
    if (this.offset === 0) return;
    this.buffer = this.buffer.subarray(this.offset);
    this.offset = 0;
  }

  private handleStall(): void {
    const pending = this.pendingBytes;
    if (this.config.stallPolicy === 'throw') {
      throw new FrameStallError(pending, this.config.maxPendingBytes);
    }
    this.log.warn('No complete frame within buffer limit, discarding buffered bytes', {
      pending,
      maxPendingBytes: this.config.maxPendingBytes,
    });
    this.discardAll('stalled');
  }

  private discardAll(reason: DiscardReason): void {
    const discardedBytes = this.pendingBytes;
    this.buffer = Buffer.alloc(0);
    this.offset = 0;
    this.continuationCount = 0;
    this.onDiscard?.({ reason, discardedBytes });
  }

  private preview(body: string): string {
    const limit = this.config.bodyPreviewChars;
    const truncated = body.length > limit ? `${body.slice(0, limit)}...` : body;
    return truncated.replace(/\n/g, '\\n');
  }
}
