import { SERVERDATA_RESPONSE_VALUE } from '../types.js';

export interface FrameSpec {
  id: number;
  type?: number;
  body?: string;
  /** Defaults to id + type + body + two terminators */
  size?: number;
  bodyTerminator?: number;
  packetTerminator?: number;
}

/**
 * Serialize a response frame the way a Source server writes it.
 */
export function encodeResponseFrame(spec: FrameSpec): Buffer {
  const body = Buffer.from(spec.body ?? '', 'utf8');
  const frame = Buffer.alloc(14 + body.length);

  frame.writeInt32LE(spec.size ?? 10 + body.length, 0);
  frame.writeInt32LE(spec.id, 4);
  frame.writeInt32LE(spec.type ?? SERVERDATA_RESPONSE_VALUE, 8);
  body.copy(frame, 12);
  frame.writeUInt8(spec.bodyTerminator ?? 0, 12 + body.length);
  frame.writeUInt8(spec.packetTerminator ?? 0, 13 + body.length);

  return frame;
}
