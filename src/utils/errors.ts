/**
 * Error types for the RCON decoder.
 */

export class RconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RconError';
  }
}

export class FrameStallError extends RconError {
  readonly pendingBytes: number;
  readonly maxPendingBytes: number;

  constructor(pendingBytes: number, maxPendingBytes: number) {
    super(`Decoder stalled: ${pendingBytes} bytes buffered without a complete frame (limit ${maxPendingBytes})`);
    this.name = 'FrameStallError';
    this.pendingBytes = pendingBytes;
    this.maxPendingBytes = maxPendingBytes;
  }
}

export class DecoderConfigError extends RconError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid decoder config: ${issues.join('; ')}`);
    this.name = 'DecoderConfigError';
    this.issues = issues;
  }
}
