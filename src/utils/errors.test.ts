import { describe, it, expect } from 'vitest';
import { RconError, FrameStallError, DecoderConfigError } from './errors.js';

describe('Error Classes', () => {
  it('RconError carries its message', () => {
    const err = new RconError('test error');
    expect(err.message).toBe('test error');
    expect(err.name).toBe('RconError');
    expect(err).toBeInstanceOf(Error);
  });

  it('FrameStallError includes the buffered byte counts', () => {
    const err = new FrameStallError(70000, 65536);
    expect(err.message).toBe('Decoder stalled: 70000 bytes buffered without a complete frame (limit 65536)');
    expect(err.name).toBe('FrameStallError');
    expect(err.pendingBytes).toBe(70000);
    expect(err.maxPendingBytes).toBe(65536);
    expect(err).toBeInstanceOf(RconError);
  });

  it('DecoderConfigError joins schema issues', () => {
    const err = new DecoderConfigError(['maxPendingBytes: too small', 'stallPolicy: invalid']);
    expect(err.message).toBe('Invalid decoder config: maxPendingBytes: too small; stallPolicy: invalid');
    expect(err.issues).toHaveLength(2);
    expect(err).toBeInstanceOf(RconError);
  });
});
