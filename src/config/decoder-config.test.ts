import { describe, it, expect } from 'vitest';
import { DEFAULT_DECODER_CONFIG, readDecoderEnv, resolveDecoderConfig } from './decoder-config.js';
import { DecoderConfigSchema, jsonSchemas } from './schemas.js';
import { DecoderConfigError } from '../utils/errors.js';

describe('decoder config', () => {
  it('validates the defaults', () => {
    expect(DecoderConfigSchema.parse(DEFAULT_DECODER_CONFIG)).toEqual(DEFAULT_DECODER_CONFIG);
  });

  it('resolves to the defaults with an empty environment', () => {
    expect(resolveDecoderConfig({}, {})).toEqual({
      maxPendingBytes: 65536,
      stallPolicy: 'discard',
      bodyPreviewChars: 30,
    });
  });

  it('reads limits from the environment', () => {
    expect(readDecoderEnv({ RCON_MAX_PENDING_BYTES: '1024', RCON_STALL_POLICY: 'throw' })).toEqual({
      maxPendingBytes: 1024,
      stallPolicy: 'throw',
    });
  });

  it('lets overrides win over the environment', () => {
    const config = resolveDecoderConfig({ maxPendingBytes: 512 }, { RCON_MAX_PENDING_BYTES: '1024' });
    expect(config.maxPendingBytes).toBe(512);
  });

  it('keeps defaults for overrides passed as undefined', () => {
    const limit: number | undefined = undefined;
    expect(resolveDecoderConfig({ maxPendingBytes: limit, stallPolicy: undefined }, {})).toEqual(DEFAULT_DECODER_CONFIG);
  });

  it('treats blank environment variables as unset', () => {
    expect(readDecoderEnv({ RCON_MAX_PENDING_BYTES: '', RCON_STALL_POLICY: '  ' })).toEqual({});
    expect(resolveDecoderConfig({}, { RCON_MAX_PENDING_BYTES: '' }).maxPendingBytes).toBe(65536);
  });

  it('rejects an unknown stall policy', () => {
    expect(() => resolveDecoderConfig({}, { RCON_STALL_POLICY: 'panic' })).toThrow(DecoderConfigError);
  });

  it('lists each failing field', () => {
    try {
      resolveDecoderConfig({ maxPendingBytes: 0, bodyPreviewChars: -1 }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecoderConfigError);
      const issues = err instanceof DecoderConfigError ? err.issues : [];
      expect(issues.map((issue) => issue.split(':')[0])).toEqual(['maxPendingBytes', 'bodyPreviewChars']);
    }
  });

  it('rejects a non-numeric size from the environment', () => {
    expect(() => resolveDecoderConfig({}, { RCON_MAX_PENDING_BYTES: 'lots' })).toThrow(DecoderConfigError);
  });

  it('exports a JSON schema with an id', () => {
    expect(jsonSchemas.decoder).toMatchObject({
      $id: 'RconDecoderConfig',
      type: 'object',
      required: ['maxPendingBytes', 'stallPolicy', 'bodyPreviewChars'],
    });
  });
});
