import { DecoderConfigError } from '../utils/errors.js';
import { DecoderConfigSchema, type DecoderConfig } from './schemas.js';

/**
 * A legal Source RCON packet is at most 4096 bytes, so 64 KiB of buffered
 * bytes without a single completed frame means the stream will not recover.
 */
export const DEFAULT_DECODER_CONFIG = {
  maxPendingBytes: 64 * 1024,
  stallPolicy: 'discard',
  bodyPreviewChars: 30,
} as const satisfies DecoderConfig;

type ConfigInput = Partial<Record<keyof DecoderConfig, unknown>>;

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Keys whose value is undefined would otherwise shadow the defaults. */
function definedOnly(input: ConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Values taken from the environment. Unset or blank variables are left out
 * so the defaults apply.
 */
export function readDecoderEnv(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  const fromEnv: ConfigInput = {};
  const maxPendingBytes = envValue(env, 'RCON_MAX_PENDING_BYTES');
  if (maxPendingBytes !== undefined) {
    fromEnv.maxPendingBytes = Number(maxPendingBytes);
  }
  const stallPolicy = envValue(env, 'RCON_STALL_POLICY');
  if (stallPolicy !== undefined) {
    fromEnv.stallPolicy = stallPolicy;
  }
  return fromEnv;
}

/**
 * Merge overrides over environment and defaults, then validate.
 * @throws DecoderConfigError when the merged config fails the schema
 */
export function resolveDecoderConfig(
  overrides: Partial<DecoderConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): DecoderConfig {
  const result = DecoderConfigSchema.safeParse({
    ...DEFAULT_DECODER_CONFIG,
    ...readDecoderEnv(env),
    ...definedOnly(overrides),
  });

  if (!result.success) {
    throw new DecoderConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
