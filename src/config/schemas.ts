import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string) => Object.assign(schema, { $id: id });

export const StallPolicySchema = z.enum(['discard', 'throw']);

export const DecoderConfigSchema = z.object({
  maxPendingBytes: z.number().int().positive(),
  stallPolicy: StallPolicySchema,
  bodyPreviewChars: z.number().int().nonnegative(),
});

export type StallPolicy = z.infer<typeof StallPolicySchema>;
export type DecoderConfig = z.infer<typeof DecoderConfigSchema>;

export const jsonSchemas = {
  decoder: withId(zodToJsonSchema(DecoderConfigSchema, { target: 'jsonSchema7' }), 'RconDecoderConfig'),
};
