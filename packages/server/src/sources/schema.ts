import { z } from 'zod';
import { BAUD_RATES, type BaudRate, type SourceConfig } from '@launchtrack/shared';

export const baudRate = z.coerce.number().int().refine(
  (n): n is BaudRate => BAUD_RATES.some(rate => rate === n),
  { message: `baudRate must be one of ${BAUD_RATES.join(', ')}` },
);

/** Connection parameters as they arrive from a form: numbers may be strings. */
export const sourceConfigSchema: z.ZodType<SourceConfig, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('simulator') }),
  z.object({ type: z.literal('serial'), path: z.string().trim().min(1), baudRate }),
  z.object({ type: z.literal('tcp'), host: z.string().trim().min(1), port: z.coerce.number().int().min(1).max(65535) }),
]);
