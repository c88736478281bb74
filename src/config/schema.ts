/**
 * Config file schema. Every field is optional; missing fields fall back to
 * DEFAULT_CONFIG when merged.
 */

import { z } from 'zod';

export const configFileSchema = z
  .object({
    timeout_ms: z.number().finite().nonnegative().optional(),
    watch: z
      .object({
        include: z.array(z.string().min(1)).optional(),
        exclude: z.array(z.string()).optional(),
        exec: z.string().min(1).nullable().optional(),
        keep_going: z.boolean().optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
        file: z.string().nullable().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
