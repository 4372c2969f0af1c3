import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';

export const env = createEnv({
  server: {
    FORGELOOP_MAX_OPERATIONS: z.coerce.number().int().positive().optional(),
    FORGELOOP_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
    FORGELOOP_HISTORY_DB: z.string().optional(),
    FORGELOOP_TRACE: z.enum(['off', 'memory', 'console']).optional(),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
      .default('info'),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
