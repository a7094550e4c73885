import { z } from 'zod';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

const runtimeEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional().catch(undefined),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development').catch('development'),
});

export type RuntimeEnv = Readonly<{
  logLevel: (typeof LOG_LEVEL_NAMES)[number] | undefined;
  nodeEnv: 'development' | 'production' | 'test';
  isProduction: boolean;
}>;

/**
 * Reads the logging configuration from `process.env`. Unknown values fall
 * back to the defaults so that importing the library never throws.
 */
export const getRuntimeEnv = (source: NodeJS.ProcessEnv = process.env): RuntimeEnv => {
  const parsed = runtimeEnvSchema.parse({
    LOG_LEVEL: source.LOG_LEVEL,
    NODE_ENV: source.NODE_ENV,
  });

  return {
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
  };
};
