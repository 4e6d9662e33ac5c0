import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_BASE_URL = 'http://localhost:8080';

const configSchema = z.object({
  TASK_API_URL: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  TASK_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  TASK_API_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
});

export interface HarnessConfig {
  baseUrl: string;
  timeoutMs: number;
  probeTimeoutMs: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): HarnessConfig {
  const parsed = configSchema.safeParse({
    TASK_API_URL: env.TASK_API_URL || undefined,
    TASK_API_TIMEOUT_MS: env.TASK_API_TIMEOUT_MS || undefined,
    TASK_API_PROBE_TIMEOUT_MS: env.TASK_API_PROBE_TIMEOUT_MS || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  return {
    baseUrl: parsed.data.TASK_API_URL,
    timeoutMs: parsed.data.TASK_API_TIMEOUT_MS,
    probeTimeoutMs: parsed.data.TASK_API_PROBE_TIMEOUT_MS,
  };
}
