import { z } from 'zod';
import { DEFAULT_RENEWAL_WINDOW_DAYS, ValidationError } from '@gymledger/shared';

const configSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  RENEWAL_WINDOW_DAYS: z.coerce.number().int().min(0).max(90).default(DEFAULT_RENEWAL_WINDOW_DAYS),
  MEMBER_CODE_PREFIX: z
    .string()
    .regex(/^[A-Z]{2,8}$/, 'Expected 2-8 upper-case letters')
    .default('MBR'),
});

export type AppConfig = z.infer<typeof configSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid configuration',
      parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

export function resetConfig(): void {
  cached = null;
}
