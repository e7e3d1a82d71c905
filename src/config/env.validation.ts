import { z } from 'zod';
import { DEFAULT_PREFERRED_LANGUAGE } from '../constants';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1');

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  AUDIO_SELECTOR_ENABLED: booleanFlag,
  PREFERRED_AUDIO_LANGUAGE: z.string().trim().min(1).default(DEFAULT_PREFERRED_LANGUAGE),
  API_KEY: z.string().min(1).optional(),
  COMMAND_RETENTION_MINUTES: z.coerce.number().positive().default(10),
  DEVICE_RETENTION_HOURS: z.coerce.number().positive().default(48),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Passed to ConfigModule.forRoot({ validate }). Unrelated variables are
 * dropped; ConfigService still reads them from process.env.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
