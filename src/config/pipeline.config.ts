/**
 * Pipeline Configuration
 *
 * Environment variables read through @nestjs/config and validated with zod
 * at startup. Invalid values abort the boot with every problem listed.
 */
import { z } from 'zod';
import { resolveAccessLevel } from '../usage/access-filter';
import { parseUsageWindow } from '../usage/window-aggregator';

export const PipelineEnvSchema = z.object({
  /** Root of the landing area: <RAW_DATA_DIR>/<source>/<source>_<table>.csv */
  RAW_DATA_DIR: z.string().trim().min(1).default('data/raw'),
  /** Default access level when a request names none */
  PII_ACCESS_LEVEL: z.string().default('external').transform(resolveAccessLevel),
  /** Default summary window when a request names none */
  USAGE_WINDOW: z
    .string()
    .default('daily')
    .transform((value, ctx) => {
      const window = parseUsageWindow(value);
      if (!window) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsupported usage window "${value}"`,
        });
        return z.NEVER;
      }
      return window;
    }),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnv(config: Record<string, unknown>): PipelineEnv {
  const result = PipelineEnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
