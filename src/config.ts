import { z, ZodError } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './services/logger';

export const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  inputDir: z.string().min(1).default('./input'),
  outputDir: z.string().min(1).default('./output'),
  maxPages: z.number().int().positive().default(50),
  concurrency: z.number().int().min(1).max(32).default(4),
  settingsPath: z.string().min(1).optional(),
  nativeOutline: z.boolean().default(true),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export type ConfigIssue = {
  field: string;
  message: string;
};

function optionalInt(v: string | undefined): number | undefined {
  return v ? Number(v) : undefined;
}

function optionalString(v: string | undefined): string | undefined {
  return v ? v : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    nodeEnv: optionalString(env.NODE_ENV),
    logLevel: optionalString(env.LOG_LEVEL),
    inputDir: optionalString(env.INPUT_DIR),
    outputDir: optionalString(env.OUTPUT_DIR),
    maxPages: optionalInt(env.MAX_PAGES),
    concurrency: optionalInt(env.CONCURRENCY),
    settingsPath: optionalString(env.OUTLINE_SETTINGS),
    nativeOutline: env.NATIVE_OUTLINE === undefined ? undefined : env.NATIVE_OUTLINE !== 'false',
  };
}

/**
 * Merge environment values with explicit overrides (CLI flags win) and
 * validate. Invalid configuration raises ConfigError carrying every issue.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigInput = {}): Config {
  const raw = configFromEnv(env);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues: ConfigIssue[] = error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ConfigError(
        `Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
        issues
      );
    }
    throw error;
  }
}
