import { z } from 'zod';
import { ConfigurationError } from '../errors';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const EnvSchema = z.object({
  AEROQUERY_NAMESPACE: z.string().min(1).default('test'),
  AEROQUERY_SCANS_ENABLED: booleanFlag,
  // 0 or negative disables scheduled refresh
  AEROQUERY_INDEX_CACHE_REFRESH_SECONDS: z.coerce.number().int().default(3600),
  AEROQUERY_QUERY_MAX_RECORDS: z.coerce.number().int().nonnegative().default(10000),
});

export const EngineSettingsSchema = z.object({
  namespace: z.string().min(1),
  scansEnabled: z.boolean().default(false),
  indexCacheRefreshSeconds: z.number().int().default(3600),
  /** 0 means unlimited */
  queryMaxRecords: z.number().int().nonnegative().default(10000),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

/**
 * Validate programmatic settings, filling defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveSettings(input: EngineSettingsInput): EngineSettings {
  const result = EngineSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid engine settings:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read settings from `AEROQUERY_*` environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Environment validation failed:\n${formatIssues(result.error)}`);
  }
  const data = result.data;
  return {
    namespace: data.AEROQUERY_NAMESPACE,
    scansEnabled: data.AEROQUERY_SCANS_ENABLED,
    indexCacheRefreshSeconds: data.AEROQUERY_INDEX_CACHE_REFRESH_SECONDS,
    queryMaxRecords: data.AEROQUERY_QUERY_MAX_RECORDS,
  };
}
