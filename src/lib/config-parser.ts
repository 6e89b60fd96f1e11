/**
 * Environment configuration
 *
 * Parses process.env once through a zod schema and caches the result.
 * Tests call clearConfigCache() after mutating process.env.
 */

import { z } from 'zod';
import { logger } from './logger';

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  /** Variable name used by earlier deployments */
  GEMINI: optionalString,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),

  ANALYSIS_THRESHOLD: z.coerce.number().int().min(1).default(5),
  ANALYSIS_WINDOW_SIZE: z.coerce.number().int().min(1).max(1000).default(50),
  ANALYSIS_MIN_READINGS: z.coerce.number().int().min(1).default(5),
  ANALYSIS_LISTING_LIMIT: z.coerce.number().int().min(1).max(200).default(10),
  ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),

  // Applied to a device's config the first time it reports
  FLOW_ALERT_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  DEVICE_READING_INTERVAL: z.coerce.number().int().min(1).default(30),
  DEVICE_VALVE_AUTO_CONTROL: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1'),

  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  ALLOWED_ORIGINS: z.string().default('*'),
});

type EnvConfig = z.infer<typeof EnvSchema>;

export interface AnalysisSettings {
  threshold: number;
  windowSize: number;
  minReadings: number;
  listingLimit: number;
  temperature: number;
}

export interface DeviceDefaults {
  valveAutoControl: boolean;
  alertThreshold: number;
  readingInterval: number;
}

export interface SupabaseConfig {
  url: string;
  serviceRoleKey: string;
}

export interface ServerSettings {
  port: number;
  host: string;
  allowedOrigins: '*' | string[];
}

let cachedConfig: EnvConfig | null = null;

function getConfig(): EnvConfig {
  if (cachedConfig) return cachedConfig;

  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getGeminiApiKey(): string | null {
  const config = getConfig();
  return config.GEMINI_API_KEY ?? config.GEMINI ?? null;
}

export function getGeminiModelId(): string {
  return getConfig().GEMINI_MODEL;
}

export function getAnalysisSettings(): AnalysisSettings {
  const config = getConfig();
  return {
    threshold: config.ANALYSIS_THRESHOLD,
    windowSize: config.ANALYSIS_WINDOW_SIZE,
    minReadings: config.ANALYSIS_MIN_READINGS,
    listingLimit: config.ANALYSIS_LISTING_LIMIT,
    temperature: config.ANALYSIS_TEMPERATURE,
  };
}

export function getDeviceDefaults(): DeviceDefaults {
  const config = getConfig();
  return {
    valveAutoControl: config.DEVICE_VALVE_AUTO_CONTROL,
    alertThreshold: config.FLOW_ALERT_THRESHOLD,
    readingInterval: config.DEVICE_READING_INTERVAL,
  };
}

export function getSupabaseConfig(): SupabaseConfig | null {
  const config = getConfig();
  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
    return null;
  }
  return { url: config.SUPABASE_URL, serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY };
}

export function getServerSettings(): ServerSettings {
  const config = getConfig();
  const origins = config.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: config.PORT,
    host: config.HOST,
    allowedOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
  };
}

/**
 * Summary for /health, without secrets
 */
export function getConfigStatus(): Record<string, boolean | number> {
  const analysis = getAnalysisSettings();
  return {
    gemini: getGeminiApiKey() !== null,
    supabase: getSupabaseConfig() !== null,
    analysisThreshold: analysis.threshold,
    analysisMinReadings: analysis.minReadings,
  };
}

export function logConfigStatus(): void {
  const status = getConfigStatus();
  if (!status.gemini) {
    logger.warn('[Config] GEMINI_API_KEY not set, trend analysis is disabled');
  }
  if (!status.supabase) {
    logger.warn('[Config] Supabase not configured, readings are kept in memory only');
  }
  logger.info({ config: status }, '[Config] Loaded');
}
