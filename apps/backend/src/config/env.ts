import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .transform(value => value.trim().toLowerCase())
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

export const envSchema = z.object({
  // NODE_ENV is set by tooling (vitest sets 'test'); don't set it in .env
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  // Without REDIS_URL the process runs with no cache handle
  REDIS_URL: z.string().min(1).optional(),
  REDIS_NAMESPACE: z.string().default('everly'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_EXPIRES_IN_MINUTES: z.coerce.number().int().positive().default(30),
  GOOGLE_USERINFO_URL: z.string().url().default('https://www.googleapis.com/oauth2/v3/userinfo'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:8000'),
  STATIC_ROOT: z.string().default('static'),
  MEDIA_UPLOAD_PATH: z.string().default('static/uploads/media'),
  MEDIA_MAX_FILE_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  PROFILE_UPLOAD_PATH: z.string().default('static/uploads/profiles'),
  PROFILE_MAX_IMAGE_SIZE: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  DIARY_DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(10),
  DIARY_MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  DIARY_SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(50),
  DIARY_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  MODULE_HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://localhost:8000')
    .transform(value => value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)),
  ENABLE_MEDIA: booleanFlag.default(true)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
