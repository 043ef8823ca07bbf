import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(1105),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
  REDIS_NAMESPACE: z.string().default('enfyra'),
  ADMIN_API_TOKEN: z.string().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  // Comma-separated list of origins allowed to call the API from a browser
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform(value => value.split(',').map(origin => origin.trim()).filter(Boolean)),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  // Module specifiers extension code may import; everything else fails compilation
  EXTENSION_ALLOWED_IMPORTS: z
    .string()
    .default('vue')
    .transform(value => value.split(',').map(name => name.trim()).filter(Boolean))
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
