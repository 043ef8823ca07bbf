import { z } from 'zod';

export const PACKAGE_MANAGERS = ['npm', 'yarn', 'pnpm'] as const;
export type PackageManager = (typeof PACKAGE_MANAGERS)[number];

export const DEFAULT_PORT = 1105;
export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_PROJECT_NAME = 'enfyra-app';
export const CACHE_TTL_SECONDS = 300;
export const EXTENSION_ALLOWED_IMPORTS = 'vue';

/**
 * Whether a value fits on one `.env` line under one of dotenv's three quote
 * styles. Fails for line breaks, and for values holding `'`, a backtick and
 * `"` or `\` together.
 */
export function isEnvWritable(value: string): boolean {
  if (/[\r\n]/.test(value)) {
    return false;
  }
  return !(value.includes("'") && value.includes('`') && /["\\]/.test(value));
}

const ENV_UNWRITABLE = 'Value cannot combine \', ` and " or \\ in a .env file';

export const projectNameSchema = z
  .string()
  .trim()
  .min(1, 'Project name is required')
  .max(214, 'Project name must be at most 214 characters')
  .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Use lowercase letters, digits, ".", "_" and "-", starting with a letter or digit');

export const packageManagerSchema = z.enum(PACKAGE_MANAGERS);

export const mongodbUriSchema = z
  .string()
  .trim()
  .regex(/^mongodb(\+srv)?:\/\/\S+$/, 'Expected a mongodb:// or mongodb+srv:// URI')
  .refine(isEnvWritable, ENV_UNWRITABLE);

export const redisUrlSchema = z
  .string()
  .trim()
  .regex(/^rediss?:\/\/\S+$/, 'Expected a redis:// or rediss:// URL')
  .refine(isEnvWritable, ENV_UNWRITABLE);

export const redisNamespaceSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9:._-]{1,64}$/, 'Use up to 64 letters, digits, ":", ".", "_" and "-"');

export const portSchema = z.coerce
  .number({ invalid_type_error: 'Port must be a number' })
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535');

export const adminTokenSchema = z
  .string()
  .trim()
  .min(16, 'Admin token must be at least 16 characters')
  .regex(/^\S+$/, 'Admin token must not contain whitespace')
  .refine(isEnvWritable, ENV_UNWRITABLE);

/**
 * Answers collected by the wizard, written to the project's `.env`.
 */
export interface IProjectConfig {
  projectName: string;
  packageManager: PackageManager;
  mongodbUri: string;
  redisUrl: string;
  redisNamespace: string;
  port: number;
  adminToken: string;
}

/**
 * Validator for enquirer's `validate` option: true, or the first issue message.
 */
export function validatorFor(schema: z.ZodTypeAny): (value: string) => true | string {
  return value => {
    const result = schema.safeParse(value);
    return result.success ? true : (result.error.issues[0]?.message ?? 'Invalid value');
  };
}

/**
 * Package manager that launched the CLI, read from `npm_config_user_agent`
 * (`pnpm/9.1.0 npm/? node/v20.12.2 linux x64`).
 */
export function detectPackageManager(userAgent: string | undefined): PackageManager {
  const name = userAgent?.split(' ')[0]?.split('/')[0];
  const parsed = packageManagerSchema.safeParse(name);
  return parsed.success ? parsed.data : 'npm';
}

export function defaultMongodbUri(projectName: string): string {
  // Database names may not contain dots
  return `mongodb://localhost:27017/${projectName.replace(/\./g, '_')}`;
}

/**
 * Hide the password of a connection string before it is printed.
 */
export function redactCredentials(uri: string): string {
  return uri.replace(/\/\/([^:@/]+):[^@/]+@/, '//$1:***@');
}
