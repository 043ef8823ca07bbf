import { CACHE_TTL_SECONDS, EXTENSION_ALLOWED_IMPORTS, isEnvWritable, type IProjectConfig } from './config.js';

const NEEDS_QUOTES = /[\s#"'`\\]/;

/**
 * Format a value for a `.env` line. dotenv unescapes nothing inside quotes
 * except `\n` and `\r` between double quotes, so the value is wrapped in the
 * first quote style whose contents come back verbatim: double quotes when it
 * holds no `"` or `\`, then single quotes, then backticks.
 *
 * @throws Error when no quote style can hold the value
 */
export function formatEnvValue(value: string): string {
  if (!isEnvWritable(value)) {
    throw new Error('Value cannot be written to a .env file');
  }
  if (!NEEDS_QUOTES.test(value)) {
    return value;
  }
  if (!/["\\]/.test(value)) {
    return `"${value}"`;
  }
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  return `\`${value}\``;
}

export function renderEnvFile(config: IProjectConfig): string {
  const entries: Array<[string, string]> = [
    ['NODE_ENV', 'production'],
    ['PORT', String(config.port)],
    ['MONGODB_URI', config.mongodbUri],
    ['REDIS_URL', config.redisUrl],
    ['REDIS_NAMESPACE', config.redisNamespace],
    ['ADMIN_API_TOKEN', config.adminToken],
    ['CACHE_TTL_SECONDS', String(CACHE_TTL_SECONDS)],
    ['EXTENSION_ALLOWED_IMPORTS', EXTENSION_ALLOWED_IMPORTS]
  ];
  return entries.map(([key, value]) => `${key}=${formatEnvValue(value)}`).join('\n') + '\n';
}
