import pino, { type Logger } from 'pino';

let rootLogger: Logger | null = null;

/**
 * Diagnostics logger of the CLI.
 *
 * Writes JSON lines to stderr so they never mix with the wizard's own output
 * on stdout. Silent unless LOG_LEVEL is set.
 */
export function getLogger(scope?: string): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        level: process.env.LOG_LEVEL ?? 'silent',
        base: { service: 'create-enfyra-app' },
        timestamp: pino.stdTimeFunctions.isoTime,
        errorKey: 'error',
        serializers: { error: pino.stdSerializers.err },
        redact: { paths: ['adminToken', '*.adminToken'], censor: '[REDACTED]' }
      },
      pino.destination(2)
    );
  }
  return scope ? rootLogger.child({ scope }) : rootLogger;
}
