import pino, { type LoggerOptions } from 'pino';

/** Header paths censored in request logs: the webhook signature and credentials. */
export function redactPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const signatureHeader = (env.SIGNATURE_HEADER || 'x-signature').toLowerCase();
  return [`req.headers["${signatureHeader}"]`, 'req.headers.authorization'];
}

export function loggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL || 'info',
    base: { service: 'signal-relay' },
    redact: redactPaths(env),
  };
  return env.LOG_PRETTY === '1'
    ? { ...options, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : options;
}

export const logger = pino(loggerOptions());

export type Logger = typeof logger;
