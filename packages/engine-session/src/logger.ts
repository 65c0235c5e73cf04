import { pino, type BaseLogger } from 'pino';

/** The part of a pino logger the engine writes to. Fastify's request logger fits. */
export type SessionLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function silentLogger(): SessionLogger {
  return pino({ level: 'silent' });
}
