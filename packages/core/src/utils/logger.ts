import { pino, type Logger } from 'pino';

/**
 * Logger used when a component is configured without one.
 */
export function createSilentLogger(): Logger {
  return pino({ enabled: false });
}
