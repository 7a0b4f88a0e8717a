import type { Logger } from 'pino';

export interface MemoryStorageConfig {
  logger?: Logger;
  /** Clock used for timestamps; defaults to the system clock */
  now?: () => Date;
}
