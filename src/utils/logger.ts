import { config } from '../config';
import { onceWarn } from './warnings';

/**
 * Log sink consumed by the evolution engine. Supply your own to route the
 * generation summaries into an application logger.
 */
export interface EngineLogger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Console-backed logger gated by the global {@link config} flags. Warnings
 * are de-duplicated by message.
 */
export const defaultLogger: EngineLogger = {
  info(message: string): void {
    // eslint-disable-next-line no-console
    if (config.logGenerations) console.log(message);
  },
  warn(message: string): void {
    onceWarn(message, message);
  },
};
