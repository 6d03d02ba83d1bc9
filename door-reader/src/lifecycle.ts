import type { Logger } from 'pino';
import { RelaySetupError, type DoorRelay } from './doorRelay.js';
import { logger as defaultLogger } from './logger.js';

export type ExitFn = (code: number) => void;

/**
 * Signal handler that releases the relay (forcing the output LOW) and then
 * exits 0, even when an unlock is still in progress.
 */
export const createShutdownHandler =
  (relay: DoorRelay, exit: ExitFn, logger: Logger = defaultLogger) =>
  (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Exiting RFID reader gracefully...');
    return relay
      .release()
      .catch((error) => {
        logger.error({ err: error }, 'Error releasing relay during shutdown');
      })
      .finally(() => {
        exit(0);
      });
  };

/** Only a relay that could not be set up ends the process with a failure. */
export const exitCodeFor = (error: unknown): number => (error instanceof RelaySetupError ? 1 : 0);
