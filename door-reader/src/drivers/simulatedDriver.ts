import type { Logger } from 'pino';
import { logger as defaultLogger } from '../logger.js';
import type { RelayDriver } from '../types.js';

/** Keeps the relay level in memory; for benches without a relay attached. */
export class SimulatedRelayDriver implements RelayDriver {
  readonly name = 'simulated';

  private level: boolean | null = null;

  constructor(private readonly logger: Logger = defaultLogger) {}

  async setup(): Promise<void> {
    this.level = false;
    this.logger.debug('Simulated relay ready');
  }

  async write(active: boolean): Promise<void> {
    if (this.level === null) {
      throw new Error('RELAY_NOT_SETUP');
    }

    this.level = active;
    this.logger.debug({ active }, 'Simulated relay output');
  }

  async release(): Promise<void> {
    this.level = null;
  }

  currentLevel(): boolean | null {
    return this.level;
  }
}
