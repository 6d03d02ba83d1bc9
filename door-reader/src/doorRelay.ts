import type { Logger } from 'pino';
import { logger as defaultLogger } from './logger.js';
import type { RelayDriver } from './types.js';
import { sleep } from './utils.js';

export interface DoorRelayOptions {
  unlockDurationMs: number;
  flashCount: number;
  flashIntervalMs: number;
  logger?: Logger;
}

export class RelaySetupError extends Error {
  readonly code = 'RELAY_SETUP_FAILED';

  constructor(driverName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to set up ${driverName} relay: ${detail}`, { cause });
    this.name = 'RelaySetupError';
  }
}

/**
 * Owns the lock relay output. The output rests LOW (locked); `engage` and
 * `signalDenial` always leave it LOW again, and neither one throws.
 */
export class DoorRelay {
  private readonly logger: Logger;

  private acquired = false;

  private engaged = false;

  constructor(
    private readonly driver: RelayDriver,
    private readonly options: DoorRelayOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async acquire(): Promise<void> {
    try {
      await this.driver.setup();
    } catch (error) {
      throw new RelaySetupError(this.driver.name, error);
    }

    this.acquired = true;
    this.engaged = false;
    this.logger.info({ driver: this.driver.name }, 'Relay ready (locked)');
  }

  async release(): Promise<void> {
    if (!this.acquired) {
      return;
    }

    this.acquired = false;
    this.engaged = false;
    await this.driver.release();
    this.logger.info({ driver: this.driver.name }, 'Relay cleanup complete');
  }

  isEngaged(): boolean {
    return this.engaged;
  }

  async engage(durationMs: number = this.options.unlockDurationMs): Promise<void> {
    this.logger.info({ durationMs }, 'Unlocking door...');
    let locked = false;
    try {
      await this.setOutput(true);
      await sleep(durationMs);
    } catch (error) {
      this.logger.error({ err: error, driver: this.driver.name }, 'Failed to engage door relay');
    } finally {
      locked = await this.settleLow();
    }
    if (locked) {
      this.logger.info('Door locked.');
    }
  }

  async signalDenial(
    flashCount: number = this.options.flashCount,
    intervalMs: number = this.options.flashIntervalMs
  ): Promise<void> {
    this.logger.warn({ flashCount, intervalMs }, 'Flashing relay for access denial.');
    try {
      for (let flash = 0; flash < flashCount; flash += 1) {
        await this.setOutput(true);
        await sleep(intervalMs);
        await this.setOutput(false);
        await sleep(intervalMs);
      }
    } catch (error) {
      this.logger.warn({ err: error, driver: this.driver.name }, 'Denial flash interrupted');
      await this.settleLow();
      return;
    }
    this.logger.warn('Access denial flash complete.');
  }

  private async setOutput(active: boolean): Promise<void> {
    await this.driver.write(active);
    this.engaged = active;
  }

  /** Drives the output LOW. Resolves false when the write failed. */
  private async settleLow(): Promise<boolean> {
    try {
      await this.setOutput(false);
      return true;
    } catch (error) {
      this.logger.error({ err: error, driver: this.driver.name }, 'Failed to return relay to locked state');
      return false;
    }
  }
}

/** Acquires the relay, runs `fn`, and releases the relay on every exit path. */
export const withDoorRelay = async <T>(
  driver: RelayDriver,
  options: DoorRelayOptions,
  fn: (relay: DoorRelay) => Promise<T>
): Promise<T> => {
  const relay = new DoorRelay(driver, options);
  try {
    await relay.acquire();
    return await fn(relay);
  } finally {
    await relay.release();
  }
};
