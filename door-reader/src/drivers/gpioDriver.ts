import type { Gpio as GpioPin } from 'onoff';
import type { RelayDriver } from '../types.js';

/** Drives the relay from a local GPIO pin (sysfs numbering) through onoff. */
export class GpioRelayDriver implements RelayDriver {
  readonly name = 'gpio';

  private gpio: GpioPin | null = null;

  constructor(private readonly pin: number) {}

  async setup(): Promise<void> {
    // Loaded on demand so machines without GPIO can still run the other drivers.
    const { Gpio } = await import('onoff');
    if (!Gpio.accessible) {
      throw new Error('GPIO_NOT_ACCESSIBLE');
    }

    this.gpio = new Gpio(this.pin, 'low');
  }

  async write(active: boolean): Promise<void> {
    if (!this.gpio) {
      throw new Error('RELAY_NOT_SETUP');
    }

    await this.gpio.write(active ? 1 : 0);
  }

  async release(): Promise<void> {
    const gpio = this.gpio;
    if (!gpio) {
      return;
    }

    this.gpio = null;
    try {
      gpio.writeSync(0);
    } finally {
      gpio.unexport();
    }
  }
}
