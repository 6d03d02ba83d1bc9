import { beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../config.js';
import { GpioRelayDriver, SimulatedRelayDriver, createRelayDriver } from '../drivers/index.js';
import { silentLogger } from './helpers.js';

const onoff = vi.hoisted(() => ({
  accessible: true,
  created: [] as Array<{ pin: number; direction: string }>,
  writes: [] as number[],
  syncWrites: [] as number[],
  unexported: 0
}));

vi.mock('onoff', () => {
  class Gpio {
    static get accessible(): boolean {
      return onoff.accessible;
    }

    constructor(pin: number, direction: string) {
      onoff.created.push({ pin, direction });
    }

    async write(value: number): Promise<void> {
      onoff.writes.push(value);
    }

    writeSync(value: number): void {
      onoff.syncWrites.push(value);
    }

    unexport(): void {
      onoff.unexported += 1;
    }
  }

  return { Gpio };
});

describe('GpioRelayDriver', () => {
  beforeEach(() => {
    onoff.accessible = true;
    onoff.created.length = 0;
    onoff.writes.length = 0;
    onoff.syncWrites.length = 0;
    onoff.unexported = 0;
  });

  it('exports the pin as an output starting low', async () => {
    const driver = new GpioRelayDriver(17);

    await driver.setup();

    expect(onoff.created).toEqual([{ pin: 17, direction: 'low' }]);
  });

  it('writes 1 when active and 0 when inactive', async () => {
    const driver = new GpioRelayDriver(17);
    await driver.setup();

    await driver.write(true);
    await driver.write(false);

    expect(onoff.writes).toEqual([1, 0]);
  });

  it('forces the pin low and unexports it on release', async () => {
    const driver = new GpioRelayDriver(17);
    await driver.setup();

    await driver.release();
    await driver.release();

    expect(onoff.syncWrites).toEqual([0]);
    expect(onoff.unexported).toBe(1);
  });

  it('fails setup when GPIO is not accessible', async () => {
    onoff.accessible = false;

    await expect(new GpioRelayDriver(17).setup()).rejects.toThrow('GPIO_NOT_ACCESSIBLE');
    expect(onoff.created).toEqual([]);
  });

  it('refuses writes before setup', async () => {
    await expect(new GpioRelayDriver(17).write(true)).rejects.toThrow('RELAY_NOT_SETUP');
  });
});

describe('SimulatedRelayDriver', () => {
  it('tracks the level in memory', async () => {
    const driver = new SimulatedRelayDriver(silentLogger);
    expect(driver.currentLevel()).toBeNull();

    await driver.setup();
    expect(driver.currentLevel()).toBe(false);

    await driver.write(true);
    expect(driver.currentLevel()).toBe(true);

    await driver.release();
    expect(driver.currentLevel()).toBeNull();
  });
});

describe('createRelayDriver', () => {
  it.each([
    ['gpio', GpioRelayDriver],
    ['simulated', SimulatedRelayDriver]
  ] as const)('builds the %s driver', (driver, type) => {
    const config = loadConfig({ RELAY_DRIVER: driver });

    expect(createRelayDriver(config.relay)).toBeInstanceOf(type);
  });
});
