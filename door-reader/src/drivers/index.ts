import type { RelayConfig } from '../config.js';
import type { RelayDriver } from '../types.js';
import { GpioRelayDriver } from './gpioDriver.js';
import { SimulatedRelayDriver } from './simulatedDriver.js';

export { GpioRelayDriver, SimulatedRelayDriver };

export const createRelayDriver = (config: RelayConfig): RelayDriver => {
  switch (config.driver) {
    case 'gpio':
      return new GpioRelayDriver(config.pin);
    case 'simulated':
      return new SimulatedRelayDriver();
  }
};
