export { AccessLogger } from './accessLogger.js';
export {
  AuthorityClient,
  AuthorityTransportError,
  authorityPaths,
  type AuthorityClientOptions,
  type AuthorityPort,
  type AuthorityResponse,
  type DeniedRecord,
  type GrantedRecord
} from './authorityClient.js';
export { loadConfig, type ReaderConfig } from './config.js';
export { DoorRelay, RelaySetupError, withDoorRelay, type DoorRelayOptions } from './doorRelay.js';
export {
  createRelayDriver,
  GpioRelayDriver,
  SimulatedRelayDriver
} from './drivers/index.js';
export { createShutdownHandler, exitCodeFor, type ExitFn } from './lifecycle.js';
export { decodeActivation, decodeVerification } from './protocol.js';
export { runScanLoop, type CredentialValidator } from './scanLoop.js';
export type * from './types.js';
export {
  ValidationEngine,
  denialReasons,
  type DoorActuator,
  type OutcomeRecorder,
  type ValidationEngineOptions
} from './validationEngine.js';
