import type { Logger } from 'pino';
import type { AuthorityPort } from './authorityClient.js';
import { logger as defaultLogger } from './logger.js';
import { decodeActivation, decodeVerification, extractMessage } from './protocol.js';
import type {
  AccessOutcome,
  CredentialStatus,
  DeniedOutcome,
  GrantedOutcome,
  GuestId,
  VerificationResult
} from './types.js';
import { safeJsonParse } from './utils.js';

export interface DoorActuator {
  engage(durationMs?: number): Promise<void>;
  signalDenial(): Promise<void>;
}

export interface OutcomeRecorder {
  record(outcome: AccessOutcome): void;
}

export interface ValidationEngineOptions {
  unlockDurationMs: number;
  logger?: Logger;
}

export const denialReasons = {
  parseError: 'Backend JSON parse error.',
  unknownBackendError: 'Unknown backend error.',
  noDetail: 'No detail provided',
  unexpectedStatus: (status: number) => `Unexpected status ${status}`,
  notActivated: (uid: string) => `RFID ${uid} could not be activated.`
};

export const grantedOutcome = (uid: string, guestId: GuestId | null): GrantedOutcome =>
  Object.freeze<GrantedOutcome>({ kind: 'granted', uid, guestId });

export const deniedOutcome = (uid: string, reason: string): DeniedOutcome =>
  Object.freeze<DeniedOutcome>({ kind: 'denied', uid, reason });

/**
 * Decides grant or deny for one scanned credential and drives the relay and
 * the access log accordingly.
 *
 * Explicit denials (the authority said no, a protocol error, or activation
 * failed) flash the relay and are recorded as denied. When the authority
 * cannot be reached for the initial verification nothing is actuated and
 * nothing is recorded, since no verdict was issued.
 */
export class ValidationEngine {
  private readonly logger: Logger;

  constructor(
    private readonly authority: AuthorityPort,
    private readonly relay: DoorActuator,
    private readonly recorder: OutcomeRecorder,
    private readonly options: ValidationEngineOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async validate(uid: string): Promise<void> {
    try {
      await this.run(uid);
    } catch (error) {
      this.logger.error({ err: error, uid }, 'Unhandled error while validating credential');
    }
  }

  private async run(uid: string): Promise<void> {
    this.logger.info({ uid }, 'Sending verification request');
    const response = await this.authority.verify(uid);

    if (!response.ok) {
      this.logger.error(
        { err: response.error, uid, timedOut: response.error.timedOut },
        'Cannot connect to backend'
      );
      return;
    }

    if (response.status === 200) {
      await this.handleVerification(uid, response.body);
      return;
    }

    if (response.status === 403 || response.status === 404) {
      const reason = extractMessage(safeJsonParse(response.body)) ?? denialReasons.noDetail;
      await this.deny(uid, reason);
      return;
    }

    this.logger.error({ uid, status: response.status }, 'Unexpected backend response');
    await this.deny(uid, denialReasons.unexpectedStatus(response.status));
  }

  private async handleVerification(uid: string, body: string): Promise<void> {
    const payload = safeJsonParse(body);
    const result = decodeVerification(payload);

    if (!result) {
      this.logger.error({ uid }, 'JSON parse error in verification response');
      await this.deny(uid, denialReasons.parseError);
      return;
    }

    this.logger.debug({ uid, response: payload }, 'Full backend response');

    if (!result.success) {
      await this.deny(uid, result.message ?? denialReasons.unknownBackendError);
      return;
    }

    this.logger.info({ uid }, 'RFID verified');
    this.logDetails(uid, result);

    const status = await this.activateIfAssigned(uid, result.credentialStatus);
    if (status === null) {
      await this.deny(uid, denialReasons.notActivated(uid));
      return;
    }

    await this.relay.engage(this.options.unlockDurationMs);
    this.recorder.record(grantedOutcome(uid, result.guest?.id ?? null));
  }

  /** Resolves the status to continue with, or null when activation failed. */
  private async activateIfAssigned(uid: string, status: CredentialStatus | null): Promise<CredentialStatus | null> {
    if (status === null) {
      this.logger.error({ uid }, 'Verification response has no RFID status');
      return null;
    }

    if (status !== 'assigned') {
      return status;
    }

    this.logger.info({ uid }, "RFID status is 'assigned'. Attempting to activate...");
    const response = await this.authority.activate(uid);

    if (!response.ok) {
      this.logger.error({ err: response.error, uid }, 'Cannot connect to backend to activate RFID');
      return null;
    }

    if (response.status !== 200) {
      this.logger.error({ uid, status: response.status }, 'Unexpected HTTP status activating RFID');
      return null;
    }

    const activation = decodeActivation(safeJsonParse(response.body));
    if (!activation) {
      this.logger.error({ uid }, 'JSON parse error in activation response');
      return null;
    }

    if (!activation.success) {
      this.logger.error({ uid, message: activation.message }, 'Could not activate RFID');
      return null;
    }

    this.logger.info({ uid, status: activation.status }, 'RFID successfully activated');
    return activation.status;
  }

  private logDetails(uid: string, result: VerificationResult): void {
    if (result.guest) {
      this.logger.info({ uid, guestId: result.guest.id, guestName: result.guest.name }, 'Guest info');
    } else {
      this.logger.warn({ uid }, 'No guest info provided by backend.');
    }

    if (result.room) {
      const { id, number, status, checkIn, checkOut } = result.room;
      this.logger.info({ uid, roomId: id, roomNumber: number, roomStatus: status, checkIn, checkOut }, 'Room info');
    } else {
      this.logger.warn({ uid }, 'No room info provided by backend.');
    }
  }

  private async deny(uid: string, reason: string): Promise<void> {
    this.logger.warn({ uid, reason }, 'ACCESS DENIED');
    await this.relay.signalDenial();
    this.recorder.record(deniedOutcome(uid, reason));
  }
}
