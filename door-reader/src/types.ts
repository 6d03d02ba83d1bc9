export interface CredentialScan {
  uid: string;
}

export type CredentialStatus = 'unassigned' | 'assigned' | 'active' | 'unknown';

export type GuestId = number | string;

export interface GuestInfo {
  id: GuestId | null;
  name: string | null;
}

export interface RoomInfo {
  id: number | string | null;
  number: string | null;
  status: string | null;
  checkIn: string | null;
  checkOut: string | null;
}

export interface VerificationResult {
  success: boolean;
  message?: string;
  /** Null when the reply carried no `data.rfid.status`. */
  credentialStatus: CredentialStatus | null;
  guest?: GuestInfo;
  room?: RoomInfo;
}

export interface ActivationResult {
  success: boolean;
  status: CredentialStatus;
  message?: string;
}

export interface GrantedOutcome {
  readonly kind: 'granted';
  readonly uid: string;
  readonly guestId: GuestId | null;
}

export interface DeniedOutcome {
  readonly kind: 'denied';
  readonly uid: string;
  readonly reason: string;
}

export type AccessOutcome = GrantedOutcome | DeniedOutcome;

export type RelayDriverKind = 'gpio' | 'simulated';

/**
 * Low-level output behind the door relay. `write(true)` energises the relay
 * (door unlocked), `write(false)` de-energises it.
 */
export interface RelayDriver {
  readonly name: string;
  setup(): Promise<void>;
  write(active: boolean): Promise<void>;
  release(): Promise<void>;
}
