import type {
  ActivationResult,
  CredentialStatus,
  GuestInfo,
  RoomInfo,
  VerificationResult
} from './types.js';
import { isRecord } from './utils.js';

// Decoders for remote authority payloads. Each one takes the already parsed
// JSON body and returns null when it is not an object.

const credentialStatuses: readonly CredentialStatus[] = ['unassigned', 'assigned', 'active', 'unknown'];

/**
 * Maps a wire status onto a known status by exact comparison. Returns null
 * when the field is absent, so callers can tell a missing status apart from
 * an unrecognised one.
 */
export const toCredentialStatus = (value: unknown): CredentialStatus | null => {
  if (value === undefined || value === null) {
    return null;
  }

  return credentialStatuses.find((status) => status === value) ?? 'unknown';
};

const optionalString = (value: unknown): string | null => {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return null;
};

const optionalId = (value: unknown): number | string | null => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }

  return null;
};

const decodeGuest = (value: unknown): GuestInfo | undefined => {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    return undefined;
  }

  return {
    id: optionalId(value.id),
    name: optionalString(value.name)
  };
};

const decodeRoom = (value: unknown): RoomInfo | undefined => {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    return undefined;
  }

  return {
    id: optionalId(value.id),
    number: optionalString(value.room_number),
    status: optionalString(value.status),
    checkIn: optionalString(value.check_in),
    checkOut: optionalString(value.check_out)
  };
};

export const extractMessage = (payload: unknown): string | undefined => {
  if (!isRecord(payload)) {
    return undefined;
  }

  return typeof payload.message === 'string' ? payload.message : undefined;
};

/**
 * `POST /rfid/verify` 200 body:
 * `{ success, message?, data: { rfid: { status }, guest?, room? } }`.
 */
export const decodeVerification = (payload: unknown): VerificationResult | null => {
  if (!isRecord(payload)) {
    return null;
  }

  const data = isRecord(payload.data) ? payload.data : {};
  const rfid = isRecord(data.rfid) ? data.rfid : {};

  return {
    success: Boolean(payload.success),
    message: extractMessage(payload),
    credentialStatus: toCredentialStatus(rfid.status),
    guest: decodeGuest(data.guest),
    room: decodeRoom(data.room)
  };
};

/** `POST /rfid/activate` 200 body: `{ success, data: { status }, message? }`. */
export const decodeActivation = (payload: unknown): ActivationResult | null => {
  if (!isRecord(payload)) {
    return null;
  }

  const data = isRecord(payload.data) ? payload.data : {};

  return {
    success: Boolean(payload.success),
    status: toCredentialStatus(data.status) ?? 'unknown',
    message: extractMessage(payload)
  };
};
