import { pino } from 'pino';
import { vi } from 'vitest';
import { AuthorityTransportError, type AuthorityResponse } from '../authorityClient.js';
import type { AccessOutcome, RelayDriver } from '../types.js';

export const silentLogger = pino({ level: 'silent' });

export const httpResponse = (status: number, body: unknown): AuthorityResponse => ({
  ok: true,
  status,
  body: typeof body === 'string' ? body : JSON.stringify(body)
});

export const transportFailure = (path = '/rfid/verify', code = 'ECONNABORTED'): AuthorityResponse => ({
  ok: false,
  error: new AuthorityTransportError('timeout of 5000ms exceeded', path, code)
});

export interface FakeAuthorityResponses {
  verify?: AuthorityResponse;
  activate?: AuthorityResponse;
  granted?: AuthorityResponse;
  denied?: AuthorityResponse;
}

/** In-process stand-in for the remote authority; `calls` keeps the order of requests. */
export const createFakeAuthority = (responses: FakeAuthorityResponses = {}) => {
  const calls: string[] = [];
  return {
    calls,
    verify: vi.fn(async (uid: string): Promise<AuthorityResponse> => {
      calls.push(`verify:${uid}`);
      return responses.verify ?? transportFailure();
    }),
    activate: vi.fn(async (uid: string): Promise<AuthorityResponse> => {
      calls.push(`activate:${uid}`);
      return responses.activate ?? transportFailure('/rfid/activate');
    }),
    recordGranted: vi.fn(async (): Promise<AuthorityResponse> => responses.granted ?? httpResponse(201, {})),
    recordDenied: vi.fn(async (): Promise<AuthorityResponse> => responses.denied ?? httpResponse(201, {}))
  };
};

export const createFakeActuator = (calls: string[] = []) => ({
  calls,
  engage: vi.fn(async (durationMs?: number): Promise<void> => {
    calls.push(`engage:${durationMs}`);
  }),
  signalDenial: vi.fn(async (): Promise<void> => {
    calls.push('signalDenial');
  })
});

export const createFakeRecorder = () => {
  const outcomes: AccessOutcome[] = [];
  return {
    outcomes,
    record: vi.fn((outcome: AccessOutcome): void => {
      outcomes.push(outcome);
    })
  };
};

export class RecordingDriver implements RelayDriver {
  readonly name = 'recording';

  readonly writes: boolean[] = [];

  level = false;

  setupCalls = 0;

  releaseCalls = 0;

  failSetup = false;

  failWrite: ((active: boolean, index: number) => boolean) | null = null;

  async setup(): Promise<void> {
    this.setupCalls += 1;
    if (this.failSetup) {
      throw new Error('GPIO_NOT_ACCESSIBLE');
    }
    this.level = false;
  }

  async write(active: boolean): Promise<void> {
    if (this.failWrite?.(active, this.writes.length)) {
      throw new Error('WRITE_FAILED');
    }
    this.writes.push(active);
    this.level = active;
  }

  async release(): Promise<void> {
    this.releaseCalls += 1;
    this.level = false;
  }
}
