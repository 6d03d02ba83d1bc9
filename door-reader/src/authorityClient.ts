import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { AuthorityConfig } from './config.js';
import type { GuestId } from './types.js';

export const authorityPaths = {
  verify: '/rfid/verify',
  activate: '/rfid/activate',
  granted: '/access-logs/granted',
  denied: '/access-logs/denied'
} as const;

/** Raised (as a value, never thrown) when no HTTP response was obtained at all. */
export class AuthorityTransportError extends Error {
  readonly code: string | null;

  readonly timedOut: boolean;

  readonly path: string;

  constructor(message: string, path: string, code: string | null, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuthorityTransportError';
    this.path = path;
    this.code = code;
    this.timedOut = code === 'ECONNABORTED' || code === 'ETIMEDOUT';
  }

  static from(error: unknown, path: string): AuthorityTransportError {
    if (axios.isAxiosError(error)) {
      return new AuthorityTransportError(error.message, path, error.code ?? null, error);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new AuthorityTransportError(message, path, null, error);
  }
}

export type AuthorityResponse =
  | { ok: true; status: number; body: string }
  | { ok: false; error: AuthorityTransportError };

export interface GrantedRecord {
  uid: string;
  guestId: GuestId | null;
}

export interface DeniedRecord {
  uid: string;
}

export interface AuthorityPort {
  verify(uid: string): Promise<AuthorityResponse>;
  activate(uid: string): Promise<AuthorityResponse>;
  recordGranted(record: GrantedRecord): Promise<AuthorityResponse>;
  recordDenied(record: DeniedRecord): Promise<AuthorityResponse>;
}

export interface AuthorityClientOptions {
  /** Replaces the HTTP transport, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

/**
 * Stateless request/response wrapper around the remote authority. Every HTTP
 * status resolves as a response; only transport failures resolve as errors.
 * Bodies are kept as raw text so callers can tell a parse failure apart.
 */
export class AuthorityClient implements AuthorityPort {
  private readonly http: AxiosInstance;

  constructor(config: AuthorityConfig, options: AuthorityClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      adapter: options.adapter
    });

    if (config.apiKey) {
      this.http.defaults.headers.common.Authorization = `Bearer ${config.apiKey}`;
    }
  }

  verify(uid: string): Promise<AuthorityResponse> {
    return this.post(authorityPaths.verify, { rfid_uid: uid });
  }

  activate(uid: string): Promise<AuthorityResponse> {
    return this.post(authorityPaths.activate, { rfid_uid: uid });
  }

  recordGranted(record: GrantedRecord): Promise<AuthorityResponse> {
    return this.post(authorityPaths.granted, { rfid_uid: record.uid, guest_id: record.guestId });
  }

  recordDenied(record: DeniedRecord): Promise<AuthorityResponse> {
    return this.post(authorityPaths.denied, { rfid_uid: record.uid });
  }

  private async post(path: string, body: Record<string, unknown>): Promise<AuthorityResponse> {
    try {
      const response = await this.http.post<unknown>(path, body);
      const text = typeof response.data === 'string' ? response.data : '';
      return { ok: true, status: response.status, body: text };
    } catch (error) {
      return { ok: false, error: AuthorityTransportError.from(error, path) };
    }
  }
}
