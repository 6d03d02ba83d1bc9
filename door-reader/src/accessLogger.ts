import type { Logger } from 'pino';
import type { AuthorityPort, AuthorityResponse } from './authorityClient.js';
import { logger as defaultLogger } from './logger.js';
import type { AccessOutcome } from './types.js';

const successMessages: Record<AccessOutcome['kind'], string> = {
  granted: 'Access granted logged successfully.',
  denied: 'Access denied logged successfully.'
};

/**
 * Fire-and-forget recorder of access outcomes. `record` returns before the
 * remote write starts to matter; a failed write is only ever reported to the
 * local logger and never retried.
 */
export class AccessLogger {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly authority: AuthorityPort,
    private readonly logger: Logger = defaultLogger
  ) {}

  record(outcome: AccessOutcome): void {
    const task = this.write(outcome).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  pending(): number {
    return this.inFlight.size;
  }

  /** Settles once every write started before the call has finished. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  private async write(outcome: AccessOutcome): Promise<void> {
    let response: AuthorityResponse;
    try {
      response =
        outcome.kind === 'granted'
          ? await this.authority.recordGranted({ uid: outcome.uid, guestId: outcome.guestId })
          : await this.authority.recordDenied({ uid: outcome.uid });
    } catch (error) {
      this.logger.error({ err: error, uid: outcome.uid, kind: outcome.kind }, 'Logging request exception');
      return;
    }

    if (!response.ok) {
      this.logger.error({ err: response.error, uid: outcome.uid, kind: outcome.kind }, 'Logging request exception');
      return;
    }

    if (response.status === 201) {
      this.logger.info({ uid: outcome.uid, kind: outcome.kind }, successMessages[outcome.kind]);
      return;
    }

    this.logger.error(
      { uid: outcome.uid, kind: outcome.kind, status: response.status },
      `Logging failed: HTTP ${response.status}`
    );
  }
}
