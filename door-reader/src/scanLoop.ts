import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { logger as defaultLogger } from './logger.js';
import type { CredentialScan } from './types.js';
import { normalizeUid } from './utils.js';

export interface CredentialValidator {
  validate(uid: string): Promise<void>;
}

export const toCredentialScan = (line: string): CredentialScan | null => {
  const uid = normalizeUid(line);
  return uid ? { uid } : null;
};

/**
 * Reads one credential UID per line and validates each scan to completion
 * before the next line is taken. Resolves with the number of scans handled
 * once the input ends.
 */
export const runScanLoop = async (
  input: Readable,
  validator: CredentialValidator,
  logger: Logger = defaultLogger
): Promise<number> => {
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
  let processed = 0;

  try {
    for await (const line of lines) {
      const scan = toCredentialScan(line);
      if (!scan) {
        continue;
      }

      logger.info({ uid: scan.uid }, 'RFID scanned');
      await validator.validate(scan.uid);
      processed += 1;
    }
  } finally {
    lines.close();
  }

  return processed;
};
