import { AccessLogger } from './accessLogger.js';
import { AuthorityClient } from './authorityClient.js';
import { config } from './config.js';
import { withDoorRelay } from './doorRelay.js';
import { createRelayDriver } from './drivers/index.js';
import { createShutdownHandler, exitCodeFor } from './lifecycle.js';
import { logger } from './logger.js';
import { runScanLoop } from './scanLoop.js';
import { ValidationEngine } from './validationEngine.js';

const start = async (): Promise<void> => {
  const authority = new AuthorityClient(config.authority);
  const accessLogger = new AccessLogger(authority);
  const driver = createRelayDriver(config.relay);

  logger.info(
    { authority: config.authority.baseUrl, driver: driver.name, pin: config.relay.pin },
    'Starting RFID door reader'
  );

  await withDoorRelay(driver, config.relay, async (relay) => {
    const shutdown = createShutdownHandler(relay, (code) => process.exit(code));
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const engine = new ValidationEngine(authority, relay, accessLogger, {
      unlockDurationMs: config.relay.unlockDurationMs
    });

    logger.info('RFID reader is active. Waiting for scans (Ctrl+C to exit).');
    const processed = await runScanLoop(process.stdin, engine);

    logger.info({ processed, pendingLogs: accessLogger.pending() }, 'Input closed, finishing access log writes');
    await accessLogger.drain();
  });
};

start()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    logger.error({ err: error }, 'RFID door reader stopped on an unrecoverable error');
    process.exit(exitCodeFor(error));
  });
