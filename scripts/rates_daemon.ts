/**
 * Rate refresh daemon
 * Refreshes rates on the configured interval until SIGINT/SIGTERM.
 *
 * Usage: npx tsx scripts/rates_daemon.ts
 */

import './load_env';
import { openLedger } from '../src/cli/bootstrap';
import { RateScheduler } from '../src/rates/scheduler';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('rates_daemon');

async function main(): Promise<void> {
  const ledger = await openLedger();
  const scheduler = new RateScheduler(ledger.service.refresher, ledger.config.refreshIntervalMs);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down rate daemon');
    // The store must stay open until the running refresh has saved its table
    void scheduler
      .shutdown()
      .catch((error: unknown) => {
        logger.error({ error }, 'Refresh failed during shutdown');
        process.exitCode = 1;
      })
      .finally(() => ledger.close());
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  scheduler.start();
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Rate daemon failed to start');
  process.exitCode = 1;
});
