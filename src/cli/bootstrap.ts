import { getConfig, type LedgerConfig } from '@/core/config';
import { getEnvConfig, type EnvConfig } from '@/core/env';
import { SqliteLedgerStore } from '@/data/store';
import { createRateSources } from '@/providers/registry';
import { LedgerService } from '@/service/ledger_service';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('bootstrap');

export interface Ledger {
  config: LedgerConfig;
  service: LedgerService;
  close(): void;
}

/** Wires config, providers and the SQLite store into a ready LedgerService. */
export async function openLedger(
  config: LedgerConfig = getConfig(),
  env: EnvConfig = getEnvConfig()
): Promise<Ledger> {
  const sources = createRateSources(config, env);
  const store = new SqliteLedgerStore(config.databasePath, { keepRateTables: config.rateHistoryLimit + 1 });
  const service = await LedgerService.open({ config, sources, store });

  logger.debug({ databasePath: config.databasePath, base: config.baseCurrency }, 'Ledger opened');
  return {
    config,
    service,
    close: () => store.close(),
  };
}
