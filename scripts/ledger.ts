/**
 * Ledger command line
 *
 * Usage: npx tsx scripts/ledger.ts <command> [args] [flags]
 */

import './load_env';
import { openLedger } from '../src/cli/bootstrap';
import { parseArgs, runCommand } from '../src/cli/commands';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('ledger_cli');

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const ledger = await openLedger();
  try {
    return await runCommand(ledger.service, args, (line) => console.log(line));
  } finally {
    ledger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error }, 'Ledger command failed');
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
