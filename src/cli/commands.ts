/**
 * Ledger CLI commands, separated from the script entry point so they can run
 * against any LedgerService.
 */

import type Decimal from 'decimal.js';
import type { Result } from 'neverthrow';
import { SUPPORTED_CURRENCIES, formatCurrencyInfo } from '@/core/currencies';
import type { LedgerError } from '@/core/errors';
import { toIsoString } from '@/core/time';
import type { TradeReceipt, Valuation, Wallet } from '@/ledger/portfolio';
import type { ValuationSnapshot } from '@/data/store';
import type { LedgerService, TradeConfirmation } from '@/service/ledger_service';

export type Output = (line: string) => void;

export interface CliArgs {
  command: string | null;
  positionals: string[];
  flags: Map<string, string | true>;
}

export const USAGE = `Usage: ledger <command> [args] [flags]

Commands:
  create <user> [--base=USD] [--seed=1000]   Open a portfolio
  deposit <user> <currency> <amount>         Credit a balance
  buy <user> <currency> <amount>             Buy currency with the base balance
  sell <user> <currency> <amount>            Sell currency into the base balance
  value <user> [--base=EUR]                  Value the portfolio
  trades <user>                              List trade receipts
  history <user> [--limit=20]                List valuation snapshots, newest first
  rate <from> <to>                           Show the cross rate
  rates                                      Show the current rate table
  refresh                                    Fetch rates from all sources
  rollback                                   Re-publish the previous rate table
  currencies                                 List supported currencies

Flags:
  --refresh   Refresh rates before running the command`;

export function parseArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq === -1) {
        flags.set(arg.slice(2), true);
      } else {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      }
    } else {
      positionals.push(arg);
    }
  }

  const [command = null, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

const DEFAULT_HISTORY_LIMIT = 20;

function flagValue(args: CliArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function num(value: Decimal): string {
  return value.toString();
}

function rateText(value: Decimal): string {
  return value.toSignificantDigits(10).toString();
}

export function formatBalances(balances: Wallet): string {
  if (balances.size === 0) return 'Balances: (empty)';
  const parts = [...balances.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([currency, balance]) => `${currency} ${num(balance)}`);
  return `Balances: ${parts.join(', ')}`;
}

export function formatReceipt(receipt: TradeReceipt): string {
  const head = `${receipt.direction.toUpperCase()} ${num(receipt.amount)} ${receipt.currency}`;
  if (receipt.direction === 'deposit') {
    return `${head} (rates v${receipt.rateTableVersion}) ${toIsoString(receipt.timestamp)}`;
  }
  return (
    `${head} at ${rateText(receipt.rateUsed)} ${receipt.baseCurrency}: ` +
    `${receipt.baseCurrency} ${receipt.baseCurrencyDelta.isNegative() ? '' : '+'}${num(receipt.baseCurrencyDelta)} ` +
    `(rates v${receipt.rateTableVersion}) ${toIsoString(receipt.timestamp)}`
  );
}

export function formatValuation(valuation: Valuation): string[] {
  const lines = valuation.lines.map(
    (line) =>
      `  ${line.currency} ${num(line.balance)} x ${rateText(line.rate)} = ${num(line.value)} ${valuation.baseCurrency}`
  );
  lines.push(
    `Total: ${num(valuation.total)} ${valuation.baseCurrency} (rates v${valuation.rateTableVersion}, as of ${toIsoString(valuation.asOf)})`
  );
  return lines;
}

export function formatSnapshot(snapshot: ValuationSnapshot): string {
  return (
    `v${snapshot.rateTableVersion} ${snapshot.total} ${snapshot.baseCurrency} ` +
    `(rates as of ${toIsoString(snapshot.asOf)}, recorded ${toIsoString(snapshot.recordedAt)})`
  );
}

function report<T>(result: Result<T, LedgerError>, out: Output, onOk: (value: T) => void): number {
  if (result.isErr()) {
    out(`Error [${result.error.kind}]: ${result.error.message}`);
    return 1;
  }
  onOk(result.value);
  return 0;
}

function reportTrade(result: Result<TradeConfirmation, LedgerError>, out: Output): number {
  return report(result, out, ({ receipt, balances, persistError }) => {
    out(formatReceipt(receipt));
    out(formatBalances(balances));
    if (persistError) {
      out(`Warning: trade applied but not saved: ${persistError.message}`);
    }
  });
}

function need(args: CliArgs, count: number, out: Output): boolean {
  if (args.positionals.length < count) {
    out(`Missing arguments for '${args.command ?? ''}'`);
    out(USAGE);
    return false;
  }
  return true;
}

/** Runs one command and returns the process exit code. */
export async function runCommand(service: LedgerService, args: CliArgs, out: Output): Promise<number> {
  if (args.flags.has('refresh') && args.command !== 'refresh') {
    const refreshed = await service.refreshRates();
    if (refreshed.isErr()) {
      out(`Warning: ${refreshed.error.message}`);
    }
  }

  const [first = '', second = '', third = ''] = args.positionals;

  switch (args.command) {
    case 'create': {
      if (!need(args, 1, out)) return 2;
      const result = await service.createPortfolio(first, {
        baseCurrency: flagValue(args, 'base'),
        seedAmount: flagValue(args, 'seed'),
      });
      return report(result, out, (portfolio) => {
        out(`Created portfolio for ${portfolio.userId} (base ${portfolio.baseCurrency})`);
        out(formatBalances(portfolio.balances()));
      });
    }

    case 'deposit':
    case 'buy':
    case 'sell': {
      if (!need(args, 3, out)) return 2;
      const command = args.command;
      const result =
        command === 'buy'
          ? await service.buy(first, second, third)
          : command === 'sell'
            ? await service.sell(first, second, third)
            : await service.deposit(first, second, third);
      return reportTrade(result, out);
    }

    case 'value': {
      if (!need(args, 1, out)) return 2;
      const result = await service.getPortfolioValue(first, flagValue(args, 'base'));
      return report(result, out, (valuation) => formatValuation(valuation).forEach(out));
    }

    case 'trades': {
      if (!need(args, 1, out)) return 2;
      const result = await service.listTrades(first);
      return report(result, out, (receipts) => {
        if (receipts.length === 0) out('No trades');
        receipts.forEach((receipt) => out(formatReceipt(receipt)));
      });
    }

    case 'history': {
      if (!need(args, 1, out)) return 2;
      const rawLimit = flagValue(args, 'limit');
      const limit = rawLimit === undefined ? DEFAULT_HISTORY_LIMIT : Number(rawLimit);
      if (!Number.isInteger(limit) || limit < 1) {
        out(`Invalid --limit '${rawLimit ?? ''}'`);
        return 2;
      }
      const result = await service.listValuations(first, limit);
      return report(result, out, (snapshots) => {
        if (snapshots.length === 0) out('No valuation history');
        snapshots.forEach((snapshot) => out(formatSnapshot(snapshot)));
      });
    }

    case 'rate': {
      if (!need(args, 2, out)) return 2;
      return report(service.getRate(first, second), out, (rate) => {
        out(
          `1 ${rate.from} = ${rateText(rate.rate)} ${rate.to} ` +
            `(1 ${rate.to} = ${rateText(rate.inverse)} ${rate.from}), updated ${toIsoString(rate.updatedAt)}`
        );
      });
    }

    case 'rates': {
      const summary = service.rateSummary();
      out(
        `Rate table v${summary.version} (base ${summary.baseCurrency}, as of ${toIsoString(summary.asOf)}, ` +
          `${summary.entryCount} entries)`
      );
      for (const entry of service.cache.current().entries.values()) {
        out(
          `  ${entry.currency} ${rateText(entry.priceInBase)} ${summary.baseCurrency} ` +
            `[${entry.source}] ${toIsoString(entry.fetchedAt)}`
        );
      }
      if (summary.version === 0) {
        out('No rates fetched yet; run `refresh`');
      }
      return 0;
    }

    case 'refresh': {
      const result = await service.refreshRates();
      return report(result, out, ({ table, persistError }) => {
        out(`Rates refreshed: v${table.version}, ${table.entries.size} entries, as of ${toIsoString(table.asOf)}`);
        if (persistError) out(`Warning: rate table not saved: ${persistError.message}`);
      });
    }

    case 'rollback': {
      const outcome = await service.rollbackRates();
      if (!outcome) {
        out('No previous rate table to roll back to');
        return 1;
      }
      out(`Rolled back: now serving v${outcome.table.version}`);
      if (outcome.persistError) out(`Warning: rate table not saved: ${outcome.persistError.message}`);
      return 0;
    }

    case 'currencies':
      SUPPORTED_CURRENCIES.forEach((code) => out(formatCurrencyInfo(code)));
      return 0;

    default:
      out(args.command ? `Unknown command '${args.command}'` : 'No command given');
      out(USAGE);
      return 2;
  }
}
