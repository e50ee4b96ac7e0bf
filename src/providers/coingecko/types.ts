/**
 * CoinGecko `/simple/price` response: { bitcoin: { usd: 64000.12 }, ... }
 */

export type CoinGeckoSimplePrice = Record<string, Record<string, number | undefined> | undefined>;
