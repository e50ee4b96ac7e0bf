/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export interface EnvConfig {
  exchangeRateApiKey: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pick<T extends string>(allowed: readonly T[], raw: string | undefined, fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const nodeEnv = pick(NODE_ENVS, getEnvVar('NODE_ENV'), 'development');
  return {
    exchangeRateApiKey: getEnvVar('EXCHANGERATE_API_KEY') ?? null,
    // Tests stay quiet unless LOG_LEVEL asks otherwise
    logLevel: pick(LOG_LEVELS, getEnvVar('LOG_LEVEL'), nodeEnv === 'test' ? 'silent' : 'info'),
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}

export function requireExchangeRateApiKey(env: EnvConfig = getEnvConfig()): string {
  if (!env.exchangeRateApiKey) {
    throw new Error('Missing required environment variable: EXCHANGERATE_API_KEY');
  }
  return env.exchangeRateApiKey;
}
