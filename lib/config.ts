import 'dotenv/config';
import { ConfigurationError } from './errors';

export interface BotConfig {
  symbols: string[];

  // Order-flow imbalance alerts
  imbalanceUpThreshold: number;
  imbalanceDownThreshold: number;
  maxSpread: number;
  momentumThreshold: number;
  holdSeconds: number;
  cooldownSeconds: number;
  refreshSeconds: number;

  // Position price-follow
  minMoveThreshold: number;
  maxSilenceSeconds: number;
  fillQueueCapacity: number;

  // Grading
  rsiPeriod: number;
  rsiMaxLong: number;
  rsiMinShort: number;
  movingAverageWindow: number;
  minTrendPct: number;
  minRsiBuffer: number;
  radarEnabled: boolean;
  radarRealertMinutes: number;

  // Daily batch
  autoTrade: boolean;
  notionalUsd: number;
  openTradeCount: number;
  takeProfitPct: number;
  stopLossPct: number;
  maxHoldMinutes: number;
  closeRetrySeconds: number;
  barLookbackMinutes: number;
  openWindowStartMinutes: number;
  openWindowMinutes: number;
  lifecyclePollSeconds: number;
  errorBackoffSeconds: number;

  healthPort: number;
}

export interface Credentials {
  alpacaKeyId: string;
  alpacaSecretKey: string;
  tradingBaseUrl: string;
  dataBaseUrl: string;
  dataFeed: string;
  telegramBotToken: string | null;
  telegramChatId: string | null;
}

export const DEFAULT_SYMBOLS = ['TSLA', 'NVDA', 'AAPL', 'MSFT', 'AMZN', 'META', 'GOOGL', 'AMD'];

export const DEFAULT_CONFIG: BotConfig = {
  symbols: DEFAULT_SYMBOLS,
  imbalanceUpThreshold: 2.0,
  imbalanceDownThreshold: 0.5,
  maxSpread: 0.05,
  momentumThreshold: 0.0005,
  holdSeconds: 10,
  cooldownSeconds: 300,
  refreshSeconds: 5,
  minMoveThreshold: 0.05,
  maxSilenceSeconds: 60,
  fillQueueCapacity: 256,
  rsiPeriod: 14,
  rsiMaxLong: 62,
  rsiMinShort: 38,
  movingAverageWindow: 20,
  minTrendPct: 0.2,
  minRsiBuffer: 4,
  radarEnabled: true,
  radarRealertMinutes: 15,
  autoTrade: true,
  notionalUsd: 25_000,
  openTradeCount: 3,
  takeProfitPct: 0.5,
  stopLossPct: 0.3,
  maxHoldMinutes: 60,
  closeRetrySeconds: 120,
  barLookbackMinutes: 90,
  openWindowStartMinutes: 1,
  openWindowMinutes: 5,
  lifecyclePollSeconds: 30,
  errorBackoffSeconds: 10,
  healthPort: 8080,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(key, `${key} must be a number (got "${raw}")`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', 'on', '1', 'yes'].includes(normalized)) return true;
  if (['false', 'off', '0', 'no'].includes(normalized)) return false;
  throw new ConfigurationError(key, `${key} must be a boolean (got "${raw}")`);
}

function readSymbols(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const symbols = raw
    .split(',')
    .map(s => s.trim().toUpperCase())
    .filter(Boolean);
  if (symbols.length === 0) {
    throw new ConfigurationError(key, `${key} must list at least one symbol`);
  }
  return Array.from(new Set(symbols));
}

function requireString(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(key, `Missing env var: ${key}`);
  }
  return value;
}

function optionalString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

/**
 * Reads every tunable from `BOT_*` environment variables, falling back to
 * {@link DEFAULT_CONFIG}.
 */
export function loadConfig(env: Env = process.env): BotConfig {
  const d = DEFAULT_CONFIG;
  const config: BotConfig = {
    symbols: readSymbols(env, 'BOT_SYMBOLS', d.symbols),
    imbalanceUpThreshold: readNumber(env, 'BOT_IMBALANCE_UP', d.imbalanceUpThreshold),
    imbalanceDownThreshold: readNumber(env, 'BOT_IMBALANCE_DOWN', d.imbalanceDownThreshold),
    maxSpread: readNumber(env, 'BOT_MAX_SPREAD', d.maxSpread),
    momentumThreshold: readNumber(env, 'BOT_MOMENTUM_THRESHOLD', d.momentumThreshold),
    holdSeconds: readNumber(env, 'BOT_HOLD_SECONDS', d.holdSeconds),
    cooldownSeconds: readNumber(env, 'BOT_COOLDOWN_SECONDS', d.cooldownSeconds),
    refreshSeconds: readNumber(env, 'BOT_REFRESH_SECONDS', d.refreshSeconds),
    minMoveThreshold: readNumber(env, 'BOT_MIN_MOVE', d.minMoveThreshold),
    maxSilenceSeconds: readNumber(env, 'BOT_MAX_SILENCE_SECONDS', d.maxSilenceSeconds),
    fillQueueCapacity: readNumber(env, 'BOT_FILL_QUEUE_CAPACITY', d.fillQueueCapacity),
    rsiPeriod: readNumber(env, 'BOT_RSI_PERIOD', d.rsiPeriod),
    rsiMaxLong: readNumber(env, 'BOT_RSI_MAX_LONG', d.rsiMaxLong),
    rsiMinShort: readNumber(env, 'BOT_RSI_MIN_SHORT', d.rsiMinShort),
    movingAverageWindow: readNumber(env, 'BOT_MA_WINDOW', d.movingAverageWindow),
    minTrendPct: readNumber(env, 'BOT_MIN_TREND_PCT', d.minTrendPct),
    minRsiBuffer: readNumber(env, 'BOT_MIN_RSI_BUFFER', d.minRsiBuffer),
    radarEnabled: readBoolean(env, 'BOT_RADAR_ENABLED', d.radarEnabled),
    radarRealertMinutes: readNumber(env, 'BOT_RADAR_REALERT_MINUTES', d.radarRealertMinutes),
    autoTrade: readBoolean(env, 'BOT_AUTO_TRADE', d.autoTrade),
    notionalUsd: readNumber(env, 'BOT_NOTIONAL_USD', d.notionalUsd),
    openTradeCount: readNumber(env, 'BOT_OPEN_TRADE_COUNT', d.openTradeCount),
    takeProfitPct: readNumber(env, 'BOT_TAKE_PROFIT_PCT', d.takeProfitPct),
    stopLossPct: readNumber(env, 'BOT_STOP_LOSS_PCT', d.stopLossPct),
    maxHoldMinutes: readNumber(env, 'BOT_MAX_HOLD_MINUTES', d.maxHoldMinutes),
    closeRetrySeconds: readNumber(env, 'BOT_CLOSE_RETRY_SECONDS', d.closeRetrySeconds),
    barLookbackMinutes: readNumber(env, 'BOT_BAR_LOOKBACK_MINUTES', d.barLookbackMinutes),
    openWindowStartMinutes: readNumber(env, 'BOT_OPEN_WINDOW_START_MINUTES', d.openWindowStartMinutes),
    openWindowMinutes: readNumber(env, 'BOT_OPEN_WINDOW_MINUTES', d.openWindowMinutes),
    lifecyclePollSeconds: readNumber(env, 'BOT_LIFECYCLE_POLL_SECONDS', d.lifecyclePollSeconds),
    errorBackoffSeconds: readNumber(env, 'BOT_ERROR_BACKOFF_SECONDS', d.errorBackoffSeconds),
    healthPort: readNumber(env, 'PORT', d.healthPort),
  };

  if (!Number.isInteger(config.openTradeCount) || config.openTradeCount < 1) {
    throw new ConfigurationError('BOT_OPEN_TRADE_COUNT', 'BOT_OPEN_TRADE_COUNT must be a positive integer');
  }
  if (!Number.isInteger(config.rsiPeriod) || config.rsiPeriod < 2) {
    throw new ConfigurationError('BOT_RSI_PERIOD', 'BOT_RSI_PERIOD must be an integer >= 2');
  }
  if (!Number.isInteger(config.movingAverageWindow) || config.movingAverageWindow < 1) {
    throw new ConfigurationError('BOT_MA_WINDOW', 'BOT_MA_WINDOW must be a positive integer');
  }
  if (config.fillQueueCapacity < 1) {
    throw new ConfigurationError('BOT_FILL_QUEUE_CAPACITY', 'BOT_FILL_QUEUE_CAPACITY must be >= 1');
  }

  return config;
}

export function loadCredentials(env: Env = process.env): Credentials {
  return {
    alpacaKeyId: requireString(env, 'APCA_API_KEY_ID'),
    alpacaSecretKey: requireString(env, 'APCA_API_SECRET_KEY'),
    tradingBaseUrl: (optionalString(env, 'APCA_API_BASE_URL') ?? 'https://paper-api.alpaca.markets').replace(/\/$/, ''),
    dataBaseUrl: (optionalString(env, 'APCA_DATA_URL') ?? 'https://data.alpaca.markets').replace(/\/$/, ''),
    dataFeed: optionalString(env, 'APCA_DATA_FEED') ?? 'iex',
    telegramBotToken: optionalString(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: optionalString(env, 'TELEGRAM_CHAT_ID'),
  };
}
