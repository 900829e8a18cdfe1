import { SMA } from 'technicalindicators';
import type { BarsBySymbol, Candidate, Clock, MinuteBar, Notifier, TradeSide } from '../types';
import { safeSend } from './notifier';

export interface GradeConfig {
  rsiPeriod: number;
  rsiMaxLong: number;
  rsiMinShort: number;
  movingAverageWindow: number;
  minTrendPct: number;
  minRsiBuffer: number;
}

export const MIN_BARS_FLOOR = 25;

export function requiredBarCount(config: Pick<GradeConfig, 'movingAverageWindow'>): number {
  return Math.max(config.movingAverageWindow + 2, MIN_BARS_FLOOR);
}

/**
 * RSI from a simple rolling mean of gains and losses over `period` price changes
 * (no Wilder smoothing). Returns null when there are not enough closes.
 */
export function computeSimpleRsi(closes: number[], period: number): number | null {
  if (closes.length < period + 1) {
    return null;
  }

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const avgGains = SMA.calculate({ values: gains, period });
  const avgLosses = SMA.calculate({ values: losses, period });
  const avgGain = avgGains[avgGains.length - 1];
  const avgLoss = avgLosses[avgLosses.length - 1];
  if (avgGain === undefined || avgLoss === undefined) {
    return null;
  }

  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Mean of the `window` closes before the most recent one.
 */
export function movingAverageExcludingLast(closes: number[], window: number): number | null {
  if (closes.length < window + 1) {
    return null;
  }
  const prior = closes.slice(-(window + 1), -1);
  const values = SMA.calculate({ values: prior, period: window });
  return values[values.length - 1] ?? null;
}

/**
 * Grades one symbol. Returns the A-grade candidate (long or short) or null when the
 * symbol has too few bars or does not clear both thresholds.
 */
export function gradeSymbol(symbol: string, bars: MinuteBar[], config: GradeConfig): Candidate | null {
  if (bars.length < requiredBarCount(config)) {
    return null;
  }

  const closes = bars.map(bar => bar.close);
  const closeNow = closes[closes.length - 1];
  const ma = movingAverageExcludingLast(closes, config.movingAverageWindow);
  const rsi = computeSimpleRsi(closes, config.rsiPeriod);
  if (closeNow === undefined || ma === null || ma <= 0 || rsi === null || closeNow <= 0) {
    return null;
  }

  let side: TradeSide;
  let trendPct: number;
  let rsiBuffer: number;
  if (closeNow > ma && rsi < config.rsiMaxLong) {
    side = 'long';
    trendPct = (closeNow / ma - 1) * 100;
    rsiBuffer = config.rsiMaxLong - rsi;
  } else if (closeNow < ma && rsi > config.rsiMinShort) {
    side = 'short';
    trendPct = (ma / closeNow - 1) * 100;
    rsiBuffer = rsi - config.rsiMinShort;
  } else {
    return null;
  }

  if (trendPct < config.minTrendPct || rsiBuffer < config.minRsiBuffer) {
    return null;
  }

  return {
    symbol,
    side,
    score: trendPct * 2 + rsiBuffer * 0.5,
    referencePrice: closeNow,
    rsi,
    trendPct,
    rsiBuffer,
  };
}

/**
 * Score-descending order; Array.prototype.sort is stable so ties keep encounter order.
 */
export function rankCandidates(candidates: Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}

export interface Selection {
  qualified: Candidate[];
  selected: Candidate[];
}

export function gradeAll(barsBySymbol: BarsBySymbol, symbols: string[], config: GradeConfig): Candidate[] {
  const longs: Candidate[] = [];
  const shorts: Candidate[] = [];
  for (const symbol of symbols) {
    const candidate = gradeSymbol(symbol, barsBySymbol[symbol] ?? [], config);
    if (!candidate) continue;
    (candidate.side === 'long' ? longs : shorts).push(candidate);
  }
  return [...longs, ...shorts];
}

export function selectCandidates(
  barsBySymbol: BarsBySymbol,
  symbols: string[],
  config: GradeConfig,
  count: number,
): Selection {
  const qualified = rankCandidates(gradeAll(barsBySymbol, symbols, config));
  return { qualified, selected: qualified.slice(0, count) };
}

export function describeCandidate(candidate: Candidate): string {
  const side = candidate.side === 'long' ? 'LONG' : 'SHORT';
  return `${candidate.symbol} ${side} score ${candidate.score.toFixed(2)} (trend ${candidate.trendPct.toFixed(2)}%, RSI ${candidate.rsi.toFixed(1)}) @ ${candidate.referencePrice.toFixed(2)}`;
}

/**
 * Standing radar: re-grades the watch list on every scan and announces a symbol when
 * it qualifies, at most once per `realertMinutes` per symbol.
 */
export class GradeRadar {
  private readonly lastAlertAt = new Map<string, number>();
  private readonly now: Clock;

  constructor(
    private readonly notifier: Notifier,
    private readonly config: GradeConfig & { radarRealertMinutes: number },
    options: { now?: Clock } = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  async scan(barsBySymbol: BarsBySymbol, symbols: string[]): Promise<Candidate[]> {
    const now = this.now();
    const realertMs = this.config.radarRealertMinutes * 60_000;
    const announced: Candidate[] = [];

    for (const candidate of rankCandidates(gradeAll(barsBySymbol, symbols, this.config))) {
      const last = this.lastAlertAt.get(candidate.symbol);
      if (last !== undefined && now - last < realertMs) {
        continue;
      }
      this.lastAlertAt.set(candidate.symbol, now);
      announced.push(candidate);
      console.log(`[GradeRadar] 🎯 ${describeCandidate(candidate)}`);
      await safeSend(this.notifier, `🎯 A-GRADE ${describeCandidate(candidate)}`);
    }
    return announced;
  }
}
