/**
 * Daily bracket batch
 *
 * One lifecycle per exchange-local trading day:
 *
 *   idle → open-window-pending → orders-submitted → monitoring → reported
 *                              ↘ no-batch
 *
 * Inside the open window the watch list is graded and the top `openTradeCount`
 * candidates are sent as notional bracket orders. The batch is then watched until no
 * tracked symbol is still open at the broker; positions older than `maxHoldMinutes`
 * are closed at market, and the close is re-sent every `closeRetrySeconds` while the
 * broker still holds them. `no-batch` and `reported` are terminal until the next day.
 *
 * With `autoTrade` off the selection is announced and the day ends as `reported`
 * without any order.
 */

import type {
  BrokerClient,
  Candidate,
  Clock,
  LifecycleState,
  MarketDataClient,
  Notifier,
  Sleeper,
  TradeLifecycle,
  TradeSide,
} from '../types';
import { sleep as defaultSleep } from './alpaca';
import { errorMessage, errorName } from './errors';
import { describeCandidate, GradeRadar, selectCandidates, type GradeConfig } from './gradeEngine';
import { exchangeDateKey, isInOpenWindow, isMarketHours, isPastOpenWindow } from './marketClock';
import { safeSend } from './notifier';

export interface LifecycleConfig extends GradeConfig {
  symbols: string[];
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
}

export interface TradeLifecycleManagerOptions {
  now?: Clock;
  sleep?: Sleeper;
  radar?: GradeRadar | null;
}

interface SubmissionResult {
  candidate: Candidate;
  takeProfitPrice: number;
  stopLossPrice: number;
  orderId?: string;
  error?: string;
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Take-profit / stop-loss as fixed percentage offsets from the reference price,
 * mirrored for shorts.
 */
export function bracketPrices(
  side: TradeSide,
  referencePrice: number,
  takeProfitPct: number,
  stopLossPct: number,
): { takeProfitPrice: number; stopLossPrice: number } {
  const tp = takeProfitPct / 100;
  const sl = stopLossPct / 100;
  if (side === 'long') {
    return {
      takeProfitPrice: roundPrice(referencePrice * (1 + tp)),
      stopLossPrice: roundPrice(referencePrice * (1 - sl)),
    };
  }
  return {
    takeProfitPrice: roundPrice(referencePrice * (1 - tp)),
    stopLossPrice: roundPrice(referencePrice * (1 + sl)),
  };
}

function sideLabel(side: TradeSide): string {
  return side === 'long' ? 'LONG' : 'SHORT';
}

export function createLifecycle(date: string): TradeLifecycle {
  return {
    date,
    state: 'idle',
    items: [],
    batchStartTime: null,
    reportSent: false,
    closeRequestedAt: {},
  };
}

export class TradeLifecycleManager {
  private lifecycle: TradeLifecycle | null = null;
  private readonly now: Clock;
  private readonly sleep: Sleeper;
  private readonly radar: GradeRadar | null;
  private running = false;

  constructor(
    private readonly marketData: MarketDataClient,
    private readonly broker: BrokerClient,
    private readonly notifier: Notifier,
    private readonly config: LifecycleConfig,
    options: TradeLifecycleManagerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.radar = options.radar ?? null;
  }

  getLifecycle(): TradeLifecycle | null {
    return this.lifecycle;
  }

  /**
   * Advances the state machine by one cycle and returns the resulting state.
   */
  async step(): Promise<LifecycleState> {
    const now = this.now();
    const date = new Date(now);
    const lifecycle = await this.rollDay(date);

    switch (lifecycle.state) {
      case 'idle':
        if (isInOpenWindow(date, this.config.openWindowStartMinutes, this.config.openWindowMinutes)) {
          lifecycle.state = 'open-window-pending';
          console.log(`[TradeLifecycle] ⏰ Open window reached for ${lifecycle.date}`);
          await this.openBatch(lifecycle, now);
        }
        break;
      case 'open-window-pending':
        if (isInOpenWindow(date, this.config.openWindowStartMinutes, this.config.openWindowMinutes)) {
          await this.openBatch(lifecycle, now);
        } else if (isPastOpenWindow(date, this.config.openWindowStartMinutes, this.config.openWindowMinutes)) {
          lifecycle.state = 'no-batch';
          console.warn(`[TradeLifecycle] Open window for ${lifecycle.date} passed without a batch`);
          await safeSend(this.notifier, `⚠️ Open window passed without a batch for ${lifecycle.date}`);
        }
        break;
      case 'monitoring':
        await this.monitorBatch(lifecycle, now);
        break;
      default:
        break;
    }

    return lifecycle.state;
  }

  /**
   * Runs one cycle; a failure is logged and followed by the error backoff.
   * Returns false when the cycle failed.
   */
  async runCycle(): Promise<boolean> {
    try {
      await this.step();
      return true;
    } catch (err) {
      console.error(`[TradeLifecycle] ❌ Cycle failed: ${errorMessage(err)}`);
      await safeSend(this.notifier, `⚠️ ERROR: ${errorName(err)}: ${errorMessage(err)}`);
      await this.sleep(this.config.errorBackoffSeconds * 1000);
      return false;
    }
  }

  /**
   * Feeds the grade radar with a fresh bar window during market hours.
   */
  async scanRadar(): Promise<Candidate[]> {
    const now = this.now();
    if (!this.radar || !isMarketHours(new Date(now))) {
      return [];
    }
    try {
      const bars = await this.marketData.getBars(
        this.config.symbols,
        new Date(now - this.config.barLookbackMinutes * 60_000),
        new Date(now),
      );
      return await this.radar.scan(bars, this.config.symbols);
    } catch (err) {
      console.error(`[GradeRadar] Scan skipped: ${errorMessage(err)}`);
      return [];
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      console.log('[TradeLifecycle] ⚠️  Already running');
      return;
    }
    this.running = true;
    console.log(`[TradeLifecycle] 🚀 Started (poll every ${this.config.lifecyclePollSeconds}s)`);

    while (this.running) {
      await this.runCycle();
      await this.scanRadar();
      await this.sleep(this.config.lifecyclePollSeconds * 1000);
    }
    console.log('[TradeLifecycle] 🛑 Stopped');
  }

  stop(): void {
    this.running = false;
  }

  private async rollDay(date: Date): Promise<TradeLifecycle> {
    const key = exchangeDateKey(date);
    if (this.lifecycle && this.lifecycle.date === key) {
      return this.lifecycle;
    }

    const previous = this.lifecycle;
    this.lifecycle = createLifecycle(key);
    if (previous) {
      console.log(`[TradeLifecycle] 🆕 New trading day ${key} (previous ${previous.date} ended ${previous.state})`);
      await safeSend(this.notifier, `🆕 New Trading Day ${key}`);
    }
    return this.lifecycle;
  }

  private async openBatch(lifecycle: TradeLifecycle, now: number): Promise<void> {
    const bars = await this.marketData.getBars(
      this.config.symbols,
      new Date(now - this.config.barLookbackMinutes * 60_000),
      new Date(now),
    );
    const { qualified, selected } = selectCandidates(
      bars,
      this.config.symbols,
      this.config,
      this.config.openTradeCount,
    );

    if (selected.length < this.config.openTradeCount) {
      lifecycle.state = 'no-batch';
      const list = qualified.length > 0 ? qualified.map(describeCandidate).join('\n') : 'none';
      console.warn(
        `[TradeLifecycle] Only ${qualified.length}/${this.config.openTradeCount} A-grade candidates; no batch today`,
      );
      await safeSend(
        this.notifier,
        `⚠️ NO BATCH ${lifecycle.date}\nOnly ${qualified.length}/${this.config.openTradeCount} A-grade candidates:\n${list}`,
      );
      return;
    }

    if (!this.config.autoTrade) {
      await this.announceSelection(lifecycle, selected);
      return;
    }

    lifecycle.state = 'orders-submitted';
    lifecycle.items = selected.map(candidate => ({ symbol: candidate.symbol, side: candidate.side }));
    lifecycle.batchStartTime = now;

    const results: SubmissionResult[] = [];
    for (const candidate of selected) {
      const { takeProfitPrice, stopLossPrice } = bracketPrices(
        candidate.side,
        candidate.referencePrice,
        this.config.takeProfitPct,
        this.config.stopLossPct,
      );
      try {
        const handle = await this.broker.submitBracketOrder({
          symbol: candidate.symbol,
          notional: this.config.notionalUsd,
          side: candidate.side,
          takeProfitPrice,
          stopLossPrice,
          timeInForce: 'day',
        });
        console.log(`[TradeLifecycle] ✅ ${candidate.symbol} ${sideLabel(candidate.side)} bracket submitted (${handle.id})`);
        results.push({ candidate, takeProfitPrice, stopLossPrice, orderId: handle.id });
      } catch (err) {
        console.error(`[TradeLifecycle] ❌ ${candidate.symbol} bracket failed: ${errorMessage(err)}`);
        results.push({ candidate, takeProfitPrice, stopLossPrice, error: errorMessage(err) });
      }
    }

    lifecycle.state = 'monitoring';
    await safeSend(this.notifier, this.formatBatchSummary(lifecycle.date, results));
  }

  private async monitorBatch(lifecycle: TradeLifecycle, now: number): Promise<void> {
    const openSymbols = await this.broker.getOpenPositionSymbols();
    const stillOpen = lifecycle.items.map(item => item.symbol).filter(symbol => openSymbols.has(symbol));

    if (stillOpen.length === 0) {
      await this.report(lifecycle);
      return;
    }

    const heldMs = lifecycle.batchStartTime === null ? 0 : now - lifecycle.batchStartTime;
    if (heldMs < this.config.maxHoldMinutes * 60_000) {
      return;
    }

    const retryMs = this.config.closeRetrySeconds * 1000;
    for (const symbol of stillOpen) {
      const requestedAt = lifecycle.closeRequestedAt[symbol];
      if (requestedAt !== undefined && now - requestedAt < retryMs) {
        continue;
      }
      try {
        await this.broker.closePositionMarket(symbol);
        lifecycle.closeRequestedAt[symbol] = now;
        if (requestedAt === undefined) {
          console.log(`[TradeLifecycle] ⏱️ ${symbol} force-closed after ${this.config.maxHoldMinutes}m`);
          await safeSend(this.notifier, `⏱️ MAX HOLD ${symbol}\nClosed at market after ${this.config.maxHoldMinutes}m`);
        } else {
          console.warn(`[TradeLifecycle] ⏱️ ${symbol} still open; close re-sent`);
          await safeSend(this.notifier, `⏱️ MAX HOLD ${symbol}\nStill open, close re-sent`);
        }
      } catch (err) {
        console.error(`[TradeLifecycle] ❌ ${symbol} force-close failed, retrying next cycle: ${errorMessage(err)}`);
      }
    }
  }

  private async announceSelection(lifecycle: TradeLifecycle, selected: Candidate[]): Promise<void> {
    lifecycle.state = 'reported';
    lifecycle.reportSent = true;
    console.log(`[TradeLifecycle] Auto-trade off; announced ${selected.length} candidates for ${lifecycle.date}`);
    await safeSend(
      this.notifier,
      [`👀 ALERT-ONLY ${lifecycle.date} (auto-trade off)`, ...selected.map(describeCandidate)].join('\n'),
    );
  }

  private async report(lifecycle: TradeLifecycle): Promise<void> {
    const lines = lifecycle.items.map(item => `${item.symbol} ${sideLabel(item.side)} — closed`);
    lifecycle.items = [];
    lifecycle.reportSent = true;
    lifecycle.state = 'reported';
    console.log(`[TradeLifecycle] 📋 Batch for ${lifecycle.date} complete`);
    await safeSend(this.notifier, [`📋 DAILY REPORT ${lifecycle.date}`, ...lines].join('\n'));
  }

  private formatBatchSummary(date: string, results: SubmissionResult[]): string {
    const lines = results.map(result => {
      const { candidate } = result;
      const head = `${candidate.symbol} ${sideLabel(candidate.side)} @ ${candidate.referencePrice.toFixed(2)}`;
      if (result.error) {
        return `❌ ${head} failed: ${result.error}`;
      }
      return `✅ ${head} TP ${result.takeProfitPrice.toFixed(2)} SL ${result.stopLossPrice.toFixed(2)}`;
    });
    const submitted = results.filter(result => !result.error).length;
    return [
      `🚀 BATCH ${date} (${submitted}/${results.length} submitted, $${this.config.notionalUsd} each)`,
      ...lines,
    ].join('\n');
  }
}
