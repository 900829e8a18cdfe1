import type { BrokerClient, Clock, MarketDataClient, Notifier, PositionTrack, Sleeper } from '../types';
import { sleep as defaultSleep } from './alpaca';
import { errorMessage } from './errors';
import { safeSend } from './notifier';
import { SymbolStore } from './symbolStore';

export interface PositionTrackerConfig {
  refreshSeconds: number;
  minMoveThreshold: number;
  maxSilenceSeconds: number;
}

export interface PositionTrackerOptions {
  now?: Clock;
  sleep?: Sleeper;
  store?: SymbolStore<PositionTrack>;
}

export type PollOutcome = 'stopped' | 'skipped' | 'unchanged' | 'notified';

export function weightedEntry(oldEntry: number, oldQty: number, fillPrice: number, fillQty: number): number {
  return (oldEntry * oldQty + fillPrice * fillQty) / (oldQty + fillQty);
}

export function formatPriceDiff(symbol: string, entryPrice: number, price: number): string {
  const delta = price - entryPrice;
  const glyph = delta > 0 ? '🟢▲' : delta < 0 ? '🔴▼' : '⚪•';
  const signed = `${delta >= 0 ? '+' : ''}${delta.toFixed(2)}`;
  return `${glyph} ${symbol} ${signed} vs entry ${entryPrice.toFixed(2)}\nNow: ${price.toFixed(2)}`;
}

/**
 * Tracks the volume-weighted entry of each bought symbol and follows its price
 * until the broker reports the position gone. One monitor loop runs per tracked
 * symbol; it exits at its next poll once the track stops running.
 */
export class PositionTracker {
  private readonly store: SymbolStore<PositionTrack>;
  private readonly monitors = new Map<string, Promise<void>>();
  private readonly now: Clock;
  private readonly sleep: Sleeper;

  constructor(
    private readonly marketData: MarketDataClient,
    private readonly broker: BrokerClient,
    private readonly notifier: Notifier,
    private readonly config: PositionTrackerConfig,
    options: PositionTrackerOptions = {},
  ) {
    this.store = options.store ?? new SymbolStore<PositionTrack>();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getTrack(symbol: string): PositionTrack | undefined {
    return this.store.get(symbol);
  }

  isTracked(symbol: string): boolean {
    return this.store.get(symbol)?.running === true;
  }

  trackedSymbols(): string[] {
    return this.store.symbols();
  }

  async start(symbol: string, fillPrice: number, fillQty: number): Promise<PositionTrack | undefined> {
    if (!(fillPrice > 0) || !(fillQty > 0)) {
      console.warn(`[PositionTracker] Ignoring fill for ${symbol} with price=${fillPrice} qty=${fillQty}`);
      return this.store.get(symbol);
    }

    const existing = this.store.get(symbol);
    if (existing?.running) {
      const merged = this.store.update(symbol, current => {
        if (!current) return current;
        current.entryPrice = weightedEntry(current.entryPrice, current.quantity, fillPrice, fillQty);
        current.quantity += fillQty;
        return current;
      });
      if (merged) {
        console.log(`[PositionTracker] ${symbol} merged fill ${fillQty}@${fillPrice} → entry ${merged.entryPrice.toFixed(4)} qty ${merged.quantity}`);
        await safeSend(
          this.notifier,
          `➕ ${symbol} ADDED ${fillQty} @ ${fillPrice.toFixed(2)}\nEntry: ${merged.entryPrice.toFixed(2)} | Qty: ${merged.quantity}`,
        );
      }
      return merged;
    }

    const track: PositionTrack = {
      symbol,
      entryPrice: fillPrice,
      quantity: fillQty,
      lastObservedPrice: null,
      lastObservedAt: this.now(),
      running: true,
    };
    this.store.set(symbol, track);
    this.launchMonitor(track);

    console.log(`[PositionTracker] 📍 Tracking ${symbol} entry ${fillPrice} qty ${fillQty}`);
    await safeSend(this.notifier, `📍 TRACKING ${symbol}\nEntry: ${fillPrice.toFixed(2)} | Qty: ${fillQty}`);
    return track;
  }

  /**
   * One price-follow step for a tracked symbol.
   */
  async pollOnce(symbol: string): Promise<PollOutcome> {
    const track = this.store.get(symbol);
    if (!track || !track.running) {
      return 'stopped';
    }
    return this.pollTrack(track);
  }

  /**
   * Stops tracking `symbol` when the broker no longer holds a position in it.
   * Returns true when the track was stopped.
   */
  async stopIfClosed(symbol: string): Promise<boolean> {
    const track = this.store.get(symbol);
    if (!track) {
      return false;
    }

    const position = await this.broker.getPosition(symbol);
    if (position) {
      console.log(`[PositionTracker] ${symbol} still open at broker (qty ${position.qty}); keep tracking`);
      return false;
    }

    track.running = false;
    if (this.store.get(symbol) === track) {
      this.store.delete(symbol);
    }
    console.log(`[PositionTracker] 🏁 ${symbol} closed; stopped tracking`);
    await safeSend(this.notifier, `🏁 ${symbol} position closed\nStopped tracking (entry ${track.entryPrice.toFixed(2)})`);
    return true;
  }

  /**
   * Stops every monitor and waits for the loops to exit.
   */
  async stopAll(): Promise<void> {
    for (const symbol of this.store.symbols()) {
      const track = this.store.get(symbol);
      if (track) track.running = false;
    }
    this.store.clear();
    await Promise.allSettled(Array.from(this.monitors.values()));
  }

  private launchMonitor(track: PositionTrack): void {
    const task: Promise<void> = this.monitor(track)
      .catch(err => {
        console.error(`[PositionTracker] Monitor for ${track.symbol} crashed: ${errorMessage(err)}`);
      })
      .finally(() => {
        if (this.monitors.get(track.symbol) === task) {
          this.monitors.delete(track.symbol);
        }
      });
    this.monitors.set(track.symbol, task);
  }

  private async monitor(track: PositionTrack): Promise<void> {
    while (track.running) {
      try {
        await this.pollTrack(track);
      } catch (err) {
        console.warn(`[PositionTracker] ${track.symbol} price poll failed, retrying: ${errorMessage(err)}`);
      }
      await this.sleep(this.config.refreshSeconds * 1000);
    }
  }

  private async pollTrack(track: PositionTrack): Promise<PollOutcome> {
    const price = await this.marketData.getLatestTrade(track.symbol);
    if (!track.running) {
      return 'stopped';
    }
    if (price === null) {
      return 'skipped';
    }

    const now = this.now();
    const moved =
      track.lastObservedPrice === null || Math.abs(price - track.lastObservedPrice) >= this.config.minMoveThreshold;
    const silent = now - track.lastObservedAt >= this.config.maxSilenceSeconds * 1000;
    if (!moved && !silent) {
      return 'unchanged';
    }

    track.lastObservedPrice = price;
    track.lastObservedAt = now;
    await safeSend(this.notifier, formatPriceDiff(track.symbol, track.entryPrice, price));
    return 'notified';
  }
}
