/**
 * Order-flow imbalance alerts
 *
 * Polls the best bid/ask and the latest trade for each watched symbol and fires a
 * directional alert once an imbalance condition has held for `holdSeconds`, at most
 * once per `cooldownSeconds`. A condition that fades before it is confirmed emits a
 * retraction notice instead.
 */

import type {
  Clock,
  MarketDataClient,
  Notifier,
  QuoteSnapshot,
  SignalDirection,
  SignalState,
  Sleeper,
} from '../types';
import { sleep as defaultSleep } from './alpaca';
import { errorMessage } from './errors';
import { safeSend } from './notifier';
import { SymbolStore } from './symbolStore';

/** Imbalance reported when the ask side is empty. */
export const IMBALANCE_SENTINEL = 999;

export interface ImbalanceSignalConfig {
  symbols: string[];
  imbalanceUpThreshold: number;
  imbalanceDownThreshold: number;
  maxSpread: number;
  momentumThreshold: number;
  holdSeconds: number;
  cooldownSeconds: number;
  refreshSeconds: number;
}

export interface ConditionSnapshot {
  spread: number;
  imbalance: number;
  momentum: number;
  goodUp: boolean;
  goodDown: boolean;
}

export type SignalEvent =
  | { kind: 'fire'; direction: SignalDirection; heldMs: number }
  | { kind: 'retract'; direction: SignalDirection; elapsedMs: number };

export type SymbolOutcome = 'skipped' | 'idle' | 'pending' | 'fired' | 'retracted';

export function computeImbalance(bidSize: number, askSize: number): number {
  return askSize > 0 ? bidSize / askSize : IMBALANCE_SENTINEL;
}

export function computeMomentum(price: number | null, previous: number | null): number {
  if (price === null || previous === null || previous <= 0) {
    return 0;
  }
  return price / previous - 1;
}

export function evaluateConditions(
  quote: QuoteSnapshot,
  momentum: number,
  config: Pick<ImbalanceSignalConfig, 'imbalanceUpThreshold' | 'imbalanceDownThreshold' | 'maxSpread' | 'momentumThreshold'>,
): ConditionSnapshot {
  const spread = quote.ask - quote.bid;
  const imbalance = computeImbalance(quote.bidSize, quote.askSize);
  const tightSpread = spread <= config.maxSpread;

  return {
    spread,
    imbalance,
    momentum,
    goodUp: imbalance >= config.imbalanceUpThreshold && tightSpread && momentum >= config.momentumThreshold,
    goodDown: imbalance <= config.imbalanceDownThreshold && tightSpread && momentum <= -config.momentumThreshold,
  };
}

export function initialSignalState(): SignalState {
  return {
    conditionSince: null,
    conditionDirection: null,
    lastAlertAt: null,
    lastObservedPrice: null,
  };
}

/**
 * Confirm-then-fire step. Pure: returns the next state and the event to announce.
 */
export function advanceSignal(
  state: SignalState,
  direction: SignalDirection | null,
  now: number,
  holdMs: number,
  cooldownMs: number,
): { state: SignalState; event: SignalEvent | null } {
  if (direction) {
    // a flip to the other side starts a new episode
    const since =
      state.conditionSince !== null && state.conditionDirection === direction ? state.conditionSince : now;
    const heldMs = now - since;
    const cooledDown = state.lastAlertAt === null || now - state.lastAlertAt >= cooldownMs;

    if (heldMs >= holdMs && cooledDown) {
      return {
        state: { ...state, conditionSince: null, conditionDirection: null, lastAlertAt: now },
        event: { kind: 'fire', direction, heldMs },
      };
    }
    return { state: { ...state, conditionSince: since, conditionDirection: direction }, event: null };
  }

  if (state.conditionSince !== null && state.conditionDirection !== null) {
    const elapsedMs = now - state.conditionSince;
    const cleared: SignalState = { ...state, conditionSince: null, conditionDirection: null };
    if (elapsedMs <= holdMs) {
      return { state: cleared, event: { kind: 'retract', direction: state.conditionDirection, elapsedMs } };
    }
    return { state: cleared, event: null };
  }

  return { state, event: null };
}

function formatAlert(symbol: string, direction: SignalDirection, snapshot: ConditionSnapshot, price: number | null): string {
  const header = direction === 'up' ? `🟢 ${symbol} BUY PRESSURE` : `🔴 ${symbol} SELL PRESSURE`;
  const imbalance = snapshot.imbalance >= IMBALANCE_SENTINEL ? 'ask empty' : snapshot.imbalance.toFixed(2);
  return [
    header,
    `Imbalance: ${imbalance} | Spread: ${snapshot.spread.toFixed(2)}`,
    `Momentum: ${(snapshot.momentum * 100).toFixed(3)}%`,
    `Price: ${price !== null ? price.toFixed(2) : 'n/a'}`,
  ].join('\n');
}

function formatRetraction(symbol: string, direction: SignalDirection, elapsedMs: number): string {
  const label = direction === 'up' ? 'buy' : 'sell';
  return `⚪ ${symbol} ${label} pressure faded after ${(elapsedMs / 1000).toFixed(0)}s (not confirmed)`;
}

export interface ImbalanceSignalDetectorOptions {
  now?: Clock;
  sleep?: Sleeper;
  store?: SymbolStore<SignalState>;
}

export class ImbalanceSignalDetector {
  private readonly store: SymbolStore<SignalState>;
  private readonly now: Clock;
  private readonly sleep: Sleeper;
  private running = false;

  constructor(
    private readonly marketData: MarketDataClient,
    private readonly notifier: Notifier,
    private readonly config: ImbalanceSignalConfig,
    options: ImbalanceSignalDetectorOptions = {},
  ) {
    this.store = options.store ?? new SymbolStore<SignalState>();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getState(symbol: string): SignalState | undefined {
    return this.store.get(symbol);
  }

  async evaluateSymbol(symbol: string): Promise<SymbolOutcome> {
    const quote = await this.marketData.getLatestQuote(symbol);
    if (!quote || quote.ask - quote.bid <= 0) {
      return 'skipped';
    }

    const price = await this.marketData.getLatestTrade(symbol);
    const now = this.now();

    // read-modify-write below runs without yielding
    const state = this.store.get(symbol) ?? initialSignalState();
    const snapshot = evaluateConditions(quote, computeMomentum(price, state.lastObservedPrice), this.config);
    const direction: SignalDirection | null = snapshot.goodUp ? 'up' : snapshot.goodDown ? 'down' : null;
    const step = advanceSignal(
      state,
      direction,
      now,
      this.config.holdSeconds * 1000,
      this.config.cooldownSeconds * 1000,
    );
    this.store.set(symbol, { ...step.state, lastObservedPrice: price ?? state.lastObservedPrice });

    const event = step.event;
    if (!event) {
      return step.state.conditionSince !== null ? 'pending' : 'idle';
    }

    if (event.kind === 'fire') {
      console.log(`[ImbalanceSignal] 🚨 ${symbol} ${event.direction} confirmed after ${(event.heldMs / 1000).toFixed(1)}s`);
      await safeSend(this.notifier, formatAlert(symbol, event.direction, snapshot, price));
      return 'fired';
    }

    console.log(`[ImbalanceSignal] ${symbol} ${event.direction} retracted after ${(event.elapsedMs / 1000).toFixed(1)}s`);
    await safeSend(this.notifier, formatRetraction(symbol, event.direction, event.elapsedMs));
    return 'retracted';
  }

  /**
   * Evaluates every watched symbol once. A failing symbol is logged and skipped.
   */
  async runCycle(): Promise<Record<string, SymbolOutcome>> {
    const outcomes: Record<string, SymbolOutcome> = {};
    for (const symbol of this.config.symbols) {
      try {
        outcomes[symbol] = await this.evaluateSymbol(symbol);
      } catch (err) {
        console.error(`[ImbalanceSignal] ${symbol} skipped: ${errorMessage(err)}`);
        outcomes[symbol] = 'skipped';
      }
    }
    return outcomes;
  }

  async start(): Promise<void> {
    if (this.running) {
      console.log('[ImbalanceSignal] ⚠️  Already running');
      return;
    }
    this.running = true;
    console.log(`[ImbalanceSignal] 🚀 Watching ${this.config.symbols.join(', ')} every ${this.config.refreshSeconds}s`);

    while (this.running) {
      await this.runCycle();
      await this.sleep(this.config.refreshSeconds * 1000);
    }
    console.log('[ImbalanceSignal] 🛑 Stopped');
  }

  stop(): void {
    this.running = false;
  }
}
