export type TradeSide = 'long' | 'short';

export type SignalDirection = 'up' | 'down';

export interface QuoteSnapshot {
  bid: number;
  ask: number;
  bidSize: number;
  askSize: number;
}

export interface MinuteBar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type BarsBySymbol = Record<string, MinuteBar[]>;

export interface SignalState {
  conditionSince: number | null;
  conditionDirection: SignalDirection | null;
  lastAlertAt: number | null;
  lastObservedPrice: number | null;
}

export interface PositionTrack {
  symbol: string;
  entryPrice: number;
  quantity: number;
  lastObservedPrice: number | null;
  lastObservedAt: number;
  running: boolean;
}

export interface Candidate {
  symbol: string;
  side: TradeSide;
  score: number;
  referencePrice: number;
  rsi: number;
  trendPct: number;
  rsiBuffer: number;
}

export interface LifecycleItem {
  symbol: string;
  side: TradeSide;
}

export type LifecycleState =
  | 'idle'
  | 'open-window-pending'
  | 'orders-submitted'
  | 'no-batch'
  | 'monitoring'
  | 'reported';

export interface TradeLifecycle {
  date: string;
  state: LifecycleState;
  items: LifecycleItem[];
  batchStartTime: number | null;
  reportSent: boolean;
  /** Time of the latest market-close request per symbol. */
  closeRequestedAt: Record<string, number>;
}

export interface BrokerPosition {
  symbol: string;
  qty: number;
  side: TradeSide;
  avgEntryPrice: number;
}

export type TimeInForce = 'day' | 'gtc';

export interface BracketOrderRequest {
  symbol: string;
  notional: number;
  side: TradeSide;
  takeProfitPrice: number;
  stopLossPrice: number;
  timeInForce: TimeInForce;
}

export interface OrderHandle {
  id: string;
  symbol: string;
  status: string;
}

export interface FillEvent {
  symbol: string;
  side: 'buy' | 'sell';
  status: string;
  filledAvgPrice: number;
  filledQty: number;
}

export interface MarketDataClient {
  getLatestTrade(symbol: string): Promise<number | null>;
  getLatestQuote(symbol: string): Promise<QuoteSnapshot | null>;
  getBars(symbols: string[], start: Date, end: Date): Promise<BarsBySymbol>;
}

export interface BrokerClient {
  submitBracketOrder(request: BracketOrderRequest): Promise<OrderHandle>;
  getOpenPositionSymbols(): Promise<Set<string>>;
  getPosition(symbol: string): Promise<BrokerPosition | null>;
  closePositionMarket(symbol: string): Promise<void>;
}

export interface Notifier {
  send(text: string): Promise<void>;
}

export type Clock = () => number;

export type Sleeper = (ms: number) => Promise<void>;
