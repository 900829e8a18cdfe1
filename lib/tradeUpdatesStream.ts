import WebSocket from 'ws';
import { EventEmitter } from 'events';
import type { FillEvent } from '../types';
import type { Credentials } from './config';
import { errorMessage } from './errors';

/**
 * Alpaca trading stream client (`trade_updates`).
 * Emits `fill` with a {@link FillEvent} for every fill / partial_fill update.
 */

interface StreamEnvelope {
  stream: string | null;
  data: Record<string, unknown> | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

/** Alpaca sends fill price and quantity as decimal strings. */
function numericField(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

function readEnvelope(message: unknown): StreamEnvelope | null {
  if (!isRecord(message)) {
    return null;
  }
  const data = message.data;
  return { stream: stringField(message, 'stream'), data: isRecord(data) ? data : null };
}

/**
 * Converts one decoded stream message into a fill event, or null when the message is
 * not an order update carrying a fill.
 */
export function parseTradeUpdate(message: unknown): FillEvent | null {
  const envelope = readEnvelope(message);
  if (!envelope || envelope.stream !== 'trade_updates' || !envelope.data) {
    return null;
  }
  const event = stringField(envelope.data, 'event');
  const order = envelope.data.order;
  if ((event !== 'fill' && event !== 'partial_fill') || !isRecord(order)) {
    return null;
  }
  const symbol = stringField(order, 'symbol');
  const side = stringField(order, 'side');
  if (!symbol || (side !== 'buy' && side !== 'sell')) {
    return null;
  }

  const filledAvgPrice = numericField(order, 'filled_avg_price');
  const filledQty = numericField(order, 'filled_qty');
  if (!Number.isFinite(filledAvgPrice) || !Number.isFinite(filledQty)) {
    return null;
  }

  return {
    symbol,
    side,
    status: stringField(order, 'status') ?? event,
    filledAvgPrice,
    filledQty,
  };
}

export interface TradeUpdatesStreamConfig {
  credentials: Pick<Credentials, 'alpacaKeyId' | 'alpacaSecretKey' | 'tradingBaseUrl'>;
  wsUrl?: string;
  /** Delay before reconnect attempt n is n times this value. */
  reconnectDelayMs?: number;
  maxReconnectAttempts?: number;
}

export class TradeUpdatesStream extends EventEmitter {
  private ws: WebSocket | null = null;
  private readonly wsUrl: string;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectDelay: number;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private isShuttingDown = false;

  constructor(private readonly config: TradeUpdatesStreamConfig) {
    super();
    this.wsUrl = config.wsUrl ?? `${config.credentials.tradingBaseUrl.replace(/^http/, 'ws')}/stream`;
    this.reconnectDelay = config.reconnectDelayMs ?? 5000;
    this.maxReconnectAttempts = config.maxReconnectAttempts ?? 10;
  }

  onFill(listener: (event: FillEvent) => void): () => void {
    this.on('fill', listener);
    return () => this.off('fill', listener);
  }

  /**
   * Called once the reconnect attempts are used up; the stream stays down after that.
   */
  onReconnectFailed(listener: (attempts: number) => void): () => void {
    this.on('reconnect_failed', listener);
    return () => this.off('reconnect_failed', listener);
  }

  connect(): void {
    if (this.ws) {
      console.log('[TradeUpdates] Already connected');
      return;
    }
    this.isShuttingDown = false;

    console.log(`[TradeUpdates] Connecting to ${this.wsUrl}...`);
    const ws = new WebSocket(this.wsUrl);
    this.ws = ws;

    ws.on('open', () => {
      console.log('[TradeUpdates] Connected; authenticating');
      ws.send(
        JSON.stringify({
          action: 'auth',
          key: this.config.credentials.alpacaKeyId,
          secret: this.config.credentials.alpacaSecretKey,
        }),
      );
    });

    ws.on('message', (data: WebSocket.RawData) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch (err) {
        console.error('[TradeUpdates] Failed to parse message:', errorMessage(err));
        return;
      }
      this.handleMessage(ws, message);
    });

    ws.on('error', (error: Error) => {
      console.error('[TradeUpdates] Error:', error.message);
    });

    ws.on('close', () => {
      console.log('[TradeUpdates] Connection closed');
      if (this.ws !== ws) {
        return;
      }
      this.ws = null;
      if (!this.isShuttingDown) {
        this.attemptReconnect();
      }
    });
  }

  close(): void {
    this.isShuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
    this.removeAllListeners('fill');
    this.removeAllListeners('reconnect_failed');
  }

  private handleMessage(ws: WebSocket, message: unknown): void {
    const envelope = readEnvelope(message);
    if (!envelope) {
      return;
    }

    if (envelope.stream === 'authorization') {
      if (envelope.data && stringField(envelope.data, 'status') === 'authorized') {
        console.log('[TradeUpdates] ✅ Authorized; listening for trade_updates');
        this.reconnectAttempts = 0;
        ws.send(JSON.stringify({ action: 'listen', data: { streams: ['trade_updates'] } }));
      } else {
        console.error('[TradeUpdates] ❌ Authorization rejected');
      }
      return;
    }

    if (envelope.stream === 'listening') {
      const streams = envelope.data?.streams;
      console.log(`[TradeUpdates] Listening: ${Array.isArray(streams) ? streams.join(', ') : ''}`);
      return;
    }

    const fill = parseTradeUpdate(message);
    if (fill) {
      this.emit('fill', fill);
    }
  }

  private attemptReconnect(): void {
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error('[TradeUpdates] Max reconnect attempts reached');
      this.emit('reconnect_failed', this.reconnectAttempts);
      return;
    }

    this.reconnectAttempts++;
    const delay = this.reconnectDelay * this.reconnectAttempts;
    console.log(`[TradeUpdates] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }
}
