import type { BrokerClient, FillEvent } from '../types';
import { errorMessage } from './errors';
import type { PositionTracker } from './positionTracker';

/**
 * Single consumer for the fill feed. Events are queued (bounded) and handed to the
 * position tracker one at a time, so a create and a merge for the same symbol can
 * never interleave.
 *
 * A buy fill only opens a track when the broker reports a long position afterwards;
 * the buy that covers a short leaves the account flat.
 */
export class FillDispatcher {
  private readonly queue: FillEvent[] = [];
  private wake: (() => void) | null = null;
  private running = false;
  private loop: Promise<void> | null = null;
  private dropped = 0;
  private busy = false;

  constructor(
    private readonly tracker: PositionTracker,
    private readonly broker: BrokerClient,
    private readonly capacity = 256,
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Enqueues a fill. Returns false (and drops the event) when the queue is full.
   */
  offer(event: FillEvent): boolean {
    if (this.queue.length >= this.capacity) {
      this.dropped += 1;
      console.warn(`[FillDispatcher] ⚠️ Queue full (${this.capacity}); dropped ${event.side} fill for ${event.symbol}`);
      return false;
    }
    this.queue.push(event);
    this.wake?.();
    return true;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.consume();
  }

  /**
   * Stops after the event currently being handled; queued events are discarded.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = null;
  }

  /**
   * Resolves once every queued event has been handled.
   */
  async drain(): Promise<void> {
    while (this.running && (this.queue.length > 0 || this.busy)) {
      await this.nextTurn();
    }
  }

  async dispatch(event: FillEvent): Promise<void> {
    if (event.status !== 'filled') {
      return;
    }

    if (event.side === 'buy') {
      if (!this.tracker.isTracked(event.symbol)) {
        const position = await this.broker.getPosition(event.symbol);
        if (!position || position.side !== 'long') {
          console.log(`[FillDispatcher] ${event.symbol} buy fill left no long position; not tracking`);
          return;
        }
      }
      await this.tracker.start(event.symbol, event.filledAvgPrice, event.filledQty);
      return;
    }

    if (this.tracker.isTracked(event.symbol)) {
      await this.tracker.stopIfClosed(event.symbol);
    }
  }

  private async consume(): Promise<void> {
    while (this.running) {
      const event = this.queue.shift();
      if (!event) {
        await new Promise<void>(resolve => {
          this.wake = resolve;
        });
        this.wake = null;
        continue;
      }
      this.busy = true;
      try {
        await this.dispatch(event);
      } catch (err) {
        console.error(`[FillDispatcher] ${event.side} fill for ${event.symbol} failed: ${errorMessage(err)}`);
      } finally {
        this.busy = false;
      }
    }
  }

  private nextTurn(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
  }
}
