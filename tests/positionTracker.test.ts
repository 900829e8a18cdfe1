import { beforeEach, describe, expect, it } from 'vitest';
import { PositionTracker, formatPriceDiff, weightedEntry, type PositionTrackerConfig } from '../lib/positionTracker';
import { FakeBroker, FakeMarketData, ManualClock, RecordingNotifier, flushAsync, parkedSleep } from './fakes';

const CONFIG: PositionTrackerConfig = {
  refreshSeconds: 5,
  minMoveThreshold: 0.05,
  maxSilenceSeconds: 60,
};

describe('weightedEntry', () => {
  it('volume-weights the two fills', () => {
    expect(weightedEntry(100, 10, 200, 10)).toBe(150);
    expect(weightedEntry(100, 30, 200, 10)).toBe(125);
  });
});

describe('formatPriceDiff', () => {
  it('shows the signed delta from entry and the current price', () => {
    expect(formatPriceDiff('AAA', 100, 101)).toBe('🟢▲ AAA +1.00 vs entry 100.00\nNow: 101.00');
    expect(formatPriceDiff('AAA', 100, 99.5)).toBe('🔴▼ AAA -0.50 vs entry 100.00\nNow: 99.50');
    expect(formatPriceDiff('AAA', 100, 100)).toBe('⚪• AAA +0.00 vs entry 100.00\nNow: 100.00');
  });
});

describe('PositionTracker', () => {
  let marketData: FakeMarketData;
  let broker: FakeBroker;
  let notifier: RecordingNotifier;
  let clock: ManualClock;
  let tracker: PositionTracker;

  beforeEach(() => {
    marketData = new FakeMarketData();
    broker = new FakeBroker();
    notifier = new RecordingNotifier();
    clock = new ManualClock(0);
    tracker = new PositionTracker(marketData, broker, notifier, CONFIG, { now: clock.now, sleep: parkedSleep });
  });

  it('merges a second buy fill into a weighted entry', async () => {
    await tracker.start('AAA', 100, 10);
    await tracker.start('AAA', 200, 10);

    const track = tracker.getTrack('AAA');
    expect(track?.entryPrice).toBe(150);
    expect(track?.quantity).toBe(20);
    expect(track?.running).toBe(true);
    expect(notifier.messages).toContain('➕ AAA ADDED 10 @ 200.00\nEntry: 150.00 | Qty: 20');
  });

  it('launches a single monitor per symbol', async () => {
    await tracker.start('AAA', 100, 10);
    await tracker.start('AAA', 101, 5);
    await tracker.start('AAA', 102, 5);
    await flushAsync();

    // each monitor polls once before parking on its sleep
    expect(marketData.tradeCalls.filter(symbol => symbol === 'AAA')).toHaveLength(1);
  });

  it('ignores fills without a positive price and quantity', async () => {
    expect(await tracker.start('AAA', 0, 10)).toBeUndefined();
    expect(await tracker.start('AAA', 100, 0)).toBeUndefined();
    expect(tracker.trackedSymbols()).toEqual([]);
  });

  it('reports price moves past the threshold and after long silence', async () => {
    await tracker.start('AAA', 100, 10);
    await flushAsync();
    notifier.messages = [];

    clock.current = 1_000;
    marketData.trades.set('AAA', 101);
    expect(await tracker.pollOnce('AAA')).toBe('notified');
    expect(notifier.messages).toEqual(['🟢▲ AAA +1.00 vs entry 100.00\nNow: 101.00']);

    clock.current = 2_000;
    marketData.trades.set('AAA', 101.03);
    expect(await tracker.pollOnce('AAA')).toBe('unchanged');

    clock.current = 3_000;
    marketData.trades.set('AAA', 99.9);
    expect(await tracker.pollOnce('AAA')).toBe('notified');
    expect(notifier.messages[1]).toBe('🔴▼ AAA -0.10 vs entry 100.00\nNow: 99.90');

    clock.current = 62_999;
    marketData.trades.set('AAA', 99.91);
    expect(await tracker.pollOnce('AAA')).toBe('unchanged');

    clock.current = 63_000;
    expect(await tracker.pollOnce('AAA')).toBe('notified');
    expect(tracker.getTrack('AAA')?.lastObservedAt).toBe(63_000);
    expect(tracker.getTrack('AAA')?.lastObservedPrice).toBe(99.91);
  });

  it('skips a poll when no trade price is available', async () => {
    await tracker.start('AAA', 100, 10);
    expect(await tracker.pollOnce('AAA')).toBe('skipped');
  });

  it('keeps tracking while the broker still holds the position', async () => {
    await tracker.start('AAA', 100, 10);
    broker.positions.set('AAA', { symbol: 'AAA', qty: 5, side: 'long', avgEntryPrice: 100 });

    expect(await tracker.stopIfClosed('AAA')).toBe(false);
    expect(tracker.isTracked('AAA')).toBe(true);
  });

  it('stops tracking once the broker reports no position', async () => {
    await tracker.start('AAA', 100, 10);
    const track = tracker.getTrack('AAA');

    expect(await tracker.stopIfClosed('AAA')).toBe(true);
    expect(track?.running).toBe(false);
    expect(tracker.getTrack('AAA')).toBeUndefined();
    expect(notifier.messages).toContain('🏁 AAA position closed\nStopped tracking (entry 100.00)');
    expect(await tracker.pollOnce('AAA')).toBe('stopped');
  });

  it('lets the monitor exit at its next poll boundary after a stop', async () => {
    const wakeups: Array<() => void> = [];
    const steppedSleep = () => new Promise<void>(resolve => wakeups.push(resolve));
    const stepped = new PositionTracker(marketData, broker, notifier, CONFIG, { now: clock.now, sleep: steppedSleep });

    await stepped.start('AAA', 100, 10);
    await flushAsync();
    expect(wakeups).toHaveLength(1);

    await stepped.stopIfClosed('AAA');
    wakeups[0]();
    await flushAsync();

    expect(marketData.tradeCalls).toEqual(['AAA']);
    expect(wakeups).toHaveLength(1);
    await stepped.stopAll();
  });

  it('starts a fresh track after a closed position is bought again', async () => {
    await tracker.start('AAA', 100, 10);
    await tracker.stopIfClosed('AAA');
    await tracker.start('AAA', 120, 4);

    expect(tracker.getTrack('AAA')?.entryPrice).toBe(120);
    expect(tracker.getTrack('AAA')?.quantity).toBe(4);
  });
});
