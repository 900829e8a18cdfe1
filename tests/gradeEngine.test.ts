import { describe, expect, it } from 'vitest';
import {
  GradeRadar,
  computeSimpleRsi,
  gradeSymbol,
  movingAverageExcludingLast,
  rankCandidates,
  requiredBarCount,
  selectCandidates,
  type GradeConfig,
} from '../lib/gradeEngine';
import type { Candidate } from '../types';
import { ManualClock, RecordingNotifier, barsFromCloses, fallingCloses, risingCloses } from './fakes';

const CONFIG: GradeConfig = {
  rsiPeriod: 14,
  rsiMaxLong: 62,
  rsiMinShort: 38,
  movingAverageWindow: 20,
  minTrendPct: 0.2,
  minRsiBuffer: 4,
};

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function candidate(symbol: string, score: number): Candidate {
  return { symbol, side: 'long', score, referencePrice: 100, rsi: 50, trendPct: 0.3, rsiBuffer: 12 };
}

describe('computeSimpleRsi', () => {
  it('is 50 when gains and losses balance', () => {
    expect(computeSimpleRsi([1, 2, 1, 2, 1], 4)).toBe(50);
  });

  it('uses a plain mean of the last period changes', () => {
    // last three changes: +1, -1, -1 → avg gain 1/3, avg loss 2/3
    expect(computeSimpleRsi([10, 11, 12, 13, 12, 11], 3)).toBeCloseTo(100 / 3, 8);
  });

  it('is 100 for a strictly rising series and 50 for a flat one', () => {
    expect(computeSimpleRsi([1, 2, 3, 4, 5], 4)).toBe(100);
    expect(computeSimpleRsi([5, 5, 5, 5, 5], 4)).toBe(50);
  });

  it('needs period + 1 closes', () => {
    expect(computeSimpleRsi([1, 2, 3, 4], 4)).toBeNull();
  });
});

describe('movingAverageExcludingLast', () => {
  it('averages the window before the latest close', () => {
    expect(movingAverageExcludingLast([1, 2, 3, 4, 100], 4)).toBe(2.5);
  });

  it('needs window + 1 closes', () => {
    expect(movingAverageExcludingLast([1, 2, 3, 4], 4)).toBeNull();
  });
});

describe('gradeSymbol', () => {
  it('requires at least max(window + 2, 25) bars', () => {
    expect(requiredBarCount({ movingAverageWindow: 20 })).toBe(25);
    expect(requiredBarCount({ movingAverageWindow: 30 })).toBe(32);
    expect(gradeSymbol('AAA', barsFromCloses(risingCloses().slice(-24)), CONFIG)).toBeNull();
  });

  it('grades a steady 0.5% climb with neutral RSI as a long', () => {
    const closes = risingCloses();
    const closeNow = closes[closes.length - 1];
    const ma = mean(closes.slice(-21, -1));
    const trendPct = (closeNow / ma - 1) * 100;

    const result = gradeSymbol('AAA', barsFromCloses(closes), CONFIG);

    expect(result?.side).toBe('long');
    expect(result?.rsi).toBeCloseTo(50, 6);
    expect(result?.trendPct).toBeCloseTo(trendPct, 8);
    expect(result?.rsiBuffer).toBeCloseTo(12, 6);
    expect(result?.score).toBeCloseTo(trendPct * 2 + 12 * 0.5, 6);
    expect(result?.referencePrice).toBe(closeNow);
  });

  it('grades the mirrored decline as a short', () => {
    const closes = fallingCloses();
    const closeNow = closes[closes.length - 1];
    const ma = mean(closes.slice(-21, -1));
    const trendPct = (ma / closeNow - 1) * 100;

    const result = gradeSymbol('BBB', barsFromCloses(closes), CONFIG);

    expect(result?.side).toBe('short');
    expect(result?.trendPct).toBeCloseTo(trendPct, 8);
    expect(result?.rsiBuffer).toBeCloseTo(12, 6);
    expect(result?.score).toBeCloseTo(trendPct * 2 + 12 * 0.5, 6);
  });

  it('rejects a long whose RSI buffer is too thin', () => {
    expect(gradeSymbol('AAA', barsFromCloses(risingCloses()), { ...CONFIG, rsiMaxLong: 53 })).toBeNull();
  });

  it('rejects a long whose trend is too weak', () => {
    expect(gradeSymbol('AAA', barsFromCloses(risingCloses()), { ...CONFIG, minTrendPct: 0.3 })).toBeNull();
  });

  it('rejects a flat series', () => {
    expect(gradeSymbol('AAA', barsFromCloses(new Array(30).fill(100)), CONFIG)).toBeNull();
  });
});

describe('rankCandidates', () => {
  it('returns the top three of five strictly descending', () => {
    const pool = [candidate('A', 3), candidate('B', 9), candidate('C', 1), candidate('D', 7), candidate('E', 5)];
    const top = rankCandidates(pool).slice(0, 3);

    expect(top.map(c => c.symbol)).toEqual(['B', 'D', 'E']);
    expect(top[0].score).toBeGreaterThan(top[1].score);
    expect(top[1].score).toBeGreaterThan(top[2].score);
  });

  it('keeps encounter order on ties', () => {
    const pool = [candidate('A', 2), candidate('B', 5), candidate('C', 2), candidate('D', 5)];
    expect(rankCandidates(pool).map(c => c.symbol)).toEqual(['B', 'D', 'A', 'C']);
  });
});

describe('selectCandidates', () => {
  it('pools longs and shorts and keeps the requested count', () => {
    const bars = {
      AAA: barsFromCloses(risingCloses()),
      BBB: barsFromCloses(fallingCloses()),
      CCC: barsFromCloses(new Array(30).fill(100)),
      DDD: barsFromCloses(risingCloses().slice(-10)),
    };

    const { qualified, selected } = selectCandidates(bars, ['AAA', 'BBB', 'CCC', 'DDD', 'EEE'], CONFIG, 1);

    expect(qualified.map(c => c.symbol).sort()).toEqual(['AAA', 'BBB']);
    expect(selected).toHaveLength(1);
    // the falling series sits slightly further from its mean
    expect(selected[0].symbol).toBe('BBB');
  });
});

describe('GradeRadar', () => {
  it('re-announces a qualifying symbol only after the re-alert interval', async () => {
    const notifier = new RecordingNotifier();
    const clock = new ManualClock(0);
    const radar = new GradeRadar(notifier, { ...CONFIG, radarRealertMinutes: 15 }, { now: clock.now });
    const bars = { AAA: barsFromCloses(risingCloses()) };

    expect((await radar.scan(bars, ['AAA'])).map(c => c.symbol)).toEqual(['AAA']);

    clock.current = 14 * 60_000;
    expect(await radar.scan(bars, ['AAA'])).toEqual([]);

    clock.current = 15 * 60_000;
    expect(await radar.scan(bars, ['AAA'])).toHaveLength(1);
    expect(notifier.messages).toHaveLength(2);
    expect(notifier.messages[0].startsWith('🎯 A-GRADE AAA LONG score ')).toBe(true);
  });
});
