import { describe, expect, it, beforeEach } from 'vitest';
import { OrderFlowFeatureExtractor, emptyFrame } from '../../src/features/orderFlow.js';

describe('OrderFlowFeatureExtractor', () => {
  let fx: OrderFlowFeatureExtractor;

  beforeEach(() => {
    fx = new OrderFlowFeatureExtractor();
  });

  it('returns a default frame before any data', () => {
    expect(fx.getFrame()).toEqual(emptyFrame(0));
  });

  describe('multi-horizon volume', () => {
    beforeEach(() => {
      fx.addTrade(100, 50, 2, 'buy');
      fx.addTrade(105, 50, 1, 'sell');
      fx.addTrade(108.5, 50, 3, 'buy');
      fx.addTrade(109.5, 51, 1, 'sell');
    });

    it('buckets trades by age into 1s/3s/10s', () => {
      const f = fx.getFrame(110);
      expect(f.ts).toBe(110);
      expect(f.flow10s.buyVolume).toBe(5);
      expect(f.flow10s.sellVolume).toBe(2);
      expect(f.flow10s.buyShare).toBeCloseTo(5 / 7, 12);
      expect(f.flow10s.sellShare).toBeCloseTo(2 / 7, 12);
      expect(f.flow3s).toEqual({ buyVolume: 3, sellVolume: 1, buyShare: 0.75, sellShare: 0.25 });
      expect(f.flow1s).toEqual({ buyVolume: 0, sellVolume: 1, buyShare: 0, sellShare: 1 });
    });

    it('defaults ts to the last trade when not given', () => {
      const f = fx.getFrame();
      expect(f.ts).toBe(109.5);
      // 108.5 is exactly 1s old
      expect(f.flow1s.buyVolume).toBe(3);
      expect(f.flow1s.sellVolume).toBe(1);
    });

    it('skips trades newer than the query time', () => {
      const f = fx.getFrame(105);
      expect(f.flow10s.buyVolume).toBe(2);
      expect(f.flow10s.sellVolume).toBe(1);
      expect(f.flow1s).toEqual({ buyVolume: 0, sellVolume: 1, buyShare: 0, sellShare: 1 });
    });

    it('prunes trades older than 10s', () => {
      const f = fx.getFrame(115);
      expect(f.flow10s.buyVolume).toBe(3);
      expect(f.flow10s.sellVolume).toBe(2);
    });

    it('falls back to the last trade price for mid without a book', () => {
      const f = fx.getFrame(110);
      expect(f.bestBid).toBe(0);
      expect(f.bestAsk).toBe(0);
      expect(f.mid).toBe(51);
      expect(f.depth01).toEqual({ bid: 0, ask: 0 });
    });
  });

  it('zero-volume trades give zero shares', () => {
    fx.addTrade(10, 100, 0, 'buy');
    const f = fx.getFrame(10);
    expect(f.flow1s).toEqual({ buyVolume: 0, sellVolume: 0, buyShare: 0, sellShare: 0 });
  });

  describe('book features', () => {
    beforeEach(() => {
      fx.applyL2Snapshot(
        [[100, 1], [99.95, 1], [99.7, 4]],
        [[100.1, 5], [100.15, 3], [100.4, 2]],
      );
    });

    it('derives best levels, mid and band depths', () => {
      const f = fx.getFrame(1);
      expect(f.bestBid).toBe(100);
      expect(f.bestAsk).toBe(100.1);
      expect(f.mid).toBeCloseTo(100.05, 10);
      expect(f.depth01).toEqual({ bid: 2, ask: 8 });
      expect(f.depth03).toEqual({ bid: 2, ask: 8 });
      expect(f.depth05).toEqual({ bid: 6, ask: 10 });
    });

    it('flags the bid as weak when it is under 40% of the ask', () => {
      expect(fx.getFrame(1).weakSide01).toBe('bid');
    });

    it('flags the ask as weak in the mirrored book', () => {
      fx.applyL2Snapshot([[100, 5], [99.95, 3]], [[100.1, 1], [100.15, 1]]);
      expect(fx.getFrame(1).weakSide01).toBe('ask');
    });

    it('reports no weak side when either side has no depth in band', () => {
      fx.applyL2Delta([], [[100.1, 0], [100.15, 0]]);
      const f = fx.getFrame(1);
      expect(f.bestAsk).toBe(100.4);
      expect(f.weakSide01).toBe('none');
    });

    it('uses the last trade price when one side is empty', () => {
      fx.addTrade(1, 99.9, 1, 'sell');
      fx.applyL2Delta([], [[100.1, 0], [100.15, 0], [100.4, 0]]);
      const f = fx.getFrame(1);
      expect(f.bestAsk).toBe(0);
      expect(f.mid).toBe(99.9);
    });
  });

  describe('new highs and lows', () => {
    const frameAt = (ts: number, price: number) => {
      fx.addTrade(ts, price, 1, 'buy');
      return fx.getFrame(ts);
    };

    it('first observation is both a high and a low', () => {
      const f = frameAt(1, 100);
      expect([f.isNewHigh20s, f.isNewLow20s, f.isNewHigh30s, f.isNewLow30s]).toEqual([true, true, true, true]);
    });

    it('compares against 20s and 30s horizons separately', () => {
      frameAt(1, 100);
      const up = frameAt(2, 101);
      expect(up.isNewHigh20s).toBe(true);
      expect(up.isNewLow20s).toBe(false);

      const mid = frameAt(3, 100.5);
      expect(mid.isNewHigh20s).toBe(false);
      expect(mid.isNewLow20s).toBe(false);

      // 20s window only holds this sample; 30s still sees 100 and 101
      const later = frameAt(25, 100.8);
      expect(later.isNewHigh20s).toBe(true);
      expect(later.isNewLow20s).toBe(true);
      expect(later.isNewHigh30s).toBe(false);
      expect(later.isNewLow30s).toBe(false);
    });

    it('counts a tie with the current max as a new high', () => {
      frameAt(1, 101);
      frameAt(2, 100);
      expect(frameAt(3, 101).isNewHigh20s).toBe(true);
    });
  });

  describe('aggressor run', () => {
    const fill = (sec: number, buy: number, sell: number) => {
      if (buy > 0) fx.addTrade(sec + 0.1, 100, buy, 'buy');
      if (sell > 0) fx.addTrade(sec + 0.2, 100, sell, 'sell');
    };

    it('needs three complete buckets', () => {
      fill(10, 2, 0);
      fill(11, 3, 1);
      fill(12, 4, 0);
      // second 12 is still open
      expect(fx.aggressorRun).toBe('none');

      fx.addTrade(13.0, 100, 0.1, 'buy');
      expect(fx.aggressorRun).toBe('buy');
      expect(fx.getFrame(13).aggRunDir).toBe('buy');
    });

    it('detects an accelerating sell run', () => {
      fill(10, 0, 1);
      fill(11, 0.5, 2);
      fill(12, 0, 3);
      expect(fx.getFrame(13).aggRunDir).toBe('sell');
    });

    it('rejects a run whose net flow weakens', () => {
      fill(10, 4, 0);
      fill(11, 2, 0);
      fill(12, 3, 0);
      expect(fx.getFrame(13).aggRunDir).toBe('none');
    });

    it('rejects buckets without a dominant side', () => {
      fill(10, 2, 0);
      fill(11, 3, 2); // buy share 0.6
      fill(12, 4, 0);
      expect(fx.getFrame(13).aggRunDir).toBe('none');
    });

    it('rejects mixed directions', () => {
      fill(10, 2, 0);
      fill(11, 0, 3);
      fill(12, 4, 0);
      expect(fx.getFrame(13).aggRunDir).toBe('none');
    });

    it('forgets buckets older than 5 seconds', () => {
      fill(10, 2, 0);
      fill(11, 3, 1);
      fill(12, 4, 0);
      expect(fx.getFrame(13).aggRunDir).toBe('buy');
      expect(fx.getFrame(17).aggRunDir).toBe('none');
    });
  });
});
