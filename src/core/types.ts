export type Side = 'buy' | 'sell';

export interface Tick {
  timestamp: number; // seconds
  price: number;
  volume: number;
  side: Side;
}

export type SweepSignal = 'UP_SWEEP' | 'DOWN_SWEEP' | 'NO_SIGNAL';
export type SweepDirection = 'up' | 'down' | 'none';

export interface SweepEvent {
  tsStart: number;
  tsEnd: number;
  priceStart: number;
  priceEnd: number;
  volumeTotal: number;
  direction: SweepDirection;
}

export type PositionDirection = 1 | -1;
export type ActionKind = 'IDLE' | 'OPEN_LONG' | 'OPEN_SHORT' | 'CLOSE';
export type ExitReason = 'take_profit' | 'stop_loss' | 'timeout' | 'trend_continuation';

export interface StrategyAction {
  kind: ActionKind;
  direction: PositionDirection | 0;
  price: number;
  timestamp: number;
  reason?: ExitReason;
}

/** A single (price, size) book level. Size <= 0 deletes the level. */
export type BookLevel = readonly [price: number, size: number];

export type AggRunDirection = 'buy' | 'sell' | 'none';
export type WeakSide = 'bid' | 'ask' | 'none';

export interface FlowWindow {
  buyVolume: number;
  sellVolume: number;
  buyShare: number;
  sellShare: number;
}

export interface DepthBand {
  bid: number;
  ask: number;
}

export interface OrderFlowFrame {
  ts: number;
  mid: number;
  bestBid: number;
  bestAsk: number;

  flow1s: FlowWindow;
  flow3s: FlowWindow;
  flow10s: FlowWindow;

  depth01: DepthBand;
  depth03: DepthBand;
  depth05: DepthBand;

  isNewHigh20s: boolean;
  isNewLow20s: boolean;
  isNewHigh30s: boolean;
  isNewLow30s: boolean;

  aggRunDir: AggRunDirection;
  weakSide01: WeakSide;
}
