export * from './core/types.js';
export { Deque } from './core/deque.js';
export { JsonLogger, type Logger, type LogLevel, type LogWriter } from './core/logger.js';
export { AppError, ConfigError, TickParseError } from './core/errors.js';

export { SweepModel, type WindowTotals } from './sweep/sweepModel.js';

export { BookSide } from './features/bookSide.js';
export { OrderBook } from './features/orderBook.js';
export { RollingExtreme } from './features/rollingExtreme.js';
export { OrderFlowFeatureExtractor, DEPTH_BANDS, emptyFrame } from './features/orderFlow.js';

export {
  MeanReversionStrategy,
  DEFAULT_MEAN_REVERSION_CONFIG,
  type MeanReversionConfig,
  type OpenPosition
} from './strategy/meanReversion.js';

export { configSchema, type AppConfig } from './config/schema.js';
export { loadConfig } from './config/load.js';

export { parseTicksCsv, loadTicksCsv, type TickCsvOptions } from './data/tickCsv.js';

export { ReplayEngine, type ReplayConfig, type ReplayResult } from './backtester/replay.js';
export {
  runParamScan,
  detectSweeps,
  sweepGridCombos,
  formatParamScanRow,
  DEFAULT_SWEEP_GRID,
  type SweepParams,
  type SweepGrid,
  type ParamScanRow
} from './backtester/paramScan.js';
export {
  summarizeTrades,
  formatReturnStats,
  forwardReturns,
  describeReturns,
  type ReplayTrade,
  type TradeSummary,
  type ForwardReturn,
  type ReturnStats
} from './backtester/metrics.js';
