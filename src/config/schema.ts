import { z } from 'zod';

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const rawSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  TICKS_PATH: z.string().default('ticks.csv'),
  // 0 replays every row
  REPLAY_LIMIT: z.coerce.number().int().nonnegative().default(0),

  SWEEP_SHORT_WINDOW_SEC: positiveNumber(0.3),
  SWEEP_LONG_WINDOW_SEC: positiveNumber(10),
  SWEEP_THRESHOLD_RATIO: positiveNumber(3),

  STRATEGY_DELAY_MS: z.coerce.number().nonnegative().default(80),
  STRATEGY_HOLD_SEC: positiveNumber(5),
  STRATEGY_TP_BP: positiveNumber(2),
  STRATEGY_SL_BP: positiveNumber(2),

  // 0 disables order-flow frame sampling during replay
  FEATURE_SAMPLE_SEC: z.coerce.number().nonnegative().default(0),
  ANALYSIS_HORIZON_SEC: positiveNumber(30)
});

export const configSchema = rawSchema
  .refine((raw) => raw.SWEEP_SHORT_WINDOW_SEC < raw.SWEEP_LONG_WINDOW_SEC, {
    message: 'must be shorter than SWEEP_LONG_WINDOW_SEC',
    path: ['SWEEP_SHORT_WINDOW_SEC']
  })
  .transform((raw) => ({
    logLevel: raw.LOG_LEVEL,

    replay: {
      ticksPath: raw.TICKS_PATH,
      limit: raw.REPLAY_LIMIT,
      featureSampleSec: raw.FEATURE_SAMPLE_SEC
    },

    sweep: {
      shortWindowSec: raw.SWEEP_SHORT_WINDOW_SEC,
      longWindowSec: raw.SWEEP_LONG_WINDOW_SEC,
      thresholdRatio: raw.SWEEP_THRESHOLD_RATIO
    },

    strategy: {
      delayMs: raw.STRATEGY_DELAY_MS,
      holdSec: raw.STRATEGY_HOLD_SEC,
      takeProfitBp: raw.STRATEGY_TP_BP,
      stopLossBp: raw.STRATEGY_SL_BP
    },

    analysis: {
      horizonSec: raw.ANALYSIS_HORIZON_SEC
    }
  }));

export type AppConfig = z.output<typeof configSchema>;
