// Configuration types for the .NET test visualizer
import { z } from 'zod';

/** Literals the CamelCase splitter keeps whole by default. */
export const DEFAULT_NO_SPLIT = ['HostBuilder', 'DBSyncer', 'DbSynchronizer'] as const;

/** Words that keep their casing in generated sentences by default. */
export const DEFAULT_NO_TRANSFORM = ['DbSynchronizer', 'DBSyncer'] as const;

export const VisualizerConfigSchema = z
  .object({
    /** Tests at or below this many seconds are shown as fast. */
    thresholdFast: z.number().nonnegative().default(0.05),
    /** Tests at or below this many seconds (and above thresholdFast) are shown as normal. */
    thresholdNormal: z.number().nonnegative().default(0.1),
    noSplit: z
      .array(z.string().min(1))
      .default(() => [...DEFAULT_NO_SPLIT]),
    noTransform: z
      .array(z.string().min(1))
      .default(() => [...DEFAULT_NO_TRANSFORM]),
  })
  .strict()
  .refine((config) => config.thresholdFast <= config.thresholdNormal, {
    message: 'thresholdFast must not exceed thresholdNormal',
    path: ['thresholdFast'],
  });

export type VisualizerConfig = Readonly<z.output<typeof VisualizerConfigSchema>>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
