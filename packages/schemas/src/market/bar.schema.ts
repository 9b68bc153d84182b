import { z } from 'zod';

/**
 * Calendar date in ISO form (YYYY-MM-DD)
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a calendar date (YYYY-MM-DD)');
export type CalendarDate = z.infer<typeof CalendarDateSchema>;

/**
 * Bar sizes accepted by the historical data provider
 *
 * Sub-daily sizes produce bars keyed by 'YYYY-MM-DD HH:mm:ss';
 * daily and longer sizes key bars by calendar date.
 */
export const BarSizeSchema = z.enum([
  '30 secs',
  '1 min',
  '2 mins',
  '3 mins',
  '5 mins',
  '10 mins',
  '15 mins',
  '20 mins',
  '30 mins',
  '1 hour',
  '2 hours',
  '3 hours',
  '4 hours',
  '8 hours',
  '1 day',
  '1 week',
  '1 month',
]);
export type BarSize = z.infer<typeof BarSizeSchema>;

export const DEFAULT_BAR_SIZE: BarSize = '1 day';

export const BarSizeCategorySchema = z.enum([
  'ultra-high-freq',
  'high-freq',
  'medium-freq',
  'hourly',
  'daily-plus',
]);
export type BarSizeCategory = z.infer<typeof BarSizeCategorySchema>;

export const BAR_SIZE_CATEGORIES = {
  'ultra-high-freq': ['30 secs'],
  'high-freq': ['1 min', '2 mins', '3 mins', '5 mins'],
  'medium-freq': ['10 mins', '15 mins', '20 mins', '30 mins'],
  hourly: ['1 hour', '2 hours', '3 hours', '4 hours', '8 hours'],
  'daily-plus': ['1 day', '1 week', '1 month'],
} as const satisfies Record<BarSizeCategory, readonly BarSize[]>;

/**
 * Security kind as declared by the caller or inferred from the symbol.
 * 'unknown' is never sent to the provider; it fails the symbol.
 */
export const SecurityKindSchema = z.enum(['equity', 'index', 'unknown']);
export type SecurityKind = z.infer<typeof SecurityKindSchema>;

/**
 * Single OHLCV row. Close is the split/dividend adjusted close.
 */
export const BarSchema = z.object({
  /** Calendar date, or 'YYYY-MM-DD HH:mm:ss' for sub-daily bar sizes */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/),
  open: z.number().positive(),
  high: z.number().positive(),
  low: z.number().positive(),
  close: z.number().positive(),
  volume: z.number().nonnegative(),
});
export type Bar = z.infer<typeof BarSchema>;

/**
 * Inclusive calendar-day interval
 */
export const DateRangeSchema = z
  .object({
    start: CalendarDateSchema,
    end: CalendarDateSchema,
  })
  .refine((range) => range.start <= range.end, {
    message: 'Date range start must not be after its end',
  });
export type DateRange = z.infer<typeof DateRangeSchema>;

/**
 * Sub-interval of a parent DateRange sized to the provider's request window
 */
export interface Chunk extends DateRange {
  /** Position within the parent range, 0 = oldest */
  index: number;
}
