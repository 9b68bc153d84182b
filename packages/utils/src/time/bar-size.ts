import {
  BAR_SIZE_CATEGORIES,
  BarSizeSchema,
  DEFAULT_BAR_SIZE,
  type BarSize,
  type BarSizeCategory,
} from '@quarry/schemas';

/**
 * Per-request timeout by category. Finer bars make the provider slower to answer.
 */
export const BAR_SIZE_TIMEOUT_MS: Record<BarSizeCategory, number> = {
  'ultra-high-freq': 120_000,
  'high-freq': 90_000,
  'medium-freq': 75_000,
  hourly: 60_000,
  'daily-plus': 45_000,
};

/**
 * Widest calendar window a single request may span, by category
 */
export const BAR_SIZE_MAX_WINDOW_DAYS: Record<BarSizeCategory, number> = {
  'ultra-high-freq': 1,
  'high-freq': 7,
  'medium-freq': 30,
  hourly: 180,
  'daily-plus': 365,
};

const UNIT_ALIASES: Record<string, string> = {
  s: 'sec',
  sec: 'sec',
  secs: 'sec',
  second: 'sec',
  seconds: 'sec',
  m: 'min',
  min: 'min',
  mins: 'min',
  minute: 'min',
  minutes: 'min',
  h: 'hour',
  hr: 'hour',
  hrs: 'hour',
  hour: 'hour',
  hours: 'hour',
  d: 'day',
  day: 'day',
  days: 'day',
  w: 'week',
  week: 'week',
  weeks: 'week',
  month: 'month',
  months: 'month',
};

const BAR_SIZE_CATEGORY_ORDER: readonly BarSizeCategory[] = [
  'ultra-high-freq',
  'high-freq',
  'medium-freq',
  'hourly',
  'daily-plus',
];

export function getBarSizeCategory(barSize: BarSize): BarSizeCategory {
  for (const category of BAR_SIZE_CATEGORY_ORDER) {
    const sizes: readonly BarSize[] = BAR_SIZE_CATEGORIES[category];
    if (sizes.includes(barSize)) return category;
  }
  return 'daily-plus';
}

export function getRequestTimeoutMs(barSize: BarSize): number {
  return BAR_SIZE_TIMEOUT_MS[getBarSizeCategory(barSize)];
}

export function getMaxWindowDays(barSize: BarSize): number {
  return BAR_SIZE_MAX_WINDOW_DAYS[getBarSizeCategory(barSize)];
}

/**
 * Bars finer than a day carry a time of day in their date key
 */
export function isIntradayBarSize(barSize: BarSize): boolean {
  const category = getBarSizeCategory(barSize);
  return category !== 'daily-plus';
}

/**
 * Canonical spelling of a bar size: '5 min' -> '5 mins', '1 Hours' -> '1 hour'.
 * Input that does not look like "<number> <unit>" comes back trimmed and lowercased.
 */
export function normalizeBarSize(input: string): string {
  const trimmed = input.trim().toLowerCase();
  const match = /^(\d+)\s*([a-z]+)$/.exec(trimmed);
  if (!match) return trimmed;

  const count = parseInt(match[1], 10);
  const unit = UNIT_ALIASES[match[2]];
  if (!unit) return `${count} ${match[2]}`;

  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Valid sizes close to an invalid one, for error messages
 */
export function suggestBarSizeAlternatives(invalid: string): BarSize[] {
  const value = invalid.toLowerCase();
  if (value.includes('sec')) return ['30 secs', '1 min'];
  if (value.includes('min')) return ['1 min', '5 mins', '15 mins', '30 mins'];
  if (value.includes('hour')) return ['1 hour', '2 hours', '4 hours'];
  return ['1 day', '1 week'];
}

/**
 * Resolve user input to a supported bar size. Blank input means the default.
 *
 * @throws Error naming close alternatives when the size is not supported
 */
export function parseBarSize(input: string | undefined): BarSize {
  if (input === undefined || input.trim() === '') return DEFAULT_BAR_SIZE;

  const parsed = BarSizeSchema.safeParse(normalizeBarSize(input));
  if (parsed.success) return parsed.data;

  const alternatives = suggestBarSizeAlternatives(input);
  throw new Error(`Unsupported bar size "${input}". Try one of: ${alternatives.join(', ')}`);
}
