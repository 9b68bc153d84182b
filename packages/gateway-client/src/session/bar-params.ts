import type { BarSize, Chunk } from '@quarry/schemas';
import { calendarDaysBetween, getMaxWindowDays } from '@quarry/utils';

/**
 * `bar` query values of /iserver/marketdata/history.
 * Sizes the gateway does not offer have no entry.
 */
export const GATEWAY_BAR_PARAMS: Partial<Record<BarSize, string>> = {
  '1 min': '1min',
  '2 mins': '2min',
  '3 mins': '3min',
  '5 mins': '5min',
  '10 mins': '10min',
  '15 mins': '15min',
  '30 mins': '30min',
  '1 hour': '1h',
  '2 hours': '2h',
  '3 hours': '3h',
  '4 hours': '4h',
  '8 hours': '8h',
  '1 day': '1d',
  '1 week': '1w',
  '1 month': '1m',
};

export function toGatewayBar(barSize: BarSize): string | undefined {
  return GATEWAY_BAR_PARAMS[barSize];
}

/** Most data points one history response carries */
export const GATEWAY_MAX_BARS_PER_RESPONSE = 1000;

// Regular trading hours of a US session; history requests exclude extended hours
const REGULAR_SESSION_MINUTES = 390;

const INTRADAY_BAR_MINUTES: Partial<Record<BarSize, number>> = {
  '1 min': 1,
  '2 mins': 2,
  '3 mins': 3,
  '5 mins': 5,
  '10 mins': 10,
  '15 mins': 15,
  '30 mins': 30,
  '1 hour': 60,
  '2 hours': 120,
  '3 hours': 180,
  '4 hours': 240,
  '8 hours': 480,
};

/**
 * Widest window whose bars fit in one response: 2 days at 1 min, 5 at 2 mins.
 * Never wider than the bar size's own window.
 */
export function getGatewayMaxWindowDays(barSize: BarSize): number {
  const windowDays = getMaxWindowDays(barSize);
  const minutes = INTRADAY_BAR_MINUTES[barSize];
  if (minutes === undefined) return windowDays;

  const barsPerDay = Math.ceil(REGULAR_SESSION_MINUTES / minutes);
  const fittingDays = Math.floor(GATEWAY_MAX_BARS_PER_RESPONSE / barsPerDay);
  return Math.max(1, Math.min(windowDays, fittingDays));
}

/**
 * History query for one chunk. The gateway counts `period` back from
 * `startTime`, so the anchor is the last second of the chunk's end date.
 */
export function buildHistoryQuery(conid: string, chunk: Chunk, bar: string): URLSearchParams {
  const days = calendarDaysBetween(chunk.start, chunk.end) + 1;
  return new URLSearchParams({
    conid,
    period: `${days}d`,
    bar,
    startTime: `${chunk.end.replace(/-/g, '')}-23:59:59`,
    outsideRth: 'false',
  });
}

/**
 * Bar key from an epoch-millisecond timestamp, in UTC.
 * Daily and longer bars are keyed by calendar date only.
 */
export function formatBarDate(timestampMs: number, intraday: boolean): string {
  const iso = new Date(timestampMs).toISOString();
  return intraday ? `${iso.slice(0, 10)} ${iso.slice(11, 19)}` : iso.slice(0, 10);
}
