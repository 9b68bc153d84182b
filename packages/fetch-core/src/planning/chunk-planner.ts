import type { Chunk, DateRange } from '@quarry/schemas';
import { addCalendarDays, calendarDaysBetween } from '@quarry/utils';

/**
 * Ordered, restartable sequence of chunks covering a date range
 *
 * Iterating starts a fresh generator each time; chunks are computed on demand.
 */
export interface ChunkPlan extends Iterable<Chunk> {
  readonly range: DateRange;
  readonly maxWindowDays: number;
  readonly count: number;
}

/**
 * Split an inclusive calendar-day range into windows of at most `maxWindowDays`
 * days, oldest first. Chunk i+1 starts the day after chunk i ends, so the chunks
 * cover the range exactly once. A single-day range yields one chunk.
 *
 * @throws RangeError when the window is not a positive integer or start > end
 */
export function planChunks(range: DateRange, maxWindowDays: number): ChunkPlan {
  if (!Number.isInteger(maxWindowDays) || maxWindowDays < 1) {
    throw new RangeError(`Chunk window must be a positive whole number of days, got ${maxWindowDays}`);
  }

  const totalDays = calendarDaysBetween(range.start, range.end) + 1;
  if (Number.isNaN(totalDays)) {
    throw new RangeError(`Invalid date range ${range.start}..${range.end}`);
  }
  if (totalDays < 1) {
    throw new RangeError(`Date range start ${range.start} is after its end ${range.end}`);
  }

  const count = Math.ceil(totalDays / maxWindowDays);

  return {
    range,
    maxWindowDays,
    count,
    *[Symbol.iterator](): Generator<Chunk> {
      for (let index = 0; index < count; index++) {
        const firstOffset = index * maxWindowDays;
        const lastOffset = Math.min(firstOffset + maxWindowDays, totalDays) - 1;
        yield {
          index,
          start: addCalendarDays(range.start, firstOffset),
          end: addCalendarDays(range.start, lastOffset),
        };
      }
    },
  };
}
