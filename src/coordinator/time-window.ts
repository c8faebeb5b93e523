import { addDays, set, startOfDay, subDays } from 'date-fns';
import type { ClockRange } from '../config/schema';

export interface WindowBounds {
  start: number;
  end: number;
}

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseClock(value: string): { hours: number; minutes: number } {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid clock time "${value}", expected HH:mm`);
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export function isClock(value: string): boolean {
  return CLOCK_PATTERN.test(value);
}

function at(day: Date, clock: string): Date {
  const { hours, minutes } = parseClock(clock);
  return set(startOfDay(day), { hours, minutes, seconds: 0, milliseconds: 0 });
}

/** The occurrence of `range` that starts on the calendar day of `day`; wraps past midnight when end <= start. */
function occurrence(day: Date, range: ClockRange): WindowBounds {
  const start = at(day, range.start);
  let end = at(day, range.end);
  if (end.getTime() <= start.getTime()) {
    end = addDays(end, 1);
  }
  return { start: start.getTime(), end: end.getTime() };
}

/** The occurrence containing `now`, or null when `now` is outside every occurrence. */
export function currentWindow(now: number, range: ClockRange): WindowBounds | null {
  const today = new Date(now);
  for (const candidate of [occurrence(subDays(today, 1), range), occurrence(today, range)]) {
    if (candidate.start <= now && now < candidate.end) return candidate;
  }
  return null;
}

/** The occurrence containing `now`, otherwise the next one to start. */
export function nextWindow(now: number, range: ClockRange): WindowBounds {
  const current = currentWindow(now, range);
  if (current) return current;
  const today = occurrence(new Date(now), range);
  return today.start > now ? today : occurrence(addDays(new Date(now), 1), range);
}

export function isWithin(timestamp: number, range: ClockRange): boolean {
  return currentWindow(timestamp, range) !== null;
}

export function msUntilNextStart(now: number, range: ClockRange): number {
  const today = occurrence(new Date(now), range);
  const start = today.start > now ? today.start : occurrence(addDays(new Date(now), 1), range).start;
  return start - now;
}

/** Most recent daily reset boundary at or before `now`. */
export function quotaPeriodStart(now: number, resetHour: number): number {
  const boundary = set(startOfDay(new Date(now)), { hours: resetHour, minutes: 0, seconds: 0, milliseconds: 0 });
  return boundary.getTime() <= now ? boundary.getTime() : subDays(boundary, 1).getTime();
}

export function nextQuotaReset(now: number, resetHour: number): number {
  return addDays(new Date(quotaPeriodStart(now, resetHour)), 1).getTime();
}
