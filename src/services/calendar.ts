import { addDays, format, isValid, isWeekend, parseISO } from 'date-fns';
import { ValidationError } from '../errors';
import type { IsoDate } from '../types';

const ISO_DAY = 'yyyy-MM-dd';

// Upper bound for next/previous scans; a holiday list never closes the market this long.
const MAX_SCAN_DAYS = 366;

export function parseDay(date: IsoDate): Date {
  const parsed = parseISO(date);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || !isValid(parsed)) {
    throw new ValidationError(`Invalid date: ${date}`);
  }
  return parsed;
}

export const formatDay = (date: Date): IsoDate => format(date, ISO_DAY);

export const shiftDay = (date: IsoDate, days: number): IsoDate => formatDay(addDays(parseDay(date), days));

export interface Clock {
  /** Current calendar day in the market's time zone. */
  today(): IsoDate;
  now(): Date;
}

export function zonedClock(timeZone: string, now: () => Date = () => new Date()): Clock {
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return {
    now,
    today: () => {
      const parts: Record<string, string> = {};
      for (const p of fmt.formatToParts(now())) parts[p.type] = p.value;
      return `${parts.year}-${parts.month}-${parts.day}`;
    },
  };
}

export const fixedClock = (day: IsoDate): Clock => ({
  today: () => day,
  now: () => parseDay(day),
});

export class TradingCalendar {
  private readonly holidays: ReadonlySet<IsoDate>;

  constructor(holidays: Iterable<IsoDate> = []) {
    this.holidays = new Set(holidays);
  }

  isHoliday(date: IsoDate): boolean {
    return this.holidays.has(date);
  }

  isTradingDay(date: IsoDate): boolean {
    return !isWeekend(parseDay(date)) && !this.holidays.has(date);
  }

  nextTradingDay(date: IsoDate): IsoDate {
    return this.scan(date, 1);
  }

  previousTradingDay(date: IsoDate): IsoDate {
    return this.scan(date, -1);
  }

  /** Trading days in `[from, to]`, ascending. */
  tradingDaysBetween(from: IsoDate, to: IsoDate): IsoDate[] {
    const days: IsoDate[] = [];
    let cursor = parseDay(from);
    const end = parseDay(to);
    while (cursor <= end) {
      const day = formatDay(cursor);
      if (this.isTradingDay(day)) days.push(day);
      cursor = addDays(cursor, 1);
    }
    return days;
  }

  private scan(date: IsoDate, step: 1 | -1): IsoDate {
    let cursor = parseDay(date);
    for (let i = 0; i < MAX_SCAN_DAYS; i++) {
      cursor = addDays(cursor, step);
      const day = formatDay(cursor);
      if (this.isTradingDay(day)) return day;
    }
    throw new ValidationError(`No trading day within ${MAX_SCAN_DAYS} days of ${date}`);
  }
}
