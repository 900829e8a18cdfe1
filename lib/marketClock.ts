export const EXCHANGE_TIME_ZONE = 'America/New_York';
export const MARKET_OPEN_MINUTES = 9 * 60 + 30;

export interface ExchangeTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  weekday: number; // 0 = Sunday
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatter = new Intl.DateTimeFormat('en-US', {
  timeZone: EXCHANGE_TIME_ZONE,
  hourCycle: 'h23',
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  weekday: 'short',
});

export function exchangeTimeParts(date: Date): ExchangeTimeParts {
  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return {
    year: Number(parts.year),
    month: Number(parts.month),
    day: Number(parts.day),
    hour: Number(parts.hour),
    minute: Number(parts.minute),
    weekday: WEEKDAYS[parts.weekday] ?? -1,
  };
}

/** Trading-day key (YYYY-MM-DD) in exchange-local time. */
export function exchangeDateKey(date: Date): string {
  const { year, month, day } = exchangeTimeParts(date);
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isWeekday(date: Date): boolean {
  const { weekday } = exchangeTimeParts(date);
  return weekday >= 1 && weekday <= 5;
}

/**
 * True inside [open + startMinutes, open + startMinutes + lengthMinutes) on a weekday.
 */
export function isInOpenWindow(date: Date, startMinutes: number, lengthMinutes: number): boolean {
  if (!isWeekday(date)) {
    return false;
  }
  const { hour, minute } = exchangeTimeParts(date);
  const minutes = hour * 60 + minute;
  const windowStart = MARKET_OPEN_MINUTES + startMinutes;
  return minutes >= windowStart && minutes < windowStart + lengthMinutes;
}

export function isPastOpenWindow(date: Date, startMinutes: number, lengthMinutes: number): boolean {
  const { hour, minute } = exchangeTimeParts(date);
  return hour * 60 + minute >= MARKET_OPEN_MINUTES + startMinutes + lengthMinutes;
}

export const MARKET_CLOSE_MINUTES = 16 * 60;

export function isMarketHours(date: Date): boolean {
  if (!isWeekday(date)) {
    return false;
  }
  const { hour, minute } = exchangeTimeParts(date);
  const minutes = hour * 60 + minute;
  return minutes >= MARKET_OPEN_MINUTES && minutes < MARKET_CLOSE_MINUTES;
}
