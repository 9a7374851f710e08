/**
 * Local-time calendar helpers. Days are represented by a Date at local midnight.
 */

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function startOfDay(day: Date): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 0, 0, 0, 0);
}

/** Last instant of the day, 23:59:59.999 local time */
export function endOfDay(day: Date): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 23, 59, 59, 999);
}

export function addDays(day: Date, days: number): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate() + days);
}

export function today(): Date {
  return startOfDay(new Date());
}

export function yesterday(): Date {
  return addDays(today(), -1);
}

/** YYYY-MM-DD in local time */
export function toDateKey(day: Date): string {
  return `${day.getFullYear()}-${pad(day.getMonth() + 1)}-${pad(day.getDate())}`;
}

export function parseDateKey(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const date = parseInt(match[3], 10);
  const day = new Date(year, month, date);
  if (day.getFullYear() !== year || day.getMonth() !== month || day.getDate() !== date) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return day;
}

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/** e.g. "October 07, 2026" */
export function formatLongDate(day: Date): string {
  return `${MONTHS[day.getMonth()]} ${pad(day.getDate())}, ${day.getFullYear()}`;
}
