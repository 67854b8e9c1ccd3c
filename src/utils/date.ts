const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function todayIso(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
