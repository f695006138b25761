const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Formats a Date into local YYYY-MM-DD (avoids UTC drift in reports)
export function formatLocalDay(date: Date): string {
  const y = date.getFullYear();
  const m = `${date.getMonth() + 1}`.padStart(2, "0");
  const d = `${date.getDate()}`.padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function isValidDay(value: string): boolean {
  if (!DAY_PATTERN.test(value)) {
    return false;
  }
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(year, month - 1, day);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

export function isValidTimestamp(value: string): boolean {
  return !Number.isNaN(Date.parse(value));
}

/** Whole seconds from `start` to `end`, never negative. */
export function secondsBetween(start: string | Date, end: string | Date): number {
  const startMs = typeof start === "string" ? Date.parse(start) : start.getTime();
  const endMs = typeof end === "string" ? Date.parse(end) : end.getTime();
  return Math.max(0, Math.floor((endMs - startMs) / 1000));
}

export function formatSeconds(sec: number): string {
  const h = Math.floor(sec / 3600);
  const m = Math.floor((sec % 3600) / 60);
  const s = sec % 60;
  return `${h}h ${m}m ${s}s`;
}

export function formatClock(sec: number): string {
  const hh = Math.floor(sec / 3600)
    .toString()
    .padStart(2, "0");
  const mm = Math.floor((sec % 3600) / 60)
    .toString()
    .padStart(2, "0");
  const ss = (sec % 60).toString().padStart(2, "0");
  return `${hh}:${mm}:${ss}`;
}

export function formatHours(hours: number): string {
  return `${hours.toFixed(2)}h`;
}

export function compactTimestamp(date: Date): string {
  const day = formatLocalDay(date).replace(/-/g, "");
  const hh = `${date.getHours()}`.padStart(2, "0");
  const mm = `${date.getMinutes()}`.padStart(2, "0");
  const ss = `${date.getSeconds()}`.padStart(2, "0");
  return `${day}_${hh}${mm}${ss}`;
}
