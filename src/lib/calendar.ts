// Day keys are yyyy-MM-dd in the caller's local calendar.

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function toDayKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function isSameDay(a: Date, b: Date): boolean {
  return toDayKey(a) === toDayKey(b);
}

/** Local midnight of a day key. */
export function fromDayKey(dayKey: string): Date {
  const [year, month, day] = dayKey.split("-").map((part) => Number.parseInt(part, 10));
  return new Date(year, month - 1, day);
}

/** Whole calendar days from `today` to `target`; negative once it has passed. */
export function daysBetween(today: string, target: string): number {
  const from = fromDayKey(today);
  const to = fromDayKey(target);
  const utcFrom = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const utcTo = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((utcTo - utcFrom) / 86_400_000);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
