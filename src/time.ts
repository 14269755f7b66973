import { DateTime } from "luxon";

export type Clock = () => DateTime;
export type Rng = () => number;

export const systemClock: Clock = () => DateTime.utc();

export function parseIso(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: "utc" });
}

export function toIso(dt: DateTime): string {
  return dt.toUTC().toISO() ?? new Date(dt.toMillis()).toISOString();
}

export function isSameUtcDay(a: DateTime, b: DateTime): boolean {
  return a.toUTC().hasSame(b.toUTC(), "day");
}

export function utcDate(dt: DateTime): string {
  return dt.toUTC().toFormat("yyyy-MM-dd");
}

/** Next occurrence of `hourUtc`:00 strictly after `now` (a run at exactly that hour rolls to tomorrow). */
export function nextDailyUtc(now: DateTime, hourUtc: number): DateTime {
  const utc = now.toUTC();
  let next = utc.startOf("day").set({ hour: hourUtc });
  if (next <= utc) next = next.plus({ days: 1 });
  return next;
}

export function msUntil(target: DateTime, now: DateTime): number {
  return Math.max(0, target.toMillis() - now.toMillis());
}

/** Integer in [min, max], inclusive on both ends. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
