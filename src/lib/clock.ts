/**
 * Time Source
 * Injected into services so period arithmetic can be tested deterministically
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Add whole days as fixed 24h spans (no calendar or DST adjustment)
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Whole days from `from` until `to`, never negative
 */
export function daysUntil(to: Date, from: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY));
}
