const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Current instant. A `Date` is an absolute point in time, so values
 * produced here compare correctly against `timestamptz` columns.
 */
export function utcNow(): Date {
  return new Date();
}

/**
 * Whole hours elapsed from `from` to `to`, rounded down.
 * Never negative: a `from` in the future yields 0.
 */
export function hoursBetween(from: Date, to: Date): number {
  const elapsedMs = to.getTime() - from.getTime();
  if (Number.isNaN(elapsedMs) || elapsedMs <= 0) {
    return 0;
  }
  return Math.floor(elapsedMs / MS_PER_HOUR);
}
