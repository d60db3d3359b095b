const MS_PER_MINUTE = 60_000;

/**
 * Whole minutes elapsed since creation. Missing, unparsable or future
 * timestamps yield 0 so the resource is never reclaimed on age alone.
 */
export function ageInMinutes(creationTimestamp: Date | string | undefined, now: Date): number {
  if (creationTimestamp === undefined) {
    return 0;
  }

  const created =
    creationTimestamp instanceof Date ? creationTimestamp.getTime() : Date.parse(creationTimestamp);

  if (!Number.isFinite(created) || created <= 0) {
    return 0;
  }

  const elapsed = Math.floor((now.getTime() - created) / MS_PER_MINUTE);
  return elapsed > 0 ? elapsed : 0;
}
