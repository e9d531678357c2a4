/**
 * Calendar date helpers for birth dates.
 * All arithmetic is done on UTC calendar fields so results do not depend on
 * the host time zone.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDate(year: number, month: number, day: number): Date {
  // Clamp the day to the month length (Feb 29 -> Feb 28 in common years)
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(Date.UTC(year, month, Math.min(day, lastDay)));
}

export function startOfUtcDay(date: Date): Date {
  return utcDate(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function subtractYears(date: Date, years: number): Date {
  return utcDate(
    date.getUTCFullYear() - years,
    date.getUTCMonth(),
    date.getUTCDate(),
  );
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Whole years elapsed between birthDate and referenceDate.
 */
export function ageOn(birthDate: Date, referenceDate: Date): number {
  let age = referenceDate.getUTCFullYear() - birthDate.getUTCFullYear();
  const beforeBirthday =
    referenceDate.getUTCMonth() < birthDate.getUTCMonth() ||
    (referenceDate.getUTCMonth() === birthDate.getUTCMonth() &&
      referenceDate.getUTCDate() < birthDate.getUTCDate());
  if (beforeBirthday) {
    age -= 1;
  }
  return age;
}

/**
 * Earliest and latest birth dates for someone aged minAge..maxAge
 * on referenceDate, both inclusive.
 */
export function birthDateWindow(
  referenceDate: Date,
  minAge: number,
  maxAge: number,
): { from: Date; to: Date } {
  const day = startOfUtcDay(referenceDate);
  return {
    from: addDays(subtractYears(day, maxAge + 1), 1),
    to: subtractYears(day, minAge),
  };
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
