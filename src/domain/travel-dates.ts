import { CommandValidationError } from './errors';

const isCalendarDate = (value: string): boolean => {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

/**
 * Dates are YYYY-MM-DD strings, so lexical order is calendar order.
 * `nowIso` is the clock's current instant; only its date part is used.
 */
export function assertTravelDates(
  departDate: string,
  returnDate: string | null,
  nowIso: string
): void {
  const violations: string[] = [];

  if (!isCalendarDate(departDate)) {
    violations.push(`departDate ${departDate} is not a calendar date`);
  } else if (departDate < nowIso.slice(0, 10)) {
    violations.push(`departDate ${departDate} is in the past`);
  }

  if (returnDate !== null) {
    if (!isCalendarDate(returnDate)) {
      violations.push(`returnDate ${returnDate} is not a calendar date`);
    } else if (returnDate <= departDate) {
      violations.push('returnDate must be after departDate');
    }
  }

  if (violations.length > 0) {
    throw new CommandValidationError('invalid travel dates', violations);
  }
}
