import { differenceInYears, isAfter, isValid, parse } from 'date-fns';

// Tried in order; the first format that yields a valid date wins.
// Numeric dates are read day-first, falling back to month-first.
export const REPORT_DATE_FORMATS = [
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'MMMM d yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'd-MMM-yyyy',
  'yyyy-M-d',
  'yyyy/M/d',
  'yyyyMMdd',
  'd/M/yyyy',
  'M/d/yyyy',
  'd.M.yyyy',
] as const;

const TRAILING_TIME = /,?\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?$/i;

// Reference point for parse(); only date parts are read from the result
const PARSE_REFERENCE = new Date(2000, 0, 1);

export function parseReportDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const candidate = value
    .trim()
    .replace(TRAILING_TIME, '')
    .replace(/(\b[A-Za-z]{3,})\./, '$1')
    .trim();
  if (!candidate) {
    return null;
  }

  for (const format of REPORT_DATE_FORMATS) {
    const parsed = parse(candidate, format, PARSE_REFERENCE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Completed years between birth and reference date: the year difference,
 * minus one when the reference month/day precedes the birth month/day.
 *
 * Null when either date is missing or unparseable, or when birth is after
 * the reference date.
 */
export function calculateAge(
  birthDate: string | null | undefined,
  referenceDate: string | null | undefined,
): number | null {
  const birth = parseReportDate(birthDate);
  const reference = parseReportDate(referenceDate);
  if (!birth || !reference || isAfter(birth, reference)) {
    return null;
  }
  return differenceInYears(reference, birth);
}
