/**
 * Normalises the date formats banks put in notifications to DD-MM-YYYY.
 */

import { DateTime } from 'luxon';

const NUMERIC_DATE = /^(\d{1,2})[-/](\d{1,2})[-/](\d{2}|\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_NAME_FORMATS = ['MMM d, yyyy', 'MMM d yyyy', 'd MMM yyyy', 'd MMM, yyyy', 'MMMM d, yyyy', 'd MMMM yyyy', 'd-MMM-yyyy', 'd-MMM-yy'];
const OUTPUT_FORMAT = 'dd-LL-yyyy';

/** Two-digit years above 50 are 19xx, the rest 20xx. */
function expandYear(year: string): string {
  if (year.length === 4) return year;
  return Number(year) > 50 ? `19${year}` : `20${year}`;
}

/** Returns the input unchanged when no known format matches. */
export function standardizeDate(value: string): string {
  const trimmed = value.trim();

  const numeric = NUMERIC_DATE.exec(trimmed);
  if (numeric) {
    const [, day = '', month = '', year = ''] = numeric;
    return `${day.padStart(2, '0')}-${month.padStart(2, '0')}-${expandYear(year)}`;
  }

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const [, year = '', month = '', day = ''] = iso;
    return `${day}-${month}-${year}`;
  }

  for (const format of MONTH_NAME_FORMATS) {
    const parsed = DateTime.fromFormat(trimmed, format, { locale: 'en-US' });
    if (parsed.isValid) {
      return parsed.toFormat(OUTPUT_FORMAT);
    }
  }

  return value;
}
