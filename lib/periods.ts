export type ParsedPeriod =
  | { quarter: string; year: string }
  | { quarter: null; year: null };

const NO_PERIOD: ParsedPeriod = { quarter: null, year: null };

const QUARTER_PATTERN = /Q([1-4])\s*(?:FY)?\s*(\d{2,4})/i;
const MONTH_YEAR_PATTERN =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?,?\s+(\d{4})(?!\d)/i;

// Indian fiscal year runs April-March and is named after the March it ends in.
// From May onwards the label moves to the next fiscal year.
const INDIAN_FY_MONTHS: Record<string, { quarter: string; yearOffset: number }> = {
  jan: { quarter: 'Q3', yearOffset: 0 },
  feb: { quarter: 'Q3', yearOffset: 0 },
  mar: { quarter: 'Q4', yearOffset: 0 },
  apr: { quarter: 'Q4', yearOffset: 0 },
  may: { quarter: 'Q1', yearOffset: 1 },
  jun: { quarter: 'Q1', yearOffset: 1 },
  jul: { quarter: 'Q1', yearOffset: 1 },
  aug: { quarter: 'Q2', yearOffset: 1 },
  sep: { quarter: 'Q2', yearOffset: 1 },
  oct: { quarter: 'Q2', yearOffset: 1 },
  nov: { quarter: 'Q3', yearOffset: 1 },
  dec: { quarter: 'Q3', yearOffset: 1 },
};

const ANNUAL_FORMS = new Set(['10-K', '10-K/A', '20-F', '40-F']);

export function fiscalYearLabel(year: number) {
  return `FY${String(((year % 100) + 100) % 100).padStart(2, '0')}`;
}

/** Folds a literal four-digit year into the `FY{nn}` form; other labels pass through. */
export function toFiscalYearLabel(year: string) {
  if (/^\d{4}$/.test(year)) return fiscalYearLabel(Number.parseInt(year, 10));
  return year;
}

/**
 * Reads a quarter and fiscal year out of free text such as "Q3FY26", "Q1 2025" or
 * "Jan 2026". Month names are mapped through the Indian fiscal calendar.
 */
export function parsePeriod(text: string): ParsedPeriod {
  const quarterMatch = QUARTER_PATTERN.exec(text);
  if (quarterMatch) {
    const yearToken = quarterMatch[2];
    return {
      quarter: `Q${quarterMatch[1]}`,
      year: yearToken.length === 2 ? `FY${yearToken}` : yearToken,
    };
  }

  const monthMatch = MONTH_YEAR_PATTERN.exec(text);
  if (monthMatch) {
    const mapping = INDIAN_FY_MONTHS[monthMatch[1].slice(0, 3).toLowerCase()];
    if (mapping) {
      const calendarYear = Number.parseInt(monthMatch[2], 10);
      return {
        quarter: mapping.quarter,
        year: fiscalYearLabel(calendarYear + mapping.yearOffset),
      };
    }
  }

  return NO_PERIOD;
}

/**
 * Maps a `YYYY-MM-DD` filing date to the calendar quarter it reports on. Quarterly
 * filings land in the quarter after the one they cover; annual forms keep their
 * filing year under the `FY` placeholder.
 */
export function calendarPeriodFromFilingDate(filingDate: string, form: string): ParsedPeriod {
  const match = /^(\d{4})-(\d{2})(?:-\d{2})?/.exec(filingDate.trim());
  if (!match) return NO_PERIOD;
  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  if (month < 1 || month > 12) return NO_PERIOD;

  if (ANNUAL_FORMS.has(form.toUpperCase())) return { quarter: 'FY', year: String(year) };
  if (month <= 3) return { quarter: 'Q4', year: String(year - 1) };
  if (month <= 6) return { quarter: 'Q1', year: String(year) };
  if (month <= 9) return { quarter: 'Q2', year: String(year) };
  return { quarter: 'Q3', year: String(year) };
}

function yearRank(year: string) {
  const digits = year.toUpperCase().startsWith('FY') ? year.slice(2) : year;
  const parsed = Number.parseInt(digits, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function quarterRank(quarter: string) {
  const match = /^Q([1-4])$/i.exec(quarter);
  if (match) return Number.parseInt(match[1], 10);
  return quarter.toUpperCase() === 'FY' ? 5 : 0;
}

/**
 * Keeps every record that belongs to the `count` most recent (quarter, year) periods.
 */
export function limitByQuarter<T extends { quarter: string; year: string }>(
  records: readonly T[],
  count: number,
): T[] {
  const byPeriod = new Map<string, { quarter: string; year: string; records: T[] }>();
  for (const record of records) {
    const key = `${record.quarter}|${record.year}`;
    const group = byPeriod.get(key);
    if (group) {
      group.records.push(record);
    } else {
      byPeriod.set(key, { quarter: record.quarter, year: record.year, records: [record] });
    }
  }

  return [...byPeriod.values()]
    .sort(
      (a, b) =>
        yearRank(b.year) - yearRank(a.year) || quarterRank(b.quarter) - quarterRank(a.quarter),
    )
    .slice(0, Math.max(0, count))
    .flatMap((group) => group.records);
}
