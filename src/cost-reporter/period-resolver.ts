import {
  addDays,
  countDays,
  firstDayOfMonth,
  lastDayOfMonth,
  monthOf,
  parseIsoDate,
  startOfIsoWeek,
  utcDateOf,
  yearOf,
} from './calendar';
import { InvalidRangeError, UnrecognizedPeriodError } from './errors';
import type { DateRange, IsoDate } from './types';

export type ParsedPeriod =
  | { kind: 'explicit-range'; start: IsoDate; end: IsoDate }
  | { kind: 'single-date'; date: IsoDate }
  | { kind: 'day-relative'; day: 'today' | 'yesterday' }
  | { kind: 'last-n-days'; days: number }
  | { kind: 'week-relative'; week: 'this' | 'last' }
  | { kind: 'month-relative'; month: 'this' | 'last' }
  | { kind: 'named-month'; month: number; year?: number };

type PeriodKind = ParsedPeriod['kind'];

interface PeriodGrammar {
  kind: PeriodKind;
  parse(expression: string): ParsedPeriod | undefined;
}

// Earliest date a resolved range may start on; later ones stay four-digit ISO years.
const EARLIEST_DATE: IsoDate = '0000-01-01';

const MONTHS = new Map<string, number>([
  ['january', 1], ['february', 2], ['march', 3], ['april', 4], ['may', 5], ['june', 6],
  ['july', 7], ['august', 8], ['september', 9], ['october', 10], ['november', 11], ['december', 12],
  ['jan', 1], ['feb', 2], ['mar', 3], ['apr', 4], ['jun', 6],
  ['jul', 7], ['aug', 8], ['sep', 9], ['oct', 10], ['nov', 11], ['dec', 12],
]);

/** Grammars in priority order; the first one that parses wins. */
const PERIOD_GRAMMARS: readonly PeriodGrammar[] = [
  {
    kind: 'explicit-range',
    parse(expression) {
      const parts = expression.split(' to ');
      if (parts.length !== 2) return undefined;
      const start = parseIsoDate(parts[0].trim());
      const end = parseIsoDate(parts[1].trim());
      return start && end ? { kind: 'explicit-range', start, end } : undefined;
    },
  },
  {
    kind: 'single-date',
    parse(expression) {
      const date = parseIsoDate(expression);
      return date ? { kind: 'single-date', date } : undefined;
    },
  },
  {
    kind: 'day-relative',
    parse(expression) {
      return expression === 'today' || expression === 'yesterday'
        ? { kind: 'day-relative', day: expression }
        : undefined;
    },
  },
  {
    kind: 'last-n-days',
    parse(expression) {
      const match = expression.match(/^last (\d+) days?$/);
      if (!match) return undefined;
      const days = parseInt(match[1], 10);
      return days > 0 ? { kind: 'last-n-days', days } : undefined;
    },
  },
  {
    kind: 'week-relative',
    parse(expression) {
      switch (expression) {
        case 'this week':
          return { kind: 'week-relative', week: 'this' };
        case 'last week':
        case 'past week':
          return { kind: 'week-relative', week: 'last' };
        default:
          return undefined;
      }
    },
  },
  {
    kind: 'month-relative',
    parse(expression) {
      switch (expression) {
        case 'this month':
          return { kind: 'month-relative', month: 'this' };
        case 'last month':
        case 'past month':
          return { kind: 'month-relative', month: 'last' };
        default:
          return undefined;
      }
    },
  },
  {
    kind: 'named-month',
    parse(expression) {
      const match = expression.match(/^([a-z]+)(?: (\d{4}))?$/);
      if (!match) return undefined;
      const month = MONTHS.get(match[1]);
      if (month === undefined) return undefined;
      return match[2] === undefined
        ? { kind: 'named-month', month }
        : { kind: 'named-month', month, year: parseInt(match[2], 10) };
    },
  },
];

function normalizePeriodExpression(expression: string): string {
  return expression.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function parsePeriod(expression: string): ParsedPeriod {
  const normalized = normalizePeriodExpression(expression);
  for (const grammar of PERIOD_GRAMMARS) {
    const parsed = grammar.parse(normalized);
    if (parsed) {
      return parsed;
    }
  }
  throw new UnrecognizedPeriodError(expression.trim());
}

function wholeMonth(year: number, month: number): DateRange {
  return { start: firstDayOfMonth(year, month), end: lastDayOfMonth(year, month) };
}

/**
 * Turns a parsed period into an inclusive UTC date range anchored on `today`.
 *
 * A named month without a year resolves to the current year unless that month has not
 * started yet, in which case the same month of the previous year is used: asked in
 * January, "december" means the December just gone.
 */
function resolveParsedPeriod(period: ParsedPeriod, today: IsoDate): DateRange {
  switch (period.kind) {
    case 'explicit-range':
      if (period.start > period.end) {
        throw new InvalidRangeError(period.start, period.end);
      }
      return { start: period.start, end: period.end };

    case 'single-date':
      return { start: period.date, end: period.date };

    case 'day-relative': {
      const day = period.day === 'today' ? today : addDays(today, -1);
      return { start: day, end: day };
    }

    case 'last-n-days':
      if (period.days > countDays(EARLIEST_DATE, today)) {
        throw new UnrecognizedPeriodError(`last ${period.days} days`);
      }
      return { start: addDays(today, -(period.days - 1)), end: today };

    case 'week-relative': {
      const monday = startOfIsoWeek(today);
      if (period.week === 'this') {
        return { start: monday, end: today };
      }
      return { start: addDays(monday, -7), end: addDays(monday, -1) };
    }

    case 'month-relative': {
      if (period.month === 'this') {
        return { start: firstDayOfMonth(yearOf(today), monthOf(today)), end: today };
      }
      const previous = addDays(firstDayOfMonth(yearOf(today), monthOf(today)), -1);
      return wholeMonth(yearOf(previous), monthOf(previous));
    }

    case 'named-month': {
      if (period.year !== undefined) {
        return wholeMonth(period.year, period.month);
      }
      const year = period.month > monthOf(today) ? yearOf(today) - 1 : yearOf(today);
      return wholeMonth(year, period.month);
    }
  }
}

export function resolvePeriod(expression: string, now: Date): DateRange {
  return resolveParsedPeriod(parsePeriod(expression), utcDateOf(now));
}
