import { addDays, startOfDay, startOfMonth, startOfQuarter, startOfWeek, startOfYear } from 'date-fns';

export type ReportRangeKind = 'today' | 'week' | 'month' | 'quarter' | 'year' | 'custom';

/** Half-open interval `[from, to)` over lead and email creation times. */
export interface ReportRange {
  kind: ReportRangeKind;
  from: Date;
  to: Date;
}

const periodStart = (kind: Exclude<ReportRangeKind, 'custom'>, now: Date): Date => {
  switch (kind) {
    case 'today':
      return startOfDay(now);
    case 'week':
      return startOfWeek(now, { weekStartsOn: 1 });
    case 'month':
      return startOfMonth(now);
    case 'quarter':
      return startOfQuarter(now);
    case 'year':
      return startOfYear(now);
  }
};

/**
 * Named ranges run from the start of the period through the end of today.
 * Custom ranges include both calendar days and are swapped when reversed.
 */
export const resolveReportRange = (
  kind: ReportRangeKind,
  now: Date,
  custom: { from?: Date; to?: Date } = {}
): ReportRange => {
  const endOfToday = addDays(startOfDay(now), 1);

  if (kind === 'custom' && custom.from && custom.to) {
    const [first, last] = custom.from <= custom.to ? [custom.from, custom.to] : [custom.to, custom.from];
    return { kind, from: startOfDay(first), to: addDays(startOfDay(last), 1) };
  }

  const named = kind === 'custom' ? 'month' : kind;
  return { kind: named, from: periodStart(named, now), to: endOfToday };
};
