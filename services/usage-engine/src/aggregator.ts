import { format, getDaysInMonth, parseISO } from "date-fns";
import type { BatchConstants } from "@teabase/contracts";
import { batchYieldFor, batchYieldMlForComponent, type BatchYieldRecord } from "./batch-yield.js";
import type { UsageRow } from "./types.js";

export interface DailyComponentUsage {
  date: string;
  component: string;
  drinkCount: number;
  mlTotal: number;
}

export interface WeekdayUsage {
  component: string;
  weekday: string;
  days: number;
  avgMlTotal: number;
  avgDrinkCount: number;
}

export interface MonthWeekdayUsage extends WeekdayUsage {
  month: string;
}

export interface MonthCoverage {
  month: string;
  daysCovered: number;
  daysInMonth: number;
  fullMonth: boolean;
}

export interface MonthlyBatchUsage extends BatchYieldRecord {
  month: string;
  component: string;
  daysCovered: number;
  daysInMonth: number;
}

export interface MonthlyBatchReport {
  records: MonthlyBatchUsage[];
  /** Months present in the data but not fully covered; never reported on. */
  partialMonths: MonthCoverage[];
}

export interface WeekdayBatchNeed extends WeekdayUsage {
  batchYieldMl: number;
  avgBatchesNeeded: number;
}

const WEEKDAY_ORDER = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

export function weekdayOf(date: string): string {
  return format(parseISO(date), "EEEE");
}

export function monthOf(date: string): string {
  return date.slice(0, 7);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareWeekday(a: string, b: string): number {
  return WEEKDAY_ORDER.indexOf(a) - WEEKDAY_ORDER.indexOf(b);
}

/** Per day and tea component: distinct drinks and summed ml. */
export function aggregateDaily(usage: UsageRow[]): DailyComponentUsage[] {
  const groups = new Map<string, { date: string; component: string; drinks: Set<string>; ml: number }>();
  for (const row of usage) {
    for (const part of row.components) {
      const key = `${row.date}::${part.component}`;
      const group = groups.get(key) ?? { date: row.date, component: part.component, drinks: new Set<string>(), ml: 0 };
      group.drinks.add(row.lineItemId);
      group.ml += part.ml;
      groups.set(key, group);
    }
  }
  return [...groups.values()]
    .map((g) => ({ date: g.date, component: g.component, drinkCount: g.drinks.size, mlTotal: g.ml }))
    .sort((a, b) => compareText(a.date, b.date) || compareText(a.component, b.component));
}

/**
 * Average daily ml and drink count per weekday. Every observed day counts,
 * so a day on which a component sold nothing pulls its average down.
 */
function averageByPeriod(
  daily: DailyComponentUsage[],
  observedDates: string[],
  periodOf: (date: string) => string
): Array<{ period: string; component: string; days: number; avgMlTotal: number; avgDrinkCount: number }> {
  const daysPerPeriod = new Map<string, number>();
  for (const date of new Set(observedDates)) {
    const period = periodOf(date);
    daysPerPeriod.set(period, (daysPerPeriod.get(period) ?? 0) + 1);
  }

  const sums = new Map<string, { period: string; component: string; ml: number; drinks: number }>();
  for (const row of daily) {
    const period = periodOf(row.date);
    const key = `${period}::${row.component}`;
    const acc = sums.get(key) ?? { period, component: row.component, ml: 0, drinks: 0 };
    acc.ml += row.mlTotal;
    acc.drinks += row.drinkCount;
    sums.set(key, acc);
  }

  return [...sums.values()].map((acc) => {
    const days = daysPerPeriod.get(acc.period) ?? 0;
    return {
      period: acc.period,
      component: acc.component,
      days,
      avgMlTotal: days > 0 ? acc.ml / days : 0,
      avgDrinkCount: days > 0 ? acc.drinks / days : 0,
    };
  });
}

export function aggregateByWeekday(daily: DailyComponentUsage[], observedDates: string[]): WeekdayUsage[] {
  return averageByPeriod(daily, observedDates, weekdayOf)
    .map((r) => ({
      component: r.component,
      weekday: r.period,
      days: r.days,
      avgMlTotal: r.avgMlTotal,
      avgDrinkCount: r.avgDrinkCount,
    }))
    .sort((a, b) => compareText(a.component, b.component) || compareWeekday(a.weekday, b.weekday));
}

export function aggregateByMonthWeekday(daily: DailyComponentUsage[], observedDates: string[]): MonthWeekdayUsage[] {
  return averageByPeriod(daily, observedDates, (date) => `${monthOf(date)}|${weekdayOf(date)}`)
    .map((r) => {
      const [month = "", weekday = ""] = r.period.split("|");
      return {
        month,
        component: r.component,
        weekday,
        days: r.days,
        avgMlTotal: r.avgMlTotal,
        avgDrinkCount: r.avgDrinkCount,
      };
    })
    .sort(
      (a, b) =>
        compareText(a.month, b.month) || compareText(a.component, b.component) || compareWeekday(a.weekday, b.weekday)
    );
}

/** Which months the source data covers completely. */
export function computeMonthCoverage(observedDates: string[]): MonthCoverage[] {
  const daysByMonth = new Map<string, Set<string>>();
  for (const date of observedDates) {
    const month = monthOf(date);
    const days = daysByMonth.get(month) ?? new Set<string>();
    days.add(date);
    daysByMonth.set(month, days);
  }
  return [...daysByMonth.entries()]
    .map(([month, days]) => {
      const daysInMonth = getDaysInMonth(parseISO(`${month}-01`));
      return { month, daysCovered: days.size, daysInMonth, fullMonth: days.size === daysInMonth };
    })
    .sort((a, b) => compareText(a.month, b.month));
}

/**
 * Bags of leaf per full month for each component that has batch constants.
 * Partial months are returned separately and never converted to bags.
 */
export function computeMonthlyBatchUsage(
  daily: DailyComponentUsage[],
  observedDates: string[],
  constants: BatchConstants[]
): MonthlyBatchReport {
  const coverage = computeMonthCoverage(observedDates);
  const mlByMonthComponent = new Map<string, number>();
  for (const row of daily) {
    const key = `${monthOf(row.date)}::${row.component}`;
    mlByMonthComponent.set(key, (mlByMonthComponent.get(key) ?? 0) + row.mlTotal);
  }

  const records: MonthlyBatchUsage[] = [];
  for (const month of coverage.filter((c) => c.fullMonth)) {
    for (const constant of constants) {
      const teaMlTotal = mlByMonthComponent.get(`${month.month}::${constant.teaComponent}`) ?? 0;
      records.push({
        month: month.month,
        component: constant.teaComponent,
        daysCovered: month.daysCovered,
        daysInMonth: month.daysInMonth,
        ...batchYieldFor(teaMlTotal, constant),
      });
    }
  }

  return {
    records: records.sort((a, b) => compareText(a.month, b.month) || compareText(a.component, b.component)),
    partialMonths: coverage.filter((c) => !c.fullMonth),
  };
}

/** Average batches to brew per weekday, using each component's batch yield. */
export function computeWeekdayBatchNeeds(
  weekday: WeekdayUsage[],
  yieldsByBatchKey: Record<string, number>
): WeekdayBatchNeed[] {
  return weekday.map((row) => {
    const batchYieldMl = batchYieldMlForComponent(row.component, yieldsByBatchKey);
    return { ...row, batchYieldMl, avgBatchesNeeded: row.avgMlTotal / batchYieldMl };
  });
}
