import { isSplit, resolveCellHalves } from "./core/boundaryResolver";
import { normalizeState } from "./core/severity";
import { ChangeTags, sortDayKeys } from "./core/snapshotDiffer";
import { formatDate, formatDayKey, calendarDateOf, SECONDS_PER_DAY } from "./time";
import {
  CellHalves,
  CellToken,
  ChangeTag,
  GroupSchedule,
  HOURS_PER_DAY,
  HourState,
  Rgb,
  ScheduleFile,
} from "./types";

export const PALETTE: Readonly<Record<CellToken | ChangeTag, Rgb>> = {
  AVAILABLE: [255, 255, 255],
  OUTAGE: [147, 170, 210],
  POSSIBLE: [255, 220, 115],
  worse: [220, 53, 69],
  better: [40, 167, 69],
};

const STATE_LABELS: Record<HourState, string> = {
  yes: "Електроенергія розподіляється",
  no: "Електроенергія відсутня",
  maybe: "Можливе відключення",
  first: "Світла не буде перші 30 хв.",
  second: "Світла не буде другі 30 хв.",
  mfirst: "Світла можливо не буде перші 30 хв.",
  msecond: "Світла можливо не буде другі 30 хв.",
};

const LEGEND_STATES: Array<{ state: HourState; token: CellToken }> = [
  { state: "yes", token: "AVAILABLE" },
  { state: "no", token: "OUTAGE" },
  { state: "maybe", token: "POSSIBLE" },
];

const CHANGE_LABELS: Record<ChangeTag, string> = {
  worse: "Більше відключень",
  better: "Менше відключень",
};

export interface GridCell {
  hour: string;
  label: string; // "00-01"
  state: HourState;
  halves: CellHalves;
  fill: { left: Rgb; right: Rgb };
  split: boolean;
  highlight?: { change: ChangeTag; outline: Rgb };
}

export interface GridRow {
  key: string;
  label: string;
  cells: GridCell[];
}

export interface LegendEntry {
  label: string;
  fill: Rgb;
  outline?: Rgb;
}

export interface GridPlan {
  title: string;
  badge: string;
  rows: GridRow[];
  legend: LegendEntry[];
  published: string;
  worse: number;
  better: number;
}

export type DisplayView = "today" | "tomorrow";

export interface DisplayDay {
  dayKey: string;
  view: DisplayView;
  date: string;
}

export interface PlanOptions {
  timezone: string;
  now?: Date;
}

export function hourLabel(hour: number): string {
  const pad = (value: number): string => value.toString().padStart(2, "0");
  return `${pad(hour - 1)}-${pad(hour)}`;
}

export function describeState(state: HourState, file: ScheduleFile): string {
  return file.preset?.time_type?.[state] ?? STATE_LABELS[state];
}

/** Cells of one schedule row; neighbours stop at the day edges. */
export function buildCells(
  hours: Partial<GroupSchedule> | undefined,
  tags: Partial<Record<string, ChangeTag>> = {}
): GridCell[] {
  const stateAt = (hour: number): HourState => normalizeState(hours?.[String(hour)]);
  const cells: GridCell[] = [];

  for (let h = 1; h <= HOURS_PER_DAY; h++) {
    const state = stateAt(h);
    const halves = resolveCellHalves(
      state,
      h > 1 ? stateAt(h - 1) : undefined,
      h < HOURS_PER_DAY ? stateAt(h + 1) : undefined
    );
    const cell: GridCell = {
      hour: String(h),
      label: hourLabel(h),
      state,
      halves,
      fill: { left: PALETTE[halves.left], right: PALETTE[halves.right] },
      split: isSplit(halves),
    };

    const change = tags[String(h)];
    if (change) {
      cell.highlight = { change, outline: PALETTE[change] };
    }
    cells.push(cell);
  }

  return cells;
}

function countChanges(rows: GridRow[]): { worse: number; better: number } {
  const counts = { worse: 0, better: 0 };
  for (const row of rows) {
    for (const cell of row.cells) {
      if (cell.highlight) {
        counts[cell.highlight.change] += 1;
      }
    }
  }
  return counts;
}

function buildLegend(file: ScheduleFile, withChanges: boolean): LegendEntry[] {
  const legend: LegendEntry[] = LEGEND_STATES.map(({ state, token }) => ({
    label: describeState(state, file),
    fill: PALETTE[token],
  }));

  if (withChanges) {
    for (const change of ["worse", "better"] as const) {
      legend.push({
        label: CHANGE_LABELS[change],
        fill: PALETTE.AVAILABLE,
        outline: PALETTE[change],
      });
    }
  }
  return legend;
}

export function publishedLabel(file: ScheduleFile, options: PlanOptions): string {
  const text =
    file.fact.update ||
    file.lastUpdated ||
    formatDate(calendarDateOf(options.now ?? new Date(), options.timezone));
  return `Опубліковано ${text}`;
}

/** Queue ids with a number sort by that number first, the rest keep source order after them. */
export function sortGroups(groupIds: readonly string[]): string[] {
  const rank = (id: string): number | undefined => {
    const match = id.match(/(\d+)/);
    return match && match[1] ? parseInt(match[1], 10) : undefined;
  };

  return [...groupIds].sort((a, b) => {
    const ra = rank(a);
    const rb = rank(b);
    if (ra === undefined || rb === undefined) {
      return (ra === undefined ? 1 : 0) - (rb === undefined ? 1 : 0);
    }
    return ra - rb;
  });
}

/**
 * Today's key maps to the "today" view and the next day to "tomorrow". Other
 * keys are shown only when they are the sole key; with no match the last key
 * stands in for today.
 */
export function selectDisplayDays(
  dayKeys: readonly string[],
  todayTs: number,
  timezone: string
): DisplayDay[] {
  const sorted = sortDayKeys(dayKeys);
  const result: DisplayDay[] = [];

  for (const dayKey of sorted) {
    const diff = Math.floor((Number(dayKey) - todayTs) / SECONDS_PER_DAY);
    const date = formatDayKey(dayKey, timezone);
    if (diff === 0) {
      result.push({ dayKey, view: "today", date });
    } else if (diff === 1) {
      result.push({ dayKey, view: "tomorrow", date });
    } else if (sorted.length === 1) {
      result.push({ dayKey, view: "today", date });
    }
  }

  const last = sorted[sorted.length - 1];
  if (result.length === 0 && last !== undefined) {
    result.push({ dayKey: last, view: "today", date: formatDayKey(last, timezone) });
  }
  return result;
}

/** One queue across the first `maxDays` published days. */
export function buildGroupGrid(
  file: ScheduleFile,
  groupId: string,
  tags: ChangeTags,
  options: PlanOptions,
  maxDays = 2
): GridPlan {
  const rows: GridRow[] = sortDayKeys(Object.keys(file.fact.data))
    .slice(0, maxDays)
    .map((dayKey) => ({
      key: dayKey,
      label: formatDayKey(dayKey, options.timezone),
      cells: buildCells(file.fact.data[dayKey]?.[groupId], tags[dayKey]?.[groupId]),
    }));

  const counts = countChanges(rows);
  return {
    title: "Графік відключень:",
    badge: `Черга ${groupId.replace("GPV", "")}`,
    rows,
    legend: buildLegend(file, counts.worse > 0 || counts.better > 0),
    published: publishedLabel(file, options),
    ...counts,
  };
}

/** Every queue for a single day. */
export function buildDayOverview(
  file: ScheduleFile,
  day: DisplayDay,
  tags: ChangeTags,
  options: PlanOptions
): GridPlan {
  const schedule = file.fact.data[day.dayKey] ?? {};
  const rows: GridRow[] = sortGroups(Object.keys(schedule)).map((groupId) => ({
    key: groupId,
    label: groupId.replace("GPV", ""),
    cells: buildCells(schedule[groupId], tags[day.dayKey]?.[groupId]),
  }));

  const counts = countChanges(rows);
  return {
    title: "Графік відключень",
    badge: day.view === "today" ? `на сьогодні ${day.date}` : `на завтра ${day.date}`,
    rows,
    legend: buildLegend(file, counts.worse > 0 || counts.better > 0),
    published: publishedLabel(file, options),
    ...counts,
  };
}

export function groupGridName(groupId: string): string {
  return `gpv-${groupId.replace("GPV", "").replace(/\./g, "-")}-emergency`;
}

export function overviewGridName(view: DisplayView): string {
  return `gpv-all-${view}`;
}
