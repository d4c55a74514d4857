import { isDeepStrictEqual } from "util";
import { assembleFactData } from "./core/scheduleAssembler";
import { diffSnapshots, sortDayKeys } from "./core/snapshotDiffer";
import {
  buildDayOverview,
  buildGroupGrid,
  DisplayView,
  groupGridName,
  overviewGridName,
  PlanOptions,
  selectDisplayDays,
} from "./gridPlanner";
import { createLogger } from "./logger";
import type { PageSource } from "./pageClient";
import type { ScheduleParser } from "./scheduleParser";
import type { SnapshotStore } from "./snapshotStore";
import { calendarDateOf, dayStartTimestamp } from "./time";
import { FactData, HOURS_PER_DAY, ScheduleFile } from "./types";

const log = createLogger("job");

export interface JobDependencies {
  source: Pick<PageSource, "fetchPage">;
  parser: ScheduleParser;
  store: SnapshotStore;
  regionId: string;
  timezone: string;
  now?: () => Date;
}

export type CycleResult =
  | { updated: false; reason: "no-schedule" | "unchanged" }
  | {
      updated: true;
      worse: number;
      better: number;
      malformed: number;
      grids: string[];
    };

const TIME_TYPE_LABELS: Partial<Record<string, string>> = {
  yes: "Світло є",
  maybe: "Можливе відключення",
  no: "Світла немає",
  first: "Світла не буде перші 30 хв.",
  second: "Світла не буде другі 30 хв.",
};

function timeZonePreset(): Record<string, [string, string, string]> {
  const pad = (value: number): string => value.toString().padStart(2, "0");
  const zones: Record<string, [string, string, string]> = {};
  for (let i = 1; i <= HOURS_PER_DAY; i++) {
    zones[String(i)] = [`${pad(i - 1)}-${pad(i)}`, `${pad(i - 1)}:00`, `${pad(i)}:00`];
  }
  return zones;
}

export function buildScheduleFile(
  data: FactData,
  update: string,
  now: Date,
  regionId: string,
  timezone: string
): ScheduleFile {
  return {
    regionId,
    lastUpdated: now.toISOString(),
    fact: {
      data,
      update,
      today: dayStartTimestamp(calendarDateOf(now, timezone), timezone),
    },
    preset: {
      time_zone: timeZonePreset(),
      time_type: { ...TIME_TYPE_LABELS },
    },
  };
}

/** Groups of the first published day, in source order. */
function groupsOf(data: FactData): string[] {
  const [firstDay] = sortDayKeys(Object.keys(data));
  return firstDay ? Object.keys(data[firstDay] ?? {}) : [];
}

/**
 * One fetch → parse → assemble → diff → persist pass. Returns early without
 * writing anything when the page has no schedule or nothing changed.
 */
export async function runCycle(deps: JobDependencies): Promise<CycleResult> {
  const now = deps.now?.() ?? new Date();
  const options: PlanOptions = { timezone: deps.timezone, now };

  const html = await deps.source.fetchPage();
  const parsed = deps.parser.parse(html, now);
  if (parsed.days.length === 0) {
    log.error("No schedules parsed, stopping");
    return { updated: false, reason: "no-schedule" };
  }

  const assembled = assembleFactData(parsed.days);
  if (assembled.malformed > 0) {
    log.warn(`${assembled.malformed} group(s) defaulted to available all day`);
  }

  const stored = await deps.store.loadSchedule();
  if (stored && isDeepStrictEqual(stored.fact.data, assembled.data)) {
    log.info("No changes detected, skipping write");
    return { updated: false, reason: "unchanged" };
  }

  const file = buildScheduleFile(
    assembled.data,
    parsed.update,
    now,
    deps.regionId,
    deps.timezone
  );
  await deps.store.saveSchedule(file);

  try {
    return await publishChanges(deps, file, assembled.malformed, options);
  } catch (error) {
    // Without the stored file the next tick sees the data as new and retries
    await deps.store.removeSchedule();
    throw error;
  }
}

async function publishChanges(
  deps: JobDependencies,
  file: ScheduleFile,
  malformed: number,
  options: PlanOptions
): Promise<CycleResult> {
  const now = options.now ?? new Date();
  const previous = await deps.store.loadPreviousState();
  const diff = diffSnapshots(previous?.data, file.fact.data);
  if (diff.firstChange) {
    const { dayKey, groupId, hour, from, to, change } = diff.firstChange;
    log.info(
      `First change: day=${dayKey}, group=${groupId}, hour=${hour}, ${from} -> ${to} (${change})`
    );
  }
  log.info(`Changes since previous state: worse=${diff.worse}, better=${diff.better}`);

  const grids: string[] = [];
  for (const groupId of groupsOf(file.fact.data)) {
    const plan = buildGroupGrid(file, groupId, diff.tags, options);
    if (plan.worse > 0 || plan.better > 0) {
      log.info(`${groupId}: worse=${plan.worse}, better=${plan.better}`);
    }
    grids.push(await deps.store.saveGrid(groupGridName(groupId), plan));
  }

  const views = new Set<DisplayView>();
  for (const day of selectDisplayDays(Object.keys(file.fact.data), file.fact.today, deps.timezone)) {
    const plan = buildDayOverview(file, day, diff.tags, options);
    grids.push(await deps.store.saveGrid(overviewGridName(day.view), plan));
    views.add(day.view);
  }
  if (!views.has("tomorrow")) {
    await deps.store.removeGrid(overviewGridName("tomorrow"));
  }

  await deps.store.savePreviousState(file, now);

  return {
    updated: true,
    worse: diff.worse,
    better: diff.better,
    malformed,
    grids,
  };
}
