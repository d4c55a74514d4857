import {
  ChangeKind,
  ChangeTag,
  FactData,
  GroupSchedule,
  HOURS_PER_DAY,
  HourState,
} from "../types";
import { normalizeState, severity } from "./severity";

export interface HourChange {
  dayKey: string;
  groupId: string;
  hour: string;
  from: HourState;
  to: HourState;
  change: ChangeTag;
}

export interface GroupDiff {
  worse: number;
  better: number;
  tags: Partial<Record<string, ChangeTag>>;
  firstChange?: { hour: string; from: HourState; to: HourState; change: ChangeTag };
}

export type ChangeTags = Record<string, Record<string, Partial<Record<string, ChangeTag>>>>;

export interface SnapshotDiff {
  worse: number;
  better: number;
  firstChange?: HourChange;
  tags: ChangeTags;
}

/**
 * With no previous value there is nothing to compare against, so the result
 * is "same" regardless of the new state.
 */
export function classifyChange(
  previous: string | undefined,
  next: string
): ChangeKind {
  if (previous === undefined) {
    return "same";
  }

  const before = severity(previous);
  const after = severity(next);
  if (after > before) {
    return "worse";
  }
  if (after < before) {
    return "better";
  }
  return "same";
}

export function diffGroup(
  previousHours: Partial<GroupSchedule> | undefined,
  currentHours: Partial<GroupSchedule> | undefined
): GroupDiff {
  const diff: GroupDiff = { worse: 0, better: 0, tags: {} };
  if (!previousHours) {
    return diff;
  }

  for (let h = 1; h <= HOURS_PER_DAY; h++) {
    const hour = String(h);
    const from = previousHours[hour];
    if (from === undefined) {
      continue;
    }

    const to = normalizeState(currentHours?.[hour]);
    const change = classifyChange(from, to);
    if (change === "same") {
      continue;
    }

    diff[change] += 1;
    diff.tags[hour] = change;
    diff.firstChange ??= { hour, from, to, change };
  }

  return diff;
}

export function sortDayKeys(keys: Iterable<string>): string[] {
  return [...keys].sort((a, b) => {
    const byNumber = Number(a) - Number(b);
    return Number.isNaN(byNumber) ? a.localeCompare(b) : byNumber;
  });
}

/**
 * Walks days ascending, groups in the current schedule's order and hours 1..24.
 * Only (day, group, hour) triples present in both snapshots are classified.
 */
export function diffSnapshots(
  previous: FactData | undefined,
  current: FactData
): SnapshotDiff {
  const result: SnapshotDiff = { worse: 0, better: 0, tags: {} };
  if (!previous) {
    return result;
  }

  for (const dayKey of sortDayKeys(Object.keys(current))) {
    const currentDay = current[dayKey];
    const previousDay = previous[dayKey];
    if (!currentDay || !previousDay) {
      continue;
    }

    for (const [groupId, currentHours] of Object.entries(currentDay)) {
      const groupDiff = diffGroup(previousDay[groupId], currentHours);
      if (groupDiff.worse === 0 && groupDiff.better === 0) {
        continue;
      }

      result.worse += groupDiff.worse;
      result.better += groupDiff.better;
      const dayTags = (result.tags[dayKey] ??= {});
      dayTags[groupId] = groupDiff.tags;
      if (!result.firstChange && groupDiff.firstChange) {
        result.firstChange = { dayKey, groupId, ...groupDiff.firstChange };
      }
    }
  }

  return result;
}

export function changeAt(
  tags: ChangeTags,
  dayKey: string,
  groupId: string,
  hour: string
): ChangeTag | undefined {
  return tags[dayKey]?.[groupId]?.[hour];
}
