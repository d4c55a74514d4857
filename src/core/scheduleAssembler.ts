import { InvalidSampleCountError } from "../errors";
import { createLogger } from "../logger";
import {
  DaySchedule,
  FactData,
  GroupSchedule,
  HOURS_PER_DAY,
  RawDaySamples,
  RawGroupSamples,
} from "../types";
import { decodeGroupFlags } from "./stateDecoder";
import { sortDayKeys } from "./snapshotDiffer";

const log = createLogger("assembler");

export interface AssembledGroup {
  schedule: GroupSchedule;
  error?: InvalidSampleCountError;
}

export interface AssembledDay {
  schedule: DaySchedule;
  malformed: InvalidSampleCountError[];
}

export interface AssembledFact {
  data: FactData;
  malformed: number;
}

export function availableAllDay(): GroupSchedule {
  const schedule: GroupSchedule = {};
  for (let hour = 1; hour <= HOURS_PER_DAY; hour++) {
    schedule[String(hour)] = "yes";
  }
  return schedule;
}

export function assembleGroupSchedule(
  flags: readonly boolean[],
  groupId?: string
): AssembledGroup {
  try {
    return { schedule: decodeGroupFlags(flags, groupId) };
  } catch (error) {
    if (error instanceof InvalidSampleCountError) {
      return { schedule: availableAllDay(), error };
    }
    throw error;
  }
}

/**
 * Decodes every group of one day in source order. A group with the wrong
 * number of slots is kept as available all day and reported in `malformed`.
 */
export function assembleDaySchedule(
  groups: readonly RawGroupSamples[]
): AssembledDay {
  const schedule: DaySchedule = {};
  const malformed: InvalidSampleCountError[] = [];

  for (const { groupId, flags } of groups) {
    const assembled = assembleGroupSchedule(flags, groupId);
    schedule[groupId] = assembled.schedule;
    if (assembled.error) {
      log.warn(assembled.error.message);
      malformed.push(assembled.error);
    }
  }

  if (malformed.length > 0) {
    log.warn(`${malformed.length} of ${groups.length} group(s) had malformed samples`);
  }

  return { schedule, malformed };
}

export function assembleFactData(days: readonly RawDaySamples[]): AssembledFact {
  const byKey = new Map<string, DaySchedule>();
  let malformed = 0;

  for (const day of days) {
    const assembled = assembleDaySchedule(day.groups);
    byKey.set(day.dayKey, assembled.schedule);
    malformed += assembled.malformed.length;
    log.debug(`${day.date}: assembled ${day.groups.length} group(s)`);
  }

  const data: FactData = {};
  for (const dayKey of sortDayKeys(byKey.keys())) {
    const schedule = byKey.get(dayKey);
    if (schedule) {
      data[dayKey] = schedule;
    }
  }

  return { data, malformed };
}
