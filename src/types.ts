export const HOUR_STATES = [
  "yes",
  "no",
  "maybe",
  "first",
  "second",
  "mfirst",
  "msecond",
] as const;

export type HourState = (typeof HOUR_STATES)[number];

export const HOURS_PER_DAY = 24;
export const SLOTS_PER_DAY = HOURS_PER_DAY * 2;

// Hour "1" spans 00:00-01:00, hour "24" spans 23:00-24:00
export type GroupSchedule = Record<string, HourState>;

export type DaySchedule = Record<string, GroupSchedule>;

// Keyed by day-start Unix timestamp (seconds) in the publication timezone
export type FactData = Record<string, DaySchedule>;

export interface SchedulePreset {
  time_zone?: Record<string, [string, string, string]>;
  time_type?: Partial<Record<string, string>>;
}

export interface ScheduleFile {
  regionId?: string;
  lastUpdated?: string; // ISO-8601 UTC with milliseconds
  fact: {
    data: FactData;
    update: string; // "HH:MM DD.MM.YYYY" as published
    today: number;
  };
  preset?: SchedulePreset;
}

export interface PreviousState {
  data: FactData;
  update?: string;
  timestamp: string;
}

export interface RawGroupSamples {
  groupId: string;
  flags: boolean[];
}

export interface RawDaySamples {
  dayKey: string;
  date: string; // "DD.MM.YYYY"
  groups: RawGroupSamples[];
}

export type ChangeTag = "worse" | "better";
export type ChangeKind = ChangeTag | "same";

export type CellToken = "AVAILABLE" | "OUTAGE" | "POSSIBLE";

export interface CellHalves {
  left: CellToken;
  right: CellToken;
}

export type Rgb = readonly [number, number, number];
