import fs from "fs-extra";
import path from "path";
import { normalizeState } from "./core/severity";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import {
  DaySchedule,
  FactData,
  GroupSchedule,
  PreviousState,
  SchedulePreset,
  ScheduleFile,
} from "./types";

const log = createLogger("store");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Reads `fact.data` as stored on disk. Unknown state symbols become "yes";
 * entries that are not objects are dropped.
 */
export function readFactData(value: unknown): FactData {
  const data: FactData = {};
  if (!isRecord(value)) {
    return data;
  }

  for (const [dayKey, day] of Object.entries(value)) {
    if (!isRecord(day)) {
      continue;
    }
    const schedule: DaySchedule = {};
    for (const [groupId, hours] of Object.entries(day)) {
      if (!isRecord(hours)) {
        continue;
      }
      const group: GroupSchedule = {};
      for (const [hour, state] of Object.entries(hours)) {
        group[hour] = normalizeState(state);
      }
      schedule[groupId] = group;
    }
    data[dayKey] = schedule;
  }

  return data;
}

function readPreset(value: unknown): SchedulePreset | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const preset: SchedulePreset = {};
  const timeType = value.time_type;
  const timeZone = value.time_zone;
  if (isRecord(timeType)) {
    const labels: Partial<Record<string, string>> = {};
    for (const [state, label] of Object.entries(timeType)) {
      if (typeof label === "string") {
        labels[state] = label;
      }
    }
    preset.time_type = labels;
  }
  if (isRecord(timeZone)) {
    const zones: Record<string, [string, string, string]> = {};
    for (const [hour, labels] of Object.entries(timeZone)) {
      if (Array.isArray(labels) && labels.length === 3) {
        const [range, start, end] = labels;
        if (
          typeof range === "string" &&
          typeof start === "string" &&
          typeof end === "string"
        ) {
          zones[hour] = [range, start, end];
        }
      }
    }
    preset.time_zone = zones;
  }
  return preset;
}

export function readScheduleFile(value: unknown): ScheduleFile | null {
  if (!isRecord(value)) {
    return null;
  }
  const fact = value.fact;
  if (!isRecord(fact)) {
    return null;
  }

  const file: ScheduleFile = {
    fact: {
      data: readFactData(fact.data),
      update: optionalString(fact.update) ?? "",
      today: typeof fact.today === "number" ? fact.today : Number(fact.today ?? 0),
    },
  };

  const regionId = optionalString(value.regionId);
  if (regionId) {
    file.regionId = regionId;
  }
  const lastUpdated = optionalString(value.lastUpdated);
  if (lastUpdated) {
    file.lastUpdated = lastUpdated;
  }
  const preset = readPreset(value.preset);
  if (preset) {
    file.preset = preset;
  }

  return file;
}

export function readPreviousState(value: unknown): PreviousState | null {
  if (!isRecord(value)) {
    return null;
  }

  const state: PreviousState = {
    data: readFactData(value.data),
    timestamp: optionalString(value.timestamp) ?? "",
  };
  const update = optionalString(value.update);
  if (update) {
    state.update = update;
  }
  return state;
}

export class SnapshotStore {
  readonly schedulePath: string;
  readonly previousStatePath: string;
  readonly gridDir: string;

  constructor(outputDir: string, regionFileName: string) {
    this.schedulePath = path.resolve(outputDir, `${regionFileName}.json`);
    this.previousStatePath = path.resolve(outputDir, "prev_state", "previous_state.json");
    this.gridDir = path.resolve(outputDir, "grids");
  }

  async loadSchedule(): Promise<ScheduleFile | null> {
    return readScheduleFile(await this.readJson(this.schedulePath));
  }

  async saveSchedule(file: ScheduleFile): Promise<void> {
    await this.writeJson(this.schedulePath, file);
    log.info(
      `Saved schedule for ${Object.keys(file.fact.data).length} day(s) to ${this.schedulePath}`
    );
  }

  async removeSchedule(): Promise<void> {
    if (await fs.pathExists(this.schedulePath)) {
      await fs.remove(this.schedulePath);
      log.warn(`Removed ${this.schedulePath} so the next cycle starts over`);
    }
  }

  async loadPreviousState(): Promise<PreviousState | null> {
    const state = readPreviousState(await this.readJson(this.previousStatePath));
    if (state) {
      log.info(`Loaded previous state, published ${state.update ?? "unknown"}`);
    } else {
      log.info(`No previous state at ${this.previousStatePath}`);
    }
    return state;
  }

  async savePreviousState(file: ScheduleFile, now: Date = new Date()): Promise<void> {
    const state: PreviousState = {
      data: file.fact.data,
      update: file.fact.update,
      timestamp: now.toISOString(),
    };
    await this.writeJson(this.previousStatePath, state);
    log.info(`Saved current state to ${this.previousStatePath}, published ${state.update}`);
  }

  async saveGrid(name: string, grid: unknown): Promise<string> {
    const target = path.join(this.gridDir, `${name}.json`);
    await this.writeJson(target, grid);
    log.debug(`Saved grid plan ${target}`);
    return target;
  }

  async removeGrid(name: string): Promise<boolean> {
    const target = path.join(this.gridDir, `${name}.json`);
    if (!(await fs.pathExists(target))) {
      return false;
    }
    await fs.remove(target);
    log.info(`Removed stale grid plan ${target}`);
    return true;
  }

  private async readJson(filePath: string): Promise<unknown> {
    try {
      if (!(await fs.pathExists(filePath))) {
        return null;
      }

      const content: unknown = await fs.readJSON(filePath);
      return content;
    } catch (error) {
      log.warn(`Failed to read ${filePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJSON(filePath, value, { spaces: 2 });
  }
}
