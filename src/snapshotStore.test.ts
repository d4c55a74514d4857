import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readFactData, readScheduleFile, SnapshotStore } from "./snapshotStore";
import { ScheduleFile } from "./types";

const file: ScheduleFile = {
  regionId: "Zhytomyr",
  lastUpdated: "2025-11-14T08:00:00.000Z",
  fact: {
    data: { "1763071200": { "GPV1.1": { "1": "no", "2": "first" } } },
    update: "09:15 14.11.2025",
    today: 1763071200,
  },
  preset: { time_type: { yes: "Світло є" } },
};

describe("readFactData", () => {
  it("normalises unknown states and drops malformed entries", () => {
    expect(
      readFactData({
        "100": { G1: { "1": "no", "2": "blackout" }, G2: "broken" },
        "200": 5,
      })
    ).toEqual({ "100": { G1: { "1": "no", "2": "yes" } } });
  });

  it("returns an empty map for non-objects", () => {
    expect(readFactData(null)).toEqual({});
    expect(readFactData(["no"])).toEqual({});
  });
});

describe("readScheduleFile", () => {
  it("requires a fact section", () => {
    expect(readScheduleFile({ regionId: "Zhytomyr" })).toBeNull();
  });

  it("keeps pass-through metadata", () => {
    expect(readScheduleFile(JSON.parse(JSON.stringify(file)))).toEqual(file);
  });
});

describe("SnapshotStore", () => {
  let dir: string;
  let store: SnapshotStore;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "outage-grid-store-"));
    store = new SnapshotStore(dir, "Region");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("returns null before anything is saved", async () => {
    expect(await store.loadSchedule()).toBeNull();
    expect(await store.loadPreviousState()).toBeNull();
  });

  it("saves and loads the schedule file", async () => {
    await store.saveSchedule(file);

    expect(store.schedulePath).toBe(path.join(dir, "Region.json"));
    expect(await store.loadSchedule()).toEqual(file);
  });

  it("removes the schedule file", async () => {
    await store.saveSchedule(file);
    await store.removeSchedule();

    expect(await store.loadSchedule()).toBeNull();
    await expect(store.removeSchedule()).resolves.toBeUndefined();
  });

  it("treats unreadable JSON as missing", async () => {
    await fs.outputFile(store.schedulePath, "{ not json");
    expect(await store.loadSchedule()).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("keeps the previous state for the next comparison", async () => {
    const now = new Date(Date.UTC(2025, 10, 14, 8, 30));
    await store.savePreviousState(file, now);

    expect(await store.loadPreviousState()).toEqual({
      data: file.fact.data,
      update: "09:15 14.11.2025",
      timestamp: "2025-11-14T08:30:00.000Z",
    });
  });

  it("writes and removes grid plans", async () => {
    const target = await store.saveGrid("gpv-all-tomorrow", { rows: [] });

    expect(target).toBe(path.join(dir, "grids", "gpv-all-tomorrow.json"));
    expect(await fs.readJSON(target)).toEqual({ rows: [] });
    expect(await store.removeGrid("gpv-all-tomorrow")).toBe(true);
    expect(await store.removeGrid("gpv-all-tomorrow")).toBe(false);
  });
});
