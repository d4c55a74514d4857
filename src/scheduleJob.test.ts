import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildScheduleFile, runCycle } from "./scheduleJob";
import { ScheduleParser } from "./scheduleParser";
import { SnapshotStore } from "./snapshotStore";
import { queueTable, schedulePage, slots } from "./testing/schedulePage";

const KYIV = "Europe/Kyiv";
const TODAY = "1763071200"; // 14.11.2025
const NOW = new Date(Date.UTC(2025, 10, 14, 8, 0)); // 10:00 in Kyiv

const page = (first: number[], second: number[], count = 48): string =>
  schedulePage(
    [
      queueTable("14.11.2025", [
        { subgroup: "1.1", colors: slots(first, count) },
        { subgroup: "1.2", colors: slots(second) },
      ]),
    ],
    "09:15 14.11.2025"
  );

describe("runCycle", () => {
  let dir: string;
  let store: SnapshotStore;
  let html: string;

  const run = () =>
    runCycle({
      source: { fetchPage: () => Promise.resolve(html) },
      parser: new ScheduleParser(KYIV),
      store,
      regionId: "Zhytomyr",
      timezone: KYIV,
      now: () => NOW,
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "outage-grid-job-"));
    store = new SnapshotStore(dir, "Region");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("stores the first snapshot without change highlights", async () => {
    html = page([0, 1, 3, 4], []);

    const result = await run();

    expect(result).toEqual({
      updated: true,
      worse: 0,
      better: 0,
      malformed: 0,
      grids: [
        path.join(store.gridDir, "gpv-1-1-emergency.json"),
        path.join(store.gridDir, "gpv-1-2-emergency.json"),
        path.join(store.gridDir, "gpv-all-today.json"),
      ],
    });

    const saved = await store.loadSchedule();
    expect(saved?.regionId).toBe("Zhytomyr");
    expect(saved?.fact.update).toBe("09:15 14.11.2025");
    expect(saved?.fact.today).toBe(1763071200);
    expect(saved?.fact.data[TODAY]?.["GPV1.1"]).toMatchObject({
      "1": "no",
      "2": "second",
      "3": "first",
      "4": "yes",
    });

    const previous = await store.loadPreviousState();
    expect(previous?.data).toEqual(saved?.fact.data);
    expect(previous?.timestamp).toBe("2025-11-14T08:00:00.000Z");
  });

  it("skips the write when nothing changed", async () => {
    html = page([0, 1], []);
    await run();

    expect(await run()).toEqual({ updated: false, reason: "unchanged" });
  });

  it("counts changes against the previous state", async () => {
    html = page([0, 1, 3, 4], []);
    await run();

    html = page([], [8, 9]);
    const result = await run();

    expect(result).toMatchObject({ updated: true, worse: 1, better: 3 });
    const grid: unknown = await fs.readJSON(path.join(store.gridDir, "gpv-1-2-emergency.json"));
    expect(grid).toMatchObject({ badge: "Черга 1.2", worse: 1, better: 0 });
  });

  it("reports a page without schedule tables", async () => {
    html = schedulePage([], "09:15 14.11.2025");

    expect(await run()).toEqual({ updated: false, reason: "no-schedule" });
    expect(await store.loadSchedule()).toBeNull();
  });

  it("keeps a group with a short row as available all day", async () => {
    html = page([0, 1], [2, 3], 47);

    const result = await run();

    expect(result).toMatchObject({ updated: true, malformed: 1 });
    const saved = await store.loadSchedule();
    expect(Object.values(saved?.fact.data[TODAY]?.["GPV1.1"] ?? {})).toEqual(
      Array.from({ length: 24 }, () => "yes")
    );
    expect(saved?.fact.data[TODAY]?.["GPV1.2"]?.["2"]).toBe("no");
  });

  it("retries a change whose grids failed to save", async () => {
    html = page([], []);
    await run();

    html = page([0, 1], []);
    vi.spyOn(store, "saveGrid").mockRejectedValueOnce(new Error("disk full"));
    await expect(run()).rejects.toThrow("disk full");
    expect(await store.loadSchedule()).toBeNull();

    const retried = await run();

    expect(retried).toMatchObject({ updated: true, worse: 1, better: 0 });
    const previous = await store.loadPreviousState();
    expect(previous?.data[TODAY]?.["GPV1.1"]?.["1"]).toBe("no");
  });

  it("drops a stale tomorrow overview", async () => {
    await store.saveGrid("gpv-all-tomorrow", {});
    html = page([0, 1], []);

    await run();

    expect(await fs.pathExists(path.join(store.gridDir, "gpv-all-tomorrow.json"))).toBe(false);
  });
});

describe("buildScheduleFile", () => {
  it("fills the publication metadata and preset", () => {
    const file = buildScheduleFile({}, "09:15 14.11.2025", NOW, "Zhytomyr", KYIV);

    expect(file.lastUpdated).toBe("2025-11-14T08:00:00.000Z");
    expect(file.fact.today).toBe(1763071200);
    expect(file.preset?.time_zone?.["1"]).toEqual(["00-01", "00:00", "01:00"]);
    expect(file.preset?.time_zone?.["24"]).toEqual(["23-24", "23:00", "24:00"]);
    expect(file.preset?.time_type?.no).toBe("Світла немає");
  });
});
