import * as cheerio from "cheerio";
import { isOutageHex } from "./core/stateDecoder";
import { createLogger } from "./logger";
import {
  addDays,
  calendarDateOf,
  dayStartTimestamp,
  formatDate,
  formatUpdateStamp,
} from "./time";
import { RawDaySamples, RawGroupSamples } from "./types";

const log = createLogger("parser");

const UPDATE_PATTERN =
  /Дата оновлення інформації[^0-9]*(\d{2}):(\d{2})\s*(\d{2})\.(\d{2})\.(\d{4})/;
const SUBGROUP_PATTERN = /^\d+\.\d+$/;
const BACKGROUND_PATTERN = /background(?:-color)?\s*:\s*#([0-9a-f]{6})\b/gi;

export interface ParseResult {
  days: RawDaySamples[];
  update: string;
  updateFound: boolean;
}

/**
 * Pulls half-hour outage flags out of the utility's schedule page. The page
 * carries one table per date (today and tomorrow) headed by a bold
 * "DD.MM.YYYY"; each queue row links to `pidcherga_id=…` and paints 48
 * half-hour cells with inline background colors.
 */
export class ScheduleParser {
  constructor(private readonly timezone: string) {}

  parse(html: string, now: Date = new Date()): ParseResult {
    const $ = cheerio.load(html);
    const today = calendarDateOf(now, this.timezone);
    const days: RawDaySamples[] = [];

    for (const date of [today, addDays(today, 1)]) {
      const dateStr = formatDate(date);
      log.debug(`Processing ${dateStr}`);

      const groups = this.parseTable($, dateStr);
      if (groups.length === 0) {
        log.warn(`No schedule for ${dateStr}`);
        continue;
      }

      days.push({
        dayKey: String(dayStartTimestamp(date, this.timezone)),
        date: dateStr,
        groups,
      });
      log.info(`Added ${groups.length} group(s) for ${dateStr}`);
    }

    const published = this.extractUpdate($);
    if (published) {
      log.debug(`Update time: ${published}`);
      return { days, update: published, updateFound: true };
    }

    const fallback = formatUpdateStamp(now, this.timezone);
    log.warn(`Update time not found, using current: ${fallback}`);
    return { days, update: fallback, updateFound: false };
  }

  private extractUpdate($: cheerio.CheerioAPI): string | undefined {
    const text = $.root().text().replace(/\s+/g, " ");
    const match = text.match(UPDATE_PATTERN);
    if (!match) {
      return undefined;
    }

    const [, hh, mm, dd, month, yyyy] = match;
    return `${hh}:${mm} ${dd}.${month}.${yyyy}`;
  }

  private parseTable($: cheerio.CheerioAPI, dateStr: string): RawGroupSamples[] {
    // The heading either sits inside its table or right before it
    const nodes = $("b, table").toArray();
    let found: (typeof nodes)[number] | undefined;
    let headingSeen = false;

    for (const node of nodes) {
      if (!headingSeen) {
        if (node.tagName === "b" && $(node).text().trim() === dateStr) {
          found = $(node).parents("table").get(0);
          if (found) {
            break;
          }
          headingSeen = true;
        }
        continue;
      }
      if (node.tagName === "table") {
        found = node;
        break;
      }
    }

    if (!found) {
      log.debug(`No table found for ${dateStr}`);
      return [];
    }

    const table = $(found);
    const groups: RawGroupSamples[] = [];
    const seen = new Set<string>();

    table.find("a[href*='pidcherga_id='] b").each((_, label) => {
      const subgroup = $(label).text().trim();
      if (!SUBGROUP_PATTERN.test(subgroup)) {
        return;
      }

      const groupId = `GPV${subgroup}`;
      if (seen.has(groupId)) {
        return;
      }
      seen.add(groupId);

      const row = $(label).closest("tr");
      if (row.length === 0) {
        log.warn(`${groupId}: <tr> not found`);
        return;
      }

      const flags: boolean[] = [];
      row
        .find("[style]")
        .addBack("[style]")
        .each((__, cell) => {
          const style = $(cell).attr("style") ?? "";
          for (const match of style.matchAll(BACKGROUND_PATTERN)) {
            flags.push(isOutageHex(match[1] ?? ""));
          }
        });

      log.debug(`${groupId}: found ${flags.length} half-hour slots`);
      groups.push({ groupId, flags });
    });

    return groups;
  }
}
