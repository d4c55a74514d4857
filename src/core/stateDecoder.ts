import { InvalidSampleCountError } from "../errors";
import { GroupSchedule, HOURS_PER_DAY, HourState, SLOTS_PER_DAY } from "../types";

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const OUTAGE_MIN_RED = 200;
const OUTAGE_MAX_GREEN_BLUE = 80;

/** Red-dominant cells are blackout slots; every other color is "available". */
export function isOutageColor({ r, g, b }: RgbColor): boolean {
  return (
    r > OUTAGE_MIN_RED && g < OUTAGE_MAX_GREEN_BLUE && b < OUTAGE_MAX_GREEN_BLUE
  );
}

export function parseHexColor(hex: string): RgbColor | undefined {
  const match = hex.trim().match(/^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return undefined;
  }

  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}

export function isOutageHex(hex: string): boolean {
  const color = parseHexColor(hex);
  return color ? isOutageColor(color) : false;
}

export function decodeHour(firstHalf: boolean, secondHalf: boolean): HourState {
  if (firstHalf && secondHalf) {
    return "no";
  }
  if (firstHalf) {
    return "first";
  }
  if (secondHalf) {
    return "second";
  }
  return "yes";
}

/**
 * Folds 48 half-hour outage flags into 24 hourly states keyed "1".."24".
 * Throws InvalidSampleCountError for any other number of flags.
 */
export function decodeGroupFlags(
  flags: readonly boolean[],
  groupId?: string
): GroupSchedule {
  if (flags.length !== SLOTS_PER_DAY) {
    throw new InvalidSampleCountError(flags.length, groupId);
  }

  const schedule: GroupSchedule = {};
  for (let hour = 1; hour <= HOURS_PER_DAY; hour++) {
    const idx = (hour - 1) * 2;
    schedule[String(hour)] = decodeHour(
      flags[idx] === true,
      flags[idx + 1] === true
    );
  }
  return schedule;
}
