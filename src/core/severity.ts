import { HOUR_STATES, HourState } from "../types";

const SEVERITY: Readonly<Record<HourState, number>> = {
  yes: 0,
  maybe: 2,
  mfirst: 2,
  msecond: 2,
  first: 3,
  second: 3,
  no: 4,
};

export function isHourState(value: unknown): value is HourState {
  return HOUR_STATES.some((state) => state === value);
}

/** Unknown or missing values read as "yes". */
export function normalizeState(value: unknown): HourState {
  return isHourState(value) ? value : "yes";
}

/** Ordering weight of a state; higher means more outage. */
export function severity(state: string): number {
  return isHourState(state) ? SEVERITY[state] : 0;
}
