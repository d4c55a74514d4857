import { CellHalves, CellToken, HourState } from "../types";

function stateSet(...states: HourState[]): ReadonlySet<string> {
  return new Set<string>(states);
}

// Neighbours that carry an outage across the cell edge for first/second cells
const EXTENDS_FIRST = stateSet("no", "first", "maybe");
const EXTENDS_SECOND = stateSet("no", "second", "maybe");

// Neighbours a "maybe" half-cell takes its solid half from
const CONTINUES_AFTER_MFIRST = stateSet("no", "first");
const CONTINUES_BEFORE_MSECOND = stateSet("no", "second");

// Any outage of any kind, used on the day edges where one neighbour is missing
const ANY_OUTAGE = stateSet("no", "first", "second", "maybe", "mfirst", "msecond");

function whole(token: CellToken): CellHalves {
  return { left: token, right: token };
}

function outageIf(condition: boolean): CellToken {
  return condition ? "OUTAGE" : "AVAILABLE";
}

/**
 * Colors of the two halves of an hour cell. `previous` is undefined for the
 * first hour of the day and `next` for the last one; there is no wraparound.
 */
export function resolveCellHalves(
  state: string,
  previous: string | undefined,
  next: string | undefined
): CellHalves {
  switch (state) {
    case "yes":
      return whole("AVAILABLE");
    case "no":
      return whole("OUTAGE");
    case "maybe":
      return whole("POSSIBLE");
    case "first":
      return {
        left: "OUTAGE",
        right: outageIf(next !== undefined && EXTENDS_FIRST.has(next)),
      };
    case "second":
      return {
        left: outageIf(previous !== undefined && EXTENDS_SECOND.has(previous)),
        right: "OUTAGE",
      };
    case "mfirst":
      // Last hour: the previous hour decides, with inverted polarity
      return {
        left: "POSSIBLE",
        right:
          next !== undefined
            ? outageIf(CONTINUES_AFTER_MFIRST.has(next))
            : outageIf(previous === undefined || !ANY_OUTAGE.has(previous)),
      };
    case "msecond":
      return {
        left:
          previous !== undefined
            ? outageIf(CONTINUES_BEFORE_MSECOND.has(previous))
            : outageIf(next === undefined || !ANY_OUTAGE.has(next)),
        right: "POSSIBLE",
      };
    default:
      return whole("AVAILABLE");
  }
}

export function isSplit({ left, right }: CellHalves): boolean {
  return left !== right;
}
