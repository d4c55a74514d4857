import { SLOTS_PER_DAY } from "./types";

export class InvalidSampleCountError extends Error {
  readonly expected = SLOTS_PER_DAY;

  constructor(
    readonly actual: number,
    readonly groupId?: string
  ) {
    super(
      `${groupId ? `${groupId}: ` : ""}found ${actual} half-hour slots, expected ${SLOTS_PER_DAY}`
    );
    this.name = "InvalidSampleCountError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
