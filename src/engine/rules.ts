import { FrameKind, InvalidRollReason, Pins } from "./types.js";

export const FRAME_COUNT = 10;
export const MIN_PINS = 0;
export const MAX_PINS = 10;

/**
 * Check a single roll. Returns null when the roll can be recorded.
 * Frame totals are not checked here: two rolls of an open frame may sum past 10.
 */
export function validateRoll(pins: unknown): InvalidRollReason | null {
  if (typeof pins !== "number" || !Number.isInteger(pins)) return "NOT_INTEGER";
  if (pins < MIN_PINS || pins > MAX_PINS) return "OUT_OF_RANGE";
  return null;
}

/**
 * Roll at index, or 0 for a roll not thrown yet
 */
export function pinsAt(rolls: readonly Pins[], index: number): Pins {
  return rolls[index] ?? 0;
}

/**
 * Classify the frame starting at cursor
 */
export function classifyFrame(rolls: readonly Pins[], cursor: number): FrameKind {
  if (cursor < rolls.length && rolls[cursor] === MAX_PINS) return "STRIKE";
  if (cursor + 1 < rolls.length && rolls[cursor] + rolls[cursor + 1] === MAX_PINS) {
    return "SPARE";
  }
  return "OPEN";
}

/**
 * Total score over exactly 10 frames.
 *
 * Bonus balls thrown after the tenth frame are only read as lookahead for
 * frame 10 and never score as a frame of their own. Missing rolls count 0,
 * so an unfinished game scores what has been earned so far.
 *
 * @example
 * ```ts
 * scoreRolls(Array(12).fill(10)); // 300
 * scoreRolls([10, 3]);            // 16
 * ```
 */
export function scoreRolls(rolls: readonly Pins[]): number {
  let total = 0;
  let cursor = 0;

  for (let frame = 0; frame < FRAME_COUNT; frame++) {
    switch (classifyFrame(rolls, cursor)) {
      case "STRIKE":
        total += MAX_PINS + pinsAt(rolls, cursor + 1) + pinsAt(rolls, cursor + 2);
        cursor += 1;
        break;
      case "SPARE":
        total += MAX_PINS + pinsAt(rolls, cursor + 2);
        cursor += 2;
        break;
      case "OPEN":
        total += pinsAt(rolls, cursor) + pinsAt(rolls, cursor + 1);
        cursor += 2;
        break;
    }
  }

  return total;
}
