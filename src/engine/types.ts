/**
 * Pins knocked down by a single roll (0-10)
 */
export type Pins = number;

/**
 * Frame classification, re-derived from the roll sequence on every scoring pass
 * - STRIKE: all 10 pins on the first roll of the frame
 * - SPARE: all 10 pins across the frame's two rolls
 * - OPEN: anything else, including frames still waiting on a roll
 */
export type FrameKind = "STRIKE" | "SPARE" | "OPEN";

/**
 * Why a roll was rejected
 * - NOT_INTEGER: not a number, or a number with a fractional part
 * - OUT_OF_RANGE: an integer outside 0-10
 */
export type InvalidRollReason = "NOT_INTEGER" | "OUT_OF_RANGE";
