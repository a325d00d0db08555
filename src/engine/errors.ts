import { MAX_PINS, MIN_PINS } from "./rules.js";
import { InvalidRollReason } from "./types.js";

function describeReason(reason: InvalidRollReason): string {
  switch (reason) {
    case "NOT_INTEGER":
      return "pins must be an integer";
    case "OUT_OF_RANGE":
      return `pins must be between ${MIN_PINS} and ${MAX_PINS} inclusive`;
  }
}

/**
 * Thrown by Game.recordRoll when a roll is rejected. The game is left untouched.
 */
export class InvalidRollError extends Error {
  readonly pins: unknown;
  readonly reason: InvalidRollReason;

  constructor(pins: unknown, reason: InvalidRollReason) {
    super(`${describeReason(reason)} (got ${String(pins)})`);
    this.name = "InvalidRollError";
    this.pins = pins;
    this.reason = reason;
  }
}
