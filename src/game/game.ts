import { InvalidRollError } from "../engine/errors.js";
import { scoreRolls, validateRoll } from "../engine/rules.js";
import { Pins } from "../engine/types.js";
import { logger } from "../utils/logger.js";

const log = logger.create("Game");

export interface IGame {
  recordRoll(pins: Pins): void;
  computeScore(): number;
  getRolls(): readonly Pins[];
}

/**
 * A single ten-pin game: an append-only record of rolls plus its score.
 *
 * Bonus balls after a tenth-frame strike or spare are recorded like any
 * other roll. Not safe for concurrent mutation; callers serialize access.
 *
 * @example
 * ```ts
 * const game = new Game();
 * game.recordRoll(10);
 * game.recordRoll(3);
 * game.recordRoll(4);
 * game.computeScore(); // 24
 * ```
 */
export class Game implements IGame {
  private readonly rolls: Pins[] = [];

  /**
   * Build a game by recording each roll in order.
   * Throws the first InvalidRollError hit; no game is returned in that case.
   */
  static replay(rolls: Iterable<Pins>): Game {
    const game = new Game();
    for (const pins of rolls) {
      game.recordRoll(pins);
    }
    return game;
  }

  /**
   * Record one roll. Rejects anything that is not an integer in 0-10
   * without touching the recorded rolls.
   */
  recordRoll(pins: Pins): void {
    const reason = validateRoll(pins);
    if (reason !== null) {
      log.debug(`Rejected roll ${String(pins)}: ${reason}`);
      throw new InvalidRollError(pins, reason);
    }

    // -0 passes validation; store it as 0
    this.rolls.push(pins === 0 ? 0 : pins);
    log.debug(`Recorded roll #${this.rolls.length}: ${pins}`);
  }

  /** Current total; rolls not yet thrown count 0 */
  computeScore(): number {
    return scoreRolls(this.rolls);
  }

  getRolls(): readonly Pins[] {
    return [...this.rolls];
  }
}
