export { Game } from "./game/game.js";
export type { IGame } from "./game/game.js";
export { InvalidRollError } from "./engine/errors.js";
export {
  FRAME_COUNT,
  MAX_PINS,
  MIN_PINS,
  classifyFrame,
  pinsAt,
  scoreRolls,
  validateRoll,
} from "./engine/rules.js";
export type { FrameKind, InvalidRollReason, Pins } from "./engine/types.js";
export { loadScenarios, parseScenarios, runScenario } from "./game/scenarios.js";
export type { Scenario, ScenarioResult } from "./game/scenarios.js";
export { logger, Logger, LogLevel, resolveMinLogLevel } from "./utils/logger.js";
export { runDemo } from "./cli/runDemo.js";
export type { ILogger } from "./utils/logger.js";
