import { environment } from "../environments/environment.js";
import { Scenario, runScenario } from "../game/scenarios.js";
import { logger } from "../utils/logger.js";

const log = logger.create("Demo");

/**
 * Run each scenario and log expected vs actual.
 * Returns the process exit code: 1 when any scenario misses its expected score.
 */
export function runDemo(scenarios: readonly Scenario[]): number {
  log.info(`${environment.appTitle}: ${scenarios.length} scenarios`);

  let failures = 0;
  for (const scenario of scenarios) {
    const { actualScore, passed } = runScenario(scenario);
    const line = `${scenario.name}: rolls [${scenario.rolls.join(", ")}] expected ${scenario.expectedScore}, actual ${actualScore} ${passed ? "✓" : "✗"}`;
    if (passed) {
      log.info(line);
    } else {
      failures++;
      log.error(line);
    }
  }

  return failures === 0 ? 0 : 1;
}
