#!/usr/bin/env node
/**
 * Runs the canned scenarios and reports expected vs actual scores.
 * Exits with code 1 when any scenario scores differently than expected.
 */

import { loadScenarios } from "../game/scenarios.js";
import { runDemo } from "./runDemo.js";

process.exitCode = runDemo(loadScenarios());
