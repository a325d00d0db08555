/**
 * Canned demo scenarios
 * Labelled roll sequences with their known final scores
 */

import { readFileSync } from "node:fs";
import { Pins } from "../engine/types.js";
import { Game } from "./game.js";

export interface Scenario {
  name: string;
  description?: string;
  rolls: Pins[];
  expectedScore: number;
}

export interface ScenarioResult {
  scenario: Scenario;
  actualScore: number;
  passed: boolean;
}

const SCENARIOS_URL = new URL("../../data/scenarios.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function parseScenario(value: unknown, index: number): Scenario {
  if (!isRecord(value)) {
    throw new Error(`Scenario #${index} is not an object`);
  }

  const { name, description, rolls, expectedScore } = value;
  if (typeof name !== "string" || !name.trim()) {
    throw new Error(`Scenario #${index} is missing a name`);
  }
  if (description !== undefined && typeof description !== "string") {
    throw new Error(`Scenario "${name}" has a non-string description`);
  }
  if (!isNumberArray(rolls)) {
    throw new Error(`Scenario "${name}" rolls must be an array of numbers`);
  }
  if (typeof expectedScore !== "number" || !Number.isInteger(expectedScore)) {
    throw new Error(`Scenario "${name}" expectedScore must be an integer`);
  }

  return {
    name: name.trim(),
    ...(description !== undefined ? { description } : {}),
    rolls: [...rolls],
    expectedScore,
  };
}

/**
 * Validate decoded scenario JSON
 *
 * @param raw - Parsed JSON (expected: array of scenarios)
 * @returns Scenarios in file order
 */
export function parseScenarios(raw: unknown): Scenario[] {
  if (!Array.isArray(raw)) {
    throw new Error("Scenario file must contain an array");
  }
  return raw.map((entry: unknown, index) => parseScenario(entry, index));
}

export function loadScenarios(url: URL = SCENARIOS_URL): Scenario[] {
  return parseScenarios(JSON.parse(readFileSync(url, "utf8")));
}

/**
 * Replay a scenario's rolls into a fresh game and compare the score.
 * An invalid roll in the scenario surfaces as InvalidRollError.
 */
export function runScenario(scenario: Scenario): ScenarioResult {
  const actualScore = Game.replay(scenario.rolls).computeScore();
  return {
    scenario,
    actualScore,
    passed: actualScore === scenario.expectedScore,
  };
}
