import { loadScenarios } from "../game/scenarios.js";
import { runDemo } from "./runDemo.js";

function assertEqual<T>(actual: T, expected: T, message: string): void {
  if (actual !== expected) {
    throw new Error(`${message} (expected: ${String(expected)}, actual: ${String(actual)})`);
  }
}

function test(name: string, fn: () => void): void {
  try {
    fn();
    console.log(`✓ ${name}`);
  } catch (error) {
    console.error(`✗ ${name}`);
    throw error;
  }
}

function captureConsole(fn: () => number): { code: number; lines: string[] } {
  const lines: string[] = [];
  const original = { log: console.log, error: console.error };
  // only the demo's own lines; Game debug output is ignored
  const record = (...args: unknown[]) => {
    const line = args.map(String).join(" ");
    if (line.includes("[Demo]")) lines.push(line);
  };
  console.log = record;
  console.error = record;
  try {
    return { code: fn(), lines };
  } finally {
    console.log = original.log;
    console.error = original.error;
  }
}

test("exits 0 when every bundled scenario matches", () => {
  const { code, lines } = captureConsole(() => runDemo(loadScenarios()));
  assertEqual(code, 0, "Expected success exit code");
  assertEqual(lines.length, 6, "Expected a header plus one line per scenario");
  assertEqual(
    lines[4],
    "ℹ️ [INFO] [Demo] Gutter Game: rolls [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0] expected 0, actual 0 ✓",
    "Expected gutter game line"
  );
});

test("exits 1 when a scenario misses its expected score", () => {
  const { code, lines } = captureConsole(() =>
    runDemo([
      { name: "Strike then 3, 4", rolls: [10, 3, 4], expectedScore: 24 },
      { name: "Wrong total", rolls: [5, 5, 3], expectedScore: 20 },
    ])
  );
  assertEqual(code, 1, "Expected failure exit code");
  assertEqual(
    lines[2],
    "❌ [ERROR] [Demo] Wrong total: rolls [5, 5, 3] expected 20, actual 16 ✗",
    "Expected failing scenario line"
  );
});

test("exits 0 with no scenarios", () => {
  const { code } = captureConsole(() => runDemo([]));
  assertEqual(code, 0, "Expected success exit code");
});

console.log("\nDemo tests passed! ✓");
