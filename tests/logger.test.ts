/**
 * Dry test for the structured JSON logger.
 *
 * Tests:
 * 1. formatEntry produces one JSON object with level, timestamp, event and data
 * 2. warn goes to console.warn, error and critical to console.error
 * 3. entries below the minimum level are dropped
 * 4. truncateForLog shortens long caller speech
 *
 * Prerequisites: None
 * Usage: npx tsx tests/logger.test.ts
 */

import { formatEntry, logger, setLogLevel, getLogLevel, truncateForLog } from "../src/lib/logger.js";

let passed = 0;
let failed = 0;

function assert(condition: boolean, label: string) {
  if (condition) {
    console.log(`  ✓ ${label}`);
    passed++;
  } else {
    console.error(`  ✗ ${label}`);
    failed++;
  }
}

type Sink = "log" | "warn" | "error";

/** Run fn with console output captured instead of printed. */
function capture(fn: () => void): Array<{ sink: Sink; line: string }> {
  const captured: Array<{ sink: Sink; line: string }> = [];
  const original = { log: console.log, warn: console.warn, error: console.error };
  console.log = (line: string) => captured.push({ sink: "log", line });
  console.warn = (line: string) => captured.push({ sink: "warn", line });
  console.error = (line: string) => captured.push({ sink: "error", line });
  try {
    fn();
  } finally {
    console.log = original.log;
    console.warn = original.warn;
    console.error = original.error;
  }
  return captured;
}

async function main() {
  console.log("\n=== Logger tests ===\n");
  const initialLevel = getLogLevel();

  console.log("Test: formatEntry");
  {
    const entry = JSON.parse(formatEntry("info", "call_ended", { callId: "call-1", durationSeconds: 12.5 }));
    assert(entry.level === "info", "level field");
    assert(entry.event === "call_ended", "event field");
    assert(entry.callId === "call-1", "data merged into entry");
    assert(entry.durationSeconds === 12.5, "numeric data preserved");
    assert(!Number.isNaN(Date.parse(entry.timestamp)), "timestamp is ISO date");
  }

  console.log("\nTest: level routing");
  {
    setLogLevel("debug");
    const out = capture(() => {
      logger.debug("d");
      logger.info("i");
      logger.warn("w");
      logger.error("e");
      logger.critical("crisis_detected", { keywords: ["kill myself"] });
    });
    assert(out.length === 5, "all five levels emitted at debug");
    assert(out[0].sink === "log" && out[1].sink === "log", "debug/info → console.log");
    assert(out[2].sink === "warn", "warn → console.warn");
    assert(out[3].sink === "error", "error → console.error");
    assert(out[4].sink === "error", "critical → console.error");
    const critical = JSON.parse(out[4].line);
    assert(critical.level === "critical", "critical level recorded");
    assert(critical.keywords[0] === "kill myself", "critical carries data");
  }

  console.log("\nTest: minimum level");
  {
    setLogLevel("error");
    const out = capture(() => {
      logger.info("quiet");
      logger.warn("quiet");
      logger.error("loud");
      logger.critical("louder");
    });
    assert(out.length === 2, "only error and critical pass at error level");
    assert(JSON.parse(out[0].line).event === "loud", "error entry kept");
  }

  console.log("\nTest: truncateForLog");
  assert(truncateForLog("short") === "short", "short text untouched");
  assert(truncateForLog("abcdefghij", 4) === "abcd...", "long text cut with ellipsis");
  assert(truncateForLog("x".repeat(120)) === "x".repeat(120), "exactly max is untouched");

  setLogLevel(initialLevel);

  console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);
  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error("Test runner error:", err);
  process.exit(1);
});
