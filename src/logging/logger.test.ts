/**
 * Logger Tests
 *
 * Run with: node --import tsx --test src/logging/logger.test.ts
 */

import { describe, it, before, after } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry } from "./logger.js";
import { generateRunId, getRunId, initRunId } from "./run-id.js";

describe("formatLogEntry", () => {
  it("formats timestamp, level, run id and message", () => {
    assert.equal(
      formatLogEntry("error", "boom", undefined, "2024-01-01T00:00:00.000Z"),
      "[2024-01-01T00:00:00.000Z] [ERROR] [no-run-id] boom"
    );
  });

  it("appends non-empty context as JSON", () => {
    assert.equal(
      formatLogEntry("info", "loaded", { topics: 4 }, "2024-01-01T00:00:00.000Z"),
      '[2024-01-01T00:00:00.000Z] [INFO ] [no-run-id] loaded {"topics":4}'
    );
    assert.equal(
      formatLogEntry("info", "loaded", {}, "2024-01-01T00:00:00.000Z"),
      "[2024-01-01T00:00:00.000Z] [INFO ] [no-run-id] loaded"
    );
  });
});

describe("createLogger", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "logs-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("filters by level and binds context", () => {
    const logger = createLogger({
      level: "info",
      logDir: dir,
      logFile: "test.log",
      console: false,
      context: { command: "test" },
    });

    logger.debug("hidden");
    logger.info("shown", { n: 1 });
    logger.child({ topic: "a" }).warn("child");

    const lines = readFileSync(join(dir, "test.log"), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? "", /^\[[^\]]+\] \[INFO \] \[no-run-id\] shown \{"command":"test","n":1\}$/);
    assert.match(
      lines[1] ?? "",
      /^\[[^\]]+\] \[WARN \] \[no-run-id\] child \{"command":"test","topic":"a"\}$/
    );
  });
});

describe("run ids", () => {
  it("uses the date as prefix", () => {
    assert.match(generateRunId(new Date("2024-01-15T10:00:00Z")), /^20240115-[0-9a-f]{6}$/);
  });

  // Runs last: the entries above are formatted before any run id exists
  it("is unset until initialized, then kept", () => {
    assert.equal(getRunId(), null);
    const id = initRunId();
    assert.equal(getRunId(), id);
    assert.match(id, /^\d{8}-[0-9a-f]{6}$/);
  });
});
