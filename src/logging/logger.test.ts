import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  FileTransport,
  MemoryTransport,
  createDefaultFormatter,
  createTrackerLogger,
  isLogLevel,
  shouldLog,
  type LogTransport,
} from "./logger.js";

describe("log levels", () => {
  it("orders levels from trace to fatal", () => {
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("fatal", "fatal")).toBe(true);
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("TrackerLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below its level", () => {
    const transport = new MemoryTransport();
    const logger = createTrackerLogger("test", { level: "warn", transports: [transport] });

    logger.info("quiet");
    logger.warn("loud");
    expect(transport.messages()).toEqual(["loud"]);

    logger.setLevel("debug");
    logger.debug("now visible");
    expect(transport.messages("debug")).toEqual(["now visible"]);
  });

  it("names children after their parent and carries context", () => {
    const transport = new MemoryTransport();
    const logger = createTrackerLogger("main", { transports: [transport] });

    logger.child("registry").withContext({ scopeId: "g1", operation: "add" }).info("hello");

    expect(transport.entries[0]).toMatchObject({
      subsystem: "whoson/main/registry",
      message: "hello",
      scopeId: "g1",
      operation: "add",
    });
  });

  it("redacts secrets in messages and metadata", () => {
    const transport = new MemoryTransport();
    const logger = createTrackerLogger("test", { transports: [transport], redactPatterns: ["test-secret"] });

    logger.info("token=test-secret", { auth: "test-secret", nested: { value: "x test-secret" }, count: 2 });

    expect(transport.entries[0].message).toBe("token=[REDACTED]");
    expect(transport.entries[0].metadata).toEqual({ auth: "[REDACTED]", nested: { value: "x [REDACTED]" }, count: 2 });
  });

  it("keeps logging when a transport throws", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const broken: LogTransport = {
      name: "broken",
      write: () => {
        throw new Error("disk full");
      },
    };
    const transport = new MemoryTransport();
    const logger = createTrackerLogger("test", { transports: [broken, transport] });

    logger.error("still delivered");
    expect(transport.messages()).toEqual(["still delivered"]);
    expect(stderr).toHaveBeenCalledWith('log transport "broken" failed: Error: disk full\n');
  });
});

describe("createDefaultFormatter", () => {
  it("renders a single plain line", () => {
    const format = createDefaultFormatter({ colors: false });
    const line = format({
      timestamp: new Date("2024-01-01T00:00:00.000Z"),
      level: "info",
      subsystem: "whoson/tracker",
      message: "Added server play.test",
      metadata: { protocolKind: "java" },
      scopeId: "g1",
      operation: "addTarget",
    });
    expect(line).toBe('2024-01-01T00:00:00.000Z INFO  [whoson/tracker] Added server play.test (scope=g1 op=addTarget) {"protocolKind":"java"}');
  });
});

describe("FileTransport", () => {
  it("appends formatted lines and flushes on close", async () => {
    const dir = await mkdtemp(join(tmpdir(), "whoson-log-"));
    const filePath = join(dir, "whoson.log");
    const file = new FileTransport({ filePath, formatter: (e) => `${e.level} ${e.message}` });
    const logger = createTrackerLogger("file", { level: "debug", transports: [file] });

    logger.info("first");
    logger.debug("below the transport level");
    logger.warn("second");
    await file.close();

    expect(await readFile(filePath, "utf8")).toBe("info first\nwarn second\n");
    await rm(dir, { recursive: true, force: true });
  });
});
