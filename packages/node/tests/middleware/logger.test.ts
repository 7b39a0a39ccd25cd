/**
 * Tests for request logging middleware.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { createTestApp, eventBody, jsonRequest } from "../setup.js";
import { levelForStatus } from "../../src/middleware/logger.js";

interface LogLine {
  level: number;
  msg: string;
  requestId: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk) as LogLine);
      },
    },
  );
  return { logger, lines };
}

describe("levelForStatus", () => {
  it("maps status classes to log levels", () => {
    expect(levelForStatus(200)).toBe("info");
    expect(levelForStatus(304)).toBe("info");
    expect(levelForStatus(404)).toBe("warn");
    expect(levelForStatus(500)).toBe("error");
  });
});

describe("requestLogger", () => {
  it("writes one line per request bound to the request id", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ requestLog: logger });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "GET /health 200",
      requestId: "req-1",
      method: "GET",
      path: "/health",
      status: 200,
    });
    expect(lines[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs accepted POST requests at info", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ requestLog: logger });

    await app.request(jsonRequest("/api/v1/events", "POST", eventBody("window")));

    expect(lines.map((l) => [l.level, l.msg])).toEqual([[30, "POST /api/v1/events 202"]]);
  });

  it("logs client errors at warn", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ requestLog: logger });

    await app.request(jsonRequest("/api/v1/events", "POST", { type: "" }));

    expect(lines.map((l) => [l.level, l.status])).toEqual([[40, 400]]);
  });
});
