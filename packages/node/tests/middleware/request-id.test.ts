/**
 * Tests for request ID middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";
import { REQUEST_ID_HEADER, resolveRequestId } from "../../src/middleware/request-id.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("resolveRequestId", () => {
  it("keeps a well-formed id", () => {
    expect(resolveRequestId("trace.abc:42-x_y")).toBe("trace.abc:42-x_y");
  });

  it("replaces missing, unsafe or overlong ids", () => {
    expect(resolveRequestId(undefined)).toMatch(UUID);
    expect(resolveRequestId("")).toMatch(UUID);
    expect(resolveRequestId("has space")).toMatch(UUID);
    expect(resolveRequestId("x".repeat(129))).toMatch(UUID);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes an incoming request ID", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { [REQUEST_ID_HEADER]: "req-42" } });
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("req-42");
  });

  it("generates a UUID when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");
    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(UUID);
  });

  it("sets the header on error responses", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events", {
      method: "POST",
      headers: { "Content-Type": "application/json", [REQUEST_ID_HEADER]: "req-err" },
      body: "{}",
    });
    expect(res.status).toBe(400);
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("req-err");
  });
});
