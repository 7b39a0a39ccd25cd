/**
 * Tests for health routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";

describe("GET /health", () => {
  it("returns ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("ok");
  });
});

describe("GET /ready", () => {
  it("is ready once the recorder is subscribed", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");
    expect(res.status).toBe(200);
  });

  it("is not ready before start or after stop", async () => {
    const { app, service } = createTestApp({ autoStart: false });
    expect((await app.request("/ready")).status).toBe(503);

    service.start();
    expect((await app.request("/ready")).status).toBe(200);

    service.stop();
    const res = await app.request("/ready");
    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("not_ready");
  });
});

describe("GET /ready recording flag", () => {
  it("reports whether the recorder is recording", async () => {
    const { app, service } = createTestApp();
    const dormant = (await (await app.request("/ready")).json()) as { recording: boolean };
    expect(dormant.recording).toBe(false);

    service.history.setActive(true);
    const active = (await (await app.request("/ready")).json()) as { recording: boolean };
    expect(active.recording).toBe(true);
  });
});
