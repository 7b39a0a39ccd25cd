/**
 * Test helpers for @hindsight/node.
 *
 * Apps are built with createApp and driven through app.request();
 * no server is started.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

/**
 * Create a test app with a small document/window type hierarchy.
 */
export function createTestApp(overrides: Partial<CreateAppOptions> = {}): AppInstance {
  return createApp({
    serviceConfig: {
      types: [
        { name: "document" },
        { name: "document.opened", parent: "document" },
        { name: "document.closed", parent: "document" },
        { name: "document.saved", parent: "document" },
        { name: "window" },
      ],
    },
    ...overrides,
  });
}

let eventCounter = 0;

/**
 * Body for POST /api/v1/events.
 */
export function eventBody(
  type: string,
  payload: Record<string, unknown> = {},
): Record<string, unknown> {
  eventCounter++;
  return {
    type,
    metadata: {
      eventId: `evt-${eventCounter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      source: "test",
    },
    payload,
  };
}

/** Request with an optional JSON body, addressed to the test app. */
export function jsonRequest(path: string, method = "GET", body?: unknown): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    ...(body === undefined ? {} : { body: JSON.stringify(body) }),
  });
}
