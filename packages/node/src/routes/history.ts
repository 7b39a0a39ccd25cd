/**
 * Event history routes.
 *
 * GET    /api/v1/history         recorded events (include/exclude, cursor pagination)
 * GET    /api/v1/history/text    rendered history (filtered/highlighted, text or html)
 * GET    /api/v1/history/status  activation, size, listeners, capacity
 * GET    /api/v1/history/stream  live records as server-sent events
 * PUT    /api/v1/history/active  switch recording on or off
 * DELETE /api/v1/history         clear the history
 */

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { htmlEncoder, textEncoder } from "@hindsight/event-history";
import type { EventHistoryListener, EventRecord } from "@hindsight/event-history";
import type { AppEnv } from "../types/api-contract.js";
import {
  HistoryQuerySchema,
  HistoryTextQuerySchema,
  SetActiveSchema,
  toEventRecordDto,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export interface HistoryRoutesOptions {
  /** Records queued for one stream client before it is disconnected. Default: 1000 */
  readonly streamBufferLimit?: number | undefined;
}

export function createHistoryRoutes(options: HistoryRoutesOptions = {}): Hono<AppEnv> {
  const streamBufferLimit = options.streamBufferLimit ?? 1000;
  const routes = new Hono<AppEnv>();

  // GET /api/v1/history
  routes.get("/", validateQuery(HistoryQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const records = c.get("service").history.events(query.include, query.exclude);
    const page = paginate(
      records,
      { cursor: query.cursor, limit: query.limit },
      (r) => r.occurredAt,
    );

    return c.json({
      data: page.data.map(toEventRecordDto),
      pagination: page.pagination,
    });
  });

  // GET /api/v1/history/text
  routes.get("/text", validateQuery(HistoryTextQuerySchema), (c) => {
    const { filtered, highlighted, format } = c.get("validatedQuery");
    const history = c.get("service").history;

    if (format === "html") {
      return c.html(history.toText(filtered, highlighted, htmlEncoder));
    }
    return c.text(history.toText(filtered, highlighted, textEncoder));
  });

  // GET /api/v1/history/status
  routes.get("/status", (c) => {
    const history = c.get("service").history;
    return c.json({
      active: history.isActive(),
      size: history.size,
      listeners: history.listenerCount,
      capacity: history.capacity,
    });
  });

  // GET /api/v1/history/stream: the connection is a listener for its lifetime.
  // A client that lets more than `streamBufferLimit` records queue up is
  // sent one `overflow` event and disconnected.
  routes.get("/stream", (c) => {
    const history = c.get("service").history;
    const logger = c.get("logger");
    const requestId = c.get("requestId");

    return streamSSE(c, async (stream) => {
      const pending: EventRecord[] = [];
      let dropped = 0;
      let wake: (() => void) | undefined;

      const listener: EventHistoryListener = {
        eventOccurred: (record) => {
          if (dropped > 0) {
            dropped++;
          } else if (pending.length >= streamBufferLimit) {
            dropped = pending.length + 1;
            pending.length = 0;
          } else {
            pending.push(record);
          }
          wake?.();
        },
      };

      history.addListener(listener);
      stream.onAbort(() => {
        wake?.();
      });

      try {
        while (!stream.aborted) {
          if (dropped > 0) {
            logger.warn(
              { requestId, limit: streamBufferLimit, dropped },
              "History stream client fell behind, closing",
            );
            await stream.writeSSE({ event: "overflow", data: JSON.stringify({ dropped }) });
            return;
          }
          const record = pending.shift();
          if (record === undefined) {
            await new Promise<void>((resolve) => {
              wake = resolve;
            });
            wake = undefined;
            continue;
          }
          await stream.writeSSE({
            event: "record",
            id: String(record.occurredAt),
            data: JSON.stringify(toEventRecordDto(record)),
          });
        }
      } finally {
        history.removeListener(listener);
      }
    });
  });

  // PUT /api/v1/history/active
  routes.put("/active", validateBody(SetActiveSchema), (c) => {
    const history = c.get("service").history;
    history.setActive(c.get("validatedBody").active);
    return c.json({ active: history.isActive() });
  });

  // DELETE /api/v1/history
  routes.delete("/", (c) => {
    c.get("service").history.clear();
    return c.body(null, 204);
  });

  return routes;
}
