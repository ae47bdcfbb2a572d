/**
 * Request Context Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Hono } from "hono";
import { configureLogging, createLogger, setLogSink, type LogEntry } from "../logging";
import { requestContext, REQUEST_ID_HEADER, RESPONSE_TIME_HEADER } from "./request-context";

const log = createLogger("handler");

function createApp() {
  const app = new Hono();
  app.use("*", requestContext());
  app.get("/context", (c) => {
    log.error("handling");
    return c.text("ok");
  });
  app.get("/raw", () => new Response("raw body"));
  return app;
}

describe("Request Context", () => {
  let entries: LogEntry[];
  let restore: () => void;

  beforeEach(() => {
    configureLogging({ pretty: false });
    entries = [];
    restore = setLogSink((_level, line) => {
      entries.push(JSON.parse(line));
    });
  });

  afterEach(() => {
    restore();
  });

  it("generates a request ID and tags log lines with it", async () => {
    const res = await createApp().request("/context");

    const header = res.headers.get(REQUEST_ID_HEADER);
    expect(header).toMatch(/^req-[A-Za-z0-9_-]{12}$/);
    expect(entries).toHaveLength(1);
    expect(entries[0].correlationId).toBe(header);
  });

  it("passes through a client-supplied request ID", async () => {
    const res = await createApp().request("/context", { headers: { [REQUEST_ID_HEADER]: "client-42" } });

    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("client-42");
    expect(entries[0].correlationId).toBe("client-42");
  });

  it("ignores an overlong client request ID", async () => {
    const res = await createApp().request("/context", { headers: { [REQUEST_ID_HEADER]: "x".repeat(200) } });

    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(/^req-/);
  });

  it("sets the response time header", async () => {
    const res = await createApp().request("/context");

    expect(res.headers.get(RESPONSE_TIME_HEADER)).toMatch(/^\d+\.\d{2}ms$/);
  });

  it("adds headers to raw responses", async () => {
    const res = await createApp().request("/raw");

    expect(await res.text()).toBe("raw body");
    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(/^req-/);
  });

  it("does not leak the ID past the request", async () => {
    await createApp().request("/context");
    log.error("afterwards");

    expect(entries[1].correlationId).toBeUndefined();
  });
});
